// src/index.ts
// Public API

// ═══════════════════════════════════════════════════════════════════════════════
// DECLARATION API
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./builder";

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./compiler";

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILED MODEL & TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./model";
export * from "./types";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES, CONFIG & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";
export * from "./config";
export * from "./log";

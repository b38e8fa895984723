// src/config/config.ts
// Compiler configuration: defaults, environment, JSON file, overrides

import * as fs from "fs";
import * as path from "path";
import { isLogLevel, type LogLevel } from "../log";

// =========================================================================
// Configuration Types
// =========================================================================

export type CompilerConfig = {
  /** Network baudrate used when none was declared */
  defaultBaudrate: number;
  /** Name of the bus synthesized when no bus was declared */
  defaultBusName: string;
  /** Interval given to free-running messages that declared none */
  defaultIntervalMs: number;
  /** Smallest bit width an enum signal gets (0 allows zero-width enums) */
  minEnumBits: number;
  logLevel: LogLevel;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: CompilerConfig = {
  defaultBaudrate: 1_000_000,
  defaultBusName: "can0",
  defaultIntervalMs: 60_000,
  minEnumBits: 1,
  logLevel: "warn",
};

export const DEFAULT_CONFIG_FILES = ["netc.config.json", ".netcrc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function intFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const parsed = parseInt(env[key] || "", 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration values present in the environment.
 * Only keys that are set show up in the result.
 */
export function configFromEnv(prefix = "NETC", env: NodeJS.ProcessEnv = process.env): Partial<CompilerConfig> {
  const config: Partial<CompilerConfig> = {};

  const baudrate = intFromEnv(env, `${prefix}_DEFAULT_BAUDRATE`);
  if (baudrate !== undefined) config.defaultBaudrate = baudrate;

  const busName = env[`${prefix}_DEFAULT_BUS_NAME`];
  if (busName) config.defaultBusName = busName;

  const interval = intFromEnv(env, `${prefix}_DEFAULT_INTERVAL_MS`);
  if (interval !== undefined) config.defaultIntervalMs = interval;

  const minEnumBits = intFromEnv(env, `${prefix}_MIN_ENUM_BITS`);
  if (minEnumBits !== undefined) config.minEnumBits = minEnumBits;

  const logLevel = env[`${prefix}_LOG_LEVEL`];
  if (isLogLevel(logLevel)) config.logLevel = logLevel;

  return config;
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): Partial<CompilerConfig> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }

  return configFromObject(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "number") return value;
  }
  return undefined;
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): Partial<CompilerConfig> {
  const config: Partial<CompilerConfig> = {};

  const baudrate = pickNumber(data, "defaultBaudrate", "default_baudrate");
  if (baudrate !== undefined) config.defaultBaudrate = baudrate;

  const busName = data.defaultBusName ?? data.default_bus_name;
  if (typeof busName === "string") config.defaultBusName = busName;

  const interval = pickNumber(data, "defaultIntervalMs", "default_interval_ms");
  if (interval !== undefined) config.defaultIntervalMs = interval;

  const minEnumBits = pickNumber(data, "minEnumBits", "min_enum_bits");
  if (minEnumBits !== undefined) config.minEnumBits = minEnumBits;

  const logLevel = data.logLevel ?? data.log_level;
  if (isLogLevel(logLevel)) config.logLevel = logLevel;

  return config;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<CompilerConfig>[]): CompilerConfig {
  let result: CompilerConfig = { ...DEFAULT_CONFIG };
  for (const cfg of configs) {
    result = { ...result, ...cfg };
  }
  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<CompilerConfig>;
}): CompilerConfig {
  const layers: Partial<CompilerConfig>[] = [configFromEnv("NETC", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        layers.push(configFromFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: CompilerConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.defaultBaudrate) || config.defaultBaudrate <= 0) {
    errors.push("defaultBaudrate must be a positive integer");
  } else if (config.defaultBaudrate > 1_000_000) {
    warnings.push("defaultBaudrate is above 1 Mbit/s, which classic CAN does not support");
  }
  if (config.defaultIntervalMs <= 0) {
    errors.push("defaultIntervalMs must be positive");
  }
  if (config.minEnumBits !== 0 && config.minEnumBits !== 1) {
    errors.push("minEnumBits must be 0 or 1");
  }
  if (!config.defaultBusName) {
    errors.push("defaultBusName must not be empty");
  }
  if (!isLogLevel(config.logLevel)) {
    errors.push(`Unknown log level: ${String(config.logLevel)}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

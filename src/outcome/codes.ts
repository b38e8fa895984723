import type { DeclarationRef, Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Type", template: "Invalid type descriptor: {descriptor}" },
  E0101: { code: "E0101", severity: "error", category: "Type", template: "Invalid range: {detail}" },
  E0102: { code: "E0102", severity: "error", category: "Type", template: "Undefined type: {name}" },
  E0103: { code: "E0103", severity: "error", category: "Type", template: "Cyclic type definition: {cycle}" },
  E0104: { code: "E0104", severity: "error", category: "Type", template: "Unsupported type: {detail}" },
  E0105: { code: "E0105", severity: "error", category: "Declaration", template: "Duplicate name: {name}" },

  E0200: { code: "E0200", severity: "error", category: "Identifier", template: "Duplicate message id {id} on bus {bus}" },
  E0201: { code: "E0201", severity: "error", category: "Identifier", template: "Message id {id} out of range for {format} frames" },
  E0202: { code: "E0202", severity: "error", category: "Identifier", template: "No free {format} id left on bus {bus}" },
  E0203: { code: "E0203", severity: "error", category: "Identifier", template: "Message {name} needs an explicit bus: {count} buses declared" },

  E0300: { code: "E0300", severity: "error", category: "Stream", template: "Invalid stream mapping: {detail}" },
  E0301: { code: "E0301", severity: "error", category: "Stream", template: "Stream type mismatch at position {position}: expected {expected}, got {actual}" },

  E0400: { code: "E0400", severity: "error", category: "Config", template: "Invalid compiler configuration: {detail}" },

  W0001: { code: "W0001", severity: "warning", category: "Frame", template: "Message {name} needs {dlc} bytes, more than a classic CAN frame carries" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  at?: DeclarationRef
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    at,
    data: params,
  };
}

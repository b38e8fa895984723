export type DiagnosticSeverity = "error" | "warning" | "info";

/**
 * Points at the declaration a diagnostic is about, e.g.
 * `{ kind: "struct", name: "motor_state", member: "rpm" }`.
 */
export interface DeclarationRef {
  kind: "type" | "struct" | "enum" | "message" | "node" | "bus" | "stream" | "command" | "object-entry";
  name: string;
  member?: string;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  at?: DeclarationRef;
  data?: Record<string, unknown>;
}

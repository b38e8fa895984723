export type { Diagnostic, DiagnosticSeverity, DeclarationRef } from "./diagnostic";
export type { DiagnosticCode } from "./codes";
export { DIAGNOSTIC_CODES, makeDiagnostic } from "./codes";
export type { Failure, FailureReason } from "./failure";
export { failure } from "./failure";
export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome";
export { done, fail, isDone, isFail } from "./outcome";
export type { ConfigErrorKind, FaultContext } from "./errors";
export { ConfigError, IntegrityFault } from "./errors";

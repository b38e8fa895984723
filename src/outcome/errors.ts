import type { DiagnosticCode } from "./codes";
import { makeDiagnostic } from "./codes";
import type { DeclarationRef, Diagnostic } from "./diagnostic";

export type ConfigErrorKind =
  | "InvalidType"
  | "InvalidRange"
  | "UndefinedType"
  | "CyclicType"
  | "UnsupportedType"
  | "DuplicateName"
  | "DuplicateMessageId"
  | "IdOutOfRange"
  | "IdSpaceExhausted"
  | "AmbiguousBus"
  | "InvalidStreamMapping"
  | "StreamTypeMismatch"
  | "InvalidConfig";

const KIND_CODES: Record<ConfigErrorKind, DiagnosticCode> = {
  InvalidType: "E0100",
  InvalidRange: "E0101",
  UndefinedType: "E0102",
  CyclicType: "E0103",
  UnsupportedType: "E0104",
  DuplicateName: "E0105",
  DuplicateMessageId: "E0200",
  IdOutOfRange: "E0201",
  IdSpaceExhausted: "E0202",
  AmbiguousBus: "E0203",
  InvalidStreamMapping: "E0300",
  StreamTypeMismatch: "E0301",
  InvalidConfig: "E0400",
};

/**
 * A declaration the compiler cannot accept. Aborts the whole build.
 */
export class ConfigError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(
    public readonly kind: ConfigErrorKind,
    public readonly params: Record<string, string | number>,
    at?: DeclarationRef
  ) {
    const diagnostic = makeDiagnostic(KIND_CODES[kind], params, at);
    super(diagnostic.message);
    this.name = "ConfigError";
    this.diagnostic = diagnostic;
  }

  get code(): string {
    return this.diagnostic.code;
  }

  /** The same error pinned to a declaration, unless it already names one. */
  locate(at: DeclarationRef): ConfigError {
    return this.diagnostic.at ? this : new ConfigError(this.kind, this.params, at);
  }
}

export interface FaultContext {
  entity: string;
  expected?: string;
  found?: string;
}

/**
 * Builder misuse: something the declaration API should never have let through.
 * Not recoverable and never turned into a Fail outcome.
 */
export class IntegrityFault extends Error {
  constructor(message: string, public readonly context: FaultContext) {
    super(`${message} (${describeContext(context)})`);
    this.name = "IntegrityFault";
  }
}

function describeContext(context: FaultContext): string {
  const parts = [`entity=${context.entity}`];
  if (context.expected !== undefined) parts.push(`expected=${context.expected}`);
  if (context.found !== undefined) parts.push(`found=${context.found}`);
  return parts.join(", ");
}

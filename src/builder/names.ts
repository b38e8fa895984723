import { ConfigError } from "../outcome/errors";
import type { DeclarationRef } from "../outcome/diagnostic";
import { isPrimitiveDescriptor } from "../types/resolve";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Declared names become signal and type names downstream, so they have to be
 * plain identifiers; type names additionally must not shadow the built-in grammar.
 */
export function checkIdentifier(name: string, at: DeclarationRef): void {
  if (!IDENTIFIER.test(name)) {
    throw new ConfigError("InvalidType", { descriptor: name }, at);
  }
}

export function checkTypeName(name: string, at: DeclarationRef): void {
  checkIdentifier(name, at);
  if (isPrimitiveDescriptor(name)) {
    throw new ConfigError("InvalidType", { descriptor: name }, at);
  }
}

export function checkUnique(existing: Iterable<string>, name: string, at: DeclarationRef): void {
  for (const other of existing) {
    if (other === name) {
      throw new ConfigError("DuplicateName", { name }, at);
    }
  }
}

import { ConfigError } from "../outcome/errors";
import type { EnumDeclaration, StructDeclaration, TypeDeclaration } from "./declaration";
import { resolveType } from "./resolve";
import type { EnumEntry, EnumType, NamedType, StructAttribute, StructType } from "./type";

export const U64_MAX = (1n << 64n) - 1n;

export interface ElaborateOptions {
  /** Floor for enum bit widths; 0 lets `{A=0}` compile to a zero-width signal */
  minEnumBits: number;
}

/**
 * Number of bits needed to hold `value`, i.e. `ceil(log2(value + 1))`.
 */
export function bitLength(value: bigint): number {
  return value === 0n ? 0 : value.toString(2).length;
}

export function elaborateEnum(decl: EnumDeclaration, typeId: number, options: ElaborateOptions): EnumType {
  const entries: EnumEntry[] = [];
  let max = 0n;
  let previous: bigint | undefined;

  for (const entry of decl.entries) {
    const value = entry.value ?? (previous === undefined ? 0n : previous + 1n);
    if (value < 0n || value > U64_MAX) {
      throw new ConfigError("InvalidRange", { detail: `enum value ${value} does not fit in 64 bits` }, {
        kind: "enum",
        name: decl.name,
        member: entry.name,
      });
    }
    entries.push({ name: entry.name, value });
    if (value > max) max = value;
    previous = value;
  }

  return {
    tag: "Enum",
    typeId,
    name: decl.name,
    description: decl.description,
    bits: Math.max(options.minEnumBits, bitLength(max)),
    entries,
    visibility: decl.visibility,
  };
}

/**
 * Attributes resolve against `defined`, so every type a struct references
 * must already be in it.
 */
export function elaborateStruct(
  decl: StructDeclaration,
  typeId: number,
  defined: readonly NamedType[]
): StructType {
  const attributes: StructAttribute[] = decl.attributes.map(attribute => {
    try {
      return { name: attribute.name, type: resolveType(attribute.descriptor, defined) };
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error.locate({ kind: "struct", name: decl.name, member: attribute.name });
      }
      throw error;
    }
  });

  return {
    tag: "Struct",
    typeId,
    name: decl.name,
    description: decl.description,
    attributes,
    visibility: decl.visibility,
  };
}

/**
 * Elaborate declarations that are already in dependency order.
 */
export function elaborateTypes(
  ordered: readonly TypeDeclaration[],
  options: ElaborateOptions
): NamedType[] {
  const types: NamedType[] = [];
  for (const decl of ordered) {
    const typeId = types.length;
    types.push(
      decl.tag === "Enum"
        ? elaborateEnum(decl, typeId, options)
        : elaborateStruct(decl, typeId, types)
    );
  }
  return types;
}

export type Visibility = "global" | "static";

/**
 * Wire representation of a single signal.
 * Decimals decode as `raw * scale + offset`.
 */
export type SignalType =
  | { readonly tag: "SignedInt"; readonly bits: number }
  | { readonly tag: "UnsignedInt"; readonly bits: number }
  | { readonly tag: "Decimal"; readonly bits: number; readonly offset: number; readonly scale: number };

export interface PrimitiveType {
  readonly tag: "Primitive";
  readonly signal: SignalType;
}

export interface StructAttribute {
  readonly name: string;
  readonly type: Type;
}

export interface StructType {
  readonly tag: "Struct";
  /** Position in the network's elaborated type list */
  readonly typeId: number;
  readonly name: string;
  readonly description?: string;
  readonly attributes: readonly StructAttribute[];
  readonly visibility: Visibility;
}

export interface EnumEntry {
  readonly name: string;
  readonly value: bigint;
}

export interface EnumType {
  readonly tag: "Enum";
  readonly typeId: number;
  readonly name: string;
  readonly description?: string;
  readonly bits: number;
  readonly entries: readonly EnumEntry[];
  readonly visibility: Visibility;
}

export interface ArrayType {
  readonly tag: "Array";
  readonly length: number;
  readonly element: Type;
}

export type Type = PrimitiveType | StructType | EnumType | ArrayType;
export type NamedType = StructType | EnumType;

/**
 * Total number of payload bits a value of this type occupies.
 */
export function bitSize(type: Type): number {
  switch (type.tag) {
    case "Primitive":
      return type.signal.bits;
    case "Enum":
      return type.bits;
    case "Struct":
      return type.attributes.reduce((sum, attr) => sum + bitSize(attr.type), 0);
    case "Array":
      return type.length * bitSize(type.element);
  }
}

export function maxRaw(bits: number): number {
  return Math.pow(2, bits) - 1;
}

export function decodeDecimal(signal: SignalType, raw: number): number {
  if (signal.tag !== "Decimal") return raw;
  return raw * signal.scale + signal.offset;
}

export function signalTypesEqual(a: SignalType, b: SignalType): boolean {
  if (a.tag !== b.tag || a.bits !== b.bits) return false;
  if (a.tag === "Decimal" && b.tag === "Decimal") {
    return a.offset === b.offset && a.scale === b.scale;
  }
  return true;
}

/**
 * Primitives and arrays compare structurally, named types by identity.
 */
export function typesEqual(a: Type, b: Type): boolean {
  if (a.tag === "Primitive" && b.tag === "Primitive") {
    return signalTypesEqual(a.signal, b.signal);
  }
  if (a.tag === "Array" && b.tag === "Array") {
    return a.length === b.length && typesEqual(a.element, b.element);
  }
  return a === b;
}

export function describeSignalType(signal: SignalType): string {
  switch (signal.tag) {
    case "SignedInt":
      return `i${signal.bits}`;
    case "UnsignedInt":
      return `u${signal.bits}`;
    case "Decimal": {
      const max = signal.offset + signal.scale * maxRaw(signal.bits);
      return `d${signal.bits}<${signal.offset}..${max}>`;
    }
  }
}

export function describeType(type: Type): string {
  switch (type.tag) {
    case "Primitive":
      return describeSignalType(type.signal);
    case "Struct":
    case "Enum":
      return type.name;
    case "Array":
      return `${describeType(type.element)}[${type.length}]`;
  }
}

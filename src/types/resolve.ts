import { ConfigError } from "../outcome/errors";
import type { NamedType, PrimitiveType, Type } from "./type";
import { maxRaw } from "./type";

const NUMBER = String.raw`[+-]?(?:[0-9]*\.)?[0-9]+`;
const RANGE = String.raw`<(${NUMBER})\.\.(${NUMBER})>`;

const INT_PATTERN = /^([iu])([0-9]{1,2})$/;
const DECIMAL_PATTERN = new RegExp(String.raw`^d([0-9]{1,2})${RANGE}$`);
const ARRAY_PATTERN = new RegExp(
  String.raw`^([A-Za-z_][A-Za-z0-9_]*(?:<${NUMBER}\.\.${NUMBER}>)?)\[([0-9]+)\]$`
);

export const MAX_SIGNAL_BITS = 64;

export interface ArrayDescriptor {
  inner: string;
  length: number;
}

export function parseArrayDescriptor(descriptor: string): ArrayDescriptor | undefined {
  const match = ARRAY_PATTERN.exec(descriptor);
  if (!match) return undefined;
  return { inner: match[1], length: parseInt(match[2], 10) };
}

/**
 * True when the descriptor is spelled with the built-in grammar
 * (`u8`, `i16`, `d10<0..1>`, or an array of those), independent of whether
 * the widths and ranges it names are valid.
 */
export function isPrimitiveDescriptor(descriptor: string): boolean {
  const array = parseArrayDescriptor(descriptor);
  const base = array ? array.inner : descriptor;
  return INT_PATTERN.test(base) || DECIMAL_PATTERN.test(base);
}

function validBits(bits: number): boolean {
  return bits >= 1 && bits <= MAX_SIGNAL_BITS;
}

function resolveInteger(descriptor: string): PrimitiveType | undefined {
  const match = INT_PATTERN.exec(descriptor);
  if (!match) return undefined;
  const bits = parseInt(match[2], 10);
  if (!validBits(bits)) return undefined;
  return {
    tag: "Primitive",
    signal: { tag: match[1] === "i" ? "SignedInt" : "UnsignedInt", bits },
  };
}

function resolveDecimal(descriptor: string): PrimitiveType | undefined {
  const match = DECIMAL_PATTERN.exec(descriptor);
  if (!match) return undefined;
  const bits = parseInt(match[1], 10);
  if (!validBits(bits)) return undefined;
  const min = parseFloat(match[2]);
  const max = parseFloat(match[3]);
  if (min >= max) {
    throw new ConfigError("InvalidRange", {
      detail: `decimal ${descriptor}: min has to be less than max`,
    });
  }
  return {
    tag: "Primitive",
    signal: { tag: "Decimal", bits, offset: min, scale: (max - min) / maxRaw(bits) },
  };
}

/**
 * Resolve a type descriptor. Grammar, tried in order:
 * `i<N>` / `u<N>`, `d<N><min..max>`, `<inner>[<len>]`, then the name of an
 * already elaborated struct or enum.
 */
export function resolveType(descriptor: string, defined: readonly NamedType[]): Type {
  const integer = resolveInteger(descriptor);
  if (integer) return integer;

  const decimal = resolveDecimal(descriptor);
  if (decimal) return decimal;

  const array = parseArrayDescriptor(descriptor);
  if (array) {
    if (array.length < 1) {
      throw new ConfigError("InvalidRange", { detail: `array ${descriptor} must have at least one element` });
    }
    return { tag: "Array", length: array.length, element: resolveType(array.inner, defined) };
  }

  const named = defined.find(type => type.name === descriptor);
  if (named) return named;

  throw new ConfigError("InvalidType", { descriptor });
}

import type { EnumEntry, SignalType, Type } from "../types/type";

export interface Signal {
  readonly name: string;
  readonly description?: string;
  readonly type: SignalType;
  /** Bit offset within the payload, counted from 0 */
  readonly offset: number;
  readonly bits: number;
  /** Entry names for enum-backed signals */
  readonly valueTable?: readonly EnumEntry[];
}

/**
 * Mirrors the shape of a field's type: one Primitive leaf per signal,
 * Composite nodes for structs and arrays.
 */
export type TypeSignalEncoding =
  | {
      readonly tag: "Primitive";
      readonly name: string;
      readonly type: Type;
      readonly signal: Signal;
    }
  | {
      readonly tag: "Composite";
      readonly name: string;
      readonly type: Type;
      readonly attributes: readonly TypeSignalEncoding[];
    };

export interface MessageEncoding {
  readonly attributes: readonly TypeSignalEncoding[];
}

/**
 * Smallest byte count holding every signal: `ceil(max(offset + bits) / 8)`.
 */
export function dataLengthOf(signals: readonly Signal[]): number {
  let maxBit = 0;
  for (const signal of signals) {
    maxBit = Math.max(maxBit, signal.offset + signal.bits);
  }
  return Math.ceil(maxBit / 8);
}

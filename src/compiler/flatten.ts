import type { DeclarationRef } from "../outcome/diagnostic";
import { ConfigError } from "../outcome/errors";
import type { RawSignalDeclaration, TypedFieldDeclaration } from "../builder/message";
import type { MessageEncoding, Signal, TypeSignalEncoding } from "../model/signal";
import { MAX_SIGNAL_BITS, resolveType } from "../types/resolve";
import type { NamedType, SignalType, Type } from "../types/type";

/**
 * Running bit position while laying out one message. Fields follow each
 * other with no padding.
 */
export class BitCursor {
  private position = 0;

  get offset(): number {
    return this.position;
  }

  take(bits: number): number {
    const start = this.position;
    this.position += bits;
    return start;
  }
}

export interface FlattenResult {
  signals: Signal[];
  encoding?: MessageEncoding;
}

/**
 * Explicit signal types skip the descriptor grammar, so they get the same
 * width and range limits checked here.
 */
function checkSignalType(signal: SignalType, at: DeclarationRef): SignalType {
  if (!Number.isInteger(signal.bits) || signal.bits < 1 || signal.bits > MAX_SIGNAL_BITS) {
    throw new ConfigError("InvalidRange", {
      detail: `signal width ${signal.bits} outside 1..${MAX_SIGNAL_BITS}`,
    }, at);
  }
  if (signal.tag === "Decimal") {
    if (!Number.isFinite(signal.offset) || !Number.isFinite(signal.scale) || signal.scale <= 0) {
      throw new ConfigError("InvalidRange", {
        detail: `decimal signal needs a finite offset and a positive scale, got offset ${signal.offset} scale ${signal.scale}`,
      }, at);
    }
  }
  return signal;
}

function rawSignalType(messageName: string, declared: RawSignalDeclaration): SignalType {
  const at = { kind: "message", name: messageName, member: declared.name } as const;
  if (typeof declared.type !== "string") return checkSignalType(declared.type, at);
  let resolved: Type;
  try {
    resolved = resolveType(declared.type, []);
  } catch (error) {
    if (error instanceof ConfigError) throw error.locate(at);
    throw error;
  }
  if (resolved.tag !== "Primitive") {
    throw new ConfigError("UnsupportedType", {
      detail: `raw signal ${declared.name} must be a primitive, got ${declared.type}`,
    }, at);
  }
  return resolved.signal;
}

/**
 * Lay out caller-supplied signals back to back. Names get the message name
 * as prefix.
 */
export function flattenSignals(messageName: string, declared: readonly RawSignalDeclaration[]): FlattenResult {
  const cursor = new BitCursor();
  const signals = declared.map((signal): Signal => {
    const type = rawSignalType(messageName, signal);
    return {
      name: `${messageName}_${signal.name}`,
      description: signal.description,
      type,
      offset: cursor.take(type.bits),
      bits: type.bits,
    };
  });
  return { signals };
}

/**
 * Flatten one value of `type` named `name` into signals, appending them to
 * `signals`. Struct attributes and array elements are laid out in order.
 */
export function flattenType(
  type: Type,
  name: string,
  prefix: string,
  cursor: BitCursor,
  signals: Signal[]
): TypeSignalEncoding {
  const path = `${prefix}_${name}`;

  switch (type.tag) {
    case "Primitive": {
      const signal: Signal = {
        name: path,
        type: type.signal,
        offset: cursor.take(type.signal.bits),
        bits: type.signal.bits,
      };
      signals.push(signal);
      return { tag: "Primitive", name, type, signal };
    }
    case "Enum": {
      const signal: Signal = {
        name: path,
        type: { tag: "UnsignedInt", bits: type.bits },
        offset: cursor.take(type.bits),
        bits: type.bits,
        valueTable: type.entries,
      };
      signals.push(signal);
      return { tag: "Primitive", name, type, signal };
    }
    case "Struct":
      return {
        tag: "Composite",
        name,
        type,
        attributes: type.attributes.map(attribute =>
          flattenType(attribute.type, attribute.name, path, cursor, signals)
        ),
      };
    case "Array": {
      const elements: TypeSignalEncoding[] = [];
      for (let index = 0; index < type.length; index++) {
        elements.push(flattenType(type.element, String(index), path, cursor, signals));
      }
      return { tag: "Composite", name, type, attributes: elements };
    }
  }
}

/**
 * Resolve and flatten the fields of a typed message format.
 */
export function flattenTypes(
  messageName: string,
  fields: readonly TypedFieldDeclaration[],
  types: readonly NamedType[]
): FlattenResult {
  const cursor = new BitCursor();
  const signals: Signal[] = [];
  const attributes = fields.map(field => {
    let type: Type;
    try {
      type = resolveType(field.descriptor, types);
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error.locate({ kind: "message", name: messageName, member: field.name });
      }
      throw error;
    }
    return flattenType(type, field.name, messageName, cursor, signals);
  });
  return { signals, encoding: { attributes } };
}

import { EXT_ID_MAX, STD_ID_MAX } from "../model/message";
import { ConfigError } from "../outcome/errors";
import type { SignalType, Visibility } from "../types/type";
import type { BusBuilder } from "./bus";
import { checkIdentifier, checkUnique } from "./names";
import type { NodeBuilder } from "./node";

/**
 * Identifier as declared. The `Any*` placeholders are replaced by concrete
 * ids during resolution; lower priority values receive lower ids.
 */
export type MessageIdTemplate =
  | { readonly tag: "Std"; readonly id: number }
  | { readonly tag: "Ext"; readonly id: number }
  | { readonly tag: "AnyStd"; readonly priority?: number }
  | { readonly tag: "AnyExt"; readonly priority?: number }
  | { readonly tag: "AnyAny"; readonly priority?: number };

export interface RawSignalDeclaration {
  readonly name: string;
  /** A primitive descriptor (`u8`, `d12<0..10>`) or an explicit signal type */
  readonly type: string | SignalType;
  readonly description?: string;
}

export class SignalFormatBuilder {
  private readonly declared: RawSignalDeclaration[] = [];

  constructor(private readonly messageName: string) {}

  addSignal(name: string, type: string | SignalType, description?: string): this {
    const at = { kind: "message", name: this.messageName, member: name } as const;
    checkIdentifier(name, at);
    checkUnique(this.declared.map(s => s.name), name, at);
    this.declared.push({ name, type, description });
    return this;
  }

  get signals(): readonly RawSignalDeclaration[] {
    return this.declared;
  }
}

export interface TypedFieldDeclaration {
  readonly descriptor: string;
  readonly name: string;
}

export class TypeFormatBuilder {
  private readonly declared: TypedFieldDeclaration[] = [];

  constructor(private readonly messageName: string) {}

  addType(descriptor: string, name: string): this {
    const at = { kind: "message", name: this.messageName, member: name } as const;
    checkIdentifier(name, at);
    checkUnique(this.declared.map(f => f.name), name, at);
    this.declared.push({ descriptor, name });
    return this;
  }

  get fields(): readonly TypedFieldDeclaration[] {
    return this.declared;
  }
}

export type MessageFormat =
  | { readonly tag: "Empty" }
  | { readonly tag: "Signals"; readonly format: SignalFormatBuilder }
  | { readonly tag: "Types"; readonly format: TypeFormatBuilder };

export class MessageBuilder {
  description?: string;
  visibility: Visibility = "global";
  idTemplate: MessageIdTemplate = { tag: "AnyAny" };
  bus?: BusBuilder;
  format: MessageFormat = { tag: "Empty" };
  private builtinMessage = false;

  constructor(
    readonly name: string,
    readonly expectedIntervalMs?: number
  ) {}

  /** Part of the object get/set protocol rather than user declared */
  get builtin(): boolean {
    return this.builtinMessage;
  }

  markBuiltin(): this {
    this.builtinMessage = true;
    return this;
  }

  setDescription(description: string): this {
    this.description = description;
    return this;
  }

  hide(): this {
    this.visibility = "static";
    return this;
  }

  setStdId(id: number): this {
    checkId(this.name, id, STD_ID_MAX, "standard");
    this.idTemplate = { tag: "Std", id };
    return this;
  }

  setExtId(id: number): this {
    checkId(this.name, id, EXT_ID_MAX, "extended");
    this.idTemplate = { tag: "Ext", id };
    return this;
  }

  setAnyStdId(priority?: number): this {
    this.idTemplate = { tag: "AnyStd", priority };
    return this;
  }

  setAnyExtId(priority?: number): this {
    this.idTemplate = { tag: "AnyExt", priority };
    return this;
  }

  setAnyId(priority?: number): this {
    this.idTemplate = { tag: "AnyAny", priority };
    return this;
  }

  assignBus(bus: BusBuilder): this {
    this.bus = bus;
    return this;
  }

  /**
   * Switch to a raw signal layout. Returns the existing format when the
   * message already has one.
   */
  makeSignalFormat(): SignalFormatBuilder {
    if (this.format.tag === "Signals") return this.format.format;
    const format = new SignalFormatBuilder(this.name);
    this.format = { tag: "Signals", format };
    return format;
  }

  /**
   * Switch to a typed layout. Returns the existing format when the
   * message already has one.
   */
  makeTypeFormat(): TypeFormatBuilder {
    if (this.format.tag === "Types") return this.format.format;
    const format = new TypeFormatBuilder(this.name);
    this.format = { tag: "Types", format };
    return format;
  }

  addTransmitter(node: NodeBuilder): this {
    node.addTxMessage(this);
    return this;
  }

  addReceiver(node: NodeBuilder): this {
    node.addRxMessage(this);
    return this;
  }
}

function checkId(name: string, id: number, max: number, format: string): void {
  if (!Number.isInteger(id) || id < 0 || id > max) {
    throw new ConfigError("IdOutOfRange", { id, format }, { kind: "message", name });
  }
}

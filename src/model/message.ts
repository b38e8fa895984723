import type { Visibility } from "../types/type";
import { WriteOnce } from "./cell";
import type { Bus } from "./bus";
import type { Command, Stream } from "./node";
import type { MessageEncoding, Signal } from "./signal";

/** Largest 11-bit standard identifier */
export const STD_ID_MAX = 0x7ff;
/** Largest 29-bit extended identifier */
export const EXT_ID_MAX = 0x1fffffff;

export type MessageId =
  | { readonly tag: "Standard"; readonly id: number }
  | { readonly tag: "Extended"; readonly id: number };

export type MessageUsage =
  | { readonly tag: "ProtocolGetReq" }
  | { readonly tag: "ProtocolGetResp" }
  | { readonly tag: "ProtocolSetReq" }
  | { readonly tag: "ProtocolSetResp" }
  | { readonly tag: "CommandRequest"; readonly command: Command }
  | { readonly tag: "CommandResponse"; readonly command: Command }
  | { readonly tag: "Stream"; readonly stream: Stream }
  | { readonly tag: "External"; readonly intervalMs: number };

export interface MessageInit {
  name: string;
  description?: string;
  id: MessageId;
  dlc: number;
  signals: readonly Signal[];
  encoding?: MessageEncoding;
  bus: Bus;
  visibility: Visibility;
}

export class Message {
  readonly name: string;
  readonly description?: string;
  readonly id: MessageId;
  /** Payload length in bytes */
  readonly dlc: number;
  readonly signals: readonly Signal[];
  /** Present for typed formats only */
  readonly encoding?: MessageEncoding;
  readonly bus: Bus;
  readonly visibility: Visibility;
  private readonly usageSlot: WriteOnce<MessageUsage>;

  constructor(init: MessageInit) {
    this.name = init.name;
    this.description = init.description;
    this.id = init.id;
    this.dlc = init.dlc;
    this.signals = init.signals;
    this.encoding = init.encoding;
    this.bus = init.bus;
    this.visibility = init.visibility;
    this.usageSlot = new WriteOnce(`message ${init.name} usage`);
  }

  get usage(): MessageUsage {
    return this.usageSlot.get();
  }

  hasUsage(): boolean {
    return this.usageSlot.isSet();
  }

  assignUsage(usage: MessageUsage): void {
    this.usageSlot.set(usage);
  }
}

export function formatMessageId(id: MessageId): string {
  const hex = `0x${id.id.toString(16).toUpperCase()}`;
  return id.tag === "Extended" ? `${hex}x` : hex;
}

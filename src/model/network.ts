import type { NamedType } from "../types/type";
import type { Bus } from "./bus";
import type { Message } from "./message";
import type { Node } from "./node";

export interface Network {
  readonly baudrate: number;
  readonly buildTime: Date;
  readonly nodes: readonly Node[];
  readonly messages: readonly Message[];
  readonly types: readonly NamedType[];
  readonly getReqMessage: Message;
  readonly getRespMessage: Message;
  readonly setReqMessage: Message;
  readonly setRespMessage: Message;
  readonly buses: readonly Bus[];
}

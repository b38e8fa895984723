import type { NamedType, Type, Visibility } from "../types/type";
import { WriteOnce } from "./cell";
import type { Bus } from "./bus";
import type { Message } from "./message";

export type ObjectEntryAccess = "read-only" | "read-write";

export interface ObjectEntryInit {
  name: string;
  description?: string;
  unit?: string;
  id: number;
  type: Type;
  access: ObjectEntryAccess;
  visibility: Visibility;
}

export class ObjectEntry {
  readonly name: string;
  readonly description?: string;
  readonly unit?: string;
  /** Sequential per node, starting at 0 */
  readonly id: number;
  readonly type: Type;
  readonly access: ObjectEntryAccess;
  readonly visibility: Visibility;
  private readonly nodeSlot: WriteOnce<Node>;

  constructor(init: ObjectEntryInit) {
    this.name = init.name;
    this.description = init.description;
    this.unit = init.unit;
    this.id = init.id;
    this.type = init.type;
    this.access = init.access;
    this.visibility = init.visibility;
    this.nodeSlot = new WriteOnce(`object entry ${init.name} node`);
  }

  get node(): Node {
    return this.nodeSlot.get();
  }

  attachTo(node: Node): void {
    this.nodeSlot.set(node);
  }
}

export interface Command {
  readonly name: string;
  readonly description?: string;
  readonly request: Message;
  readonly response: Message;
  readonly visibility: Visibility;
}

export interface Stream {
  readonly name: string;
  readonly description?: string;
  /** Positional; `undefined` marks a slot the owner does not use */
  readonly mapping: readonly (ObjectEntry | undefined)[];
  readonly message: Message;
  readonly visibility: Visibility;
}

export interface ExternCommand {
  /** Name of the node that owns and serves the command */
  readonly nodeName: string;
  readonly command: Command;
}

export interface Node {
  readonly name: string;
  readonly description?: string;
  /** Declaration order */
  readonly id: number;
  /** Every struct/enum this node touches, dependencies first */
  readonly types: readonly NamedType[];
  readonly commands: readonly Command[];
  readonly externCommands: readonly ExternCommand[];
  readonly txStreams: readonly Stream[];
  readonly rxStreams: readonly Stream[];
  readonly rxMessages: readonly Message[];
  readonly txMessages: readonly Message[];
  readonly objectEntries: readonly ObjectEntry[];
  readonly buses: readonly Bus[];
}

import { ConfigError, IntegrityFault } from "../outcome/errors";
import type { Visibility } from "../types/type";
import type { MessageBuilder } from "./message";
import type { NodeBuilder } from "./node";
import type { ObjectEntryBuilder } from "./objectEntry";

/**
 * Publishes object entries of `txNode`, in declaration order, on one message.
 */
export class StreamBuilder {
  description?: string;
  visibility: Visibility = "global";
  private readonly mapped: ObjectEntryBuilder[] = [];

  constructor(
    readonly name: string,
    readonly txNode: NodeBuilder,
    readonly message: MessageBuilder
  ) {}

  addEntry(entry: ObjectEntryBuilder): this {
    if (entry.node !== this.txNode) {
      throw new IntegrityFault("stream entry belongs to another node", {
        entity: `stream ${this.name}`,
        expected: this.txNode.name,
        found: entry.node.name,
      });
    }
    if (this.mapped.includes(entry)) {
      throw new ConfigError("DuplicateName", { name: entry.name }, {
        kind: "stream",
        name: this.name,
        member: entry.name,
      });
    }
    this.mapped.push(entry);
    this.message.makeTypeFormat().addType(entry.descriptor, entry.name);
    return this;
  }

  get entries(): readonly ObjectEntryBuilder[] {
    return this.mapped;
  }

  setDescription(description: string): this {
    this.description = description;
    this.message.setDescription(description);
    return this;
  }

  hide(): this {
    this.visibility = "static";
    return this;
  }
}

export interface StreamMappingDeclaration {
  readonly position: number;
  readonly entry: ObjectEntryBuilder;
}

/**
 * A subscription to another node's stream. Only the positions mapped here
 * are decoded into local object entries.
 */
export class ReceiveStreamBuilder {
  visibility: Visibility = "global";
  private readonly declared: StreamMappingDeclaration[] = [];

  constructor(
    readonly stream: StreamBuilder,
    readonly rxNode: NodeBuilder
  ) {}

  map(position: number, entry: ObjectEntryBuilder): this {
    if (entry.node !== this.rxNode) {
      throw new IntegrityFault("receive stream maps an entry of another node", {
        entity: `stream ${this.stream.name}`,
        expected: this.rxNode.name,
        found: entry.node.name,
      });
    }
    this.declared.push({ position, entry });
    return this;
  }

  /**
   * Map the publisher's entry called `publisherEntry` onto `entry`.
   */
  mapEntry(publisherEntry: string, entry: ObjectEntryBuilder): this {
    const position = this.stream.entries.findIndex(e => e.name === publisherEntry);
    if (position < 0) {
      throw new ConfigError("InvalidStreamMapping", {
        detail: `stream ${this.stream.name} has no entry ${publisherEntry}`,
      }, { kind: "stream", name: this.stream.name, member: publisherEntry });
    }
    return this.map(position, entry);
  }

  get mappings(): readonly StreamMappingDeclaration[] {
    return this.declared;
  }

  hide(): this {
    this.visibility = "static";
    return this;
  }
}

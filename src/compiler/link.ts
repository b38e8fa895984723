import type { BusBuilder } from "../builder/bus";
import type { CommandBuilder } from "../builder/command";
import type { MessageBuilder } from "../builder/message";
import type { NodeBuilder } from "../builder/node";
import type { ObjectEntryBuilder } from "../builder/objectEntry";
import type { ReceiveStreamBuilder, StreamBuilder } from "../builder/stream";
import type { Bus } from "../model/bus";
import type { Message } from "../model/message";
import { ObjectEntry, type Command, type ExternCommand, type Node, type Stream } from "../model/node";
import { ConfigError, IntegrityFault } from "../outcome/errors";
import { orderNamedTypes } from "../types/order";
import { resolveType } from "../types/resolve";
import { describeType, typesEqual, type NamedType, type Type } from "../types/type";

export interface LinkContext {
  readonly messages: ReadonlyMap<MessageBuilder, Message>;
  readonly buses: ReadonlyMap<BusBuilder, Bus>;
  /** Every elaborated type of the network, dependencies first */
  readonly types: readonly NamedType[];
}

// ─────────────────────────────────────────────────────────────────
// Lookup helpers
// ─────────────────────────────────────────────────────────────────

function lookup<K, V>(map: ReadonlyMap<K, V>, key: K, entity: string): V {
  const value = map.get(key);
  if (value === undefined) {
    throw new IntegrityFault("declaration missing from the compiled network", { entity });
  }
  return value;
}

function messageOf(ctx: LinkContext, builder: MessageBuilder): Message {
  return lookup(ctx.messages, builder, `message ${builder.name}`);
}

function collectNamed(type: Type, into: Set<NamedType>): void {
  switch (type.tag) {
    case "Primitive":
      return;
    case "Enum":
      into.add(type);
      return;
    case "Struct":
      if (into.has(type)) return;
      into.add(type);
      for (const attribute of type.attributes) collectNamed(attribute.type, into);
      return;
    case "Array":
      collectNamed(type.element, into);
      return;
  }
}

/**
 * Named types a node touches through its messages and object entries,
 * dependencies first.
 */
function typeClosure(messages: readonly Message[], entries: readonly ObjectEntry[]): NamedType[] {
  const used = new Set<NamedType>();
  for (const message of messages) {
    for (const attribute of message.encoding?.attributes ?? []) {
      collectNamed(attribute.type, used);
    }
  }
  for (const entry of entries) {
    collectNamed(entry.type, used);
  }
  return orderNamedTypes([...used].sort((a, b) => a.typeId - b.typeId));
}

// ─────────────────────────────────────────────────────────────────
// Per-node declarations
// ─────────────────────────────────────────────────────────────────

function compileObjectEntries(
  node: NodeBuilder,
  types: readonly NamedType[],
  into: Map<ObjectEntryBuilder, ObjectEntry>
): ObjectEntry[] {
  return node.objectEntries.map((builder, id) => {
    let type: Type;
    try {
      type = resolveType(builder.descriptor, types);
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error.locate({ kind: "node", name: node.name, member: builder.name });
      }
      throw error;
    }
    const entry = new ObjectEntry({
      name: builder.name,
      description: builder.description,
      unit: builder.unit,
      id,
      type,
      access: builder.access,
      visibility: builder.visibility,
    });
    into.set(builder, entry);
    return entry;
  });
}

function compileCommand(ctx: LinkContext, builder: CommandBuilder): Command {
  const command: Command = {
    name: builder.name,
    description: builder.description,
    request: messageOf(ctx, builder.request),
    response: messageOf(ctx, builder.response),
    visibility: builder.visibility,
  };
  command.request.assignUsage({ tag: "CommandRequest", command });
  command.response.assignUsage({ tag: "CommandResponse", command });
  return command;
}

function compileTxStream(
  ctx: LinkContext,
  builder: StreamBuilder,
  entries: ReadonlyMap<ObjectEntryBuilder, ObjectEntry>
): Stream {
  const stream: Stream = {
    name: builder.name,
    description: builder.description,
    mapping: builder.entries.map(entry => lookup(entries, entry, `object entry ${entry.name}`)),
    message: messageOf(ctx, builder.message),
    visibility: builder.visibility,
  };
  stream.message.assignUsage({ tag: "Stream", stream });
  return stream;
}

/**
 * Subscriber view of a stream: a slot per published entry, filled only
 * where the subscriber mapped one of its own entries.
 */
function compileRxStream(
  ctx: LinkContext,
  builder: ReceiveStreamBuilder,
  entries: ReadonlyMap<ObjectEntryBuilder, ObjectEntry>
): Stream {
  const published = builder.stream.entries.map(entry => lookup(entries, entry, `object entry ${entry.name}`));
  const mapping: (ObjectEntry | undefined)[] = published.map(() => undefined);

  for (const { position, entry } of builder.mappings) {
    const at = { kind: "stream", name: builder.stream.name, member: entry.name } as const;
    if (!Number.isInteger(position) || position < 0 || position >= published.length) {
      throw new ConfigError("InvalidStreamMapping", {
        detail: `position ${position} outside 0..${published.length - 1}`,
      }, at);
    }
    if (mapping[position] !== undefined) {
      throw new ConfigError("InvalidStreamMapping", {
        detail: `position ${position} mapped twice`,
      }, at);
    }
    const local = lookup(entries, entry, `object entry ${entry.name}`);
    const expected = published[position].type;
    if (!typesEqual(expected, local.type)) {
      throw new ConfigError("StreamTypeMismatch", {
        position,
        expected: describeType(expected),
        actual: describeType(local.type),
      }, { kind: "object-entry", name: entry.name });
    }
    mapping[position] = local;
  }

  return {
    name: builder.stream.name,
    description: builder.stream.description,
    mapping,
    message: messageOf(ctx, builder.stream.message),
    visibility: builder.visibility,
  };
}

function nodeBuses(ctx: LinkContext, node: NodeBuilder, messages: readonly Message[]): Bus[] {
  if (node.buses.length > 0) {
    return node.buses.map(bus => lookup(ctx.buses, bus, `bus ${bus.name}`));
  }
  const buses: Bus[] = [];
  for (const message of messages) {
    if (!buses.includes(message.bus)) buses.push(message.bus);
  }
  return buses.sort((a, b) => a.id - b.id);
}

// ─────────────────────────────────────────────────────────────────
// Linking
// ─────────────────────────────────────────────────────────────────

interface NodeParts {
  builder: NodeBuilder;
  objectEntries: ObjectEntry[];
  commands: Command[];
  txStreams: Stream[];
}

/**
 * Resolve every node's references into compiled messages, commands and
 * streams. Command and stream messages get their usage here.
 *
 * Runs in two passes so that extern commands and received streams can
 * point at declarations of nodes that come later.
 */
export function linkNodes(ctx: LinkContext, builders: readonly NodeBuilder[]): Node[] {
  const entries = new Map<ObjectEntryBuilder, ObjectEntry>();
  const commands = new Map<CommandBuilder, Command>();

  const parts: NodeParts[] = builders.map(builder => {
    const objectEntries = compileObjectEntries(builder, ctx.types, entries);
    const nodeCommands = builder.commands.map(command => {
      const compiled = compileCommand(ctx, command);
      commands.set(command, compiled);
      return compiled;
    });
    const txStreams = builder.txStreams.map(stream => compileTxStream(ctx, stream, entries));
    return { builder, objectEntries, commands: nodeCommands, txStreams };
  });

  return parts.map(({ builder, objectEntries, commands: ownCommands, txStreams }) => {
    const externCommands: ExternCommand[] = builder.externCommands.map(command => ({
      nodeName: command.owner.name,
      command: lookup(commands, command, `command ${command.name}`),
    }));
    const rxStreams = builder.rxStreams.map(stream => compileRxStream(ctx, stream, entries));
    const rxMessages = builder.rxMessages.map(message => messageOf(ctx, message));
    const txMessages = builder.txMessages.map(message => messageOf(ctx, message));

    const node: Node = {
      name: builder.name,
      description: builder.description,
      id: builder.id,
      types: typeClosure([...rxMessages, ...txMessages], objectEntries),
      commands: ownCommands,
      externCommands,
      txStreams,
      rxStreams,
      rxMessages,
      txMessages,
      objectEntries,
      buses: nodeBuses(ctx, builder, [...rxMessages, ...txMessages]),
    };
    for (const entry of objectEntries) entry.attachTo(node);
    return node;
  });
}

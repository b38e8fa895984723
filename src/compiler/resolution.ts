import type { BusBuilder } from "../builder/bus";
import type { MessageBuilder, MessageIdTemplate } from "../builder/message";
import { EXT_ID_MAX, STD_ID_MAX } from "../model/message";
import { ConfigError, IntegrityFault } from "../outcome/errors";

type FrameFormat = "standard" | "extended";

const ID_MAX: Record<FrameFormat, number> = {
  standard: STD_ID_MAX,
  extended: EXT_ID_MAX,
};

/**
 * Ids taken on one bus, per frame format. Standard and extended frames with
 * the same numeric id are distinct on the wire.
 */
class IdSpace {
  private readonly used: Record<FrameFormat, Set<number>> = {
    standard: new Set(),
    extended: new Set(),
  };
  private readonly next: Record<FrameFormat, number> = { standard: 0, extended: 0 };

  has(format: FrameFormat, id: number): boolean {
    return this.used[format].has(id);
  }

  claim(format: FrameFormat, id: number): void {
    this.used[format].add(id);
  }

  /** Lowest free id, or undefined when the space is full */
  claimLowest(format: FrameFormat): number | undefined {
    let candidate = this.next[format];
    while (candidate <= ID_MAX[format] && this.used[format].has(candidate)) {
      candidate++;
    }
    if (candidate > ID_MAX[format]) return undefined;
    this.used[format].add(candidate);
    this.next[format] = candidate + 1;
    return candidate;
  }
}

function formatId(id: number): string {
  return `0x${id.toString(16).toUpperCase()}`;
}

function assignBuses(buses: readonly BusBuilder[], messages: readonly MessageBuilder[]): void {
  if (buses.length === 0) {
    throw new IntegrityFault("id resolution needs at least one bus", { entity: "network" });
  }
  for (const message of messages) {
    if (message.bus) {
      if (!buses.includes(message.bus)) {
        throw new IntegrityFault("message assigned to a bus outside the network", {
          entity: `message ${message.name}`,
          found: message.bus.name,
        });
      }
      continue;
    }
    if (message.builtin || buses.length === 1) {
      message.assignBus(buses[0]);
      continue;
    }
    throw new ConfigError("AmbiguousBus", { name: message.name, count: buses.length }, {
      kind: "message",
      name: message.name,
    });
  }
}

function busOf(message: MessageBuilder): BusBuilder {
  if (!message.bus) {
    throw new IntegrityFault("message has no bus after bus assignment", {
      entity: `message ${message.name}`,
    });
  }
  return message.bus;
}

function concreteFormat(template: MessageIdTemplate): FrameFormat | undefined {
  switch (template.tag) {
    case "Std":
      return "standard";
    case "Ext":
      return "extended";
    default:
      return undefined;
  }
}

function placeholderFormats(template: MessageIdTemplate): FrameFormat[] {
  switch (template.tag) {
    case "AnyStd":
      return ["standard"];
    case "AnyExt":
      return ["extended"];
    case "AnyAny":
      return ["standard", "extended"];
    default:
      return [];
  }
}

function priorityOf(template: MessageIdTemplate): number {
  switch (template.tag) {
    case "AnyStd":
    case "AnyExt":
    case "AnyAny":
      return template.priority ?? Number.POSITIVE_INFINITY;
    default:
      return Number.POSITIVE_INFINITY;
  }
}

/**
 * Give every message a bus and a concrete id, rewriting the builders in place.
 *
 * Explicit ids are claimed first, in declaration order; placeholders then take
 * the lowest free id of their bus, ordered by priority and declaration.
 */
export function resolveIdsAndBuses(buses: readonly BusBuilder[], messages: readonly MessageBuilder[]): void {
  assignBuses(buses, messages);

  const spaces = new Map<BusBuilder, IdSpace>(buses.map(bus => [bus, new IdSpace()]));
  const spaceOf = (message: MessageBuilder): IdSpace => {
    const space = spaces.get(busOf(message));
    if (!space) {
      throw new IntegrityFault("bus has no id space", { entity: `message ${message.name}` });
    }
    return space;
  };

  for (const message of messages) {
    const template = message.idTemplate;
    const format = concreteFormat(template);
    if (format === undefined || !("id" in template)) continue;

    const at = { kind: "message", name: message.name } as const;
    if (!Number.isInteger(template.id) || template.id < 0 || template.id > ID_MAX[format]) {
      throw new ConfigError("IdOutOfRange", { id: template.id, format }, at);
    }
    const space = spaceOf(message);
    if (space.has(format, template.id)) {
      throw new ConfigError("DuplicateMessageId", { id: formatId(template.id), bus: busOf(message).name }, at);
    }
    space.claim(format, template.id);
  }

  const pending = messages
    .map((message, order) => ({ message, order }))
    .filter(({ message }) => placeholderFormats(message.idTemplate).length > 0)
    .sort((a, b) => {
      const byPriority = priorityOf(a.message.idTemplate) - priorityOf(b.message.idTemplate);
      return Number.isNaN(byPriority) || byPriority === 0 ? a.order - b.order : byPriority;
    });

  for (const { message } of pending) {
    const formats = placeholderFormats(message.idTemplate);
    const space = spaceOf(message);
    let assigned = false;
    for (const format of formats) {
      const id = space.claimLowest(format);
      if (id === undefined) continue;
      message.idTemplate = format === "standard" ? { tag: "Std", id } : { tag: "Ext", id };
      assigned = true;
      break;
    }
    if (!assigned) {
      throw new ConfigError("IdSpaceExhausted", { format: formats.join("/"), bus: busOf(message).name }, {
        kind: "message",
        name: message.name,
      });
    }
  }
}

import type { BusBuilder } from "../builder/bus";
import type { MessageBuilder, MessageIdTemplate } from "../builder/message";
import type { Bus } from "../model/bus";
import { Message, type MessageId } from "../model/message";
import { dataLengthOf } from "../model/signal";
import { IntegrityFault } from "../outcome/errors";
import type { NamedType } from "../types/type";
import { flattenSignals, flattenTypes, type FlattenResult } from "./flatten";

function concreteId(message: MessageBuilder, template: MessageIdTemplate): MessageId {
  switch (template.tag) {
    case "Std":
      return { tag: "Standard", id: template.id };
    case "Ext":
      return { tag: "Extended", id: template.id };
    default:
      throw new IntegrityFault("message id left unresolved", {
        entity: `message ${message.name}`,
        expected: "Std or Ext",
        found: template.tag,
      });
  }
}

function layout(message: MessageBuilder, types: readonly NamedType[]): FlattenResult {
  switch (message.format.tag) {
    case "Empty":
      return { signals: [] };
    case "Signals":
      return flattenSignals(message.name, message.format.format.signals);
    case "Types":
      return flattenTypes(message.name, message.format.format.fields, types);
  }
}

/**
 * Turn a resolved message builder into an immutable message. Ids and buses
 * must already be concrete; usage is assigned later by the linker.
 */
export function compileMessage(
  message: MessageBuilder,
  buses: ReadonlyMap<BusBuilder, Bus>,
  types: readonly NamedType[]
): Message {
  const bus = message.bus ? buses.get(message.bus) : undefined;
  if (!bus) {
    throw new IntegrityFault("message has no compiled bus", { entity: `message ${message.name}` });
  }

  const { signals, encoding } = layout(message, types);
  return new Message({
    name: message.name,
    description: message.description,
    id: concreteId(message, message.idTemplate),
    dlc: dataLengthOf(signals),
    signals,
    encoding,
    bus,
    visibility: message.visibility,
  });
}

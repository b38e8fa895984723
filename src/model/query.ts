import type { NamedType } from "../types/type";
import type { Message } from "./message";
import type { Network } from "./network";
import type { Command, Node } from "./node";
import type { Signal } from "./signal";

export function messageByName(network: Network, name: string): Message | undefined {
  return network.messages.find(message => message.name === name);
}

export function nodeByName(network: Network, name: string): Node | undefined {
  return network.nodes.find(node => node.name === name);
}

export function typeByName(network: Network, name: string): NamedType | undefined {
  return network.types.find(type => type.name === name);
}

export function commandByName(node: Node, name: string): Command | undefined {
  return node.commands.find(command => command.name === name);
}

/**
 * Signals of a message ordered by bit offset.
 */
export function signalsOf(message: Message): Signal[] {
  return [...message.signals].sort((a, b) => a.offset - b.offset);
}

export function protocolMessages(network: Network): {
  getReq: Message;
  getResp: Message;
  setReq: Message;
  setResp: Message;
} {
  return {
    getReq: network.getReqMessage,
    getResp: network.getRespMessage,
    setReq: network.setReqMessage,
    setResp: network.setRespMessage,
  };
}

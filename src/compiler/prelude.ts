// src/compiler/prelude.ts
// Object get/set protocol shared by every node of a network.
//
// Four messages, each led by a header struct:
//   get_req   od_index:13 client_id:8 server_id:8
//   get_resp  sof:1 eof:1 toggle:1 od_index:13 client_id:8 server_id:8 | data:32
//   set_req   sof:1 eof:1 toggle:1 od_index:13 client_id:8 server_id:8 | data:32
//   set_resp  client_id:8 server_id:8 erno:set_resp_erno
// sof/eof/toggle frame values wider than the 32-bit data slot across several
// frames; splitting and reassembly happen at runtime.

import type { MessageBuilder } from "../builder/message";
import type { NetworkBuilder } from "../builder/network";

export interface ProtocolMessageBuilders {
  getReq: MessageBuilder;
  getResp: MessageBuilder;
  setReq: MessageBuilder;
  setResp: MessageBuilder;
}

export const PROTOCOL_NAMES = {
  getReq: "get_req",
  getResp: "get_resp",
  setReq: "set_req",
  setResp: "set_resp",
} as const;

const OD_INDEX = "od_index";
const CLIENT_ID = "client_id";
const SERVER_ID = "server_id";
const START_OF_FRAME = "sof";
const END_OF_FRAME = "eof";
const TOGGLE = "toggle";

export const PROTOCOL_DATA_BITS = 32;

function defineStatusEnum(network: NetworkBuilder, name: string): void {
  network.defineEnum(name).addEntry("Success", 0).addEntry("Error", 1);
}

function protocolMessage(network: NetworkBuilder, name: string, header: string, withData: boolean): MessageBuilder {
  const message = network.createMessage(name).markBuiltin().setAnyStdId();
  const format = message.makeTypeFormat().addType(header, "header");
  if (withData) {
    format.addType(`u${PROTOCOL_DATA_BITS}`, "data");
  }
  return message;
}

/**
 * Declare the protocol types and messages on a fresh network builder.
 */
export function declareProtocol(network: NetworkBuilder): ProtocolMessageBuilders {
  defineStatusEnum(network, "get_resp_erno");
  defineStatusEnum(network, "set_resp_erno");

  network.defineStruct("get_req_header")
    .addAttribute(OD_INDEX, "u13")
    .addAttribute(CLIENT_ID, "u8")
    .addAttribute(SERVER_ID, "u8");
  const getReq = protocolMessage(network, PROTOCOL_NAMES.getReq, "get_req_header", false);

  network.defineStruct("get_resp_header")
    .addAttribute(START_OF_FRAME, "u1")
    .addAttribute(END_OF_FRAME, "u1")
    .addAttribute(TOGGLE, "u1")
    .addAttribute(OD_INDEX, "u13")
    .addAttribute(CLIENT_ID, "u8")
    .addAttribute(SERVER_ID, "u8");
  const getResp = protocolMessage(network, PROTOCOL_NAMES.getResp, "get_resp_header", true);

  network.defineStruct("set_req_header")
    .addAttribute(START_OF_FRAME, "u1")
    .addAttribute(END_OF_FRAME, "u1")
    .addAttribute(TOGGLE, "u1")
    .addAttribute(OD_INDEX, "u13")
    .addAttribute(CLIENT_ID, "u8")
    .addAttribute(SERVER_ID, "u8");
  const setReq = protocolMessage(network, PROTOCOL_NAMES.setReq, "set_req_header", true);

  network.defineStruct("set_resp_header")
    .addAttribute(CLIENT_ID, "u8")
    .addAttribute(SERVER_ID, "u8")
    .addAttribute("erno", "set_resp_erno");
  const setResp = protocolMessage(network, PROTOCOL_NAMES.setResp, "set_resp_header", false);

  defineStatusEnum(network, "command_resp_erno");

  return { getReq, getResp, setReq, setResp };
}

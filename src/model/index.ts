export { WriteOnce } from "./cell";
export type { Signal, TypeSignalEncoding, MessageEncoding } from "./signal";
export { dataLengthOf } from "./signal";
export type { MessageId, MessageUsage, MessageInit } from "./message";
export { Message, formatMessageId, STD_ID_MAX, EXT_ID_MAX } from "./message";
export type { Bus } from "./bus";
export type { ObjectEntryAccess, ObjectEntryInit, Command, Stream, ExternCommand, Node } from "./node";
export { ObjectEntry } from "./node";
export type { Network } from "./network";
export { messageByName, nodeByName, typeByName, commandByName, signalsOf, protocolMessages } from "./query";

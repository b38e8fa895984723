export { BusBuilder } from "./bus";
export { StructBuilder, EnumBuilder, type TypeBuilder } from "./types";
export {
  MessageBuilder,
  SignalFormatBuilder,
  TypeFormatBuilder,
  type MessageIdTemplate,
  type MessageFormat,
  type RawSignalDeclaration,
  type TypedFieldDeclaration,
} from "./message";
export { ObjectEntryBuilder } from "./objectEntry";
export { CommandBuilder } from "./command";
export { StreamBuilder, ReceiveStreamBuilder, type StreamMappingDeclaration } from "./stream";
export { NodeBuilder } from "./node";
export { NetworkBuilder, type NetworkBuilderOptions } from "./network";

export { BitCursor, flattenSignals, flattenType, flattenTypes, type FlattenResult } from "./flatten";
export { declareProtocol, PROTOCOL_NAMES, PROTOCOL_DATA_BITS, type ProtocolMessageBuilders } from "./prelude";
export { resolveIdsAndBuses } from "./resolution";
export { compileMessage } from "./messages";
export { linkNodes, type LinkContext } from "./link";
export {
  CLASSIC_CAN_MAX_DLC,
  runPipeline,
  compileNetworkBuilder,
  compileNetwork,
  type PassRecord,
  type CompilationResult,
} from "./pipeline";

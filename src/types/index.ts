export type {
  Visibility,
  SignalType,
  PrimitiveType,
  StructAttribute,
  StructType,
  EnumEntry,
  EnumType,
  ArrayType,
  Type,
  NamedType,
} from "./type";
export {
  bitSize,
  maxRaw,
  decodeDecimal,
  signalTypesEqual,
  typesEqual,
  describeSignalType,
  describeType,
} from "./type";
export type { StructDeclaration, EnumDeclaration, TypeDeclaration } from "./declaration";
export type { ArrayDescriptor } from "./resolve";
export { MAX_SIGNAL_BITS, resolveType, parseArrayDescriptor, isPrimitiveDescriptor } from "./resolve";
export { topoOrder, descriptorDependency, orderTypeDeclarations, orderNamedTypes } from "./order";
export type { ElaborateOptions } from "./elaborate";
export { U64_MAX, bitLength, elaborateEnum, elaborateStruct, elaborateTypes } from "./elaborate";

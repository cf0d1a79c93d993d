// Interpreter module exports

export { ChannelRef, type ChannelValue, ValueTable, channelKey } from "./channel";
export {
  BinaryDispatcherOverload,
  ChannelDispatcherOverload,
  Dispatcher,
  NaryDispatcherOverload,
  type Overload,
  UnaryDispatcherOverload,
} from "./dispatcher";
export {
  add,
  arithmeticFunctions,
  collectionFunctions,
  constantFunctions,
  logicalFunctions,
  mathFunctions,
  standardFunctions,
} from "./functions";
export {
  CallValue,
  ConstValue,
  ErrorValue,
  type Interpretable,
  type Purity,
  type ResolvedEvaluator,
} from "./interpretable";
export {
  type AnyRange,
  type Bound,
  ClosedRange,
  HalfOpenRange,
  RangeFrom,
  RangeThrough,
  RangeUpTo,
  isRange,
} from "./ranges";
export {
  DefaultOptions,
  type Option,
  type SymbolEvaluator,
  type SymbolLookup,
  SymbolResolver,
  createDispatcher,
} from "./resolver";
export { subscript } from "./subscript";
export { type ResultKind, type ResultType, TypeBuilder, Types, project } from "./types";
export {
  ArraySlice,
  type Dictionary,
  StringIndex,
  type StructuralEq,
  Tuple,
  isNil,
  stringify,
  typeName,
  valuesEqual,
} from "./values";

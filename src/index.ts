export { diff, logDiff, pinoDiff, printDiff, writeDiff } from './differ';
export {
  LineCollector,
  LogfPrinter,
  PinoPrinter,
  StreamPrinter
} from './differ/sinks';
export type {
  DiffLogger,
  LineWriter,
  Logfer,
  PinoDiffOptions,
  Printfer
} from './differ/types';
export { keyEqual, partitionKeys } from './differ/key-matcher';

export { t, typeName, identical } from './inspect/types';
export type { Kind, Type, StructType, TypeRef } from './inspect/types';
export { complex, ref, Ref, typed, Typed, typeOf } from './inspect/infer';
export type { Complex } from './inspect/infer';
export { InspectedValue } from './inspect/value';

export { render } from './format/render';

export {
  DiffError,
  InspectionError,
  InvalidMapKeyError,
  UnsupportedKindError
} from './errors';

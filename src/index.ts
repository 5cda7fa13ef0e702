/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Linearizers describe a finite type as a bijection with `[0, LENGTH)`;
 * static maps store one value per key of such a type in a flat array.
 */

/**
 * Linearizer contract and derived value types
 * @public
 */
export type {
  Linearizer,
  Infer,
  FieldShape,
  RecordOf,
  TupleOf,
  UnionOf,
  JsonPrimitive,
  CopyValue,
} from "./types";

/**
 * Primitive linearizers
 * @public
 */
export * from "./primitives";

/**
 * Composition: records, tuples, unions, optionals
 * @public
 */
export { record, tuple, union, optional } from "./compose";

/**
 * Safe entry points, cached indices and enumeration
 * @public
 */
export { delinearize, variants, linearized, isLinearizer } from "./linearize/ext";
export { Linearized } from "./linearize/linearized";
export { Variants } from "./linearize/variants";
export { CursorIterator } from "./linearize/cursor";

/**
 * Static maps
 * @public
 */
export { StaticMap, StaticCopyMap, StaticMapBuilder, Iter, IterMut, IntoIter, Values, EntryRef, LinearMap, keyString } from "./map";
export type { Entry, Storage, NumericArray, NumericArrayConstructor } from "./map";

/**
 * Boundaries: JSON, randomness, property testing, bytes
 * @public
 */
export { toJSON, toJSONSkipNone, stringifyMap, fromJSON, fromJSONSkipNone, parseMap } from "./interop/serde";
export type { DecodePolicy, EncodeValue, DecodeValue } from "./interop/serde";
export {
  createRng,
  standard,
  uniform,
  bernoulli,
  open01,
  openClosed01,
  weightedIndex,
  uniformIndex,
  sampleStaticMap,
  sampleStaticCopyMap,
  mapSizeHint,
} from "./interop/random";
export type { Rng, Distribution } from "./interop/random";
export { indexArbitrary, linearizableArbitrary, staticMapArbitrary, staticCopyMapArbitrary } from "./interop/arbitrary";
export { asBytes, fromBytes, fromBytesCopy } from "./interop/pod";

/**
 * Errors
 * @public
 */
export {
  LengthMismatchError,
  MapDecodeError,
  MissingKeyError,
  UnknownKeyError,
  MapShapeError,
  LengthOverflowError,
  InvalidShapeError,
  InvalidValueError,
  IndexOutOfRangeError,
  UnsetSlotError,
  UnreachableError,
  PodCastError,
  isIncompleteMapError,
  isMapShapeError,
} from "./errors";

/**
 * Runtime options
 * @public
 */
export { configure, getConfig, setConfig, resetConfig, defineConfig, normalizeConfig, resolveEnvConfig } from "./config";
export type { LinmapConfig, RawLinmapConfig, Logger, LogLevel } from "./config";

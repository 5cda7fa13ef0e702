/**
 * @file Static map façade
 */
export { StaticMap, StaticCopyMap } from "./static_map";
export { StaticMapBuilder } from "./builder";
export { Iter, IterMut, IntoIter, Values, EntryRef } from "./iters";
export type { Entry } from "./iters";
export { LinearMap } from "./base";
export { keyString, keyIndex, keyStrings } from "./keys";
export { compareValues } from "./storage";
export type { Storage, NumericArray, NumericArrayConstructor } from "./storage";

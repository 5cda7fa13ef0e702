/**
 * @file Backing arrays of static maps
 *
 * A map owns one array-like of exactly LENGTH slots. Plain arrays hold any
 * value; numeric typed arrays back copy maps of numbers and are what the
 * byte-casting boundary reinterprets.
 */
import { LengthMismatchError } from "../errors";
import { describeKind } from "../util/is-object";

/** Array-like with a `slice` that returns the same kind of storage. */
export type Storage<V> = {
  readonly length: number;
  [index: number]: V;
  slice(start?: number, end?: number): Storage<V>;
};

export type NumericArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

/** Constructor of a numeric typed array. */
export type NumericArrayConstructor<A extends NumericArray = NumericArray> = {
  new (length: number): A;
  new (buffer: ArrayBufferLike, byteOffset?: number, length?: number): A;
  readonly BYTES_PER_ELEMENT: number;
  readonly name: string;
};

/** Throws unless `actual === expected`. */
export function checkStorageLength(expected: number, actual: number): void {
  if (expected !== actual) {
    throw new LengthMismatchError(expected, actual);
  }
}

/** Fills a fresh array by calling `fill(i)` for each slot in ascending order. */
export function storageFromFn<V>(length: number, fill: (index: number) => V): V[] {
  const out = new Array<V>(length);
  for (let i = 0; i < length; i++) {
    out[i] = fill(i);
  }
  return out;
}

/** Natural order of primitives of the same kind. */
export function compareValues(a: unknown, b: unknown): -1 | 0 | 1 {
  if (typeof a === "number" && typeof b === "number") {
    return order(a, b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return order(a, b);
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return order(a, b);
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return order(Number(a), Number(b));
  }
  if (a === b) {
    return 0;
  }
  throw new TypeError(`cannot compare ${describeKind(a)} with ${describeKind(b)} without a comparator`);
}

function order<P extends number | string | bigint>(a: P, b: P): -1 | 0 | 1 {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/** Slot-wise equality. */
export function storageEquals<V>(a: Storage<V>, b: Storage<V>, eq: (x: V, y: V) => boolean): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (!eq(a[i], b[i])) {
      return false;
    }
  }
  return true;
}

/** Lexicographic comparison by slot index; a proper prefix sorts first. */
export function storageCompare<V>(a: Storage<V>, b: Storage<V>, cmp: (x: V, y: V) => number): -1 | 0 | 1 {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = cmp(a[i], b[i]);
    if (c !== 0) {
      return c < 0 ? -1 : 1;
    }
  }
  return order(a.length, b.length);
}

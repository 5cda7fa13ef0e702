/**
 * @file Safe entry points layered over a linearizer
 */
import type { Linearizer } from "../types";
import { inRange } from "../util/assert";
import { isObject } from "../util/is-object";
import { Linearized } from "./linearized";
import { Variants } from "./variants";

/**
 * Checked inverse of `linearize`.
 *
 * Returns `undefined` unless `index` is an integer in `[0, LENGTH)`. No
 * linearizer in this library uses `undefined` as a value, so the result is
 * unambiguous.
 */
export function delinearize<T>(linearizer: Linearizer<T>, index: number): T | undefined {
  if (!inRange(index, linearizer.LENGTH)) {
    return undefined;
  }
  return linearizer.delinearizeUnchecked(index);
}

/** Iterator over all values of the type, in index order. */
export function variants<T>(linearizer: Linearizer<T>): Variants<T> {
  return new Variants(linearizer);
}

/** Linearizes a value and caches the index. */
export function linearized<T>(linearizer: Linearizer<T>, value: T): Linearized<T> {
  return Linearized.of(linearizer, value);
}

/** Runtime check for the linearizer contract's shape. */
export function isLinearizer(x: unknown): x is Linearizer<unknown> {
  if (!isObject(x)) {
    return false;
  }
  const n = x.LENGTH;
  return (
    typeof n === "number" &&
    Number.isSafeInteger(n) &&
    n >= 0 &&
    typeof x.name === "string" &&
    typeof x.linearize === "function" &&
    typeof x.delinearizeUnchecked === "function" &&
    typeof x.describe === "function"
  );
}

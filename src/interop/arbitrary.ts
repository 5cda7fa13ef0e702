/**
 * @file fast-check arbitraries for linearizable values and static maps
 */
import fc from "fast-check";
import type { Arbitrary } from "fast-check";
import { InvalidShapeError } from "../errors";
import { StaticCopyMap, StaticMap } from "../map/static_map";
import type { CopyValue, Linearizer } from "../types";

const INT32_MAX = 0x7fffffff;

/** Arbitrary index in [0, LENGTH). */
export function indexArbitrary(linearizer: Linearizer<unknown>): Arbitrary<number> {
  const last = linearizer.LENGTH - 1;
  if (last < 0) {
    throw new InvalidShapeError(`no values of the uninhabited type ${linearizer.name}`);
  }
  if (last <= INT32_MAX) {
    return fc.integer({ min: 0, max: last });
  }
  return fc.bigInt({ min: 0n, max: BigInt(last) }).map((i) => Number(i));
}

/** Arbitrary value of the type; shrinks toward index 0. */
export function linearizableArbitrary<T>(linearizer: Linearizer<T>): Arbitrary<T> {
  return indexArbitrary(linearizer).map((i) => linearizer.delinearizeUnchecked(i));
}

/** Map with one generated value per slot. */
export function staticMapArbitrary<K, V>(linearizer: Linearizer<K>, valueArb: Arbitrary<V>): Arbitrary<StaticMap<K, V>> {
  const n = linearizer.LENGTH;
  return fc.array(valueArb, { minLength: n, maxLength: n }).map((values) => StaticMap.fromStorage(linearizer, values));
}

export function staticCopyMapArbitrary<K, V extends CopyValue>(
  linearizer: Linearizer<K>,
  valueArb: Arbitrary<V>,
): Arbitrary<StaticCopyMap<K, V>> {
  const n = linearizer.LENGTH;
  return fc
    .array(valueArb, { minLength: n, maxLength: n })
    .map((values) => StaticCopyMap.fromStorage(linearizer, values));
}

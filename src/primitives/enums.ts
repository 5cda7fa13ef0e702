/**
 * @file Linearizers for fixed enumerations without payload
 *
 * A case's index is its declared position. `enumOf` takes the cases in order;
 * `enumFromCodes` takes an explicit case-to-index table, which must be a
 * permutation of `0..n-1`.
 */
import { InvalidShapeError, InvalidValueError } from "../errors";
import type { JsonPrimitive, Linearizer } from "../types";

/** Enumeration over the given cases, indexed by position. */
export function enumOf<const V extends JsonPrimitive>(cases: readonly V[], name = "enum"): Linearizer<V> {
  const rev = new Map<V, number>();
  const texts = new Set<string>();
  cases.forEach((c, i) => {
    if (rev.has(c)) {
      throw new InvalidShapeError(`duplicate case ${JSON.stringify(c)} in ${name} at ${rev.get(c)} and ${i}`);
    }
    const text = JSON.stringify(c);
    if (texts.has(text)) {
      throw new InvalidShapeError(`cases of ${name} are not distinguishable: ${text}`);
    }
    rev.set(c, i);
    texts.add(text);
  });
  const table = cases.slice();
  return {
    name,
    LENGTH: table.length,
    linearize: (value) => {
      const index = rev.get(value);
      if (index === undefined) {
        throw new InvalidValueError(name, value);
      }
      return index;
    },
    delinearizeUnchecked: (index) => table[index],
    describe: (value) => JSON.stringify(value),
  };
}

/** Enumeration over string cases with explicit indices. */
export function enumFromCodes<K extends string>(codes: Record<K, number>, name = "enum"): Linearizer<K> {
  const entries = Object.entries<number>(codes);
  const table = new Array<string>(entries.length);
  const seen = new Map<number, string>();
  for (const [k, v] of entries) {
    const prev = seen.get(v);
    if (prev !== undefined) {
      throw new InvalidShapeError(`duplicate code ${v} for ${k} and ${prev}`);
    }
    if (!Number.isInteger(v) || v < 0 || v >= entries.length) {
      throw new InvalidShapeError(`code ${v} for ${k} is outside 0..${entries.length - 1}`);
    }
    seen.set(v, k);
    table[v] = k;
  }
  const ordered = table.filter((k): k is K => Object.prototype.hasOwnProperty.call(codes, k));
  const lin = enumOf(ordered, name);
  return {
    ...lin,
    linearize: (value) => {
      if (!Object.prototype.hasOwnProperty.call(codes, value)) {
        throw new InvalidValueError(name, value);
      }
      return codes[value];
    },
  };
}

/** Three-way comparison results, as returned by comparators: -1 < 0 < 1. */
export const ordering: Linearizer<-1 | 0 | 1> = enumOf([-1, 0, 1] as const, "Ordering");

/**
 * @file Cardinality arithmetic for composite types
 *
 * Products use mixed-radix digits with the first field most significant;
 * sums partition the index range into contiguous blocks in declaration
 * order. Both are computed once per composite and checked against
 * `Number.MAX_SAFE_INTEGER`, so per-value arithmetic never loses precision.
 */
import { LengthOverflowError } from "../errors";

export type RadixPlan = {
  LENGTH: number;
  /** `strides[i]` is the product of the lengths after field `i`. */
  strides: number[];
};

export type PartitionPlan = {
  LENGTH: number;
  /** `bases[i]` is the first index of block `i`. */
  bases: number[];
};

/** Suffix products of `lengths`; any zero length makes the whole product 0. */
export function mixedRadix(lengths: readonly number[], typeName: string): RadixPlan {
  const strides = new Array<number>(lengths.length).fill(0);
  if (lengths.some((n) => n === 0)) {
    return { LENGTH: 0, strides };
  }
  let acc = 1;
  for (let i = lengths.length - 1; i >= 0; i--) {
    strides[i] = acc;
    acc *= lengths[i];
    if (acc > Number.MAX_SAFE_INTEGER) {
      throw new LengthOverflowError(typeName);
    }
  }
  return { LENGTH: acc, strides };
}

/** Prefix sums of `lengths`. */
export function rangePartition(lengths: readonly number[], typeName: string): PartitionPlan {
  const bases = new Array<number>(lengths.length);
  let acc = 0;
  for (let i = 0; i < lengths.length; i++) {
    bases[i] = acc;
    acc += lengths[i];
    if (acc > Number.MAX_SAFE_INTEGER) {
      throw new LengthOverflowError(typeName);
    }
  }
  return { LENGTH: acc, bases };
}

/** Number of elements in the ascending array `sorted` that are `<= x`. */
export function upperBound(sorted: readonly number[], x: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= x) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

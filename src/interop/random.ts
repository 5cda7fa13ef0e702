/**
 * @file Seeded random values and randomly filled maps
 *
 * The generator is a 32-bit xorshift: deterministic per seed, which is what
 * reproducible tests and fixtures need. It is not suitable for anything
 * security-related.
 */
import { upperBound } from "../compose/radix";
import { InvalidShapeError } from "../errors";
import { StaticCopyMap, StaticMap } from "../map/static_map";
import type { CopyValue, Linearizer } from "../types";

/** Uniform float in [0, 1). */
export type Rng = () => number;

export type Distribution<T> = {
  sample(rng: Rng): T;
};

const TWO_32 = 0x100000000;

/**
 *
 */
export function createRng(seed = 42): Rng {
  let state = seed >>> 0 || 1;
  return () => {
    let x = state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    state = x >>> 0;
    return state / TWO_32;
  };
}

/** Uniform float in [0, 1) with 53 random bits, built from two draws. */
function nextFloat53(rng: Rng): number {
  const hi = Math.floor(rng() * 0x4000000);
  const lo = Math.floor(rng() * 0x8000000);
  return (hi * 0x8000000 + lo) / 2 ** 53;
}

/** Uniform integer in [0, n). */
export function uniformIndex(rng: Rng, n: number): number {
  if (n <= TWO_32) {
    return Math.floor(rng() * n);
  }
  return Math.floor(nextFloat53(rng) * n);
}

/** Every value of the type with equal probability. */
export function standard<T>(linearizer: Linearizer<T>): Distribution<T> {
  if (linearizer.LENGTH === 0) {
    throw new InvalidShapeError(`cannot sample the uninhabited type ${linearizer.name}`);
  }
  return {
    sample: (rng) => linearizer.delinearizeUnchecked(uniformIndex(rng, linearizer.LENGTH)),
  };
}

/** Float in [lo, hi). */
export function uniform(lo: number, hi: number): Distribution<number> {
  if (!(lo < hi) || !Number.isFinite(hi - lo)) {
    throw new RangeError(`uniform: need finite lo < hi, got [${lo}, ${hi})`);
  }
  return { sample: (rng) => lo + rng() * (hi - lo) };
}

/** `true` with probability `p`. */
export function bernoulli(p: number): Distribution<boolean> {
  if (!(p >= 0 && p <= 1)) {
    throw new RangeError(`bernoulli: probability ${p} outside [0, 1]`);
  }
  return { sample: (rng) => rng() < p };
}

/** Float in (0, 1). */
export const open01: Distribution<number> = {
  sample: (rng) => (Math.floor(rng() * TWO_32) + 0.5) / TWO_32,
};

/** Float in (0, 1]. */
export const openClosed01: Distribution<number> = {
  sample: (rng) => 1 - rng(),
};

/** Index `i` with probability `weights[i] / sum(weights)`. */
export function weightedIndex(weights: readonly number[]): Distribution<number> {
  const cumulative: number[] = [];
  let total = 0;
  weights.forEach((w, i) => {
    if (!(w >= 0) || !Number.isFinite(w)) {
      throw new RangeError(`weightedIndex: weight ${i} is ${w}`);
    }
    total += w;
    cumulative.push(total);
  });
  if (!(total > 0)) {
    throw new RangeError("weightedIndex: weights must have a positive sum");
  }
  return { sample: (rng) => upperBound(cumulative, rng() * total) };
}

/** Map with every value drawn independently from `dist`, in index order. */
export function sampleStaticMap<K, V>(linearizer: Linearizer<K>, dist: Distribution<V>, rng: Rng): StaticMap<K, V> {
  return StaticMap.fromFn(linearizer, () => dist.sample(rng));
}

export function sampleStaticCopyMap<K, V extends CopyValue>(
  linearizer: Linearizer<K>,
  dist: Distribution<V>,
  rng: Rng,
): StaticCopyMap<K, V> {
  return StaticCopyMap.fromFn(linearizer, () => dist.sample(rng));
}

/**
 * Bounds on the number of values drawn to fill a map, given bounds on the
 * draws per value. The lower bound saturates at `Number.MAX_SAFE_INTEGER`;
 * an unknown or overflowing upper bound is `undefined`.
 */
export function mapSizeHint(
  linearizer: Linearizer<unknown>,
  [lo, hi]: readonly [number, number | undefined],
): [number, number | undefined] {
  const n = linearizer.LENGTH;
  const low = Math.min(lo * n, Number.MAX_SAFE_INTEGER);
  if (hi === undefined) {
    return [low, undefined];
  }
  const high = hi * n;
  return [low, high > Number.MAX_SAFE_INTEGER ? undefined : high];
}

/**
 * @file Pre-computed output of `linearize`
 *
 * Indexing a map by key re-runs the bijection on every access. For keys used
 * more than once, compute the index once and index with a `Linearized`
 * instead. The cached index is always below the linearizer's `LENGTH`.
 */
import type { Linearizer } from "../types";
import { debugAssertIndex } from "../util/assert";

export class Linearized<T> {
  /** Linearizer that produced the index. */
  readonly linearizer: Linearizer<T>;
  private readonly index: number;

  private constructor(linearizer: Linearizer<T>, index: number) {
    this.linearizer = linearizer;
    this.index = index;
  }

  /** Linearizes `value` and caches the result. */
  static of<T>(linearizer: Linearizer<T>, value: T): Linearized<T> {
    const index = linearizer.linearize(value);
    debugAssertIndex(index, linearizer.LENGTH);
    return new Linearized(linearizer, index);
  }

  /**
   * Wraps an index computed elsewhere.
   *
   * The caller guarantees `index < linearizer.LENGTH`. Only verified when
   * debug assertions are enabled.
   */
  static unchecked<T>(linearizer: Linearizer<T>, index: number): Linearized<T> {
    debugAssertIndex(index, linearizer.LENGTH);
    return new Linearized(linearizer, index);
  }

  /** The cached index. */
  get(): number {
    return this.index;
  }

  /** The value the index was computed from. */
  delinearize(): T {
    return this.linearizer.delinearizeUnchecked(this.index);
  }

  equals(other: Linearized<T> | number): boolean {
    return this.index === (typeof other === "number" ? other : other.index);
  }

  compare(other: Linearized<T> | number): -1 | 0 | 1 {
    const o = typeof other === "number" ? other : other.index;
    if (this.index < o) {
      return -1;
    }
    return this.index > o ? 1 : 0;
  }

  valueOf(): number {
    return this.index;
  }

  toString(): string {
    return String(this.index);
  }

  toJSON(): number {
    return this.index;
  }
}

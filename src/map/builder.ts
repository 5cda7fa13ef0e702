/**
 * @file Slot-by-slot construction of a static map
 *
 * The builder hands out an uninitialized array of LENGTH slots. Callers must
 * set every slot exactly once before `finish()`; the occupancy mask only
 * enforces this when debug assertions are enabled.
 */
import { getConfig } from "../config";
import { UnsetSlotError } from "../errors";
import type { Linearizer } from "../types";
import { debugAssertIndex } from "../util/assert";
import { createBitMask, maskFirstUnset, maskSet, type BitMask } from "../util/bitset";

export class StaticMapBuilder<K, V, M> {
  readonly linearizer: Linearizer<K>;
  private readonly slots: V[];
  private readonly mask: BitMask | null;
  private readonly wrap: (storage: V[]) => M;

  constructor(linearizer: Linearizer<K>, wrap: (storage: V[]) => M) {
    this.linearizer = linearizer;
    this.slots = new Array<V>(linearizer.LENGTH);
    this.mask = getConfig().debugAssertions ? createBitMask(linearizer.LENGTH) : null;
    this.wrap = wrap;
  }

  /** Number of slots to fill. */
  get length(): number {
    return this.slots.length;
  }

  /** Sets slot `index`. The caller guarantees `index < length`. */
  setUnchecked(index: number, value: V): void {
    debugAssertIndex(index, this.slots.length);
    this.slots[index] = value;
    if (this.mask) {
      maskSet(this.mask, index);
    }
  }

  /** Sets the slot of `key`. */
  set(key: K, value: V): void {
    this.setUnchecked(this.linearizer.linearize(key), value);
  }

  /**
   * Hands the storage to a map. Every slot must have been set.
   */
  finish(): M {
    if (this.mask) {
      const gap = maskFirstUnset(this.mask);
      if (gap >= 0) {
        throw new UnsetSlotError(gap);
      }
    }
    return this.wrap(this.slots);
  }
}

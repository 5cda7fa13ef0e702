/**
 * @file Total maps keyed by a linearizable type
 *
 * `StaticMap` holds arbitrary values. `StaticCopyMap` holds primitives only,
 * so copying it is a flat copy of its storage, and its storage may be a
 * numeric typed array. Both share storage when converted into one another.
 */
import type { CopyValue, Linearizer } from "../types";
import { LinearMap, noteAllocation } from "./base";
import { StaticMapBuilder } from "./builder";
import {
  checkStorageLength,
  storageFromFn,
  type NumericArray,
  type NumericArrayConstructor,
  type Storage,
} from "./storage";

export class StaticMap<K, V> extends LinearMap<K, V> {
  private constructor(linearizer: Linearizer<K>, storage: Storage<V>) {
    super(linearizer, storage);
  }

  /**
   * Builds a map by calling `fill` once per key, in ascending index order.
   *
   * @example
   * const squares = StaticMap.fromFn(u8, (k) => k * k);
   */
  static fromFn<K, V>(linearizer: Linearizer<K>, fill: (key: K) => V): StaticMap<K, V> {
    noteAllocation(linearizer);
    return new StaticMap(
      linearizer,
      storageFromFn(linearizer.LENGTH, (i) => fill(linearizer.delinearizeUnchecked(i))),
    );
  }

  /** Wraps `storage` without copying. Throws `LengthMismatchError` unless it has LENGTH slots. */
  static fromStorage<K, V>(linearizer: Linearizer<K>, storage: Storage<V>): StaticMap<K, V> {
    return new StaticMap(linearizer, storage);
  }

  /** Copies `items` into a new map. Throws `LengthMismatchError` unless it has LENGTH elements. */
  static tryFrom<K, V>(linearizer: Linearizer<K>, items: ArrayLike<V>): StaticMap<K, V> {
    checkStorageLength(linearizer.LENGTH, items.length);
    return new StaticMap(linearizer, Array.from(items));
  }

  static builder<K, V>(linearizer: Linearizer<K>): StaticMapBuilder<K, V, StaticMap<K, V>> {
    noteAllocation(linearizer);
    return new StaticMapBuilder<K, V, StaticMap<K, V>>(linearizer, (storage) => new StaticMap(linearizer, storage));
  }

  /** Every slot set to `value`. The value is shared, not copied. */
  static filled<K, V>(linearizer: Linearizer<K>, value: V): StaticMap<K, V> {
    noteAllocation(linearizer);
    return new StaticMap(linearizer, new Array<V>(linearizer.LENGTH).fill(value));
  }

  /** Every slot set to its own `makeDefault()`. */
  static withDefault<K, V>(linearizer: Linearizer<K>, makeDefault: () => V): StaticMap<K, V> {
    noteAllocation(linearizer);
    return new StaticMap(linearizer, storageFromFn(linearizer.LENGTH, () => makeDefault()));
  }

  /** Defaults everywhere, then the given entries in order. */
  static fromEntries<K, V>(
    linearizer: Linearizer<K>,
    entries: Iterable<readonly [K, V]>,
    makeDefault: () => V,
  ): StaticMap<K, V> {
    const map = StaticMap.withDefault(linearizer, makeDefault);
    map.extend(entries);
    return map;
  }

  map<U>(fn: (key: K, value: V) => U): StaticMap<K, U> {
    const { linearizer, storage } = this;
    return new StaticMap(
      linearizer,
      storageFromFn(storage.length, (i) => fn(linearizer.delinearizeUnchecked(i), storage[i])),
    );
  }

  mapValues<U>(fn: (value: V) => U): StaticMap<K, U> {
    const { storage } = this;
    return new StaticMap(
      this.linearizer,
      storageFromFn(storage.length, (i) => fn(storage[i])),
    );
  }

  /** Copy with each value passed through `cloneValue` (shallow by default). */
  clone(cloneValue?: (value: V) => V): StaticMap<K, V> {
    if (!cloneValue) {
      return new StaticMap(this.linearizer, this.storage.slice());
    }
    return this.mapValues(cloneValue);
  }

  /** Copy-map view over the same storage. */
  asCopy<C extends CopyValue>(this: StaticMap<K, C>): StaticCopyMap<K, C> {
    return StaticCopyMap.fromStorage(this.linearizer, this.storage);
  }

  /** Hands the storage to a copy map; this map should not be used afterwards. */
  intoCopy<C extends CopyValue>(this: StaticMap<K, C>): StaticCopyMap<K, C> {
    return this.asCopy();
  }
}

/** Static map of primitive values. */
export class StaticCopyMap<K, V extends CopyValue> extends LinearMap<K, V> {
  private constructor(linearizer: Linearizer<K>, storage: Storage<V>) {
    super(linearizer, storage);
  }

  static fromFn<K, V extends CopyValue>(linearizer: Linearizer<K>, fill: (key: K) => V): StaticCopyMap<K, V> {
    noteAllocation(linearizer);
    return new StaticCopyMap(
      linearizer,
      storageFromFn(linearizer.LENGTH, (i) => fill(linearizer.delinearizeUnchecked(i))),
    );
  }

  /**
   * Map of numbers backed by a typed array of the given kind.
   *
   * @example
   * const weights = StaticCopyMap.typed(bool, Float64Array, (b) => (b ? 0.75 : 0.25));
   */
  static typed<K>(
    linearizer: Linearizer<K>,
    ctor: NumericArrayConstructor,
    fill: (key: K) => number,
  ): StaticCopyMap<K, number> {
    noteAllocation(linearizer);
    const storage: NumericArray = new ctor(linearizer.LENGTH);
    for (let i = 0; i < storage.length; i++) {
      storage[i] = fill(linearizer.delinearizeUnchecked(i));
    }
    return new StaticCopyMap<K, number>(linearizer, storage);
  }

  static fromStorage<K, V extends CopyValue>(linearizer: Linearizer<K>, storage: Storage<V>): StaticCopyMap<K, V> {
    return new StaticCopyMap(linearizer, storage);
  }

  static tryFrom<K, V extends CopyValue>(linearizer: Linearizer<K>, items: ArrayLike<V>): StaticCopyMap<K, V> {
    checkStorageLength(linearizer.LENGTH, items.length);
    return new StaticCopyMap(linearizer, Array.from(items));
  }

  static builder<K, V extends CopyValue>(linearizer: Linearizer<K>): StaticMapBuilder<K, V, StaticCopyMap<K, V>> {
    noteAllocation(linearizer);
    return new StaticMapBuilder<K, V, StaticCopyMap<K, V>>(linearizer, (storage) => new StaticCopyMap(linearizer, storage));
  }

  static filled<K, V extends CopyValue>(linearizer: Linearizer<K>, value: V): StaticCopyMap<K, V> {
    noteAllocation(linearizer);
    return new StaticCopyMap(linearizer, new Array<V>(linearizer.LENGTH).fill(value));
  }

  static fromEntries<K, V extends CopyValue>(
    linearizer: Linearizer<K>,
    entries: Iterable<readonly [K, V]>,
    defaultValue: V,
  ): StaticCopyMap<K, V> {
    const map = StaticCopyMap.filled(linearizer, defaultValue);
    map.extend(entries);
    return map;
  }

  map<U extends CopyValue>(fn: (key: K, value: V) => U): StaticCopyMap<K, U> {
    const { linearizer, storage } = this;
    return new StaticCopyMap(
      linearizer,
      storageFromFn(storage.length, (i) => fn(linearizer.delinearizeUnchecked(i), storage[i])),
    );
  }

  mapValues<U extends CopyValue>(fn: (value: V) => U): StaticCopyMap<K, U> {
    const { storage } = this;
    return new StaticCopyMap(
      this.linearizer,
      storageFromFn(storage.length, (i) => fn(storage[i])),
    );
  }

  /** Flat copy of the storage, preserving its kind (array or typed array). */
  copy(): StaticCopyMap<K, V> {
    return new StaticCopyMap(this.linearizer, this.storage.slice());
  }

  clone(): StaticCopyMap<K, V> {
    return this.copy();
  }

  /** StaticMap view over the same storage. */
  asStaticMap(): StaticMap<K, V> {
    return StaticMap.fromStorage(this.linearizer, this.storage);
  }

  /** Hands the storage to a StaticMap; this map should not be used afterwards. */
  intoStaticMap(): StaticMap<K, V> {
    return this.asStaticMap();
  }
}

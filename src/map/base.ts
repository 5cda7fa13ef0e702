/**
 * @file Operations shared by StaticMap and StaticCopyMap
 *
 * A map is a linearizer plus one storage array of exactly LENGTH slots. The
 * slot of key `k` is `linearize(k)`; keys are never stored.
 */
import { inspect } from "node:util";
import { getConfig } from "../config";
import type { Linearized } from "../linearize/linearized";
import { Variants } from "../linearize/variants";
import type { Linearizer } from "../types";
import { debugAssertIndex } from "../util/assert";
import { hashSequence, hashValue } from "../util/hash";
import { defineEntry } from "../util/is-object";
import { log } from "../util/log";
import { Iter, IntoIter, IterMut, Values, type Entry } from "./iters";
import { keyStrings } from "./keys";
import { checkStorageLength, compareValues, storageCompare, storageEquals, type Storage } from "./storage";

const warned = new WeakSet<Linearizer<unknown>>();

/** Logs once per key type when a map larger than the configured threshold is allocated. */
export function noteAllocation(linearizer: Linearizer<unknown>): void {
  const { largeMapWarningThreshold } = getConfig();
  if (linearizer.LENGTH <= largeMapWarningThreshold || warned.has(linearizer)) {
    return;
  }
  warned.add(linearizer);
  log.warn(`allocating ${linearizer.LENGTH} slots for a map keyed by ${linearizer.name} (threshold ${largeMapWarningThreshold})`);
}

export abstract class LinearMap<K, V> implements Iterable<Entry<K, V>> {
  readonly linearizer: Linearizer<K>;
  protected readonly storage: Storage<V>;

  protected constructor(linearizer: Linearizer<K>, storage: Storage<V>) {
    checkStorageLength(linearizer.LENGTH, storage.length);
    this.linearizer = linearizer;
    this.storage = storage;
  }

  /** Number of slots; always the key type's LENGTH. */
  get length(): number {
    return this.storage.length;
  }

  get(key: K): V {
    return this.storage[this.linearizer.linearize(key)];
  }

  set(key: K, value: V): void {
    this.storage[this.linearizer.linearize(key)] = value;
  }

  /** Reads the slot of a pre-computed index. */
  getAt(key: Linearized<K>): V {
    const index = key.get();
    debugAssertIndex(index, this.storage.length);
    return this.storage[index];
  }

  setAt(key: Linearized<K>, value: V): void {
    const index = key.get();
    debugAssertIndex(index, this.storage.length);
    this.storage[index] = value;
  }

  /** Replaces the value of `key` with `fn(old)` and returns the new value. */
  update(key: K, fn: (value: V, key: K) => V): V {
    const index = this.linearizer.linearize(key);
    const next = fn(this.storage[index], key);
    this.storage[index] = next;
    return next;
  }

  /** Resets every slot to a fresh default. */
  clear(makeDefault: () => V): void {
    for (let i = 0; i < this.storage.length; i++) {
      this.storage[i] = makeDefault();
    }
  }

  /** Overwrites the slots of the given keys; later entries win. */
  extend(entries: Iterable<readonly [K, V]>): void {
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  keys(): Variants<K> {
    return new Variants(this.linearizer);
  }

  values(): Values<V> {
    return new Values(this.storage);
  }

  entries(): Iter<K, V> {
    return new Iter(this.linearizer, this.storage);
  }

  iter(): Iter<K, V> {
    return this.entries();
  }

  iterMut(): IterMut<K, V> {
    return new IterMut(this.linearizer, this.storage);
  }

  /** Entries over storage handed to the iterator; the map should not be used afterwards. */
  intoIter(): IntoIter<K, V> {
    return new IntoIter(this.linearizer, this.storage);
  }

  [Symbol.iterator](): Iter<K, V> {
    return this.entries();
  }

  /** The backing array, without copying. Slot `i` belongs to `delinearizeUnchecked(i)`. */
  asStorage(): Storage<V> {
    return this.storage;
  }

  equals(other: LinearMap<K, V>, eq: (a: V, b: V) => boolean = Object.is): boolean {
    return storageEquals(this.storage, other.storage, eq);
  }

  /** Lexicographic by slot index. */
  compare(other: LinearMap<K, V>, cmp: (a: V, b: V) => number = compareValues): -1 | 0 | 1 {
    return storageCompare(this.storage, other.storage, cmp);
  }

  hash(hashItem: (value: V) => number = hashValue): number {
    return hashSequence(this.storage, hashItem);
  }

  /** Renders `{key: value, ...}` in index order. */
  format(formatValue: (value: V) => string = (v) => inspect(v)): string {
    const parts: string[] = [];
    for (let i = 0; i < this.storage.length; i++) {
      parts.push(`${this.linearizer.describe(this.linearizer.delinearizeUnchecked(i))}: ${formatValue(this.storage[i])}`);
    }
    return `{${parts.join(", ")}}`;
  }

  toString(): string {
    return this.format();
  }

  /**
   * Plain object keyed by canonical key strings, so `JSON.stringify(map)`
   * works. Property order follows the engine's rules, which put integer-like
   * keys first; `stringifyMap` writes text in index order.
   */
  toJSON(): Record<string, V> {
    const out: Record<string, V> = {};
    const keys = keyStrings(this.linearizer);
    for (let i = 0; i < this.storage.length; i++) {
      defineEntry(out, keys[i], this.storage[i]);
    }
    return out;
  }

  [inspect.custom](): string {
    return `${this.constructor.name}(${this.storage.length}) ${this.format()}`;
  }
}

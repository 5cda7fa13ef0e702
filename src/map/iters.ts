/**
 * @file Iterators over static map entries
 *
 * Keys are recovered from slot indices with `delinearizeUnchecked`; no key is
 * ever stored. All iterators share the cursor semantics of `Variants`.
 */
import { CursorIterator } from "../linearize/cursor";
import type { Linearizer } from "../types";
import type { Storage } from "./storage";

export type Entry<K, V> = [key: K, value: V];

/** Borrowed `[key, value]` pairs, reading the map's storage as they go. */
export class Iter<K, V> extends CursorIterator<Entry<K, V>> {
  protected readonly linearizer: Linearizer<K>;
  protected readonly storage: Storage<V>;

  constructor(linearizer: Linearizer<K>, storage: Storage<V>, front = 0, back = storage.length) {
    super(front, back);
    this.linearizer = linearizer;
    this.storage = storage;
  }

  protected override item(index: number): Entry<K, V> {
    return [this.linearizer.delinearizeUnchecked(index), this.storage[index]];
  }

  override clone(): Iter<K, V> {
    return new Iter(this.linearizer, this.storage, this.front, this.back);
  }
}

/** Values in key order. */
export class Values<V> extends CursorIterator<V> {
  private readonly storage: Storage<V>;

  constructor(storage: Storage<V>, front = 0, back = storage.length) {
    super(front, back);
    this.storage = storage;
  }

  protected override item(index: number): V {
    return this.storage[index];
  }

  override clone(): Values<V> {
    return new Values(this.storage, this.front, this.back);
  }
}

/** Handle on one slot; assigning `value` writes through to the map. */
export class EntryRef<K, V> {
  readonly key: K;
  readonly index: number;
  private readonly storage: Storage<V>;

  constructor(key: K, index: number, storage: Storage<V>) {
    this.key = key;
    this.index = index;
    this.storage = storage;
  }

  get value(): V {
    return this.storage[this.index];
  }

  set value(v: V) {
    this.storage[this.index] = v;
  }
}

/** Mutable entries. */
export class IterMut<K, V> extends CursorIterator<EntryRef<K, V>> {
  private readonly linearizer: Linearizer<K>;
  private readonly storage: Storage<V>;

  constructor(linearizer: Linearizer<K>, storage: Storage<V>, front = 0, back = storage.length) {
    super(front, back);
    this.linearizer = linearizer;
    this.storage = storage;
  }

  protected override item(index: number): EntryRef<K, V> {
    return new EntryRef(this.linearizer.delinearizeUnchecked(index), index, this.storage);
  }

  override clone(): IterMut<K, V> {
    return new IterMut(this.linearizer, this.storage, this.front, this.back);
  }
}

/**
 * Owning `[key, value]` pairs. The iterator holds the storage taken from a
 * consumed map; clones share it.
 */
export class IntoIter<K, V> extends Iter<K, V> {
  override clone(): IntoIter<K, V> {
    return new IntoIter(this.linearizer, this.storage, this.front, this.back);
  }
}

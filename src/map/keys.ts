/**
 * @file Canonical key strings and the reverse lookup used by decoders
 */
import { InvalidShapeError } from "../errors";
import type { Linearizer } from "../types";

type KeyTable = { index: Map<string, number>; strings: string[] };

const keyTables = new WeakMap<Linearizer<unknown>, KeyTable>();

/**
 * String form of a key as it appears in serialized maps.
 *
 * This is `describe(key)`, except that a bare JSON string is unquoted so that
 * string enumerations serialize as `{"red": ...}` rather than `{"\"red\"": ...}`.
 */
export function keyString<K>(linearizer: Linearizer<K>, key: K): string {
  return unquote(linearizer.describe(key));
}

function unquote(text: string): string {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "string") {
      return parsed;
    }
  }
  return text;
}

function keyTable<K>(linearizer: Linearizer<K>): KeyTable {
  const cached = keyTables.get(linearizer);
  if (cached) {
    return cached;
  }
  const index = new Map<string, number>();
  const strings: string[] = [];
  for (let i = 0; i < linearizer.LENGTH; i++) {
    const k = keyString(linearizer, linearizer.delinearizeUnchecked(i));
    const prev = index.get(k);
    if (prev !== undefined) {
      throw new InvalidShapeError(`${linearizer.name} renders indices ${prev} and ${i} as the same key ${JSON.stringify(k)}`);
    }
    index.set(k, i);
    strings.push(k);
  }
  const table = { index, strings };
  keyTables.set(linearizer, table);
  return table;
}

/**
 * Key string to index, built by enumerating the key type once per linearizer.
 * Throws `InvalidShapeError` when two indices render as the same key string.
 */
export function keyIndex<K>(linearizer: Linearizer<K>): ReadonlyMap<string, number> {
  return keyTable(linearizer).index;
}

/** Key strings in index order, validated the same way as {@link keyIndex}. */
export function keyStrings<K>(linearizer: Linearizer<K>): readonly string[] {
  return keyTable(linearizer).strings;
}

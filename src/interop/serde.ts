/**
 * @file JSON boundary for static maps
 *
 * A map serializes as an object with exactly LENGTH entries keyed by the
 * canonical key string (`keyString`) in ascending index order. Decoding is
 * strict by default: every key must be present and no other key may appear.
 */
import { MapShapeError, MissingKeyError, UnknownKeyError } from "../errors";
import type { LinearMap } from "../map/base";
import { keyIndex, keyString, keyStrings } from "../map/keys";
import { StaticMap } from "../map/static_map";
import type { Linearizer } from "../types";
import { createBitMask, maskHas, maskSet } from "../util/bitset";
import { defineEntry, describeKind, isPlainRecord } from "../util/is-object";

/**
 * How absent keys are treated when decoding.
 * - `"strict"`: `MissingKeyError` naming the first absent key in index order.
 * - `useDefault`: absent keys take `makeDefault()`.
 */
export type DecodePolicy<V> = "strict" | { kind: "useDefault"; makeDefault: () => V };

export type EncodeValue<K, V> = (value: V, key: K) => unknown;
export type DecodeValue<K, V> = (raw: unknown, key: K) => V;

const identity = (value: unknown): unknown => value;

function* indexedEntries<K, V>(map: LinearMap<K, V>): Generator<[number, K, V]> {
  let i = 0;
  for (const [key, value] of map.entries()) {
    yield [i, key, value];
    i += 1;
  }
}

/** Object form of a map, one property per key. */
export function toJSON<K, V>(map: LinearMap<K, V>, encodeValue: EncodeValue<K, V> = identity): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const keys = keyStrings(map.linearizer);
  for (const [i, key, value] of indexedEntries(map)) {
    defineEntry(out, keys[i], encodeValue(value, key));
  }
  return out;
}

/** Like `toJSON`, leaving out keys whose value is `null`. */
export function toJSONSkipNone<K, V>(
  map: LinearMap<K, V | null>,
  encodeValue: EncodeValue<K, V> = identity,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const keys = keyStrings(map.linearizer);
  for (const [i, key, value] of indexedEntries(map)) {
    if (value !== null) {
      defineEntry(out, keys[i], encodeValue(value, key));
    }
  }
  return out;
}

/**
 * JSON text with entries in ascending index order.
 *
 * `JSON.stringify(toJSON(map))` lets the engine move integer-like keys to the
 * front; this writes the entries itself.
 */
export function stringifyMap<K, V>(map: LinearMap<K, V>, encodeValue: EncodeValue<K, V> = identity): string {
  const parts: string[] = [];
  const keys = keyStrings(map.linearizer);
  for (const [i, key, value] of indexedEntries(map)) {
    const text = JSON.stringify(encodeValue(value, key));
    parts.push(`${JSON.stringify(keys[i])}:${text ?? "null"}`);
  }
  return `{${parts.join(",")}}`;
}

type Decoded<V> = { slots: V[]; present: Uint8Array };

function decodeEntries<K, V>(linearizer: Linearizer<K>, payload: unknown, decodeValue: DecodeValue<K, V>): Decoded<V> {
  if (!isPlainRecord(payload)) {
    throw new MapShapeError("a map", describeKind(payload));
  }
  const index = keyIndex(linearizer);
  const slots = new Array<V>(linearizer.LENGTH);
  const present = createBitMask(linearizer.LENGTH);
  for (const [k, raw] of Object.entries(payload)) {
    const i = index.get(k);
    if (i === undefined) {
      throw new UnknownKeyError(k);
    }
    slots[i] = decodeValue(raw, linearizer.delinearizeUnchecked(i));
    maskSet(present, i);
  }
  return { slots, present };
}

/** Decodes the object form produced by `toJSON`. */
export function fromJSON<K, V>(
  linearizer: Linearizer<K>,
  payload: unknown,
  decodeValue: DecodeValue<K, V>,
  policy: DecodePolicy<V> = "strict",
): StaticMap<K, V> {
  const { slots, present } = decodeEntries(linearizer, payload, decodeValue);
  for (let i = 0; i < slots.length; i++) {
    if (maskHas(present, i)) {
      continue;
    }
    if (policy === "strict") {
      throw new MissingKeyError(keyString(linearizer, linearizer.delinearizeUnchecked(i)));
    }
    slots[i] = policy.makeDefault();
  }
  return StaticMap.fromStorage(linearizer, slots);
}

/** Decodes the output of `toJSONSkipNone`: absent keys and `null` values become `null`. */
export function fromJSONSkipNone<K, V>(
  linearizer: Linearizer<K>,
  payload: unknown,
  decodeValue: DecodeValue<K, V>,
): StaticMap<K, V | null> {
  const decodeOptional: DecodeValue<K, V | null> = (raw, key) => (raw === null ? null : decodeValue(raw, key));
  return fromJSON(linearizer, payload, decodeOptional, { kind: "useDefault", makeDefault: () => null });
}

/** `fromJSON` over JSON text. */
export function parseMap<K, V>(
  linearizer: Linearizer<K>,
  text: string,
  decodeValue: DecodeValue<K, V>,
  policy: DecodePolicy<V> = "strict",
): StaticMap<K, V> {
  const payload: unknown = JSON.parse(text);
  return fromJSON(linearizer, payload, decodeValue, policy);
}

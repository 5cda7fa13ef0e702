/**
 * @file 32-bit FNV-1a hashing for map contents
 */

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** FNV-1a over the UTF-16 code units of a string. */
export function fnv1a(s: string, seed = FNV_OFFSET): number {
  let h = seed >>> 0;
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    h = Math.imul(h ^ (c & 0xff), FNV_PRIME);
    h = Math.imul(h ^ (c >>> 8), FNV_PRIME);
  }
  return h >>> 0;
}

/** Fold a 32-bit word into a running FNV-1a state, one byte at a time. */
export function mixWord(h: number, word: number): number {
  let x = h >>> 0;
  for (let k = 0; k < 4; k++) {
    x = Math.imul(x ^ ((word >>> (k * 8)) & 0xff), FNV_PRIME);
  }
  return x >>> 0;
}

/**
 * Hash of a value, tagged by its type.
 *
 * Objects and arrays hash by their own enumerable contents; bigints keep
 * their type tag inside nested values, and a reference back to an enclosing
 * object hashes as a fixed marker.
 */
export function hashValue(v: unknown): number {
  return fnv1a(valueText(v, []));
}

function valueText(v: unknown, ancestors: object[]): string {
  if (typeof v === "symbol") {
    return `symbol:${v.description ?? ""}`;
  }
  if (typeof v !== "object" || v === null) {
    return `${typeof v}:${String(v)}`;
  }
  if (ancestors.includes(v)) {
    return "cycle";
  }
  ancestors.push(v);
  const parts = Array.isArray(v)
    ? v.map((item) => valueText(item, ancestors))
    : Object.entries(v).map(([k, item]) => `${JSON.stringify(k)}=${valueText(item, ancestors)}`);
  ancestors.pop();
  return `${Array.isArray(v) ? "array" : "object"}(${parts.join(",")})`;
}

/** Hash a sequence of element hashes, including its length. */
export function hashSequence<T>(items: ArrayLike<T>, hashItem: (item: T) => number): number {
  let h = mixWord(FNV_OFFSET, items.length);
  for (let i = 0; i < items.length; i++) {
    h = mixWord(h, hashItem(items[i]) >>> 0);
  }
  return h;
}

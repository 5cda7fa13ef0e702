/**
 * @file Small type guards for object-like values
 */

/** Narrow unknown to a generic object record (non-null). */
export function isObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object") {
    return false;
  }
  return value !== null;
}

/** Object records that are not arrays: the shape of a serialized map. */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (!isObject(value)) {
    return false;
  }
  return !Array.isArray(value);
}

/** Short type label for error messages ("null", "array", "string", ...). */
export function describeKind(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}

/**
 * Writes an own enumerable property. Unlike `target[key] = value`, a key of
 * `"__proto__"` becomes an ordinary entry instead of replacing the prototype.
 */
export function defineEntry(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

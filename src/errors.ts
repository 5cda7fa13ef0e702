/**
 * @file Error types raised by linearizers, maps and their codecs
 *
 * Precondition violations (out-of-range unchecked indices, unfinished
 * builders) are only reported when debug assertions are enabled; everything
 * else here is an ordinary recoverable error.
 */

/** Thrown when a buffer handed to a map does not hold exactly LENGTH elements. */
export class LengthMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;
  constructor(expected: number, actual: number) {
    super(`length mismatch: expected ${expected} elements, got ${actual}`);
    this.name = "LengthMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** Common base of deserialization failures. */
export class MapDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MapDecodeError";
  }
}

/** Payload is a mapping but lacks one of the keys. */
export class MissingKeyError extends MapDecodeError {
  readonly key: string;
  constructor(key: string) {
    super(`missing key ${key} in static map`);
    this.name = "MissingKeyError";
    this.key = key;
  }
}

/** Payload names a key that is not a value of the key type. */
export class UnknownKeyError extends MapDecodeError {
  readonly key: string;
  constructor(key: string) {
    super(`unknown key ${JSON.stringify(key)} in static map`);
    this.name = "UnknownKeyError";
    this.key = key;
  }
}

/** Payload is not shaped as a mapping at all. */
export class MapShapeError extends MapDecodeError {
  readonly expectedShape: string;
  constructor(expectedShape: string, actual: string) {
    super(`invalid type: ${actual}, expected ${expectedShape}`);
    this.name = "MapShapeError";
    this.expectedShape = expectedShape;
  }
}

/** Thrown at composition time when a cardinality leaves the safe integer range. */
export class LengthOverflowError extends Error {
  readonly typeName: string;
  constructor(typeName: string) {
    super(`cardinality of ${typeName} exceeds Number.MAX_SAFE_INTEGER`);
    this.name = "LengthOverflowError";
    this.typeName = typeName;
  }
}

/** Thrown when a shape description cannot be turned into a bijection. */
export class InvalidShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidShapeError";
  }
}

/** A value passed to `linearize` is not a value of the linearizer's type. */
export class InvalidValueError extends Error {
  constructor(typeName: string, value: unknown) {
    super(`${String(value)} is not a value of ${typeName}`);
    this.name = "InvalidValueError";
  }
}

/** Debug assertion: an index handed to an unchecked path is out of range. */
export class IndexOutOfRangeError extends Error {
  readonly index: number;
  readonly length: number;
  constructor(index: number, length: number) {
    super(`index ${index} out of range for length ${length}`);
    this.name = "IndexOutOfRangeError";
    this.index = index;
    this.length = length;
  }
}

/** Debug assertion: a builder was finished before every slot was set. */
export class UnsetSlotError extends Error {
  readonly index: number;
  constructor(index: number) {
    super(`static map builder finished with slot ${index} unset`);
    this.name = "UnsetSlotError";
    this.index = index;
  }
}

/** Reached code that an uninhabited type makes impossible. */
export class UnreachableError extends Error {
  constructor(typeName: string) {
    super(`entered unreachable code: ${typeName} has no values`);
    this.name = "UnreachableError";
  }
}

/** Byte view cannot be reinterpreted as the requested element type. */
export class PodCastError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PodCastError";
  }
}

/** True for decode failures of a well-formed mapping that lacks entries. */
export function isIncompleteMapError(e: unknown): e is MissingKeyError {
  return e instanceof MissingKeyError;
}

/** True when the payload was not a mapping at all. */
export function isMapShapeError(e: unknown): e is MapShapeError {
  return e instanceof MapShapeError;
}

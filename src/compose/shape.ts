/**
 * @file Field access helpers shared by the composers
 */
import { InvalidShapeError } from "../errors";
import { isLinearizer } from "../linearize/ext";
import { isPlainRecord } from "../util/is-object";
import type { Linearizer } from "../types";

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

/** Reads a named property from a composite value. */
export function readField<T>(value: T, key: string): unknown {
  return Reflect.get(Object(value), key);
}

/**
 * Types the object or array produced by a decoder.
 *
 * Decoders fill exactly the keys of the shape with values from the field
 * linearizers, so the result is a value of `T`.
 */
export function assemble<T>(parts: Record<string, unknown> | unknown[]): T {
  return parts as T;
}

/**
 * Validates declared names. Integer-like names are rejected because the
 * engine would enumerate them before the others, silently changing the
 * declared order. `__proto__` cannot be assigned as an own property.
 */
export function checkNames(names: readonly string[], typeName: string, what: string): string[] {
  for (const n of names) {
    if (n === "__proto__") {
      throw new InvalidShapeError(`${what} name "__proto__" of ${typeName} is reserved`);
    }
    if (INTEGER_KEY.test(n)) {
      throw new InvalidShapeError(`${what} name ${JSON.stringify(n)} of ${typeName} is integer-like; order would not be preserved`);
    }
  }
  return names.slice();
}

/** Validates that every entry of a shape is a linearizer. */
export function checkLinearizers(
  entries: ReadonlyArray<readonly [string, unknown]>,
  typeName: string,
): Linearizer<unknown>[] {
  return entries.map(([key, lin]) => {
    if (!isLinearizer(lin)) {
      throw new InvalidShapeError(`field ${JSON.stringify(key)} of ${typeName} is not a linearizer`);
    }
    return lin;
  });
}

/** Splits a field shape into validated names and linearizers. */
export function splitShape(shape: unknown, typeName: string): { names: string[]; lins: Linearizer<unknown>[] } {
  if (!isPlainRecord(shape)) {
    throw new InvalidShapeError(`shape of ${typeName} must be an object of linearizers`);
  }
  const names = checkNames(Object.keys(shape), typeName, "field");
  const lins = checkLinearizers(Object.entries(shape), typeName);
  return { names, lins };
}

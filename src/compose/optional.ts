/**
 * @file `T | null` as the sum of `null` (index 0) and `T` (indices 1..|T|)
 */
import { LengthOverflowError } from "../errors";
import type { Linearizer } from "../types";

export function optional<T extends {}>(inner: Linearizer<T>): Linearizer<T | null> {
  const name = `${inner.name} | null`;
  const LENGTH = inner.LENGTH + 1;
  if (LENGTH > Number.MAX_SAFE_INTEGER) {
    throw new LengthOverflowError(name);
  }
  return {
    name,
    LENGTH,
    linearize: (value) => (value === null ? 0 : 1 + inner.linearize(value)),
    delinearizeUnchecked: (index) => (index === 0 ? null : inner.delinearizeUnchecked(index - 1)),
    describe: (value) => (value === null ? "null" : inner.describe(value)),
  };
}

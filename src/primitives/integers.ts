/**
 * @file Linearizers for fixed-width integers
 *
 * Unsigned values map to themselves. Signed values are shifted by their
 * minimum, so `MIN` maps to 0 and `MAX` to `2^bits - 1`. Widths above 32 bits
 * do not fit a safe-integer index and are not provided.
 */
import type { Linearizer } from "../types";

export type IntegerWidth = 8 | 16 | 32;

/**
 *
 */
export function unsigned(bits: IntegerWidth): Linearizer<number> {
  const LENGTH = 2 ** bits;
  return {
    name: `u${bits}`,
    LENGTH,
    linearize: (value) => value,
    delinearizeUnchecked: (index) => index,
    describe: (value) => String(value),
  };
}

/**
 *
 */
export function signed(bits: IntegerWidth): Linearizer<number> {
  const LENGTH = 2 ** bits;
  const MIN = -(2 ** (bits - 1));
  return {
    name: `i${bits}`,
    LENGTH,
    linearize: (value) => value - MIN,
    delinearizeUnchecked: (index) => index + MIN,
    describe: (value) => String(value),
  };
}

export const u8 = unsigned(8);
export const u16 = unsigned(16);
export const u32 = unsigned(32);
export const i8 = signed(8);
export const i16 = signed(16);
export const i32 = signed(32);

/**
 * @file Single-valued linearizers: `unit` (null) and `literal(v)`
 */
import type { JsonPrimitive, Linearizer } from "../types";

export const unit: Linearizer<null> = {
  name: "null",
  LENGTH: 1,
  linearize: () => 0,
  delinearizeUnchecked: () => null,
  describe: () => "null",
};

/** The type whose only value is `value`. */
export function literal<const V extends JsonPrimitive>(value: V): Linearizer<V> {
  const text = JSON.stringify(value);
  return {
    name: text,
    LENGTH: 1,
    linearize: () => 0,
    delinearizeUnchecked: () => value,
    describe: () => text,
  };
}

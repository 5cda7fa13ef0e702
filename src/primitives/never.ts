/**
 * @file The uninhabited type
 *
 * LENGTH is 0, so no index is ever valid and no value can be passed in. The
 * functions exist to satisfy the contract and trap if reached.
 */
import type { Linearizer } from "../types";
import { unreachable } from "../util/assert";

export const never: Linearizer<never> = {
  name: "never",
  LENGTH: 0,
  linearize: () => unreachable("never"),
  delinearizeUnchecked: () => unreachable("never"),
  describe: () => unreachable("never"),
};

/** A linearizer for an uninhabited composite; used when a field or every variant has no values. */
export function uninhabited<T>(name: string): Linearizer<T> {
  return {
    name,
    LENGTH: 0,
    linearize: () => unreachable(name),
    delinearizeUnchecked: () => unreachable(name),
    describe: () => unreachable(name),
  };
}

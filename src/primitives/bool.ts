/**
 * @file Linearizer for booleans: false = 0, true = 1
 */
import type { Linearizer } from "../types";

export const bool: Linearizer<boolean> = {
  name: "boolean",
  LENGTH: 2,
  linearize: (value) => (value ? 1 : 0),
  delinearizeUnchecked: (index) => index !== 0,
  describe: (value) => (value ? "true" : "false"),
};

/**
 * @file Console-backed logger with a bracketed component prefix
 */
import type { Logger } from "../config/types";

/**
 *
 */
export function createConsoleLogger(prefix = "[linmap]"): Logger {
  return {
    debug(message: string) {
      console.debug(`${prefix} ${message}`);
    },
    warn(message: string) {
      console.warn(`${prefix} ${message}`);
    },
  };
}

/**
 * @file Level-filtered logging through the configured logger
 */
import { getConfig } from "../config";

export const log = {
  debug(message: string): void {
    const cfg = getConfig();
    if (cfg.logLevel === "debug") {
      cfg.logger.debug(message);
    }
  },
  warn(message: string): void {
    const cfg = getConfig();
    if (cfg.logLevel !== "silent") {
      cfg.logger.warn(message);
    }
  },
};

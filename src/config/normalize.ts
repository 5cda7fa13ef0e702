/**
 * @file Config normalization + validation (raw -> LinmapConfig)
 */
import type { LinmapConfig, LogLevel, Logger, RawLinmapConfig } from "./types";
import { createConsoleLogger } from "../util/console_logger";
import { isObject } from "../util/is-object";

export const DEFAULT_LARGE_MAP_WARNING_THRESHOLD = 1 << 24;

const LOG_LEVELS: readonly LogLevel[] = ["silent", "warn", "debug"];

/** Authoring helper to get type inference in user configs. */
export function defineConfig(x: RawLinmapConfig): RawLinmapConfig {
  return x;
}

/** Validate raw config shape. Throws with a descriptive message on invalid. */
export function validateRawConfig(raw: unknown): asserts raw is RawLinmapConfig {
  if (!isObject(raw)) {
    throw new Error("config must be an object");
  }
  const { debugAssertions, largeMapWarningThreshold, logLevel, logger } = raw;
  if (debugAssertions !== undefined && typeof debugAssertions !== "boolean") {
    throw new Error("config.debugAssertions must be a boolean");
  }
  if (largeMapWarningThreshold !== undefined) {
    if (
      typeof largeMapWarningThreshold !== "number" ||
      !Number.isSafeInteger(largeMapWarningThreshold) ||
      largeMapWarningThreshold < 0
    ) {
      throw new Error("config.largeMapWarningThreshold must be a non-negative safe integer");
    }
  }
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new Error(`config.logLevel must be one of ${LOG_LEVELS.join(", ")}`);
  }
  if (logger !== undefined && !isLogger(logger)) {
    throw new Error("config.logger must provide debug() and warn()");
  }
}

/** Normalize raw config into a complete LinmapConfig, filling defaults. */
export function normalizeConfig(raw: unknown, base?: LinmapConfig): LinmapConfig {
  validateRawConfig(raw);
  return {
    debugAssertions: raw.debugAssertions ?? base?.debugAssertions ?? false,
    largeMapWarningThreshold:
      raw.largeMapWarningThreshold ?? base?.largeMapWarningThreshold ?? DEFAULT_LARGE_MAP_WARNING_THRESHOLD,
    logLevel: raw.logLevel ?? base?.logLevel ?? "warn",
    logger: raw.logger ?? base?.logger ?? createConsoleLogger(),
  } satisfies LinmapConfig;
}

function isLogLevel(x: unknown): x is LogLevel {
  return LOG_LEVELS.some((level) => level === x);
}

function isLogger(x: unknown): x is Logger {
  if (!isObject(x)) {
    return false;
  }
  return typeof x.debug === "function" && typeof x.warn === "function";
}

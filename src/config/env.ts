/**
 * @file Environment overrides (LINMAP_* variables)
 */
import type { LogLevel, RawLinmapConfig } from "./types";

export const ENV_DEBUG_ASSERTIONS = "LINMAP_DEBUG_ASSERTIONS";
export const ENV_LARGE_MAP_THRESHOLD = "LINMAP_LARGE_MAP_THRESHOLD";
export const ENV_LOG_LEVEL = "LINMAP_LOG_LEVEL";

/** Read raw options from environment variables; unset or malformed values are skipped. */
export function resolveEnvConfig(env: Record<string, string | undefined>): RawLinmapConfig {
  const out: RawLinmapConfig = {};
  const debug = parseFlag(env[ENV_DEBUG_ASSERTIONS]);
  if (debug !== undefined) {
    out.debugAssertions = debug;
  }
  const threshold = env[ENV_LARGE_MAP_THRESHOLD];
  if (threshold !== undefined && /^\d+$/.test(threshold.trim())) {
    const n = Number(threshold.trim());
    if (Number.isSafeInteger(n)) {
      out.largeMapWarningThreshold = n;
    }
  }
  const level = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
  if (level === "silent" || level === "warn" || level === "debug") {
    out.logLevel = level satisfies LogLevel;
  }
  return out;
}

function parseFlag(v: string | undefined): boolean | undefined {
  if (v === undefined) {
    return undefined;
  }
  const s = v.trim().toLowerCase();
  if (s === "1" || s === "true" || s === "yes" || s === "on") {
    return true;
  }
  if (s === "0" || s === "false" || s === "no" || s === "off" || s === "") {
    return false;
  }
  return undefined;
}

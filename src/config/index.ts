/**
 * @file Process-wide runtime options
 *
 * Options start from defaults merged with LINMAP_* environment variables and
 * can be replaced with `configure()`. Reads go through `getConfig()` so that
 * hot paths pay one property access.
 */
import { resolveEnvConfig } from "./env";
import { normalizeConfig } from "./normalize";
import type { LinmapConfig, RawLinmapConfig } from "./types";

export { defineConfig, normalizeConfig, validateRawConfig, DEFAULT_LARGE_MAP_WARNING_THRESHOLD } from "./normalize";
export { resolveEnvConfig, ENV_DEBUG_ASSERTIONS, ENV_LARGE_MAP_THRESHOLD, ENV_LOG_LEVEL } from "./env";
export type { LinmapConfig, RawLinmapConfig, Logger, LogLevel } from "./types";

const state: { current: LinmapConfig } = { current: initialConfig() };

function initialConfig(): LinmapConfig {
  return normalizeConfig(resolveEnvConfig(process.env));
}

/** Current options. */
export function getConfig(): LinmapConfig {
  return state.current;
}

/** Merge options over the current ones. Returns the previous config so callers can restore it. */
export function configure(raw: RawLinmapConfig): LinmapConfig {
  const prev = state.current;
  state.current = normalizeConfig(raw, prev);
  return prev;
}

/** Replace the current options wholesale (e.g. to restore a value returned by configure). */
export function setConfig(config: LinmapConfig): void {
  state.current = config;
}

/** Back to defaults + environment. */
export function resetConfig(): void {
  state.current = initialConfig();
}

/**
 * @file Config types: single source for runtime options
 */

export type LogLevel = "silent" | "warn" | "debug";

/** Sink for library diagnostics. */
export type Logger = {
  debug(message: string): void;
  warn(message: string): void;
};

export type LinmapConfig = {
  /** Verify unchecked indices and builder coverage at run time. */
  debugAssertions: boolean;
  /** Maps with more slots than this log a warning on allocation. */
  largeMapWarningThreshold: number;
  logLevel: LogLevel;
  logger: Logger;
};

/** Partial options as supplied by callers or the environment. */
export type RawLinmapConfig = Partial<LinmapConfig>;

/**
 * Console logging
 *
 * Informational output goes to stdout, warnings and errors to stderr.
 * The orchestrator takes a Logger so tests can record what it prints.
 */

export type LogLevel = "debug" | "info" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2,
};

/**
 * Create a console logger
 *
 * - "debug": everything (--verbose)
 * - "info": default
 * - "error": errors only (--quiet)
 */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];

  return {
    debug(message) {
      if (threshold <= LEVEL_ORDER.debug) console.log(`[debug] ${message}`);
    },
    info(message) {
      if (threshold <= LEVEL_ORDER.info) console.log(message);
    },
    warn(message) {
      if (threshold <= LEVEL_ORDER.info) console.error(`Warning: ${message}`);
    },
    error(message) {
      console.error(`Error: ${message}`);
    },
  };
}

/**
 * Pick the log level from --verbose / --quiet (quiet wins)
 */
export function logLevelFor(options: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (options.quiet) return "error";
  if (options.verbose) return "debug";
  return "info";
}

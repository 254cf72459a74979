/**
 * Console logging with ISO 8601 timestamps.
 * Scoped loggers prefix each line with `[scope]`; debug lines are opt-in.
 */

/**
 * Format a timestamp in ISO 8601 format with timezone.
 * Example: 2026-01-03T16:45:23.123Z
 */
function formatTimestamp(): string {
  return new Date().toISOString();
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Print debug lines (default: false) */
  debug?: boolean;
}

/**
 * Create a logger for one part of the program, e.g. createLogger("Store").
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = () => [`[${formatTimestamp()}]`, `[${scope}]`];

  return {
    debug(...args) {
      if (options.debug) console.log(...prefix(), ...args);
    },
    info(...args) {
      console.log(...prefix(), ...args);
    },
    warn(...args) {
      console.warn(...prefix(), ...args);
    },
    error(...args) {
      console.error(...prefix(), ...args);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

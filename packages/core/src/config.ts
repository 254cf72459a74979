/**
 * Configuration management.
 * Reads from environment variables with sensible defaults.
 */

import { homedir } from "node:os";
import { join } from "node:path";

/** Live display refresh interval used when WORKLOG_TICK_MS is unset or invalid */
export const DEFAULT_TICK_MS = 200;

/** Get the default data directory in user's home directory */
export function getDefaultDataDir(): string {
  return join(homedir(), ".worklog");
}

/** Get the default record store path */
export function getDefaultDataPath(): string {
  return join(getDefaultDataDir(), "time_records.json");
}

export interface Config {
  /** Path to the JSON record store (default: ~/.worklog/time_records.json) */
  dataFile: string;

  /** Refresh interval of the live timer display in ms (default: 200) */
  tickMs: number;

  /** Enable debug logging */
  debug: boolean;
}

function parseTickMs(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_TICK_MS;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : DEFAULT_TICK_MS;
}

/**
 * Load configuration from environment variables.
 * `overrides` wins over the environment (used for CLI flags).
 */
export function loadConfig(overrides: Partial<Config> = {}): Config {
  const dataFile = process.env["WORKLOG_DATA_FILE"] ?? getDefaultDataPath();
  const tickMs = parseTickMs(process.env["WORKLOG_TICK_MS"]);
  const debug = process.env["WORKLOG_DEBUG"] === "1";

  return {
    dataFile: overrides.dataFile ?? dataFile,
    tickMs: overrides.tickMs ?? tickMs,
    debug: overrides.debug ?? debug,
  };
}

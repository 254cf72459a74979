/**
 * Helpers shared by the record and export commands.
 */

import { createLogger, loadConfig, RecordStore } from "@worklog/core";

export interface StoreCommandOptions {
  /** Override for the data file path */
  file?: string;
}

export function openStore(options: StoreCommandOptions): RecordStore {
  const config = loadConfig({ dataFile: options.file });
  return new RecordStore({
    filePath: config.dataFile,
    logger: createLogger("Store", { debug: config.debug }),
  });
}

/** Print a failure and mark the process as failed. */
export function reportError(error: unknown): void {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}

/**
 * Parse a record position typed by the user.
 * Returns null for anything that is not a non-negative integer.
 */
export function parseIndex(text: string): number | null {
  return /^\d+$/.test(text.trim()) ? parseInt(text, 10) : null;
}

/**
 * Durable record store backed by a single JSON file.
 *
 * The file holds an array of records in insertion order. Every change
 * rewrites the whole file through a temp file and a rename, so a crash
 * leaves either the old or the new content on disk.
 * Single process, single writer: there is no cross-process locking.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { WorklogError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { StoredRecord, WorkRecord } from "../types/index.js";

export interface RecordStoreOptions {
  /** Path to the JSON data file */
  filePath: string;
  logger?: Logger;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert one parsed JSON entry into a record.
 * Returns a reason string when the entry does not have the expected shape.
 */
export function fromStored(entry: unknown): WorkRecord | string {
  if (!isObject(entry)) return "entry is not an object";

  const { start_time, end_time, elapsed, comment } = entry;
  if (typeof start_time !== "string") return "start_time is not a string";
  if (typeof end_time !== "string") return "end_time is not a string";
  if (typeof elapsed !== "number" || !Number.isFinite(elapsed)) {
    return "elapsed is not a number";
  }
  // Older files may lack a comment; that reads as an empty one.
  if (comment !== undefined && typeof comment !== "string") {
    return "comment is not a string";
  }

  return {
    startTime: start_time,
    endTime: end_time,
    elapsedSeconds: elapsed,
    comment: comment ?? "",
  };
}

export function toStored(record: WorkRecord): StoredRecord {
  return {
    start_time: record.startTime,
    end_time: record.endTime,
    elapsed: record.elapsedSeconds,
    comment: record.comment,
  };
}

/**
 * The record at `index`, or IndexOutOfRange when there is none.
 */
export function recordAt(records: readonly WorkRecord[], index: number): WorkRecord {
  const record = Number.isInteger(index) && index >= 0 ? records[index] : undefined;
  if (record === undefined) {
    throw new WorklogError(
      "INDEX_OUT_OF_RANGE",
      `No record at index ${index} (${records.length} record${
        records.length === 1 ? "" : "s"
      } loaded). Reload and try again.`
    );
  }
  return record;
}

export class RecordStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(options: RecordStoreOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger ?? silentLogger;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Read all records. A missing file is an empty store.
   * Anything that is not an array of well-formed records raises CorruptStorage.
   */
  load(): WorkRecord[] {
    if (!this.exists()) {
      this.logger.debug(`No data file at ${this.filePath}, starting empty`);
      return [];
    }

    const content = fs.readFileSync(this.filePath, "utf-8");

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new WorklogError(
        "CORRUPT_STORAGE",
        `Data file ${this.filePath} is not valid JSON: ${
          error instanceof Error ? error.message : "Unknown error"
        }`
      );
    }

    if (!Array.isArray(parsed)) {
      throw new WorklogError(
        "CORRUPT_STORAGE",
        `Data file ${this.filePath} does not contain a list of records`
      );
    }

    const records: WorkRecord[] = [];
    parsed.forEach((entry: unknown, index) => {
      const result = fromStored(entry);
      if (typeof result === "string") {
        throw new WorklogError(
          "CORRUPT_STORAGE",
          `Data file ${this.filePath} has a malformed record at index ${index}: ${result}`
        );
      }
      records.push(result);
    });

    this.logger.debug(`Loaded ${records.length} records from ${this.filePath}`);
    return records;
  }

  /**
   * Replace the stored sequence with `records`.
   * Writes to a temp file beside the target, then renames it into place.
   */
  save(records: readonly WorkRecord[]): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const content = JSON.stringify(records.map(toStored), null, 4) + "\n";
    const tempPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;

    try {
      fs.writeFileSync(tempPath, content, "utf-8");
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }

    this.logger.debug(`Saved ${records.length} records to ${this.filePath}`);
  }

  /** Add a record at the end. Existing entries are left as they are. */
  append(record: WorkRecord): void {
    this.save([...this.load(), record]);
  }

  /**
   * Remove the record at `index` and persist the result.
   * Positions are relative to `snapshot` (the list the caller is looking at);
   * without one the store is reloaded first.
   *
   * @returns The removed record
   */
  deleteAt(index: number, snapshot?: readonly WorkRecord[]): WorkRecord {
    const records = [...(snapshot ?? this.load())];
    const removed = recordAt(records, index);

    records.splice(index, 1);
    this.save(records);
    this.logger.debug(`Deleted record ${index}`);
    return removed;
  }
}

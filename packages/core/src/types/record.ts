/**
 * Record types for worklog.
 * A record is one completed work session as kept in the record store.
 */

/**
 * A completed work session.
 * Times are local wall-clock ISO 8601 strings without an offset
 * (e.g. 2025-01-01T09:00:00).
 */
export interface WorkRecord {
  startTime: string;
  endTime: string;
  /** Seconds worked. For timer sessions this excludes paused time. */
  elapsedSeconds: number;
  /** Free text, may be empty */
  comment: string;
}

/** Shape of one entry in the JSON data file */
export interface StoredRecord {
  start_time: string;
  end_time: string;
  elapsed: number;
  comment: string;
}

export interface ExportTotals {
  totalSeconds: number;
  totalHours: number;
}

export type TableCell = string | number;

/** Ordered rows handed to a spreadsheet writer */
export type TabularData = TableCell[][];

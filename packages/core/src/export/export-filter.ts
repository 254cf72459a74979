/**
 * Date-range selection, totals and the export table layout.
 */

import { WorklogError } from "../errors.js";
import type {
  ExportTotals,
  TabularData,
  WorkRecord,
} from "../types/index.js";
import {
  compareCalendarDates,
  formatCalendarDate,
  parseCalendarDate,
  parseIsoDateTime,
  type CalendarDate,
} from "../utils/datetime.js";

export const EXPORT_HEADERS = [
  "Start Time",
  "End Time",
  "Elapsed (seconds)",
  "Comment",
] as const;

/**
 * Parse a `YYYY-MM-DD` range bound.
 * @param label - Field name used in the error message
 */
export function parseRangeDate(text: string, label = "Date"): CalendarDate {
  const date = parseCalendarDate(text);
  if (!date) {
    throw new WorklogError(
      "INVALID_FORMAT",
      `${label} must be in YYYY-MM-DD format.`
    );
  }
  return date;
}

/**
 * Records whose start date lies in [startDate, endDate].
 * Only the calendar date counts. Records with an unreadable startTime are
 * skipped. Stored order is kept. An empty result is not an error here.
 */
export function selectRange(
  records: readonly WorkRecord[],
  startDate: CalendarDate,
  endDate: CalendarDate
): WorkRecord[] {
  if (compareCalendarDates(endDate, startDate) < 0) {
    throw new WorklogError(
      "INVALID_DATE_RANGE",
      `End date ${formatCalendarDate(endDate)} is before start date ${formatCalendarDate(startDate)}.`
    );
  }

  return records.filter((record) => {
    const start = parseIsoDateTime(record.startTime);
    if (!start) return false;
    return (
      compareCalendarDates(start, startDate) >= 0 &&
      compareCalendarDates(start, endDate) <= 0
    );
  });
}

/** selectRange, but an empty selection raises NoRecordsInRange. */
export function selectForExport(
  records: readonly WorkRecord[],
  startDate: CalendarDate,
  endDate: CalendarDate
): WorkRecord[] {
  const selected = selectRange(records, startDate, endDate);
  if (selected.length === 0) {
    throw new WorklogError(
      "NO_RECORDS_IN_RANGE",
      "No records found in the specified date range."
    );
  }
  return selected;
}

export function aggregate(records: readonly WorkRecord[]): ExportTotals {
  const totalSeconds = records.reduce(
    (sum, record) => sum + record.elapsedSeconds,
    0
  );
  return { totalSeconds, totalHours: totalSeconds / 3600 };
}

/** Hours at two decimals, rounded. */
export function formatHours(totalHours: number): string {
  return totalHours.toFixed(2);
}

/**
 * Rows for the spreadsheet: header, one row per record, a blank row,
 * then total seconds and total hours.
 */
export function buildExportTable(
  records: readonly WorkRecord[],
  totals: ExportTotals
): TabularData {
  const rows: TabularData = [[...EXPORT_HEADERS]];

  for (const record of records) {
    rows.push([
      record.startTime,
      record.endTime,
      record.elapsedSeconds,
      record.comment,
    ]);
  }

  rows.push(EXPORT_HEADERS.map(() => ""));
  rows.push(["", "", totals.totalSeconds, "TOTAL SECONDS"]);
  rows.push(["", "", formatHours(totals.totalHours), "TOTAL HOURS"]);

  return rows;
}

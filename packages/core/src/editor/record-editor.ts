/**
 * Validation and rewriting of existing records.
 */

import { WorklogError } from "../errors.js";
import { recordAt, type RecordStore } from "../store/index.js";
import type { WorkRecord } from "../types/index.js";
import {
  formatIsoDateTime,
  isoToDisplay,
  parseDisplayDateTime,
  toNaiveSeconds,
} from "../utils/datetime.js";

/** Input format for start/end fields */
export const DISPLAY_FORMAT = "YYYY-MM-DD HH:MM:SS";

/** Text fields of an edit form */
export interface EditableFields {
  start: string;
  end: string;
  comment: string;
}

/**
 * Build a record from user-entered fields.
 * Equal start and end are fine and give zero elapsed seconds.
 * The comment is kept verbatim.
 */
export function validateAndBuild(
  startText: string,
  endText: string,
  comment: string
): WorkRecord {
  const start = parseDisplayDateTime(startText);
  const end = parseDisplayDateTime(endText);
  if (!start || !end) {
    throw new WorklogError(
      "INVALID_FORMAT",
      `Invalid date/time. Use ${DISPLAY_FORMAT} format.`
    );
  }

  const elapsedSeconds = toNaiveSeconds(end) - toNaiveSeconds(start);
  if (elapsedSeconds < 0) {
    throw new WorklogError(
      "END_BEFORE_START",
      "End time cannot be before start time."
    );
  }

  return {
    startTime: formatIsoDateTime(start),
    endTime: formatIsoDateTime(end),
    elapsedSeconds,
    comment,
  };
}

/**
 * Replace the record at `index` and save the full sequence.
 * `snapshot` is the list the index refers to; defaults to a fresh load.
 *
 * @returns The updated sequence as saved
 */
export function applyEdit(
  store: RecordStore,
  index: number,
  newRecord: WorkRecord,
  snapshot?: readonly WorkRecord[]
): WorkRecord[] {
  const records = [...(snapshot ?? store.load())];
  recordAt(records, index);

  records[index] = newRecord;
  store.save(records);
  return records;
}

/** Pre-fill values for editing a stored record. */
export function toEditableFields(record: WorkRecord): EditableFields {
  return {
    start: isoToDisplay(record.startTime),
    end: isoToDisplay(record.endTime),
    comment: record.comment,
  };
}

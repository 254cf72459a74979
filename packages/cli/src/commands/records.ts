/**
 * Records commands - list, edit and delete stored work sessions.
 */

import {
  applyEdit,
  formatClock,
  isoToDisplay,
  recordAt,
  toEditableFields,
  validateAndBuild,
  type WorkRecord,
} from "@worklog/core";
import {
  openStore,
  parseIndex,
  reportError,
  type StoreCommandOptions,
} from "./shared.js";

function formatTable(records: WorkRecord[]): void {
  if (records.length === 0) {
    console.log("No time records available.");
    return;
  }

  // Header
  console.log(
    "#".padEnd(5) +
      "START".padEnd(21) +
      "END".padEnd(21) +
      "ELAPSED".padEnd(11) +
      "COMMENT"
  );
  console.log("-".repeat(80));

  // Rows
  records.forEach((record, index) => {
    const position = String(index).padEnd(5);
    const start = isoToDisplay(record.startTime).padEnd(21);
    const end = isoToDisplay(record.endTime).padEnd(21);
    const elapsed = formatClock(record.elapsedSeconds).padEnd(11);
    console.log(`${position}${start}${end}${elapsed}${record.comment}`);
  });
}

export async function recordsListCommand(
  options: StoreCommandOptions
): Promise<void> {
  try {
    formatTable(openStore(options).load());
  } catch (error) {
    reportError(error);
  }
}

export interface RecordsEditOptions extends StoreCommandOptions {
  start?: string;
  end?: string;
  comment?: string;
}

/**
 * Edit the record at a position. Fields left out keep their current value.
 */
export async function recordsEditCommand(
  indexText: string,
  options: RecordsEditOptions
): Promise<void> {
  const index = parseIndex(indexText);
  if (index === null) {
    reportError(new Error(`Invalid index: ${indexText}`));
    return;
  }

  try {
    const store = openStore(options);
    const snapshot = store.load();
    const fields = toEditableFields(recordAt(snapshot, index));

    const updated = validateAndBuild(
      options.start ?? fields.start,
      options.end ?? fields.end,
      options.comment ?? fields.comment
    );
    applyEdit(store, index, updated, snapshot);

    console.log("Record updated.");
    console.log(
      `Start: ${isoToDisplay(updated.startTime)} | End: ${isoToDisplay(
        updated.endTime
      )} | Elapsed: ${formatClock(updated.elapsedSeconds)} | Comment: ${
        updated.comment
      }`
    );
  } catch (error) {
    reportError(error);
  }
}

export async function recordsDeleteCommand(
  indexText: string,
  options: StoreCommandOptions
): Promise<void> {
  const index = parseIndex(indexText);
  if (index === null) {
    reportError(new Error(`Invalid index: ${indexText}`));
    return;
  }

  try {
    const removed = openStore(options).deleteAt(index);
    console.log("Record deleted successfully.");
    console.log(
      `Start: ${isoToDisplay(removed.startTime)} | End: ${isoToDisplay(
        removed.endTime
      )} | Comment: ${removed.comment}`
    );
  } catch (error) {
    reportError(error);
  }
}

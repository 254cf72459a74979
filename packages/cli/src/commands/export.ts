/**
 * Export command - write records in a date range to an .xlsx file.
 */

import { ExcelTableWriter, exportRecords, formatHours } from "@worklog/core";
import { openStore, reportError, type StoreCommandOptions } from "./shared.js";

export interface ExportCommandOptions extends StoreCommandOptions {
  from: string;
  to: string;
  out: string;
}

export async function exportCommand(
  options: ExportCommandOptions
): Promise<void> {
  try {
    const result = await exportRecords(
      openStore(options),
      new ExcelTableWriter(),
      { from: options.from, to: options.to, out: options.out }
    );

    console.log(`Data exported to ${result.destination}`);
    console.log(
      `Records: ${result.recordCount}  Total: ${
        result.totals.totalSeconds
      } seconds (${formatHours(result.totals.totalHours)} hours)`
    );
  } catch (error) {
    reportError(error);
  }
}

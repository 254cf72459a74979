/**
 * Spreadsheet output for exports.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import ExcelJS from "exceljs";
import type { RecordStore } from "../store/index.js";
import type { ExportTotals, TabularData } from "../types/index.js";
import {
  aggregate,
  buildExportTable,
  parseRangeDate,
  selectForExport,
} from "./export-filter.js";

export const SHEET_NAME = "WorkHours";

/** Writes tabular rows to a file. */
export interface TableWriter {
  write(table: TabularData, destination: string): Promise<void>;
}

/** Single-sheet .xlsx writer */
export class ExcelTableWriter implements TableWriter {
  constructor(private readonly sheetName: string = SHEET_NAME) {}

  async write(table: TabularData, destination: string): Promise<void> {
    const dir = path.dirname(destination);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(this.sheetName);
    for (const row of table) {
      sheet.addRow(row);
    }

    await workbook.xlsx.writeFile(destination);
  }
}

export interface ExportOptions {
  /** First day, YYYY-MM-DD */
  from: string;
  /** Last day (inclusive), YYYY-MM-DD */
  to: string;
  /** Destination file */
  out: string;
}

export interface ExportResult {
  recordCount: number;
  totals: ExportTotals;
  destination: string;
}

/**
 * Export the records started between `from` and `to` with their totals.
 * Fails with NoRecordsInRange rather than writing an empty sheet.
 */
export async function exportRecords(
  store: RecordStore,
  writer: TableWriter,
  options: ExportOptions
): Promise<ExportResult> {
  const startDate = parseRangeDate(options.from, "Start date");
  const endDate = parseRangeDate(options.to, "End date");

  const selected = selectForExport(store.load(), startDate, endDate);
  const totals = aggregate(selected);

  await writer.write(buildExportTable(selected, totals), options.out);

  return {
    recordCount: selected.length,
    totals,
    destination: options.out,
  };
}

export {
  selectRange,
  selectForExport,
  aggregate,
  formatHours,
  buildExportTable,
  parseRangeDate,
  EXPORT_HEADERS,
} from "./export-filter.js";
export {
  ExcelTableWriter,
  exportRecords,
  SHEET_NAME,
  type TableWriter,
  type ExportOptions,
  type ExportResult,
} from "./workbook.js";

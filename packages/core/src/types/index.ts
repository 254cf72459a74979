export type {
  WorkRecord,
  StoredRecord,
  ExportTotals,
  TableCell,
  TabularData,
} from "./record.js";

export type {
  TimerStatus,
  TimerClock,
  SessionSnapshot,
  FinalizedSession,
} from "./session.js";

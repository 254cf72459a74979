/**
 * Error taxonomy for worklog.
 * Codes are stable enum-like strings; messages are for humans.
 */

export type WorklogErrorCode =
  | "ALREADY_RUNNING"
  | "NOT_RUNNING"
  | "NO_ACTIVE_SESSION"
  | "CORRUPT_STORAGE"
  | "INDEX_OUT_OF_RANGE"
  | "INVALID_FORMAT"
  | "END_BEFORE_START"
  | "INVALID_DATE_RANGE"
  | "NO_RECORDS_IN_RANGE";

export class WorklogError extends Error {
  readonly code: WorklogErrorCode;

  constructor(code: WorklogErrorCode, message: string) {
    super(message);
    this.name = "WorklogError";
    this.code = code;
  }
}

export function isWorklogError(
  error: unknown,
  code?: WorklogErrorCode
): error is WorklogError {
  if (!(error instanceof WorklogError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Whether the caller can recover by retrying the right operation or
 * re-prompting. Only unreadable storage is fatal for the call.
 */
export function isRecoverable(code: WorklogErrorCode): boolean {
  return code !== "CORRUPT_STORAGE";
}

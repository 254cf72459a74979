/**
 * Local wall-clock date/time helpers.
 *
 * Records carry naive local times (no offset), so arithmetic here works on
 * the calendar fields directly and never consults the process timezone
 * except when converting a live Date.
 */

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface NaiveDateTime extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

const DISPLAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

/**
 * UTC Date for the given fields. Unlike Date.UTC, years 0-99 are not
 * mapped onto 1900-1999.
 */
function utcDate(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date;
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return utcDate(year, month + 1, 0).getUTCDate();
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function buildDateTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): NaiveDateTime | null {
  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { year, month, day, hour, minute, second };
}

/** Read capture group `index` as an integer, defaulting when it did not match. */
function group(match: RegExpExecArray, index: number, fallback = 0): number {
  const raw = match[index];
  return raw === undefined ? fallback : parseInt(raw, 10);
}

/**
 * Parse the canonical input format `YYYY-MM-DD HH:MM:SS`.
 * Returns null for anything else, including impossible calendar values.
 */
export function parseDisplayDateTime(text: string): NaiveDateTime | null {
  const match = DISPLAY_PATTERN.exec(text);
  if (!match) return null;
  return buildDateTime(
    group(match, 1),
    group(match, 2),
    group(match, 3),
    group(match, 4),
    group(match, 5),
    group(match, 6)
  );
}

/**
 * Parse an ISO 8601 date-time as stored in the data file.
 * Accepts a bare date, `T` or space separators, optional seconds, fractions
 * and offsets. Fractions are dropped; an offset is ignored so the literal
 * wall-clock fields are kept.
 */
export function parseIsoDateTime(text: string): NaiveDateTime | null {
  const match = ISO_PATTERN.exec(text);
  if (!match) return null;
  return buildDateTime(
    group(match, 1),
    group(match, 2),
    group(match, 3),
    group(match, 4),
    group(match, 5),
    group(match, 6)
  );
}

/** Parse a `YYYY-MM-DD` calendar date. */
export function parseCalendarDate(text: string): CalendarDate | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) return null;
  const parsed = buildDateTime(
    group(match, 1),
    group(match, 2),
    group(match, 3),
    0,
    0,
    0
  );
  if (!parsed) return null;
  return { year: parsed.year, month: parsed.month, day: parsed.day };
}

/** Negative, zero or positive as `a` is before, equal to or after `b`. */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** Seconds since the epoch, treating the fields as UTC. Only differences are meaningful. */
export function toNaiveSeconds(dt: NaiveDateTime): number {
  return (
    utcDate(dt.year, dt.month, dt.day, dt.hour, dt.minute, dt.second).getTime() /
    1000
  );
}

/** Local wall-clock fields of a Date, truncated to whole seconds. */
export function fromLocalDate(date: Date): NaiveDateTime {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  };
}

export function formatCalendarDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

function formatTime(dt: NaiveDateTime): string {
  return `${pad(dt.hour)}:${pad(dt.minute)}:${pad(dt.second)}`;
}

/** Storage form, e.g. 2025-01-05T14:30:00 */
export function formatIsoDateTime(dt: NaiveDateTime): string {
  return `${formatCalendarDate(dt)}T${formatTime(dt)}`;
}

/** Input/display form, e.g. 2025-01-05 14:30:00 */
export function formatDisplayDateTime(dt: NaiveDateTime): string {
  return `${formatCalendarDate(dt)} ${formatTime(dt)}`;
}

/**
 * Convert a stored ISO string to `YYYY-MM-DD HH:MM:SS`.
 * Strings that do not parse are returned unchanged.
 */
export function isoToDisplay(iso: string): string {
  const parsed = parseIsoDateTime(iso);
  return parsed ? formatDisplayDateTime(parsed) : iso;
}

/** Render seconds as HH:MM:SS. Hours are not wrapped at 24. */
export function formatClock(elapsedSeconds: number): string {
  const total = Math.max(0, elapsedSeconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = Math.floor(total % 60);
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

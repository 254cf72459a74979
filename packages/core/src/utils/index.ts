export {
  parseDisplayDateTime,
  parseIsoDateTime,
  parseCalendarDate,
  compareCalendarDates,
  toNaiveSeconds,
  fromLocalDate,
  formatCalendarDate,
  formatIsoDateTime,
  formatDisplayDateTime,
  isoToDisplay,
  formatClock,
  type CalendarDate,
  type NaiveDateTime,
} from "./datetime.js";

/**
 * datetime-helper
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  DateTimeHelperError, DateTimeHelperErrorCode,
  UnsupportedSelectorError, ParseError, UnknownZoneError, InvalidArgumentError,
} from './errors'
export type { DateTimeHelperErrorCode as DateTimeHelperErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date primitives (branded types + utilities)
export type { LocalDate, LocalTime, LocalDateTime, OffsetDateTime } from './time-date'
export {
  MIN_YEAR, MAX_YEAR,
  isLeapYear, daysInMonth, isValidDate,
  parseIsoDate, parseIsoTime, parseIsoDateTime,
  makeDate, makeTime, makeDateTime, makeOffsetDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, daysBetween, addSecondsToTime, addMinutesToDateTime,
  compareDates,
  fromJsDate, toJsDate,
  parseOffset,
  isValidTimezone, isKnownZone, utcOffsetAt, offsetAtLocal,
} from './time-date'

// DateTimeHelper operations
export type { Clock, DateTimeHelper, DateTimeHelperConfig } from './date-time-helper'
export {
  DatePart, LOCAL_OFFSET, MONTH_SLICE, DAY_SLICE,
  createDateTimeHelper,
  todayDate, getDate,
  addHours, addMinutes, addSeconds, addWeeks,
  beforeOrAfter, getDateInSpecificTimeZone, offsetDateTime,
  parseDate, customParseDate, formatDate,
} from './date-time-helper'

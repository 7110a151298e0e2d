/**
 * DateTimeHelper
 *
 * Stateless operations over dates, times and date-times: today's date parts,
 * time-of-day and week arithmetic, comparison with today, zone conversion,
 * fixed-offset attachment, and two fixed text layouts read and written in English.
 *
 * Two failure idioms are kept apart. getDate, parseDate and customParseDate
 * return null for any unusable input; todayDate and getDateInSpecificTimeZone
 * throw a typed DateTimeHelperError.
 */

import { format, isValid, parse } from 'date-fns'
import { enUS } from 'date-fns/locale'
import type { LocalDate, LocalTime, LocalDateTime, OffsetDateTime } from './time-date'
import {
  MAX_YEAR, MIN_YEAR, addDays, addMinutesToDateTime, addSecondsToTime,
  compareDates, dateOf, daysInMonth, fromJsDate, isKnownZone, isValidDate,
  makeDate, makeOffsetDateTime, offsetAtLocal, parseIsoDateTime,
  parseOffset, timeOf, toJsDate, yearOf,
} from './time-date'
import {
  InvalidArgumentError, ParseError, UnknownZoneError, UnsupportedSelectorError,
} from './errors'

// ============================================================================
// Constants
// ============================================================================

export const DatePart = {
  FULL: 'FULL',
  YEAR: 'YEAR',
  MONTH: 'MONTH',
  DAY: 'DAY',
} as const

export type DatePart = (typeof DatePart)[keyof typeof DatePart]

/** Regional offset attached by offsetDateTime (Eastern European Time) */
export const LOCAL_OFFSET = '+02:00'

/** [start, end) of the month digits in a `yyyymmdd` string */
export const MONTH_SLICE = { start: 4, end: 6 } as const

/** [start, end) of the day digits in a `d MMM yyyy` string */
export const DAY_SLICE = { start: 0, end: 2 } as const

const MAX_MONTH = 12
const MAX_DAY_IN_MONTH = 31

const BASIC_ISO_DATE = /^(\d{4})(\d{2})(\d{2})$/
const CUSTOM_DATE = /^(\d{1,2}) ([A-Za-z]{3} \d{4})$/
const CUSTOM_DATE_PATTERN = 'd MMM yyyy'
const DISPLAY_DATE_PATTERN = 'dd MMMM yyyy'
const ZONED_DATE_TIME =
  /^((?:[+-]\d{5,}|-?\d{4})-\d{2}-\d{2})T(\d{2}:\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})$/

const PARSE_REFERENCE = new Date(2000, 0, 1, 0, 0, 0, 0)

// ============================================================================
// Types
// ============================================================================

export type Clock = () => Date

export type DateTimeHelperConfig = {
  /** Source of "now" for todayDate and beforeOrAfter; defaults to the system clock */
  clock?: Clock
}

export type DateTimeHelper = {
  todayDate(part: DatePart): string
  getDate(components: readonly number[]): LocalDate | null
  addHours(time: LocalTime, hours: number): LocalTime
  addMinutes(time: LocalTime, minutes: number): LocalTime
  addSeconds(time: LocalTime, seconds: number): LocalTime
  addWeeks(date: LocalDate, weeks: number): LocalDate
  beforeOrAfter(date: LocalDate): string
  getDateInSpecificTimeZone(text: string, zoneName: string): LocalDateTime
  offsetDateTime(dt: LocalDateTime): OffsetDateTime
  parseDate(text: string): LocalDate | null
  customParseDate(text: string): LocalDate | null
  formatDate(dt: LocalDateTime): string
}

// ============================================================================
// Helpers
// ============================================================================

function requireInteger(name: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${name} must be an integer, got ${value}`)
  }
}

function inYearRange(date: LocalDate): boolean {
  const year = yearOf(date)
  return year >= MIN_YEAR && year <= MAX_YEAR
}

const systemClock: Clock = () => new Date()

// ============================================================================
// Clock-free Operations
// ============================================================================

export function getDate(components: readonly number[]): LocalDate | null {
  if (components.length < 3) return null
  const [year, month, day] = components
  if (!isValidDate(year, month, day)) return null
  return makeDate(year, month, day)
}

export function addHours(time: LocalTime, hours: number): LocalTime {
  requireInteger('hours', hours)
  return addSecondsToTime(time, (hours % 24) * 3600)
}

export function addMinutes(time: LocalTime, minutes: number): LocalTime {
  requireInteger('minutes', minutes)
  return addSecondsToTime(time, (minutes % 1440) * 60)
}

export function addSeconds(time: LocalTime, seconds: number): LocalTime {
  requireInteger('seconds', seconds)
  return addSecondsToTime(time, seconds % 86400)
}

export function addWeeks(date: LocalDate, weeks: number): LocalDate {
  requireInteger('weeks', weeks)
  const result = addDays(date, weeks * 7)
  if (!inYearRange(result)) {
    throw new InvalidArgumentError(`Adding ${weeks} weeks to ${date} leaves years ${MIN_YEAR} to ${MAX_YEAR}`)
  }
  return result
}

/**
 * Local date-time, as observed in `zoneName`, of the instant written in `text`.
 *
 * The zone offset is looked up for the wall-clock fields of `text`, not for
 * the instant itself, so the two differ around the zone's DST transitions.
 */
export function getDateInSpecificTimeZone(text: string, zoneName: string): LocalDateTime {
  const match = ZONED_DATE_TIME.exec(text)
  if (!match) throw new ParseError(`Invalid zoned date-time: '${text}'`)

  const wallClock = match[3] ? `${match[1]}T${match[2]}:${match[3]}` : `${match[1]}T${match[2]}`
  const local = parseIsoDateTime(wallClock)
  if (!local.ok) throw new ParseError(`Invalid zoned date-time: '${text}'`)

  const inputOffset = parseOffset(match[4])
  if (!inputOffset.ok) throw new ParseError(`Invalid offset in zoned date-time: '${text}'`)

  if (!isKnownZone(zoneName)) throw new UnknownZoneError(`Unknown time zone: '${zoneName}'`)

  const zoneOffset = offsetAtLocal(local.value, zoneName)
  const result = addMinutesToDateTime(local.value, zoneOffset - inputOffset.value)
  if (!inYearRange(dateOf(result))) {
    throw new InvalidArgumentError(`${text} in ${zoneName} leaves years ${MIN_YEAR} to ${MAX_YEAR}`)
  }
  return result
}

export function offsetDateTime(dt: LocalDateTime): OffsetDateTime {
  return makeOffsetDateTime(dt, LOCAL_OFFSET)
}

/** Basic ISO `yyyymmdd`; null for a month above 12 or anything unparseable */
export function parseDate(text: string): LocalDate | null {
  if (text.length < MONTH_SLICE.end) return null
  if (Number(text.slice(MONTH_SLICE.start, MONTH_SLICE.end)) > MAX_MONTH) return null

  const match = BASIC_ISO_DATE.exec(text)
  if (!match) return null
  return getDate([parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)])
}

/**
 * `d MMM yyyy` with English month abbreviations, e.g. `6 Sep 2019`.
 * A day past the end of the month resolves to its last day: `31 Feb 2019` is 2019-02-28.
 */
export function customParseDate(text: string): LocalDate | null {
  if (text.length < DAY_SLICE.end) return null
  if (parseInt(text.slice(DAY_SLICE.start, DAY_SLICE.end), 10) > MAX_DAY_IN_MONTH) return null

  const match = CUSTOM_DATE.exec(text)
  if (!match) return null
  const day = parseInt(match[1], 10)
  if (day < 1) return null

  const firstOfMonth = parse(`1 ${match[2]}`, CUSTOM_DATE_PATTERN, PARSE_REFERENCE, { locale: enUS })
  if (!isValid(firstOfMonth)) return null

  const year = firstOfMonth.getFullYear()
  const month = firstOfMonth.getMonth() + 1
  return makeDate(year, month, Math.min(day, daysInMonth(year, month)))
}

/** `dd MMMM yyyy HH:mm` in English, e.g. `01 January 2000 18:00` */
export function formatDate(dt: LocalDateTime): string {
  const day = format(toJsDate(dateOf(dt)), DISPLAY_DATE_PATTERN, { locale: enUS })
  return `${day} ${timeOf(dt).slice(0, 5)}`
}

// ============================================================================
// Factory
// ============================================================================

export function createDateTimeHelper(config: DateTimeHelperConfig = {}): DateTimeHelper {
  const clock = config.clock ?? systemClock
  if (typeof clock !== 'function') {
    throw new InvalidArgumentError('clock must be a function returning a Date')
  }

  function todayDate(part: DatePart): string {
    const now = clock()
    switch (part) {
      case DatePart.FULL:
        return fromJsDate(now)
      case DatePart.YEAR:
        return format(now, 'yyyy')
      case DatePart.MONTH:
        return format(now, 'MMMM', { locale: enUS }).toUpperCase()
      case DatePart.DAY:
        return String(now.getDate())
      default: {
        const unsupported: never = part
        throw new UnsupportedSelectorError(`Unsupported date part: '${String(unsupported)}'`)
      }
    }
  }

  function beforeOrAfter(date: LocalDate): string {
    const today = fromJsDate(clock())
    const cmp = compareDates(date, today)
    if (cmp > 0) return `${date} is after ${today}`
    if (cmp < 0) return `${date} is before ${today}`
    return `${date} is today`
  }

  return {
    todayDate,
    getDate,
    addHours,
    addMinutes,
    addSeconds,
    addWeeks,
    beforeOrAfter,
    getDateInSpecificTimeZone,
    offsetDateTime,
    parseDate,
    customParseDate,
    formatDate,
  }
}

// ============================================================================
// System-clock Operations
// ============================================================================

const systemHelper = createDateTimeHelper()

export function todayDate(part: DatePart): string {
  return systemHelper.todayDate(part)
}

export function beforeOrAfter(date: LocalDate): string {
  return systemHelper.beforeOrAfter(date)
}

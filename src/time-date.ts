/**
 * Time & Date Primitives
 *
 * Branded ISO types and the pure functions the helper operations are built on:
 * parsing, construction, component extraction, arithmetic, and zone-rule lookups.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Zone rules come from Intl.DateTimeFormat.
 */

import type { Result } from './result'
import { Ok, Err } from './result'
import { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol
declare const __offsetDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD, with a sign and more digits outside 0000-9999 */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm, with :ss only when the seconds are not zero */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

/** LocalDateTime followed by a fixed offset: YYYY-MM-DDThh:mm[:ss]±hh:mm */
export type OffsetDateTime = string & { readonly [__offsetDateTime]: true }

export { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

/** Whole years a JS Date can hold */
export const MIN_YEAR = -271820
export const MAX_YEAR = 275759

const DAYS_IN_MONTH = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return DAYS_IN_MONTH[month] ?? 0
}

/** True when the three integers name a real proleptic Gregorian date within MIN_YEAR..MAX_YEAR */
export function isValidDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (year < MIN_YEAR || year > MAX_YEAR) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= daysInMonth(year, month)
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

/** Four digits inside 0000-9999, otherwise a sign and all digits: -0001, +10000 */
function isoYear(year: number): string {
  const abs = Math.abs(year)
  if (abs < 10000) return (year < 0 ? '-' : '') + pad4(abs)
  return (year < 0 ? '-' : '+') + abs
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Parsing
// ============================================================================

const ISO_DATE_PATTERN = /^([+-]\d{5,}|-?\d{4})-(\d{2})-(\d{2})$/

export function parseIsoDate(str: string): Result<LocalDate, ParseError> {
  const match = ISO_DATE_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1], 10)
  const month = parseInt(match[2], 10)
  const day = parseInt(match[3], 10)

  if (year < MIN_YEAR || year > MAX_YEAR)
    return Err(new ParseError(`Year out of range in date: '${str}'`))

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

/** Accepts HH:MM or HH:MM:SS; the result always carries seconds */
export function parseIsoTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1], 10)
  const minute = parseInt(match[2], 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

export function parseIsoDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseIsoDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseIsoTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${isoYear(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  const clock = secondOf(time) === 0 ? time.substring(0, 5) : time
  return `${date}T${clock}` as LocalDateTime
}

export function makeOffsetDateTime(dt: LocalDateTime, offset: string): OffsetDateTime {
  return `${makeDateTime(dateOf(dt), timeOf(dt))}${offset}` as OffsetDateTime
}

// ============================================================================
// Component Extraction
// ============================================================================

// Month and day sit at fixed distances from the end; the year takes the rest

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, date.length - 6), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(date.length - 5, date.length - 3), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(date.length - 2), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return time.length > 5 ? parseInt(time.substring(6, 8), 10) : 0
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, dt.indexOf('T')) as LocalDate
}

/** Always HH:MM:SS, whether or not the date-time wrote its seconds */
export function timeOf(dt: LocalDateTime): LocalTime {
  const clock = dt.substring(dt.indexOf('T') + 1)
  return (clock.length === 5 ? `${clock}:00` : clock) as LocalTime
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

// ============================================================================
// Time-of-Day Arithmetic
// ============================================================================

const SECONDS_PER_DAY = 86400

/** Wraps at midnight in both directions; the date is not tracked */
export function addSecondsToTime(time: LocalTime, n: number): LocalTime {
  const total = hourOf(time) * 3600 + minuteOf(time) * 60 + secondOf(time) + n

  // Avoid JS % sign-preservation on negative totals
  const wrapped = total - Math.floor(total / SECONDS_PER_DAY) * SECONDS_PER_DAY

  return makeTime(Math.floor(wrapped / 3600), Math.floor((wrapped % 3600) / 60), wrapped % 60)
}

// ============================================================================
// DateTime Arithmetic
// ============================================================================

export function addMinutesToDateTime(dt: LocalDateTime, n: number): LocalDateTime {
  const date = dateOf(dt)
  const time = timeOf(dt)

  let totalMinutes = hourOf(time) * 60 + minuteOf(time) + n
  const seconds = secondOf(time)

  const dayDelta = Math.floor(totalMinutes / 1440)
  totalMinutes = totalMinutes - dayDelta * 1440

  const newHour = Math.floor(totalMinutes / 60)
  const newMinute = totalMinutes % 60

  const newDate = dayDelta === 0 ? date : addDays(date, dayDelta)
  return makeDateTime(newDate, makeTime(newHour, newMinute, seconds))
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  const diff = daysBetween(b, a)
  if (diff < 0) return -1
  if (diff > 0) return 1
  return 0
}

// ============================================================================
// JS Date Bridging
// ============================================================================

/** Calendar date of a JS Date as seen in the runtime's local zone */
export function fromJsDate(d: Date): LocalDate {
  return makeDate(d.getFullYear(), d.getMonth() + 1, d.getDate())
}

/** Local noon on the given date, clear of midnight DST transitions */
export function toJsDate(date: LocalDate): Date {
  const d = new Date(2000, 0, 1, 12, 0, 0, 0)
  d.setFullYear(yearOf(date), monthOf(date) - 1, dayOf(date))
  return d
}

/** Date.UTC without its two-digit-year remapping */
function utcEpochMs(
  year: number, month: number, day: number,
  hour: number, minute: number, second: number
): number {
  const d = new Date(0)
  d.setUTCFullYear(year, month - 1, day)
  d.setUTCHours(hour, minute, second, 0)
  return d.getTime()
}

// ============================================================================
// Offsets
// ============================================================================

const OFFSET_PATTERN = /^([+-])(\d{2}):(\d{2})$/
const MAX_OFFSET_MINUTES = 18 * 60

/** Parses `Z` or `±HH:MM` into signed minutes east of UTC */
export function parseOffset(str: string): Result<number, ParseError> {
  if (str === 'Z') return Ok(0)

  const match = OFFSET_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid offset format: '${str}'`))

  const hours = parseInt(match[2], 10)
  const minutes = parseInt(match[3], 10)
  if (minutes > 59) return Err(new ParseError(`Invalid minutes in offset: '${str}'`))

  const total = hours * 60 + minutes
  if (total > MAX_OFFSET_MINUTES) return Err(new ParseError(`Offset out of range: '${str}'`))

  return Ok(match[1] === '-' ? -total : total)
}

// ============================================================================
// Timezone Rules
// ============================================================================

const DAY_MS = 86400000

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch (e) {
    if (e instanceof RangeError) return false
    throw e
  }
}

/** Z, a ±HH:MM fixed offset, or a region the runtime's tz database knows */
export function isKnownZone(zoneId: string): boolean {
  return parseOffset(zoneId).ok || isValidTimezone(zoneId)
}

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
export function utcOffsetAt(utcMs: number, tz: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    era: 'short',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(utcMs))
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  // Years before 1 CE come back as year-of-era: 1 BC is year 0
  const yearOfEra = get('year')
  const year = parts.some((p) => p.type === 'era' && p.value === 'BC') ? 1 - yearOfEra : yearOfEra

  let h = get('hour')
  if (h === 24) h = 0
  const localMs = utcEpochMs(year, get('month'), get('day'), h, get('minute'), get('second'))
  // Pre-standard-time LMT offsets carry seconds; keep whole minutes
  return Math.round((localMs - utcMs) / 60000)
}

/** Epoch ms of a LocalDateTime read as if it were UTC */
function dtToMs(dt: LocalDateTime): number {
  const d = dateOf(dt), t = timeOf(dt)
  return utcEpochMs(yearOf(d), monthOf(d), dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

/**
 * Offset (minutes) the zone's rules assign to a wall-clock date-time.
 *
 * A local time inside a spring-forward gap or a fall-back overlap resolves to
 * the offset in force before the transition.
 */
export function offsetAtLocal(dt: LocalDateTime, zoneId: string): number {
  const fixed = parseOffset(zoneId)
  if (fixed.ok) return fixed.value

  const localMs = dtToMs(dt)

  // At most one transition sits within a day of any local time
  const before = utcOffsetAt(localMs - DAY_MS, zoneId)
  const after = utcOffsetAt(localMs + DAY_MS, zoneId)
  if (before === after) return before

  const beforeMapsBack = utcOffsetAt(localMs - before * 60000, zoneId) === before
  const afterMapsBack = utcOffsetAt(localMs - after * 60000, zoneId) === after

  if (beforeMapsBack) return before // unambiguous before the transition, or overlap
  if (afterMapsBack) return after
  return before // gap
}

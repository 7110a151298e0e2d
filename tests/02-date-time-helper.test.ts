/**
 * Segment 02: DateTimeHelper Tests
 *
 * Tests the helper operations that work on plain values or read the clock.
 * Zone conversion lives in segment 03.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  DatePart,
  LOCAL_OFFSET,
  createDateTimeHelper,
  todayDate,
  getDate,
  addHours,
  addMinutes,
  addSeconds,
  addWeeks,
  beforeOrAfter,
  offsetDateTime,
  parseDate,
  customParseDate,
  formatDate,
  type Clock,
} from '../src/date-time-helper'
import { InvalidArgumentError, UnsupportedSelectorError } from '../src/errors'
import { addDays, parseIsoDateTime, type LocalDate, type LocalTime, type LocalDateTime } from '../src/time-date'

// ============================================================================
// Test Helpers
// ============================================================================

function date(iso: string): LocalDate {
  return iso as LocalDate
}

function time(hms: string): LocalTime {
  return hms as LocalTime
}

function datetime(iso: string): LocalDateTime {
  return iso as LocalDateTime
}

/** Local 09:00 on the given day, whatever TZ the runner has */
function fixedClock(year: number, month: number, day: number): Clock {
  return () => new Date(year, month - 1, day, 9, 0, 0)
}

// ============================================================================
// 1. TODAY'S DATE
// ============================================================================

describe('todayDate', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2019-09-06T10:00:00Z'))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('FULL returns YYYY-MM-DD', () => {
    expect(todayDate(DatePart.FULL)).toBe('2019-09-06')
  })

  it('YEAR returns the four-digit year', () => {
    expect(todayDate(DatePart.YEAR)).toBe('2019')
  })

  it('MONTH returns the full English month name in upper case', () => {
    expect(todayDate(DatePart.MONTH)).toBe('SEPTEMBER')
  })

  it('DAY returns the unpadded day of month', () => {
    expect(todayDate(DatePart.DAY)).toBe('6')
  })

  it('rejects an unknown selector', () => {
    const week: string = 'WEEK'
    expect(() => todayDate(week as DatePart)).toThrow(UnsupportedSelectorError)
    expect(() => todayDate(week as DatePart)).toThrow("Unsupported date part: 'WEEK'")
  })

  it('rejects a lower-case selector', () => {
    const full: string = 'full'
    expect(() => todayDate(full as DatePart)).toThrow(UnsupportedSelectorError)
  })
})

// ============================================================================
// 2. BUILDING DATES
// ============================================================================

describe('getDate', () => {
  it('builds a valid date', () => {
    expect(getDate([2019, 9, 6])).toBe('2019-09-06')
  })

  it('accepts Feb 29 in a leap year', () => {
    expect(getDate([2020, 2, 29])).toBe('2020-02-29')
  })

  it('returns null for Feb 30', () => {
    expect(getDate([2020, 2, 30])).toBeNull()
  })

  it('returns null for Feb 29 in a non-leap year', () => {
    expect(getDate([2021, 2, 29])).toBeNull()
  })

  it('returns null for month 13', () => {
    expect(getDate([2020, 13, 1])).toBeNull()
  })

  it('returns null with fewer than three components', () => {
    expect(getDate([2020, 2])).toBeNull()
    expect(getDate([])).toBeNull()
  })

  it('ignores components past the third', () => {
    expect(getDate([2020, 1, 1, 99])).toBe('2020-01-01')
  })

  it('returns null for fractional components', () => {
    expect(getDate([2020, 1.5, 1])).toBeNull()
  })

  it('builds years past 9999 with a sign', () => {
    expect(getDate([10000, 1, 1])).toBe('+10000-01-01')
  })

  it('builds years before 1 CE', () => {
    expect(getDate([0, 2, 29])).toBe('0000-02-29')
    expect(getDate([-1, 12, 31])).toBe('-0001-12-31')
  })

  it('returns null for a year a JS Date cannot hold', () => {
    expect(getDate([300000, 1, 1])).toBeNull()
  })
})

// ============================================================================
// 3. TIME-OF-DAY ARITHMETIC
// ============================================================================

describe('addHours', () => {
  it('wraps past midnight without tracking the date', () => {
    expect(addHours(time('23:30:00'), 1)).toBe('00:30:00')
  })

  it('subtracts across midnight', () => {
    expect(addHours(time('01:00:00'), -3)).toBe('22:00:00')
  })

  it('drops whole days', () => {
    expect(addHours(time('10:15:30'), 49)).toBe('11:15:30')
  })

  it('rejects a fractional amount', () => {
    expect(() => addHours(time('10:00:00'), 1.5)).toThrow(InvalidArgumentError)
    expect(() => addHours(time('10:00:00'), 1.5)).toThrow('hours must be an integer, got 1.5')
  })
})

describe('addMinutes', () => {
  it('wraps past midnight', () => {
    expect(addMinutes(time('23:50:00'), 15)).toBe('00:05:00')
  })

  it('subtracts across midnight', () => {
    expect(addMinutes(time('00:05:00'), -10)).toBe('23:55:00')
  })

  it('carries into hours', () => {
    expect(addMinutes(time('10:45:10'), 90)).toBe('12:15:10')
  })
})

describe('addSeconds', () => {
  it('wraps past midnight', () => {
    expect(addSeconds(time('23:59:30'), 45)).toBe('00:00:15')
  })

  it('subtracts across midnight', () => {
    expect(addSeconds(time('00:00:10'), -20)).toBe('23:59:50')
  })

  it('rejects NaN', () => {
    expect(() => addSeconds(time('00:00:10'), NaN)).toThrow(InvalidArgumentError)
  })
})

describe('addWeeks', () => {
  it('adds seven days', () => {
    expect(addWeeks(date('2020-01-01'), 1)).toBe('2020-01-08')
  })

  it('crosses the end of February in a leap year', () => {
    expect(addWeeks(date('2020-02-26'), 1)).toBe('2020-03-04')
  })

  it('crosses the end of February in a non-leap year', () => {
    expect(addWeeks(date('2019-02-26'), 1)).toBe('2019-03-05')
  })

  it('crosses a year boundary', () => {
    expect(addWeeks(date('2020-12-28'), 1)).toBe('2021-01-04')
  })

  it('goes backwards for negative weeks', () => {
    expect(addWeeks(date('2020-01-08'), -1)).toBe('2020-01-01')
  })

  it('crosses into year 10000', () => {
    expect(addWeeks(date('9999-12-28'), 1)).toBe('+10000-01-04')
  })

  it('crosses back before year 1', () => {
    expect(addWeeks(date('0001-01-03'), -1)).toBe('0000-12-27')
    expect(addWeeks(date('0000-01-03'), -1)).toBe('-0001-12-27')
  })

  it('rejects a result a JS Date cannot hold', () => {
    expect(() => addWeeks(date('+275759-12-31'), 1)).toThrow(InvalidArgumentError)
  })

  it('rejects fractional weeks', () => {
    expect(() => addWeeks(date('2020-01-01'), 0.5)).toThrow('weeks must be an integer, got 0.5')
  })
})

// ============================================================================
// 4. COMPARING WITH TODAY
// ============================================================================

describe('beforeOrAfter', () => {
  describe('on the system clock', () => {
    beforeEach(() => {
      vi.useFakeTimers()
      vi.setSystemTime(new Date('2019-09-06T10:00:00Z'))
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('reports tomorrow as after today', () => {
      const today = date(todayDate(DatePart.FULL))
      const result = beforeOrAfter(addDays(today, 1))
      expect(result.endsWith('is after ' + today)).toBe(true)
      expect(result).toBe('2019-09-07 is after 2019-09-06')
    })

    it('reports today as today', () => {
      expect(beforeOrAfter(date('2019-09-06'))).toBe('2019-09-06 is today')
    })
  })

  describe('on an injected clock', () => {
    const helper = createDateTimeHelper({ clock: fixedClock(2020, 1, 5) })

    it('reports a later date as after', () => {
      expect(helper.beforeOrAfter(date('2020-01-06'))).toBe('2020-01-06 is after 2020-01-05')
    })

    it('reports an earlier date as before', () => {
      expect(helper.beforeOrAfter(date('2019-12-31'))).toBe('2019-12-31 is before 2020-01-05')
    })

    it('reports the same date as today', () => {
      expect(helper.beforeOrAfter(date('2020-01-05'))).toBe('2020-01-05 is today')
    })
  })

  it('reads the clock once per call', () => {
    const clock = vi.fn(fixedClock(2020, 1, 5))
    const helper = createDateTimeHelper({ clock })
    helper.beforeOrAfter(date('2019-12-31'))
    expect(clock).toHaveBeenCalledTimes(1)
  })
})

// ============================================================================
// 5. OFFSETS
// ============================================================================

describe('offsetDateTime', () => {
  it('attaches +02:00', () => {
    expect(offsetDateTime(datetime('2019-09-06T13:17'))).toBe('2019-09-06T13:17+02:00')
  })

  it('leaves out zero seconds of a parsed date-time', () => {
    const parsed = parseIsoDateTime('2019-09-06T13:17:00')
    expect(parsed.ok).toBe(true)
    if (parsed.ok) expect(offsetDateTime(parsed.value)).toBe('2019-09-06T13:17+02:00')
  })

  it('does not shift the wall-clock time', () => {
    expect(offsetDateTime(datetime('2019-12-31T23:59:59'))).toBe('2019-12-31T23:59:59' + LOCAL_OFFSET)
  })
})

// ============================================================================
// 6. PARSING
// ============================================================================

describe('parseDate', () => {
  it('parses yyyymmdd', () => {
    expect(parseDate('20201231')).toBe('2020-12-31')
  })

  it('returns null for month 13', () => {
    expect(parseDate('20201301')).toBeNull()
  })

  it('returns null for month 00', () => {
    expect(parseDate('20200001')).toBeNull()
  })

  it('returns null for Feb 30', () => {
    expect(parseDate('20200230')).toBeNull()
  })

  it('returns null for the dashed form', () => {
    expect(parseDate('2020-12-31')).toBeNull()
  })

  it('returns null for input shorter than the month digits', () => {
    expect(parseDate('2020')).toBeNull()
    expect(parseDate('')).toBeNull()
  })

  it('returns null for extra digits', () => {
    expect(parseDate('202012311')).toBeNull()
  })

  it('returns null for letters in the month', () => {
    expect(parseDate('2020ab01')).toBeNull()
  })
})

describe('customParseDate', () => {
  it('parses a two-digit day', () => {
    expect(customParseDate('06 Sep 2019')).toBe('2019-09-06')
  })

  it('parses a one-digit day', () => {
    expect(customParseDate('6 Sep 2019')).toBe('2019-09-06')
  })

  it('returns null for day 00', () => {
    expect(customParseDate('00 Sep 2019')).toBeNull()
  })

  it('returns null for day 32', () => {
    expect(customParseDate('32 Jan 2020')).toBeNull()
  })

  it('resolves Feb 31 to the last day of February', () => {
    expect(customParseDate('31 Feb 2019')).toBe('2019-02-28')
    expect(customParseDate('31 Feb 2020')).toBe('2020-02-29')
  })

  it('resolves Apr 31 to Apr 30', () => {
    expect(customParseDate('31 Apr 2019')).toBe('2019-04-30')
  })

  it('returns null for year 0000', () => {
    expect(customParseDate('01 Jan 0000')).toBeNull()
  })

  it('accepts Feb 29 in a leap year', () => {
    expect(customParseDate('29 Feb 2020')).toBe('2020-02-29')
  })

  it('reads the month abbreviation case-insensitively', () => {
    expect(customParseDate('06 sep 2019')).toBe('2019-09-06')
  })

  it('returns null for a four-letter abbreviation', () => {
    expect(customParseDate('06 Sept 2019')).toBeNull()
  })

  it('returns null for an unknown month', () => {
    expect(customParseDate('06 Xyz 2019')).toBeNull()
  })

  it('returns null for a two-digit year', () => {
    expect(customParseDate('06 Sep 19')).toBeNull()
  })

  it('returns null for input shorter than the day digits', () => {
    expect(customParseDate('6')).toBeNull()
  })
})

// ============================================================================
// 7. FORMATTING
// ============================================================================

describe('formatDate', () => {
  it('formats dd MMMM yyyy HH:mm', () => {
    expect(formatDate(datetime('2000-01-01T18:00'))).toBe('01 January 2000 18:00')
  })

  it('drops seconds and pads the time', () => {
    expect(formatDate(datetime('2019-09-06T07:05:59'))).toBe('06 September 2019 07:05')
  })

  it('pads years below 1000', () => {
    expect(formatDate(datetime('0019-06-01T00:00'))).toBe('01 June 0019 00:00')
  })

  it('re-parses through the abbreviated layout', () => {
    const [day, month, year] = formatDate(datetime('2019-09-06T13:17')).split(' ')
    expect(customParseDate(`${day} ${month.slice(0, 3)} ${year}`)).toBe('2019-09-06')
  })
})

// ============================================================================
// 8. FACTORY
// ============================================================================

describe('createDateTimeHelper', () => {
  it('reads today from the injected clock', () => {
    const helper = createDateTimeHelper({ clock: fixedClock(2020, 1, 5) })
    expect(helper.todayDate(DatePart.FULL)).toBe('2020-01-05')
    expect(helper.todayDate(DatePart.MONTH)).toBe('JANUARY')
    expect(helper.todayDate(DatePart.DAY)).toBe('5')
  })

  it('exposes the clock-free operations unchanged', () => {
    const helper = createDateTimeHelper()
    expect(helper.addWeeks(date('2020-01-01'), 1)).toBe('2020-01-08')
    expect(helper.parseDate('20201231')).toBe('2020-12-31')
  })

  it('rejects a clock that is not a function', () => {
    expect(() => createDateTimeHelper({ clock: 'now' as unknown as Clock })).toThrow(InvalidArgumentError)
  })
})

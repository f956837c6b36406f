/**
 * Segment 01: Time & Date Utilities Tests
 *
 * Parsing, arithmetic, weekday math and timezone conversion. Pure functions
 * with no dependencies beyond the runtime timezone database.
 */

import { describe, it, expect } from 'vitest'
import {
  parseDate,
  parseTime,
  parseDateTime,
  formatTimestamp,
  addDays,
  addMonths,
  addSeconds,
  addMinutes,
  daysBetween,
  dayOfWeek,
  weekdayToIndex,
  indexToWeekday,
  isLeapYear,
  daysInMonth,
  makeDate,
  makeTime,
  makeDateTime,
  toEpochMs,
  fromEpochMs,
  allEpochMs,
  toInstant,
  instantMs,
  localAt,
  classifyWallClock,
  isValidTimezone,
  ParseError,
  type LocalDateTime,
} from '../src/time-date'

function dt(s: string): LocalDateTime {
  const parsed = parseDateTime(s)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

// ============================================================================
// 1. PARSING
// ============================================================================

describe('Parsing', () => {
  it('parses a date', () => {
    expect(parseDate('2024-02-29')).toEqual({ ok: true, value: '2024-02-29' })
  })

  it('rejects Feb 29 in a common year', () => {
    const result = parseDate('2023-02-29')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(ParseError)
  })

  it('defaults missing seconds to zero', () => {
    expect(parseTime('19:30')).toEqual({ ok: true, value: '19:30:00' })
  })

  it('rejects hour 24', () => {
    expect(parseTime('24:00:00').ok).toBe(false)
  })

  it('accepts a space separator in datetimes', () => {
    expect(parseDateTime('2024-03-15 19:30:00')).toEqual({ ok: true, value: '2024-03-15T19:30:00' })
  })

  it('accepts a T separator and surrounding whitespace', () => {
    expect(parseDateTime('  2024-03-15T19:30  ')).toEqual({ ok: true, value: '2024-03-15T19:30:00' })
  })

  it('rejects an impossible calendar date', () => {
    const result = parseDateTime('2024-02-30 10:00:00')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Invalid datetime: '2024-02-30 10:00:00'")
  })

  it('rejects free text', () => {
    expect(parseDateTime('tomorrow').ok).toBe(false)
  })
})

// ============================================================================
// 2. FORMATTING & CONSTRUCTION
// ============================================================================

describe('Formatting', () => {
  it('formats a timestamp with a space separator', () => {
    expect(formatTimestamp(dt('2024-03-15T19:30:05'))).toBe('2024-03-15 19:30:05')
  })

  it('zero-pads constructed values', () => {
    expect(makeDateTime(makeDate(987, 1, 2), makeTime(3, 4, 5))).toBe('0987-01-02T03:04:05')
  })
})

// ============================================================================
// 3. ARITHMETIC
// ============================================================================

describe('Arithmetic', () => {
  it('knows leap years', () => {
    expect(isLeapYear(2024)).toBe(true)
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2023, 2)).toBe(28)
  })

  it('adds days across a year boundary', () => {
    expect(addDays(makeDate(2024, 12, 30), 3)).toBe('2025-01-02')
    expect(daysBetween(makeDate(2024, 1, 1), makeDate(2025, 1, 1))).toBe(366)
  })

  it('adds months to a year and month', () => {
    expect(addMonths(makeDate(2024, 11, 15), 3)).toEqual({ year: 2025, month: 2 })
    expect(addMonths(makeDate(2024, 1, 31), -1)).toEqual({ year: 2023, month: 12 })
  })

  it('rolls seconds over midnight', () => {
    expect(addSeconds(dt('2024-12-31T23:59:59'), 1)).toBe('2025-01-01T00:00:00')
  })

  it('subtracts minutes across a leap day', () => {
    expect(addMinutes(dt('2024-03-01T00:10:00'), -20)).toBe('2024-02-29T23:50:00')
  })
})

// ============================================================================
// 4. WEEKDAYS
// ============================================================================

describe('Weekdays', () => {
  it('computes the day of week', () => {
    expect(dayOfWeek(makeDate(2000, 1, 1))).toBe('sat')
    expect(dayOfWeek(makeDate(2024, 3, 15))).toBe('fri')
  })

  it('indexes Monday as zero', () => {
    expect(weekdayToIndex('mon')).toBe(0)
    expect(weekdayToIndex('sun')).toBe(6)
    expect(indexToWeekday(-1)).toBe('sun')
    expect(indexToWeekday(9)).toBe('wed')
  })
})

// ============================================================================
// 5. TIMEZONES
// ============================================================================

describe('Timezones', () => {
  const NY = 'America/New_York'

  it('validates IANA names', () => {
    expect(isValidTimezone('Europe/Berlin')).toBe(true)
    expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false)
  })

  it('treats UTC wall-clock time as the instant', () => {
    expect(toEpochMs(dt('2024-01-15T12:00:00'), 'UTC')).toBe(Date.UTC(2024, 0, 15, 12, 0, 0))
  })

  it('converts summer time in New York', () => {
    expect(toEpochMs(dt('2024-07-01T12:00:00'), NY)).toBe(Date.UTC(2024, 6, 1, 16, 0, 0))
    expect(toEpochMs(dt('2024-01-15T12:00:00'), NY)).toBe(Date.UTC(2024, 0, 15, 17, 0, 0))
    expect(fromEpochMs(Date.UTC(2024, 6, 1, 16, 0, 0), NY)).toBe('2024-07-01T12:00:00')
    expect(classifyWallClock(dt('2024-07-01T12:00:00'), NY)).toBe('unique')
  })

  it('resolves a spring-forward gap to the first instant after the transition', () => {
    expect(classifyWallClock(dt('2024-03-10T02:30:00'), NY)).toBe('gap')
    expect(toEpochMs(dt('2024-03-10T02:30:00'), NY)).toBe(Date.UTC(2024, 2, 10, 7, 0, 0))
  })

  it('resolves a fall-back overlap to standard time', () => {
    expect(classifyWallClock(dt('2024-11-03T01:30:00'), NY)).toBe('overlap')
    expect(toEpochMs(dt('2024-11-03T01:30:00'), NY)).toBe(Date.UTC(2024, 10, 3, 6, 30, 0))
  })

  it('reads the wall clock on both sides of a transition', () => {
    expect(fromEpochMs(Date.UTC(2024, 2, 10, 6, 59, 59), NY)).toBe('2024-03-10T01:59:59')
    expect(fromEpochMs(Date.UTC(2024, 2, 10, 7, 0, 0), NY)).toBe('2024-03-10T03:00:00')
  })

  it('truncates epoch milliseconds to the second', () => {
    expect(fromEpochMs(Date.UTC(2024, 6, 1, 16, 0, 0, 999), NY)).toBe('2024-07-01T12:00:00')
  })

  it('lists both instants of an overlapped time', () => {
    expect(allEpochMs(dt('2024-11-03T01:30:00'), NY)).toEqual([
      Date.UTC(2024, 10, 3, 5, 30, 0),
      Date.UTC(2024, 10, 3, 6, 30, 0),
    ])
    expect(allEpochMs(dt('2024-03-10T02:30:00'), NY)).toEqual([Date.UTC(2024, 2, 10, 7, 0, 0)])
    expect(allEpochMs(dt('2024-07-01T12:00:00'), NY)).toEqual([Date.UTC(2024, 6, 1, 16, 0, 0)])
  })
})

describe('Instants', () => {
  it('formats epoch milliseconds as UTC, truncated to the second', () => {
    expect(toInstant(Date.UTC(2024, 10, 3, 6, 20, 0, 750))).toBe('2024-11-03T06:20:00Z')
    expect(instantMs(toInstant(Date.UTC(2024, 10, 3, 6, 20, 0)))).toBe(Date.UTC(2024, 10, 3, 6, 20, 0))
  })

  it('reads both passes of the repeated hour as the same wall clock', () => {
    expect(localAt(toInstant(Date.UTC(2024, 10, 3, 5, 20, 0)), 'America/New_York')).toBe('2024-11-03T01:20:00')
    expect(localAt(toInstant(Date.UTC(2024, 10, 3, 6, 20, 0)), 'America/New_York')).toBe('2024-11-03T01:20:00')
  })
})

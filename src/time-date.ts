/**
 * Time & Date
 *
 * Wall-clock values are branded ISO strings, so they sort lexically and
 * serialize as-is. Calendar arithmetic runs on "wall milliseconds": the
 * wall-clock reading interpreted as if it were UTC. Only `toEpochMs`,
 * `allEpochMs` and `fromEpochMs` cross into real instants, through the
 * runtime's IANA timezone data (Intl.DateTimeFormat). Fire times are kept as
 * `Instant`s, so elapsed-time arithmetic never touches a wall clock.
 */

import { type Result, Ok, Err } from './result'

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol
declare const __instant: unique symbol

/** YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** HH:mm:ss */
export type LocalTime = string & { readonly [__localTime]: true }

/** YYYY-MM-DDTHH:mm:ss, wall-clock time in the reference timezone */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

/** YYYY-MM-DDTHH:mm:ssZ, an absolute point in time */
export type Instant = string & { readonly [__instant]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

const MINUTE_MS = 60_000
const DAY_MS = 86_400_000

// ============================================================================
// Calendar
// ============================================================================

export function isLeapYear(year: number): boolean {
  return year % 400 === 0 || (year % 4 === 0 && year % 100 !== 0)
}

export function daysInMonth(year: number, month: number): number {
  if (month < 1 || month > 12) return 0
  if (month === 2) return isLeapYear(year) ? 29 : 28
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

// ============================================================================
// Construction & Access
// ============================================================================

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0')
}

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second = 0): LocalTime {
  return `${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.slice(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.slice(11, 19) as LocalTime
}

export const yearOf = (date: LocalDate): number => Number(date.slice(0, 4))
export const monthOf = (date: LocalDate): number => Number(date.slice(5, 7))
export const dayOf = (date: LocalDate): number => Number(date.slice(8, 10))
export const hourOf = (time: LocalTime): number => Number(time.slice(0, 2))
export const minuteOf = (time: LocalTime): number => Number(time.slice(3, 5))
export const secondOf = (time: LocalTime): number => Number(time.slice(6, 8))

/** `YYYY-MM-DD HH:mm:ss`, the form shown to agents */
export function formatTimestamp(dt: LocalDateTime): string {
  return `${dateOf(dt)} ${timeOf(dt)}`
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/
const DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2})?)$/

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const m = DATE_PATTERN.exec(str)
  if (!m) return Err(new ParseError(`Invalid date: '${str}'`))
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])]
  if (day < 1 || day > daysInMonth(year, month)) {
    return Err(new ParseError(`Invalid date: '${str}' is not on the calendar`))
  }
  return Ok(makeDate(year, month, day))
}

/** Seconds are optional and default to zero. */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const m = TIME_PATTERN.exec(str)
  if (!m) return Err(new ParseError(`Invalid time: '${str}'`))
  const [hour, minute, second] = [Number(m[1]), Number(m[2]), m[3] === undefined ? 0 : Number(m[3])]
  if (hour > 23 || minute > 59 || second > 59) {
    return Err(new ParseError(`Invalid time: '${str}' is out of range`))
  }
  return Ok(makeTime(hour, minute, second))
}

/**
 * Parses `YYYY-MM-DD HH:mm[:ss]`. A `T` is accepted in place of the space,
 * and surrounding whitespace is ignored.
 */
export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const m = DATETIME_PATTERN.exec(str.trim())
  if (!m) return Err(new ParseError(`Invalid datetime: '${str}'`))
  const date = parseDate(m[1])
  const time = parseTime(m[2])
  if (!date.ok || !time.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))
  return Ok(makeDateTime(date.value, time.value))
}

// ============================================================================
// Arithmetic
// ============================================================================

function epochDay(date: LocalDate): number {
  return Date.UTC(yearOf(date), monthOf(date) - 1, dayOf(date)) / DAY_MS
}

function wallMs(dt: LocalDateTime): number {
  const time = timeOf(dt)
  return epochDay(dateOf(dt)) * DAY_MS + ((hourOf(time) * 60 + minuteOf(time)) * 60 + secondOf(time)) * 1000
}

function fromWallMs(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds()),
  )
}

export function addDays(date: LocalDate, n: number): LocalDate {
  return dateOf(fromWallMs((epochDay(date) + n) * DAY_MS))
}

/** Signed whole days from `a` to `b`. */
export function daysBetween(a: LocalDate, b: LocalDate): number {
  return epochDay(b) - epochDay(a)
}

/** The year and month `n` months from the month of `date`. */
export function addMonths(date: LocalDate, n: number): { year: number; month: number } {
  const index = yearOf(date) * 12 + monthOf(date) - 1 + n
  const year = Math.floor(index / 12)
  return { year, month: index - year * 12 + 1 }
}

/** Wall-clock addition; DST is ignored. */
export function addSeconds(dt: LocalDateTime, n: number): LocalDateTime {
  return fromWallMs(wallMs(dt) + n * 1000)
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  return addSeconds(dt, n * 60)
}

// ============================================================================
// Weekdays
// ============================================================================

const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

/** Monday = 0 ... Sunday = 6 */
export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[((i % 7) + 7) % 7] ?? 'mon'
}

export function dayOfWeek(date: LocalDate): Weekday {
  // 1970-01-01 was a Thursday
  return indexToWeekday(epochDay(date) + 3)
}

// ============================================================================
// Timezones
// ============================================================================

const formatters = new Map<string, Intl.DateTimeFormat>()

function formatterFor(tz: string): Intl.DateTimeFormat {
  let formatter = formatters.get(tz)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: tz,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    })
    formatters.set(tz, formatter)
  }
  return formatter
}

/** UTC offset of `tz` at an instant, in minutes east of UTC. */
function offsetMinutes(instantMs: number, tz: string): number {
  if (tz === 'UTC') return 0
  const fields: Record<string, number> = {}
  for (const part of formatterFor(tz).formatToParts(new Date(instantMs))) {
    if (part.type !== 'literal') fields[part.type] = Number(part.value)
  }
  const local = Date.UTC(
    fields.year ?? 1970,
    (fields.month ?? 1) - 1,
    fields.day ?? 1,
    fields.hour ?? 0,
    fields.minute ?? 0,
    fields.second ?? 0,
  )
  return Math.round((local - instantMs) / MINUTE_MS)
}

function wallMsAt(instantMs: number, tz: string): number {
  return instantMs + offsetMinutes(instantMs, tz) * MINUTE_MS
}

/** Instants whose wall clock in `tz` reads `local`, ascending: none in a gap, two in an overlap. */
function instantsAt(local: LocalDateTime, tz: string): number[] {
  const naive = wallMs(local)
  const before = offsetMinutes(naive - DAY_MS, tz)
  const after = offsetMinutes(naive + DAY_MS, tz)
  // No transition within a day either side
  if (before === after) return [naive - before * MINUTE_MS]
  return [before, after]
    .map((offset) => naive - offset * MINUTE_MS)
    .filter((instant) => wallMsAt(instant, tz) === naive)
    .sort((a, b) => a - b)
}

/** First instant of the new offset, for a wall-clock time skipped by a forward transition. */
function endOfGap(local: LocalDateTime, tz: string): number {
  const naive = wallMs(local)
  let lo = naive - offsetMinutes(naive + DAY_MS, tz) * MINUTE_MS
  let hi = naive - offsetMinutes(naive - DAY_MS, tz) * MINUTE_MS
  const after = offsetMinutes(hi, tz)
  while (hi - lo > MINUTE_MS) {
    const mid = lo + Math.floor((hi - lo) / 2 / MINUTE_MS) * MINUTE_MS
    if (offsetMinutes(mid, tz) === after) hi = mid
    else lo = mid
  }
  return hi
}

export type WallClockKind = 'unique' | 'gap' | 'overlap'

/** Whether `local` occurs once, never (spring-forward gap) or twice (fall-back overlap) in `tz`. */
export function classifyWallClock(local: LocalDateTime, tz: string): WallClockKind {
  const count = instantsAt(local, tz).length
  if (count === 0) return 'gap'
  return count === 1 ? 'unique' : 'overlap'
}

export function isValidTimezone(tz: string): boolean {
  try {
    formatterFor(tz)
    return true
  } catch {
    return false
  }
}

/**
 * Epoch ms of a wall-clock time in `tz`. A time inside a gap resolves to the
 * first instant after the transition; an overlapped time to standard time,
 * the later of its two instants.
 */
export function toEpochMs(local: LocalDateTime, tz: string): number {
  const instants = instantsAt(local, tz)
  return instants[instants.length - 1] ?? endOfGap(local, tz)
}

/**
 * Every instant at which the wall clock in `tz` reads `local`, ascending.
 * An overlapped time yields both instants; a skipped one yields the first
 * instant after the transition.
 */
export function allEpochMs(local: LocalDateTime, tz: string): number[] {
  const instants = instantsAt(local, tz)
  return instants.length > 0 ? instants : [endOfGap(local, tz)]
}

/** Wall-clock time in `tz` at an instant, truncated to the second. */
export function fromEpochMs(ms: number, tz: string): LocalDateTime {
  const instant = Math.floor(ms / 1000) * 1000
  return fromWallMs(wallMsAt(instant, tz))
}

// ============================================================================
// Instants
// ============================================================================

/** Truncated to the second. */
export function toInstant(ms: number): Instant {
  return `${fromEpochMs(ms, 'UTC')}Z` as Instant
}

export function instantMs(instant: Instant): number {
  return Date.parse(instant)
}

/** Wall-clock time in `tz` at an instant. */
export function localAt(instant: Instant, tz: string): LocalDateTime {
  return fromEpochMs(instantMs(instant), tz)
}

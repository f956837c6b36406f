/**
 * Recurrence Evaluator
 *
 * Pure functions that turn a recurrence rule, an explicit timestamp or a delay
 * into concrete fire instants. Rules expand on the wall clock of one reference
 * timezone; each candidate is then resolved to the instant(s) it names there,
 * and every "strictly after" comparison is made on those instants. Delays are
 * elapsed time. Nothing here reads the clock.
 */

import { type Result, Ok, Err } from './result'
import {
  type Instant,
  type LocalDate,
  type LocalDateTime,
  type LocalTime,
  type Weekday,
  addDays,
  addMonths,
  allEpochMs,
  dateOf,
  dayOf,
  dayOfWeek,
  daysBetween,
  daysInMonth,
  daysInYear,
  fromEpochMs,
  hourOf,
  instantMs,
  makeDate,
  makeDateTime,
  makeTime,
  minuteOf,
  monthOf,
  parseDateTime,
  secondOf,
  timeOf,
  toEpochMs,
  toInstant,
  weekdayToIndex,
  yearOf,
} from './time-date'
import { type RecurrenceRule, type WeekdaySelector, parseRecurrenceRule } from './recurrence-rule'

export { InvalidScheduleError } from './errors'
import { InvalidScheduleError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** A parsed rule pinned to the instant it counts from. */
export type Recurrence = {
  rule: RecurrenceRule
  /** Occurrences are strictly after this */
  start: Instant
  /** `start` on the reference wall clock; fields the rule omits default to it */
  startLocal: LocalDateTime
  timezone: string
}

/**
 * Scheduling input for a new reminder. Precedence is fixed:
 * `timestamp` wins over `delayMinutes`, which wins over `rule`.
 */
export type ScheduleInput = {
  rule?: string | null
  timestamp?: string | null
  delayMinutes?: number | null
}

export type Occurrence = {
  fireAt: Instant
  /** The rule text to keep evaluating after the first fire, if any */
  rule: string | null
  /** The instant `rule` is anchored to */
  anchorAt: Instant
}

/** Consecutive periods without a candidate before a rule is treated as exhausted */
const SCAN_HORIZON_PERIODS = 3000

const MINUTE_MS = 60_000

// ============================================================================
// Construction
// ============================================================================

export function createRecurrence(
  ruleText: string,
  start: Instant,
  timezone: string,
): Result<Recurrence, InvalidScheduleError> {
  const parsed = parseRecurrenceRule(ruleText)
  if (!parsed.ok) return parsed
  const startMs = instantMs(start)
  return Ok({ rule: parsed.value, start: toInstant(startMs), startLocal: fromEpochMs(startMs, timezone), timezone })
}

// ============================================================================
// First Occurrence
// ============================================================================

export function firstOccurrence(
  input: ScheduleInput,
  reference: Instant,
  timezone: string,
): Result<Occurrence, InvalidScheduleError> {
  const ruleText = input.rule != null && input.rule.trim() !== '' ? input.rule.trim() : null

  let recurrence: Recurrence | null = null
  if (ruleText !== null) {
    const created = createRecurrence(ruleText, reference, timezone)
    if (!created.ok) return created
    recurrence = created.value
  }

  if (input.timestamp != null && input.timestamp.trim() !== '') {
    const parsed = parseDateTime(input.timestamp)
    if (!parsed.ok) {
      return Err(new InvalidScheduleError(
        `Invalid timestamp '${input.timestamp}', expected format YYYY-MM-DD HH:mm:ss`,
      ))
    }
    return Ok({ fireAt: toInstant(toEpochMs(parsed.value, timezone)), rule: ruleText, anchorAt: reference })
  }

  if (input.delayMinutes != null) {
    if (!Number.isInteger(input.delayMinutes) || input.delayMinutes < 0) {
      return Err(new InvalidScheduleError(
        `delayMinutes must be a non-negative integer, got ${input.delayMinutes}`,
      ))
    }
    const fireAt = toInstant(instantMs(reference) + input.delayMinutes * MINUTE_MS)
    return Ok({ fireAt, rule: ruleText, anchorAt: reference })
  }

  if (recurrence !== null) {
    const fireAt = nextAfter(recurrence, reference)
    if (fireAt === null) {
      return Err(new InvalidScheduleError(`Recurrence rule '${ruleText}' has no occurrence after ${reference}`))
    }
    return Ok({ fireAt, rule: ruleText, anchorAt: reference })
  }

  return Err(new InvalidScheduleError('One of recurrenceRule, timestamp or delayMinutes is required'))
}

// ============================================================================
// Next Occurrence
// ============================================================================

/** Earliest occurrence strictly after `after`, or null once the rule is exhausted. */
export function nextAfter(recurrence: Recurrence, after: Instant): Instant | null {
  const afterMs = instantMs(after)

  // Counted rules must be walked from the start; open-ended ones can jump ahead
  const fromDate = recurrence.rule.count === null
    ? addDays(dateOf(fromEpochMs(afterMs, recurrence.timezone)), -1)
    : null

  for (const occurrence of occurrences(recurrence, fromDate)) {
    if (instantMs(occurrence) > afterMs) return occurrence
  }
  return null
}

/**
 * Enumerates the occurrences of a recurrence in order. Ends when COUNT or
 * UNTIL is reached, or when the scan horizon passes without a candidate.
 * `fromDate` skips whole periods before it; it must not be used with COUNT.
 *
 * A wall-clock candidate skipped by a forward transition fires at the first
 * instant after it. One repeated by a backward transition fires at standard
 * time, except under HOURLY and MINUTELY rules, which fire at both instants.
 */
export function* occurrences(recurrence: Recurrence, fromDate: LocalDate | null = null): Generator<Instant> {
  const { rule, timezone } = recurrence
  const untilMs = rule.until === null ? null : toEpochMs(rule.until.at, rule.until.utc ? 'UTC' : timezone)

  let last = instantMs(recurrence.start)
  let emitted = 0
  let empty = 0
  let period = fromDate === null ? 0 : Math.max(0, periodIndexOf(recurrence, fromDate))

  while (empty < SCAN_HORIZON_PERIODS) {
    const candidates = expandPeriod(recurrence, period)
    period++

    if (candidates.length === 0) {
      empty++
      continue
    }
    empty = 0

    for (const ms of resolvePeriod(rule, candidates, timezone)) {
      if (ms <= last) continue
      if (untilMs !== null && ms > untilMs) return
      last = ms
      yield toInstant(ms)
      emitted++
      if (rule.count !== null && emitted >= rule.count) return
    }
  }
}

/** The instants one period's wall-clock candidates name, ascending. */
function resolvePeriod(rule: RecurrenceRule, candidates: LocalDateTime[], timezone: string): number[] {
  const instants = isSubDaily(rule)
    ? candidates.flatMap((candidate) => allEpochMs(candidate, timezone))
    : candidates.map((candidate) => toEpochMs(candidate, timezone))
  return instants.sort((a, b) => a - b)
}

// ============================================================================
// Periods
// ============================================================================

function isSubDaily(rule: RecurrenceRule): boolean {
  return rule.freq === 'HOURLY' || rule.freq === 'MINUTELY'
}

function weekStartOf(date: LocalDate, weekStart: Weekday): LocalDate {
  const offset = (weekdayToIndex(dayOfWeek(date)) - weekdayToIndex(weekStart) + 7) % 7
  return addDays(date, -offset)
}

function monthsBetween(a: LocalDate, b: LocalDate): number {
  return (yearOf(b) - yearOf(a)) * 12 + (monthOf(b) - monthOf(a))
}

function periodIndexOf(recurrence: Recurrence, date: LocalDate): number {
  const { rule } = recurrence
  const startDate = dateOf(recurrence.startLocal)
  switch (rule.freq) {
    case 'YEARLY':
      return Math.floor((yearOf(date) - yearOf(startDate)) / rule.interval)
    case 'MONTHLY':
      return Math.floor(monthsBetween(startDate, date) / rule.interval)
    case 'WEEKLY': {
      const weeks = Math.floor(daysBetween(weekStartOf(startDate, rule.weekStart), date) / 7)
      return Math.floor(weeks / rule.interval)
    }
    case 'DAILY':
      return Math.floor(daysBetween(startDate, date) / rule.interval)
    case 'HOURLY':
    case 'MINUTELY':
      // Sub-daily rules walk one calendar day per period
      return daysBetween(startDate, date)
  }
}

/** All candidate wall-clock times of the k-th period, sorted. */
function expandPeriod(recurrence: Recurrence, k: number): LocalDateTime[] {
  const { rule } = recurrence
  const startDate = dateOf(recurrence.startLocal)

  if (isSubDaily(rule)) {
    const date = addDays(startDate, k)
    if (!matchesDateFilters(rule, date)) return []
    return subDailyTimes(recurrence, date).map((t) => makeDateTime(date, t))
  }

  const dates = periodDates(recurrence, k)
  const times = dailyTimes(recurrence)
  const result: LocalDateTime[] = []
  for (const date of dates) {
    for (const time of times) {
      result.push(makeDateTime(date, time))
    }
  }
  return result
}

function periodDates(recurrence: Recurrence, k: number): LocalDate[] {
  const { rule } = recurrence
  const startDate = dateOf(recurrence.startLocal)

  switch (rule.freq) {
    case 'DAILY': {
      const date = addDays(startDate, k * rule.interval)
      return matchesDateFilters(rule, date) ? [date] : []
    }
    case 'WEEKLY': {
      const first = addDays(weekStartOf(startDate, rule.weekStart), k * rule.interval * 7)
      const weekdays = rule.byDay.length > 0 ? rule.byDay.map((d) => d.weekday) : [dayOfWeek(startDate)]
      const result: LocalDate[] = []
      for (let i = 0; i < 7; i++) {
        const date = addDays(first, i)
        if (!weekdays.includes(dayOfWeek(date))) continue
        if (rule.byMonth.length > 0 && !rule.byMonth.includes(monthOf(date))) continue
        result.push(date)
      }
      return result
    }
    case 'MONTHLY': {
      const { year, month } = addMonths(startDate, k * rule.interval)
      if (rule.byMonth.length > 0 && !rule.byMonth.includes(month)) return []
      return monthDates(rule, year, month, dayOf(startDate))
    }
    case 'YEARLY': {
      const year = yearOf(startDate) + k * rule.interval
      return yearDates(rule, year, startDate)
    }
    case 'HOURLY':
    case 'MINUTELY':
      return []
  }
}

// ============================================================================
// Date Expansion
// ============================================================================

function resolveMonthDay(year: number, month: number, day: number): number | null {
  const dim = daysInMonth(year, month)
  const resolved = day > 0 ? day : dim + day + 1
  return resolved >= 1 && resolved <= dim ? resolved : null
}

function findNthWeekdayInMonth(n: number, weekday: Weekday, year: number, month: number): LocalDate | null {
  if (n > 0) {
    let d = makeDate(year, month, 1)
    while (dayOfWeek(d) !== weekday) {
      d = addDays(d, 1)
    }
    d = addDays(d, (n - 1) * 7)
    return monthOf(d) === month ? d : null
  }
  let d = makeDate(year, month, daysInMonth(year, month))
  while (dayOfWeek(d) !== weekday) {
    d = addDays(d, -1)
  }
  d = addDays(d, (n + 1) * 7)
  return monthOf(d) === month ? d : null
}

function findNthWeekdayInYear(n: number, weekday: Weekday, year: number): LocalDate | null {
  if (n > 0) {
    let d = makeDate(year, 1, 1)
    while (dayOfWeek(d) !== weekday) {
      d = addDays(d, 1)
    }
    d = addDays(d, (n - 1) * 7)
    return yearOf(d) === year ? d : null
  }
  let d = makeDate(year, 12, 31)
  while (dayOfWeek(d) !== weekday) {
    d = addDays(d, -1)
  }
  d = addDays(d, (n + 1) * 7)
  return yearOf(d) === year ? d : null
}

function weekdayDatesInMonth(selector: WeekdaySelector, year: number, month: number): LocalDate[] {
  if (selector.ordinal !== null) {
    const d = findNthWeekdayInMonth(selector.ordinal, selector.weekday, year, month)
    return d === null ? [] : [d]
  }
  const result: LocalDate[] = []
  for (let day = 1; day <= daysInMonth(year, month); day++) {
    const d = makeDate(year, month, day)
    if (dayOfWeek(d) === selector.weekday) result.push(d)
  }
  return result
}

function sortedUnique(dates: LocalDate[]): LocalDate[] {
  return [...new Set(dates)].sort()
}

/**
 * Dates of one month. BYMONTHDAY and BYDAY each expand; when both are given
 * BYDAY narrows the BYMONTHDAY days. With neither, the anchor's day of month
 * is used and months too short for it are skipped.
 */
function monthDates(rule: RecurrenceRule, year: number, month: number, anchorDay: number): LocalDate[] {
  const fromMonthDays: LocalDate[] = []
  for (const day of rule.byMonthDay) {
    const resolved = resolveMonthDay(year, month, day)
    if (resolved !== null) fromMonthDays.push(makeDate(year, month, resolved))
  }

  const fromWeekdays: LocalDate[] = []
  for (const selector of rule.byDay) {
    fromWeekdays.push(...weekdayDatesInMonth(selector, year, month))
  }

  if (rule.byMonthDay.length > 0 && rule.byDay.length > 0) {
    const allowed = new Set(rule.byDay.map((d) => d.weekday))
    return sortedUnique(fromMonthDays.filter((d) => allowed.has(dayOfWeek(d))))
  }
  if (rule.byMonthDay.length > 0) return sortedUnique(fromMonthDays)
  if (rule.byDay.length > 0) return sortedUnique(fromWeekdays)

  return anchorDay <= daysInMonth(year, month) ? [makeDate(year, month, anchorDay)] : []
}

function yearDates(rule: RecurrenceRule, year: number, anchor: LocalDate): LocalDate[] {
  if (rule.byMonth.length > 0) {
    const result: LocalDate[] = []
    for (const month of [...rule.byMonth].sort((a, b) => a - b)) {
      result.push(...monthDates(rule, year, month, dayOf(anchor)))
    }
    return sortedUnique(result)
  }

  if (rule.byMonthDay.length > 0) {
    const result: LocalDate[] = []
    for (let month = 1; month <= 12; month++) {
      result.push(...monthDates(rule, year, month, dayOf(anchor)))
    }
    return sortedUnique(result)
  }

  if (rule.byDay.length > 0) {
    const result: LocalDate[] = []
    for (const selector of rule.byDay) {
      if (selector.ordinal !== null) {
        const d = findNthWeekdayInYear(selector.ordinal, selector.weekday, year)
        if (d !== null) result.push(d)
        continue
      }
      let d = makeDate(year, 1, 1)
      for (let i = 0; i < daysInYear(year); i++) {
        if (dayOfWeek(d) === selector.weekday) result.push(d)
        d = addDays(d, 1)
      }
    }
    return sortedUnique(result)
  }

  const month = monthOf(anchor)
  const day = dayOf(anchor)
  return day <= daysInMonth(year, month) ? [makeDate(year, month, day)] : []
}

/** BYMONTH, BYMONTHDAY and BYDAY acting as filters, for DAILY and finer rules. */
function matchesDateFilters(rule: RecurrenceRule, date: LocalDate): boolean {
  if (rule.byMonth.length > 0 && !rule.byMonth.includes(monthOf(date))) return false
  if (rule.byMonthDay.length > 0) {
    const year = yearOf(date)
    const month = monthOf(date)
    const day = dayOf(date)
    if (!rule.byMonthDay.some((d) => resolveMonthDay(year, month, d) === day)) return false
  }
  if (rule.byDay.length > 0 && !rule.byDay.some((d) => d.weekday === dayOfWeek(date))) return false
  return true
}

// ============================================================================
// Time Expansion
// ============================================================================

function ascending(values: number[]): number[] {
  return [...values].sort((a, b) => a - b)
}

function dailyTimes(recurrence: Recurrence): LocalTime[] {
  const { rule } = recurrence
  const anchor = timeOf(recurrence.startLocal)
  const hours = rule.byHour.length > 0 ? ascending(rule.byHour) : [hourOf(anchor)]
  const minutes = rule.byMinute.length > 0 ? ascending(rule.byMinute) : [minuteOf(anchor)]
  const seconds = rule.bySecond.length > 0 ? ascending(rule.bySecond) : [secondOf(anchor)]

  const result: LocalTime[] = []
  for (const h of hours) {
    for (const m of minutes) {
      for (const s of seconds) {
        result.push(makeTime(h, m, s))
      }
    }
  }
  return result
}

function mod(n: number, m: number): number {
  return ((n % m) + m) % m
}

/** Interval-aligned times of one day for HOURLY and MINUTELY rules. */
function subDailyTimes(recurrence: Recurrence, date: LocalDate): LocalTime[] {
  const { rule } = recurrence
  const anchor = timeOf(recurrence.startLocal)
  const dayOffset = daysBetween(dateOf(recurrence.startLocal), date)
  const seconds = rule.bySecond.length > 0 ? ascending(rule.bySecond) : [secondOf(anchor)]
  const hours = rule.byHour.length > 0 ? ascending(rule.byHour) : Array.from({ length: 24 }, (_, h) => h)

  const result: LocalTime[] = []
  for (const h of hours) {
    if (rule.freq === 'HOURLY') {
      const elapsedHours = dayOffset * 24 + h - hourOf(anchor)
      if (mod(elapsedHours, rule.interval) !== 0) continue
      const minutes = rule.byMinute.length > 0 ? ascending(rule.byMinute) : [minuteOf(anchor)]
      for (const m of minutes) {
        for (const s of seconds) result.push(makeTime(h, m, s))
      }
      continue
    }

    for (let m = 0; m < 60; m++) {
      if (rule.byMinute.length > 0 && !rule.byMinute.includes(m)) continue
      const elapsedMinutes = (dayOffset * 24 + h) * 60 + m - (hourOf(anchor) * 60 + minuteOf(anchor))
      if (mod(elapsedMinutes, rule.interval) !== 0) continue
      for (const s of seconds) result.push(makeTime(h, m, s))
    }
  }
  return result
}

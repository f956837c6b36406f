/**
 * Recurrence Rule Parser
 *
 * Parses the iCalendar RRULE subset reminders are scheduled with, e.g.
 * `FREQ=MONTHLY;BYDAY=+4TH;BYHOUR=19;BYMINUTE=30;BYSECOND=0`.
 * Parsing is strict: unknown parts, duplicate parts and out-of-range values
 * are rejected rather than ignored.
 */

import { type Result, Ok, Err } from './result'
import { type LocalDateTime, type Weekday, makeDate, makeTime, makeDateTime, daysInMonth } from './time-date'

export { InvalidScheduleError } from './errors'
import { InvalidScheduleError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Frequency = 'YEARLY' | 'MONTHLY' | 'WEEKLY' | 'DAILY' | 'HOURLY' | 'MINUTELY'

/** A BYDAY entry. `ordinal` is null for "every such weekday", ±n for the nth (from the end when negative). */
export type WeekdaySelector = {
  weekday: Weekday
  ordinal: number | null
}

export type RuleEnd = {
  at: LocalDateTime
  /** UNTIL carried a trailing `Z`: `at` is UTC rather than reference-timezone wall-clock time */
  utc: boolean
}

export type RecurrenceRule = {
  freq: Frequency
  interval: number
  count: number | null
  until: RuleEnd | null
  byMonth: number[]
  byMonthDay: number[]
  byDay: WeekdaySelector[]
  byHour: number[]
  byMinute: number[]
  bySecond: number[]
  weekStart: Weekday
}

// ============================================================================
// Tables
// ============================================================================

const FREQUENCIES: readonly Frequency[] = ['YEARLY', 'MONTHLY', 'WEEKLY', 'DAILY', 'HOURLY', 'MINUTELY']

const DAY_CODES: Record<string, Weekday> = {
  MO: 'mon', TU: 'tue', WE: 'wed', TH: 'thu', FR: 'fri', SA: 'sat', SU: 'sun',
}

const KNOWN_PARTS = new Set([
  'FREQ', 'INTERVAL', 'COUNT', 'UNTIL', 'BYMONTH', 'BYMONTHDAY',
  'BYDAY', 'BYHOUR', 'BYMINUTE', 'BYSECOND', 'WKST',
])

function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((f) => f === value)
}

// ============================================================================
// Part Parsers
// ============================================================================

function parseInteger(key: string, raw: string): Result<number, InvalidScheduleError> {
  if (!/^[+-]?\d+$/.test(raw)) {
    return Err(new InvalidScheduleError(`${key} expects an integer, got '${raw}'`))
  }
  return Ok(parseInt(raw, 10))
}

function parseIntegerList(
  key: string,
  raw: string,
  accept: (n: number) => boolean,
): Result<number[], InvalidScheduleError> {
  const values: number[] = []
  for (const item of raw.split(',')) {
    const n = parseInteger(key, item)
    if (!n.ok) return n
    if (!accept(n.value)) {
      return Err(new InvalidScheduleError(`${key} value out of range: ${item}`))
    }
    if (!values.includes(n.value)) values.push(n.value)
  }
  return Ok(values)
}

function parseByDay(raw: string): Result<WeekdaySelector[], InvalidScheduleError> {
  const selectors: WeekdaySelector[] = []
  for (const item of raw.split(',')) {
    const match = /^([+-]?\d{1,2})?(MO|TU|WE|TH|FR|SA|SU)$/.exec(item)
    if (!match) return Err(new InvalidScheduleError(`Invalid BYDAY value: '${item}'`))
    const weekday = DAY_CODES[match[2]]
    const ordinal = match[1] === undefined ? null : parseInt(match[1], 10)
    if (ordinal !== null && (ordinal === 0 || Math.abs(ordinal) > 53)) {
      return Err(new InvalidScheduleError(`BYDAY ordinal out of range: '${item}'`))
    }
    selectors.push({ weekday, ordinal })
  }
  return Ok(selectors)
}

function parseWeekStart(raw: string): Result<Weekday, InvalidScheduleError> {
  const weekday = DAY_CODES[raw]
  if (weekday === undefined) return Err(new InvalidScheduleError(`Invalid WKST value: '${raw}'`))
  return Ok(weekday)
}

function parseUntil(raw: string): Result<RuleEnd, InvalidScheduleError> {
  const match = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})(Z)?)?$/.exec(raw)
  if (!match) return Err(new InvalidScheduleError(`Invalid UNTIL value: '${raw}'`))

  const year = parseInt(match[1], 10)
  const month = parseInt(match[2], 10)
  const day = parseInt(match[3], 10)
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return Err(new InvalidScheduleError(`Invalid UNTIL date: '${raw}'`))
  }

  // A date-only UNTIL includes the whole day
  if (match[4] === undefined) {
    return Ok({ at: makeDateTime(makeDate(year, month, day), makeTime(23, 59, 59)), utc: false })
  }

  const hour = parseInt(match[4], 10)
  const minute = parseInt(match[5], 10)
  const second = parseInt(match[6], 10)
  if (hour > 23 || minute > 59 || second > 59) {
    return Err(new InvalidScheduleError(`Invalid UNTIL time: '${raw}'`))
  }
  return Ok({
    at: makeDateTime(makeDate(year, month, day), makeTime(hour, minute, second)),
    utc: match[7] === 'Z',
  })
}

// ============================================================================
// Rule Parser
// ============================================================================

export function parseRecurrenceRule(text: string): Result<RecurrenceRule, InvalidScheduleError> {
  const body = text.trim().replace(/^RRULE:/i, '')
  if (body === '') return Err(new InvalidScheduleError('Recurrence rule is empty'))

  const parts = new Map<string, string>()
  for (const segment of body.split(';')) {
    if (segment.trim() === '') continue
    const eq = segment.indexOf('=')
    if (eq === -1) return Err(new InvalidScheduleError(`Malformed rule part: '${segment}'`))
    const key = segment.substring(0, eq).trim().toUpperCase()
    const value = segment.substring(eq + 1).trim().toUpperCase()
    if (!KNOWN_PARTS.has(key)) return Err(new InvalidScheduleError(`Unsupported rule part: '${key}'`))
    if (parts.has(key)) return Err(new InvalidScheduleError(`Duplicate rule part: '${key}'`))
    if (value === '') return Err(new InvalidScheduleError(`Empty value for rule part '${key}'`))
    parts.set(key, value)
  }

  const freq = parts.get('FREQ')
  if (freq === undefined) return Err(new InvalidScheduleError('Recurrence rule requires FREQ'))
  if (!isFrequency(freq)) return Err(new InvalidScheduleError(`Unsupported FREQ: '${freq}'`))

  const rule: RecurrenceRule = {
    freq,
    interval: 1,
    count: null,
    until: null,
    byMonth: [],
    byMonthDay: [],
    byDay: [],
    byHour: [],
    byMinute: [],
    bySecond: [],
    weekStart: 'mon',
  }

  for (const [key, value] of parts) {
    switch (key) {
      case 'INTERVAL': {
        const n = parseInteger(key, value)
        if (!n.ok) return n
        if (n.value < 1) return Err(new InvalidScheduleError(`INTERVAL must be >= 1, got ${n.value}`))
        rule.interval = n.value
        break
      }
      case 'COUNT': {
        const n = parseInteger(key, value)
        if (!n.ok) return n
        if (n.value < 1) return Err(new InvalidScheduleError(`COUNT must be >= 1, got ${n.value}`))
        rule.count = n.value
        break
      }
      case 'UNTIL': {
        const until = parseUntil(value)
        if (!until.ok) return until
        rule.until = until.value
        break
      }
      case 'BYMONTH': {
        const list = parseIntegerList(key, value, (n) => n >= 1 && n <= 12)
        if (!list.ok) return list
        rule.byMonth = list.value
        break
      }
      case 'BYMONTHDAY': {
        const list = parseIntegerList(key, value, (n) => n !== 0 && n >= -31 && n <= 31)
        if (!list.ok) return list
        rule.byMonthDay = list.value
        break
      }
      case 'BYDAY': {
        const list = parseByDay(value)
        if (!list.ok) return list
        rule.byDay = list.value
        break
      }
      case 'BYHOUR': {
        const list = parseIntegerList(key, value, (n) => n >= 0 && n <= 23)
        if (!list.ok) return list
        rule.byHour = list.value
        break
      }
      case 'BYMINUTE': {
        const list = parseIntegerList(key, value, (n) => n >= 0 && n <= 59)
        if (!list.ok) return list
        rule.byMinute = list.value
        break
      }
      case 'BYSECOND': {
        const list = parseIntegerList(key, value, (n) => n >= 0 && n <= 59)
        if (!list.ok) return list
        rule.bySecond = list.value
        break
      }
      case 'WKST': {
        const weekStart = parseWeekStart(value)
        if (!weekStart.ok) return weekStart
        rule.weekStart = weekStart.value
        break
      }
    }
  }

  const invalid = checkCombinations(rule)
  if (invalid) return Err(invalid)

  return Ok(rule)
}

function checkCombinations(rule: RecurrenceRule): InvalidScheduleError | null {
  if (rule.count !== null && rule.until !== null) {
    return new InvalidScheduleError('COUNT and UNTIL cannot both be set')
  }
  if (rule.freq === 'WEEKLY' && rule.byMonthDay.length > 0) {
    return new InvalidScheduleError('BYMONTHDAY is not allowed with FREQ=WEEKLY')
  }

  const ordinals = rule.byDay.filter((d) => d.ordinal !== null)
  if (ordinals.length === 0) return null

  if (rule.freq !== 'MONTHLY' && rule.freq !== 'YEARLY') {
    return new InvalidScheduleError(`Ordinal BYDAY values require FREQ=MONTHLY or FREQ=YEARLY, got ${rule.freq}`)
  }
  const withinMonth = rule.freq === 'MONTHLY' || rule.byMonth.length > 0
  if (withinMonth && ordinals.some((d) => Math.abs(d.ordinal ?? 0) > 5)) {
    return new InvalidScheduleError('Ordinal BYDAY values within a month must be between -5 and 5')
  }
  return null
}

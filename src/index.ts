/**
 * agent-reminders
 *
 * Public API exports
 */

// Error system
export {
  ReminderError, ReminderErrorCode,
  DuplicateKeyError, StoreFailureError,
  DuplicateDescriptionError, NotFoundError, ValidationError,
  ParseError, InvalidScheduleError, DeliveryFailureError,
} from './errors'
export type { ReminderErrorCode as ReminderErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Instant, Weekday, WallClockKind } from './time-date'
export {
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime,
  formatTimestamp, addDays, addMinutes, addSeconds, dayOfWeek,
  toEpochMs, fromEpochMs, allEpochMs, classifyWallClock, isValidTimezone,
  toInstant, instantMs, localAt,
} from './time-date'

// Recurrence
export type { Frequency, WeekdaySelector, RuleEnd, RecurrenceRule } from './recurrence-rule'
export { parseRecurrenceRule } from './recurrence-rule'
export type { Recurrence, ScheduleInput, Occurrence } from './recurrence'
export { createRecurrence, firstOccurrence, nextAfter, occurrences } from './recurrence'

// Adapter (persistence interface + in-memory mock)
export type { Adapter, Reminder, ReminderChanges, PageRequest } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Reminder store
export type { CreateReminderInput, ReminderSelector, ReminderPage, ReminderStore } from './reminder-store'
export { createReminderStore, DEFAULT_PAGE_SIZE } from './reminder-store'

// Scheduler
export type { JobState, ScheduledJob, PendingJob, Scheduler } from './scheduler'
export { createScheduler, jobOf, notificationText, MAX_TIMER_DELAY_MS } from './scheduler'

// Notifier
export type { Notifier, HttpNotifierConfig } from './notifier'
export { createHttpNotifier } from './notifier'

// Tools
export type { CreateReminderArgs, DeleteReminderArgs, ReminderTools } from './reminder-tools'
export { createReminderTools, Messages } from './reminder-tools'

// Service
export type { ReminderServiceOptions, ReminderService } from './reminder-service'
export { createReminderService, startReminderService } from './reminder-service'

// Config & logging
export type { ReminderConfig, Env } from './config'
export { loadConfig, readEnv } from './config'
export type { Logger, LogLevel, LogData, ConsoleLoggerOptions } from './logger'
export { LOG_LEVELS, isLogLevel, createConsoleLogger, createSilentLogger } from './logger'

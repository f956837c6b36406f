/**
 * Scheduler Engine
 *
 * Owns the live job table: one timer per (agent, reminder id). When a timer
 * matures the agent is notified, then the reminder is either rescheduled to
 * its next occurrence or retired.
 *
 * Same-key operations are ordered through entry identity. A fire re-checks
 * that its entry is still the registered, uncancelled one after every await,
 * so a delete or replacement arriving mid-fire lets the notification finish
 * but stops any reschedule from resurrecting the reminder.
 */

import type { Instant, LocalDateTime } from './time-date'
import { formatTimestamp, fromEpochMs, instantMs, toInstant } from './time-date'
import { createRecurrence, nextAfter } from './recurrence'
import type { ReminderStore, Reminder } from './reminder-store'
import type { Notifier } from './notifier'
import { type Logger, createSilentLogger } from './logger'
import { type Result, Ok, Err } from './result'
import { NotFoundError, StoreFailureError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type JobState = 'pending' | 'fired' | 'rescheduled' | 'retired' | 'cancelled'

export type ScheduledJob = {
  agentId: string
  id: number
  description: string
  recurrenceRule: string | null
  anchorAt: Instant
}

export type PendingJob = ScheduledJob & {
  fireAt: Instant
  state: JobState
}

type Entry = {
  job: ScheduledJob
  fireAt: Instant
  timer: ReturnType<typeof setTimeout> | null
  state: JobState
  cancelled: boolean
}

type SchedulerDeps = {
  store: Pick<ReminderStore, 'reschedule' | 'delete' | 'getAll'>
  notifier: Notifier
  timezone: string
  logger?: Logger
  /** Epoch milliseconds */
  now?: () => number
}

export type Scheduler = ReturnType<typeof createScheduler>

/** Largest delay setTimeout accepts; longer waits are re-armed in steps */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

export function notificationText(description: string, at: LocalDateTime): string {
  return `Reminder (${formatTimestamp(at)}): ${description}`
}

export function jobOf(reminder: Reminder): ScheduledJob {
  return {
    agentId: reminder.agentId,
    id: reminder.id,
    description: reminder.description,
    recurrenceRule: reminder.recurrenceRule,
    anchorAt: reminder.anchorAt,
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createScheduler(deps: SchedulerDeps) {
  const { store, notifier, timezone } = deps
  const log = (deps.logger ?? createSilentLogger()).child('scheduler')
  const now = deps.now ?? (() => Date.now())

  const jobs = new Map<string, Entry>()
  const inFlight = new Set<Promise<void>>()
  let closed = false

  function keyOf(agentId: string, id: number): string {
    return `${agentId}:${id}`
  }

  function isCurrent(entry: Entry): boolean {
    return !entry.cancelled && jobs.get(keyOf(entry.job.agentId, entry.job.id)) === entry
  }

  // ========== Timers ==========

  function arm(entry: Entry) {
    if (closed || !isCurrent(entry)) return
    const delay = instantMs(entry.fireAt) - now()
    entry.state = 'pending'
    if (delay > MAX_TIMER_DELAY_MS) {
      entry.timer = setTimeout(() => arm(entry), MAX_TIMER_DELAY_MS)
      return
    }
    entry.timer = setTimeout(() => launch(entry), Math.max(0, delay))
  }

  function launch(entry: Entry) {
    entry.timer = null
    const run: Promise<void> = fire(entry)
      .catch((e) => {
        log.error('Unexpected failure while firing reminder', e, { agentId: entry.job.agentId, id: entry.job.id })
      })
      .finally(() => {
        inFlight.delete(run)
      })
    inFlight.add(run)
  }

  function forget(entry: Entry) {
    const key = keyOf(entry.job.agentId, entry.job.id)
    if (jobs.get(key) === entry) jobs.delete(key)
  }

  // ========== Firing ==========

  async function fire(entry: Entry): Promise<void> {
    if (!isCurrent(entry)) return
    const { job } = entry
    entry.state = 'fired'

    const firedAt = fromEpochMs(now(), timezone)
    const delivered = await notifier.notify(job.agentId, notificationText(job.description, firedAt))
    if (!delivered.ok) {
      log.error('Reminder delivery failed', delivered.error, { agentId: job.agentId, id: job.id })
    } else {
      log.debug('Reminder delivered', { agentId: job.agentId, id: job.id })
    }

    if (!isCurrent(entry)) return

    const next = nextFireTime(entry)
    if (next === null) {
      await retire(entry)
      return
    }

    const rescheduled = await store.reschedule(job.agentId, job.id, next)
    if (!rescheduled.ok) {
      if (rescheduled.error instanceof NotFoundError) {
        entry.state = 'cancelled'
        forget(entry)
        return
      }
      log.error('Failed to persist next fire time', rescheduled.error, { agentId: job.agentId, id: job.id })
    }

    if (!isCurrent(entry)) return
    entry.fireAt = next
    entry.state = 'rescheduled'
    log.debug('Reminder rescheduled', { agentId: job.agentId, id: job.id, nextFireAt: next })
    arm(entry)
  }

  /** Next occurrence strictly after both now and the fire that just ran, or null to retire. */
  function nextFireTime(entry: Entry): Instant | null {
    const { job } = entry
    if (job.recurrenceRule === null) return null

    const recurrence = createRecurrence(job.recurrenceRule, job.anchorAt, timezone)
    if (!recurrence.ok) {
      log.warn('Retiring reminder with malformed recurrence rule', {
        agentId: job.agentId,
        id: job.id,
        rule: job.recurrenceRule,
        reason: recurrence.error.message,
      })
      return null
    }

    // A timer may mature marginally early; never count the same occurrence twice
    const after = Math.max(now(), instantMs(entry.fireAt))
    return nextAfter(recurrence.value, toInstant(after))
  }

  async function retire(entry: Entry) {
    const { job } = entry
    entry.state = 'retired'
    forget(entry)
    const deleted = await store.delete(job.agentId, job.id)
    if (!deleted.ok && !(deleted.error instanceof NotFoundError)) {
      log.error('Failed to remove retired reminder', deleted.error, { agentId: job.agentId, id: job.id })
      return
    }
    log.info('Reminder retired', { agentId: job.agentId, id: job.id })
  }

  // ========== Public API ==========

  /** Registers (or replaces) the timer for a job. Returns false once shut down. */
  function schedule(job: ScheduledJob, fireAt: Instant): boolean {
    if (closed) return false
    cancel(job.agentId, job.id)
    const entry: Entry = { job: { ...job }, fireAt, timer: null, state: 'pending', cancelled: false }
    jobs.set(keyOf(job.agentId, job.id), entry)
    arm(entry)
    return true
  }

  /** Cancels the outstanding timer, if any. A fire never runs after this returns true. */
  function cancel(agentId: string, id: number): boolean {
    const key = keyOf(agentId, id)
    const entry = jobs.get(key)
    if (!entry) return false
    entry.cancelled = true
    entry.state = 'cancelled'
    if (entry.timer !== null) clearTimeout(entry.timer)
    entry.timer = null
    jobs.delete(key)
    return true
  }

  /** Registers a timer for every persisted reminder. Missed fire times fire immediately. */
  async function start(): Promise<Result<number, StoreFailureError>> {
    const all = await store.getAll()
    if (!all.ok) return Err(all.error)
    let count = 0
    for (const reminder of all.value) {
      if (schedule(jobOf(reminder), reminder.nextFireAt)) count++
    }
    log.info('Scheduler started', { reminders: count })
    return Ok(count)
  }

  /** Stops all timers, refuses new registrations and waits for in-flight fires. */
  async function shutdown(): Promise<void> {
    closed = true
    for (const entry of jobs.values()) {
      if (entry.timer !== null) clearTimeout(entry.timer)
      entry.timer = null
    }
    await Promise.allSettled([...inFlight])
    jobs.clear()
    log.info('Scheduler stopped')
  }

  function pending(): PendingJob[] {
    return [...jobs.values()].map((e) => ({ ...e.job, fireAt: e.fireAt, state: e.state }))
  }

  return {
    schedule,
    cancel,
    start,
    shutdown,
    pending,
  }
}

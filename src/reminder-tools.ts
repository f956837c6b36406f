/**
 * Reminder Tools
 *
 * The agent-facing operations. Each takes the calling agent's id and returns
 * the human-readable string the agent sees; failures become strings here and
 * never escape as exceptions.
 */

import { formatTimestamp, localAt, toInstant } from './time-date'
import { firstOccurrence } from './recurrence'
import type { ReminderStore, Reminder } from './reminder-store'
import { DEFAULT_PAGE_SIZE } from './reminder-store'
import { type Scheduler, jobOf } from './scheduler'
import { type Logger, createSilentLogger } from './logger'
import { DuplicateDescriptionError, NotFoundError, StoreFailureError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CreateReminderArgs = {
  description: string
  recurrenceRule?: string | null
  /** "YYYY-MM-DD HH:mm:ss" in the reference timezone; wins over delayMinutes */
  timestamp?: string | null
  delayMinutes?: number | null
}

export type DeleteReminderArgs = {
  description?: string | null
  reminderId?: number | null
}

export type ReminderTools = ReturnType<typeof createReminderTools>

type ReminderToolsDeps = {
  store: ReminderStore
  scheduler: Pick<Scheduler, 'schedule' | 'cancel'>
  timezone: string
  /** Epoch milliseconds */
  now?: () => number
  pageSize?: number
  logger?: Logger
}

// ============================================================================
// Messages
// ============================================================================

export const Messages = {
  created: (r: Reminder, tz: string) =>
    `Reminder #${r.id} "${r.description}" created. Next occurrence: ${formatTimestamp(localAt(r.nextFireAt, tz))} (${tz}).`,
  deleted: (r: Reminder) => `Reminder #${r.id} "${r.description}" deleted.`,
  notFound: 'Reminder not found.',
  noneFound: 'No reminders found.',
  invalid: (action: 'create' | 'delete' | 'list', reason: string) =>
    `Could not ${action} reminder${action === 'list' ? 's' : ''}: ${reason}`,
  storeFailure: {
    create: 'An error occurred while creating the reminder.',
    delete: 'An error occurred while deleting the reminder.',
    list: 'An error occurred while listing the reminders.',
  },
} as const

function formatLine(r: Reminder): string {
  return [
    `ID: ${r.id}`,
    `Description: ${r.description}`,
    `Recurrence Rule: ${r.recurrenceRule ?? 'None'}`,
    `Created At: ${formatTimestamp(r.createdAt)}`,
    `Modified At: ${formatTimestamp(r.modifiedAt)}`,
  ].join(', ')
}

// ============================================================================
// Factory
// ============================================================================

export function createReminderTools(deps: ReminderToolsDeps) {
  const { store, scheduler, timezone } = deps
  const now = deps.now ?? (() => Date.now())
  const pageSize = deps.pageSize ?? DEFAULT_PAGE_SIZE
  const log = (deps.logger ?? createSilentLogger()).child('tools')

  async function createReminder(agentId: string, args: CreateReminderArgs): Promise<string> {
    const occurrence = firstOccurrence(
      { rule: args.recurrenceRule, timestamp: args.timestamp, delayMinutes: args.delayMinutes },
      toInstant(now()),
      timezone,
    )
    if (!occurrence.ok) return Messages.invalid('create', occurrence.error.message)

    const created = await store.create(agentId, {
      description: args.description,
      recurrenceRule: occurrence.value.rule,
      anchorAt: occurrence.value.anchorAt,
      nextFireAt: occurrence.value.fireAt,
    })
    if (!created.ok) {
      const { error } = created
      if (error instanceof DuplicateDescriptionError) return error.message
      if (error instanceof StoreFailureError) {
        log.error('Failed to create reminder', error, { agentId })
        return Messages.storeFailure.create
      }
      return Messages.invalid('create', error.message)
    }

    const reminder = created.value
    if (!scheduler.schedule(jobOf(reminder), reminder.nextFireAt)) {
      log.warn('Scheduler is shut down; reminder will be armed on next start', { agentId, id: reminder.id })
    }
    log.info('Reminder created', { agentId, id: reminder.id, nextFireAt: reminder.nextFireAt })
    return Messages.created(reminder, timezone)
  }

  async function deleteReminder(agentId: string, args: DeleteReminderArgs): Promise<string> {
    const found = await store.find(agentId, { id: args.reminderId, description: args.description })
    if (!found.ok) {
      const { error } = found
      if (error instanceof NotFoundError) return Messages.notFound
      if (error instanceof StoreFailureError) {
        log.error('Failed to look up reminder', error, { agentId })
        return Messages.storeFailure.delete
      }
      return Messages.invalid('delete', error.message)
    }

    const target = found.value
    const wasArmed = scheduler.cancel(agentId, target.id)

    const deleted = await store.delete(agentId, target.id)
    if (!deleted.ok) {
      if (deleted.error instanceof NotFoundError) return Messages.notFound
      log.error('Failed to delete reminder', deleted.error, { agentId, id: target.id })
      if (wasArmed) await rearm(agentId, target.id)
      return Messages.storeFailure.delete
    }

    log.info('Reminder deleted', { agentId, id: target.id })
    return Messages.deleted(deleted.value)
  }

  /** Re-arms from the stored record, which a fire may have rescheduled since it was looked up. */
  async function rearm(agentId: string, id: number) {
    const current = await store.get(agentId, id)
    if (!current.ok) {
      log.error('Failed to re-read reminder after a failed delete', current.error, { agentId, id })
      return
    }
    if (current.value !== null) scheduler.schedule(jobOf(current.value), current.value.nextFireAt)
  }

  async function listReminders(agentId: string, page = 0): Promise<string> {
    const listed = await store.list(agentId, page, pageSize)
    if (!listed.ok) {
      const { error } = listed
      if (error instanceof StoreFailureError) {
        log.error('Failed to list reminders', error, { agentId })
        return Messages.storeFailure.list
      }
      return Messages.invalid('list', error.message)
    }

    const { items, total, totalPages } = listed.value
    if (items.length === 0) return Messages.noneFound

    const header = `Showing ${items.length} of ${total} reminders (page ${page + 1}/${totalPages}):`
    return [header, ...items.map(formatLine)].join('\n')
  }

  return {
    createReminder,
    deleteReminder,
    listReminders,
  }
}

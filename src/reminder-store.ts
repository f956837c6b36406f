/**
 * Reminder Store
 *
 * Domain data access for reminders on top of an Adapter. Owns id assignment,
 * description uniqueness and pagination; knows nothing about recurrence.
 * Every operation returns a Result; adapter exceptions surface as
 * StoreFailureError.
 */

import type { Adapter, Reminder } from './adapter'
import { DuplicateKeyError, NotFoundError } from './adapter'
import type { Instant, LocalDateTime } from './time-date'
import { type Result, Ok, Err } from './result'
import { DuplicateDescriptionError, StoreFailureError, ValidationError } from './errors'

export { DuplicateDescriptionError, NotFoundError, StoreFailureError, ValidationError }
export type { Reminder } from './adapter'

// ============================================================================
// Types
// ============================================================================

export type CreateReminderInput = {
  description: string
  recurrenceRule: string | null
  anchorAt: Instant
  nextFireAt: Instant
}

/** Selects a reminder by id or by exact description. An id takes precedence. */
export type ReminderSelector = {
  id?: number | null
  description?: string | null
}

export type ReminderPage = {
  items: Reminder[]
  total: number
  /** Zero-based */
  page: number
  totalPages: number
}

export type ReminderStore = ReturnType<typeof createReminderStore>

type ReminderStoreDeps = {
  adapter: Adapter
  /** Current wall-clock time in the reference timezone */
  clock: () => LocalDateTime
}

export const DEFAULT_PAGE_SIZE = 10

// ============================================================================
// Helpers
// ============================================================================

function storeFailure(action: string, e: unknown): StoreFailureError {
  const detail = e instanceof Error ? `: ${e.message}` : ''
  return new StoreFailureError(`Failed to ${action}${detail}`, e)
}

// ============================================================================
// Factory
// ============================================================================

export function createReminderStore(deps: ReminderStoreDeps) {
  const { adapter, clock } = deps

  async function nextId(agentId: string): Promise<number> {
    const last = await adapter.getLastReminderId(agentId)
    const existing = await adapter.getRemindersByAgent(agentId)
    const maxExisting = existing.reduce((max, r) => Math.max(max, r.id), 0)
    return Math.max(last, maxExisting) + 1
  }

  async function create(
    agentId: string,
    input: CreateReminderInput,
  ): Promise<Result<Reminder, DuplicateDescriptionError | ValidationError | StoreFailureError>> {
    if (input.description.trim() === '') {
      return Err(new ValidationError('description must be non-empty'))
    }

    try {
      return await adapter.transaction(async () => {
        const duplicate = await adapter.getReminderByDescription(agentId, input.description)
        if (duplicate) return Err(new DuplicateDescriptionError(input.description))

        const id = await nextId(agentId)
        const now = clock()
        const reminder: Reminder = {
          agentId,
          id,
          description: input.description,
          recurrenceRule: input.recurrenceRule,
          anchorAt: input.anchorAt,
          nextFireAt: input.nextFireAt,
          createdAt: now,
          modifiedAt: now,
        }
        await adapter.createReminder(reminder)
        await adapter.setLastReminderId(agentId, id)
        return Ok(reminder)
      })
    } catch (e) {
      if (e instanceof DuplicateKeyError) return Err(new DuplicateDescriptionError(input.description))
      return Err(storeFailure('create reminder', e))
    }
  }

  async function deleteWhere(
    agentId: string,
    lookup: () => Promise<Reminder | null>,
    missing: string,
  ): Promise<Result<Reminder, NotFoundError | StoreFailureError>> {
    try {
      return await adapter.transaction(async () => {
        const reminder = await lookup()
        if (!reminder) return Err(new NotFoundError(missing))
        await adapter.deleteReminder(agentId, reminder.id)
        return Ok(reminder)
      })
    } catch (e) {
      return Err(storeFailure('delete reminder', e))
    }
  }

  function deleteById(agentId: string, id: number) {
    return deleteWhere(
      agentId,
      () => adapter.getReminder(agentId, id),
      `Reminder ${id} not found for agent '${agentId}'`,
    )
  }

  function deleteByDescription(agentId: string, description: string) {
    return deleteWhere(
      agentId,
      () => adapter.getReminderByDescription(agentId, description),
      `Reminder "${description}" not found for agent '${agentId}'`,
    )
  }

  function missingSelector(): ValidationError {
    return new ValidationError('Either a reminder id or a description is required')
  }

  async function remove(
    agentId: string,
    selector: ReminderSelector,
  ): Promise<Result<Reminder, NotFoundError | ValidationError | StoreFailureError>> {
    if (selector.id != null) return deleteById(agentId, selector.id)
    if (selector.description != null && selector.description !== '') {
      return deleteByDescription(agentId, selector.description)
    }
    return Err(missingSelector())
  }

  /** Resolves a selector without deleting, with the same precedence as remove. */
  async function find(
    agentId: string,
    selector: ReminderSelector,
  ): Promise<Result<Reminder, NotFoundError | ValidationError | StoreFailureError>> {
    try {
      if (selector.id != null) {
        const r = await adapter.getReminder(agentId, selector.id)
        return r ? Ok(r) : Err(new NotFoundError(`Reminder ${selector.id} not found for agent '${agentId}'`))
      }
      if (selector.description != null && selector.description !== '') {
        const r = await adapter.getReminderByDescription(agentId, selector.description)
        return r ? Ok(r) : Err(new NotFoundError(`Reminder "${selector.description}" not found for agent '${agentId}'`))
      }
    } catch (e) {
      return Err(storeFailure('read reminder', e))
    }
    return Err(missingSelector())
  }

  async function list(
    agentId: string,
    page = 0,
    pageSize = DEFAULT_PAGE_SIZE,
  ): Promise<Result<ReminderPage, ValidationError | StoreFailureError>> {
    if (!Number.isInteger(page) || page < 0) {
      return Err(new ValidationError(`page must be a non-negative integer, got ${page}`))
    }
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      return Err(new ValidationError(`pageSize must be a positive integer, got ${pageSize}`))
    }

    try {
      const total = await adapter.countRemindersByAgent(agentId)
      const items = await adapter.getRemindersByAgent(agentId, { offset: page * pageSize, limit: pageSize })
      return Ok({ items, total, page, totalPages: Math.ceil(total / pageSize) })
    } catch (e) {
      return Err(storeFailure('list reminders', e))
    }
  }

  async function get(agentId: string, id: number): Promise<Result<Reminder | null, StoreFailureError>> {
    try {
      return Ok(await adapter.getReminder(agentId, id))
    } catch (e) {
      return Err(storeFailure('read reminder', e))
    }
  }

  async function getAll(): Promise<Result<Reminder[], StoreFailureError>> {
    try {
      return Ok(await adapter.getAllReminders())
    } catch (e) {
      return Err(storeFailure('read reminders', e))
    }
  }

  async function reschedule(
    agentId: string,
    id: number,
    nextFireAt: Instant,
  ): Promise<Result<Reminder, NotFoundError | StoreFailureError>> {
    try {
      return await adapter.transaction(async () => {
        const existing = await adapter.getReminder(agentId, id)
        if (!existing) return Err(new NotFoundError(`Reminder ${id} not found for agent '${agentId}'`))
        const modifiedAt = clock()
        await adapter.updateReminder(agentId, id, { nextFireAt, modifiedAt })
        return Ok({ ...existing, nextFireAt, modifiedAt })
      })
    } catch (e) {
      return Err(storeFailure('reschedule reminder', e))
    }
  }

  return {
    create,
    delete: deleteById,
    deleteByDescription,
    remove,
    find,
    list,
    get,
    getAll,
    reschedule,
  }
}

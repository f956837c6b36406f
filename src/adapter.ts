/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory mock implementation.
 * All methods are async so synchronous (better-sqlite3) and asynchronous
 * backends share one contract. Transactions never interleave: a transaction
 * started while another is running waits for it to settle.
 */

import type { Instant, LocalDateTime } from './time-date'

export type { Instant, LocalDateTime } from './time-date'

// ============================================================================
// Error Classes
// ============================================================================

export { DuplicateKeyError, NotFoundError } from './errors'
import { DuplicateKeyError, NotFoundError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

export type Reminder = {
  agentId: string
  id: number
  description: string
  recurrenceRule: string | null
  /** The instant the recurrence rule counts from */
  anchorAt: Instant
  nextFireAt: Instant
  /** Wall clock of the reference timezone */
  createdAt: LocalDateTime
  modifiedAt: LocalDateTime
}

export type ReminderChanges = Partial<Pick<Reminder, 'nextFireAt' | 'modifiedAt'>>

export type PageRequest = {
  offset: number
  limit: number
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  /** Runs fn exclusively. fn must not start another transaction. */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Reminder
  createReminder(reminder: Reminder): Promise<void>
  getReminder(agentId: string, id: number): Promise<Reminder | null>
  getReminderByDescription(agentId: string, description: string): Promise<Reminder | null>
  getRemindersByAgent(agentId: string, page?: PageRequest): Promise<Reminder[]>
  countRemindersByAgent(agentId: string): Promise<number>
  getAllReminders(): Promise<Reminder[]>
  updateReminder(agentId: string, id: number, changes: ReminderChanges): Promise<void>
  deleteReminder(agentId: string, id: number): Promise<void>

  // Per-agent id counter
  getLastReminderId(agentId: string): Promise<number>
  setLastReminderId(agentId: string, id: number): Promise<void>

  // Lifecycle (persistent adapters only)
  close?(): Promise<void>
}

// ============================================================================
// Serial Transaction Queue
// ============================================================================

/** Chains transactions so each one starts after the previous has settled. */
export function createTransactionQueue() {
  let tail: Promise<unknown> = Promise.resolve()

  return function run<T>(fn: () => Promise<T>): Promise<T> {
    const result = tail.then(fn)
    tail = result.then(
      () => undefined,
      () => undefined,
    )
    return result
  }
}

// ============================================================================
// Mock Adapter
// ============================================================================

function reminderKey(agentId: string, id: number): string {
  return `${agentId}\u0000${id}`
}

export function createMockAdapter(): Adapter {
  // ---- State ----
  let state = {
    reminders: new Map<string, Reminder>(),
    counters: new Map<string, number>(),
  }

  // ---- Transaction ----
  const enqueue = createTransactionQueue()

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function byAgent(agentId: string): Reminder[] {
    return [...state.reminders.values()]
      .filter((r) => r.agentId === agentId)
      .sort((a, b) => a.id - b.id)
  }

  return {
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      return enqueue(async () => {
        const snapshot = clone(state)
        try {
          return await fn()
        } catch (e) {
          state = snapshot
          throw e
        }
      })
    },

    // ================================================================
    // Reminder
    // ================================================================
    async createReminder(reminder: Reminder) {
      const key = reminderKey(reminder.agentId, reminder.id)
      if (state.reminders.has(key)) {
        throw new DuplicateKeyError(`Reminder ${reminder.id} already exists for agent '${reminder.agentId}'`)
      }
      for (const existing of state.reminders.values()) {
        if (existing.agentId === reminder.agentId && existing.description === reminder.description) {
          throw new DuplicateKeyError(`Reminder description already exists for agent '${reminder.agentId}'`)
        }
      }
      state.reminders.set(key, clone(reminder))
    },

    async getReminder(agentId: string, id: number) {
      const r = state.reminders.get(reminderKey(agentId, id))
      return r ? clone(r) : null
    },

    async getReminderByDescription(agentId: string, description: string) {
      const r = byAgent(agentId).find((x) => x.description === description)
      return r ? clone(r) : null
    },

    async getRemindersByAgent(agentId: string, page?: PageRequest) {
      const all = byAgent(agentId)
      const slice = page ? all.slice(page.offset, page.offset + page.limit) : all
      return slice.map(clone)
    },

    async countRemindersByAgent(agentId: string) {
      return byAgent(agentId).length
    },

    async getAllReminders() {
      return [...state.reminders.values()]
        .sort((a, b) => (a.agentId === b.agentId ? a.id - b.id : a.agentId < b.agentId ? -1 : 1))
        .map(clone)
    },

    async updateReminder(agentId: string, id: number, changes: ReminderChanges) {
      const key = reminderKey(agentId, id)
      const existing = state.reminders.get(key)
      if (!existing) throw new NotFoundError(`Reminder ${id} not found for agent '${agentId}'`)
      state.reminders.set(key, { ...existing, ...changes })
    },

    async deleteReminder(agentId: string, id: number) {
      state.reminders.delete(reminderKey(agentId, id))
    },

    // ================================================================
    // Counter
    // ================================================================
    async getLastReminderId(agentId: string) {
      return state.counters.get(agentId) ?? 0
    },

    async setLastReminderId(agentId: string, id: number) {
      state.counters.set(agentId, id)
    },
  }
}

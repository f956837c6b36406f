/**
 * Segment 05: Reminder Store Tests
 *
 * Id assignment, description uniqueness, deletion by id or description,
 * pagination and failure wrapping on top of the mock adapter.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { createMockAdapter, type Adapter } from '../src/adapter'
import {
  createReminderStore,
  DuplicateDescriptionError,
  NotFoundError,
  StoreFailureError,
  ValidationError,
  type CreateReminderInput,
  type ReminderStore,
} from '../src/reminder-store'
import type { LocalDateTime } from '../src/time-date'
import { at, dt, unwrap } from './helpers/fixtures'

const AGENT = 'agent-1'

function input(description: string, rule: string | null = null): CreateReminderInput {
  return {
    description,
    recurrenceRule: rule,
    anchorAt: at('2024-03-15T10:00:00'),
    nextFireAt: at('2024-03-15T10:30:00'),
  }
}

describe('Reminder Store', () => {
  let adapter: Adapter
  let now: LocalDateTime
  let store: ReminderStore

  beforeEach(() => {
    adapter = createMockAdapter()
    now = dt('2024-03-15T10:00:00')
    store = createReminderStore({ adapter, clock: () => now })
  })

  // ==========================================================================
  // create
  // ==========================================================================

  describe('create', () => {
    it('assigns sequential ids and timestamps', async () => {
      const first = unwrap(await store.create(AGENT, input('Take meds')))
      const second = unwrap(await store.create(AGENT, input('Call mom', 'FREQ=WEEKLY')))
      expect(first).toEqual({
        agentId: AGENT,
        id: 1,
        description: 'Take meds',
        recurrenceRule: null,
        anchorAt: '2024-03-15T10:00:00Z',
        nextFireAt: '2024-03-15T10:30:00Z',
        createdAt: '2024-03-15T10:00:00',
        modifiedAt: '2024-03-15T10:00:00',
      })
      expect(second.id).toBe(2)
      expect(second.recurrenceRule).toBe('FREQ=WEEKLY')
    })

    it('numbers each agent independently', async () => {
      unwrap(await store.create('a', input('x')))
      unwrap(await store.create('a', input('y')))
      expect(unwrap(await store.create('b', input('x'))).id).toBe(1)
    })

    it('rejects a duplicate description and keeps the first', async () => {
      unwrap(await store.create(AGENT, input('Take meds', 'FREQ=DAILY')))
      const dup = await store.create(AGENT, input('Take meds'))
      expect(dup.ok).toBe(false)
      if (!dup.ok) {
        expect(dup.error).toBeInstanceOf(DuplicateDescriptionError)
        expect(dup.error.message).toBe('A reminder with the description "Take meds" already exists.')
      }
      const kept = unwrap(await store.get(AGENT, 1))
      expect(kept?.recurrenceRule).toBe('FREQ=DAILY')
      expect(unwrap(await store.list(AGENT)).total).toBe(1)
    })

    it('rejects a blank description', async () => {
      const result = await store.create(AGENT, input('   '))
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error).toBeInstanceOf(ValidationError)
    })

    it('never reuses an id after deletion', async () => {
      unwrap(await store.create(AGENT, input('a')))
      unwrap(await store.create(AGENT, input('b')))
      unwrap(await store.delete(AGENT, 2))
      expect(unwrap(await store.create(AGENT, input('c'))).id).toBe(3)
      unwrap(await store.delete(AGENT, 1))
      unwrap(await store.delete(AGENT, 3))
      expect(unwrap(await store.create(AGENT, input('d'))).id).toBe(4)
    })

    it('assigns distinct ids to concurrent creates', async () => {
      const results = await Promise.all(
        ['a', 'b', 'c', 'd', 'e'].map((d) => store.create(AGENT, input(d))),
      )
      const ids = results.map((r) => unwrap(r).id).sort((x, y) => x - y)
      expect(ids).toEqual([1, 2, 3, 4, 5])
    })

    it('lets exactly one of two concurrent identical creates win', async () => {
      const [a, b] = await Promise.all([
        store.create(AGENT, input('Same')),
        store.create(AGENT, input('Same')),
      ])
      expect([a.ok, b.ok].filter(Boolean)).toHaveLength(1)
      const loser = a.ok ? b : a
      if (!loser.ok) expect(loser.error).toBeInstanceOf(DuplicateDescriptionError)
    })
  })

  // ==========================================================================
  // delete / remove
  // ==========================================================================

  describe('delete', () => {
    beforeEach(async () => {
      unwrap(await store.create(AGENT, input('first')))
      unwrap(await store.create(AGENT, input('second')))
    })

    it('deletes by id and returns the removed record', async () => {
      const removed = unwrap(await store.delete(AGENT, 1))
      expect(removed.description).toBe('first')
      expect(unwrap(await store.get(AGENT, 1))).toBeNull()
    })

    it('deletes by exact description', async () => {
      expect(unwrap(await store.deleteByDescription(AGENT, 'second')).id).toBe(2)
    })

    it('reports a missing reminder', async () => {
      const byId = await store.delete(AGENT, 9)
      const byDescription = await store.deleteByDescription(AGENT, 'third')
      expect(!byId.ok && byId.error instanceof NotFoundError).toBe(true)
      expect(!byDescription.ok && byDescription.error instanceof NotFoundError).toBe(true)
    })

    it('does not cross agents', async () => {
      const result = await store.delete('agent-2', 1)
      expect(result.ok).toBe(false)
      expect(unwrap(await store.get(AGENT, 1))?.description).toBe('first')
    })

    it('prefers the id when both selectors are given', async () => {
      const removed = unwrap(await store.remove(AGENT, { id: 1, description: 'second' }))
      expect(removed.description).toBe('first')
      expect(unwrap(await store.get(AGENT, 2))?.description).toBe('second')
    })

    it('falls back to the description without an id', async () => {
      expect(unwrap(await store.remove(AGENT, { id: null, description: 'second' })).id).toBe(2)
    })

    it('requires a selector', async () => {
      const result = await store.remove(AGENT, {})
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ValidationError)
        expect(result.error.message).toBe('Either a reminder id or a description is required')
      }
    })

    it('finds without deleting', async () => {
      expect(unwrap(await store.find(AGENT, { description: 'second' })).id).toBe(2)
      expect(unwrap(await store.list(AGENT)).total).toBe(2)
    })
  })

  // ==========================================================================
  // list
  // ==========================================================================

  describe('list', () => {
    beforeEach(async () => {
      for (let i = 1; i <= 25; i++) {
        unwrap(await store.create(AGENT, input(`reminder ${i}`)))
      }
    })

    it('returns the first page of ten', async () => {
      const page = unwrap(await store.list(AGENT, 0))
      expect(page.items.map((r) => r.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])
      expect(page.total).toBe(25)
      expect(page.totalPages).toBe(3)
      expect(page.page).toBe(0)
    })

    it('returns a short last page', async () => {
      expect(unwrap(await store.list(AGENT, 2)).items.map((r) => r.id)).toEqual([21, 22, 23, 24, 25])
    })

    it('returns an empty page past the end', async () => {
      const page = unwrap(await store.list(AGENT, 3))
      expect(page.items).toEqual([])
      expect(page.total).toBe(25)
      expect(page.totalPages).toBe(3)
    })

    it('honours a custom page size', async () => {
      const page = unwrap(await store.list(AGENT, 1, 20))
      expect(page.items).toHaveLength(5)
      expect(page.totalPages).toBe(2)
    })

    it('rejects a negative page', async () => {
      const result = await store.list(AGENT, -1)
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe('page must be a non-negative integer, got -1')
    })

    it('returns nothing for an unknown agent', async () => {
      expect(unwrap(await store.list('nobody'))).toEqual({ items: [], total: 0, page: 0, totalPages: 0 })
    })
  })

  // ==========================================================================
  // reschedule / getAll
  // ==========================================================================

  describe('reschedule', () => {
    it('updates the next fire time and modification time', async () => {
      unwrap(await store.create(AGENT, input('Stretch', 'FREQ=DAILY')))
      now = dt('2024-03-15T10:30:00')
      const updated = unwrap(await store.reschedule(AGENT, 1, at('2024-03-16T10:30:00')))
      expect(updated.nextFireAt).toBe('2024-03-16T10:30:00Z')
      expect(updated.modifiedAt).toBe('2024-03-15T10:30:00')
      expect(updated.createdAt).toBe('2024-03-15T10:00:00')
      expect(unwrap(await store.get(AGENT, 1))).toEqual(updated)
    })

    it('reports a missing reminder', async () => {
      const result = await store.reschedule(AGENT, 1, at('2024-03-16T10:30:00'))
      expect(!result.ok && result.error instanceof NotFoundError).toBe(true)
    })

    it('lists every agent\'s reminders for hydration', async () => {
      unwrap(await store.create('b', input('x')))
      unwrap(await store.create('a', input('y')))
      expect(unwrap(await store.getAll()).map((r) => r.agentId)).toEqual(['a', 'b'])
    })
  })

  // ==========================================================================
  // failures
  // ==========================================================================

  describe('persistence failures', () => {
    function failing(overrides: Partial<Adapter>): ReminderStore {
      return createReminderStore({ adapter: { ...createMockAdapter(), ...overrides }, clock: () => now })
    }

    it('wraps a failed insert', async () => {
      const broken = failing({
        createReminder: async () => {
          throw new Error('disk I/O error')
        },
      })
      const result = await broken.create(AGENT, input('x'))
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(StoreFailureError)
        expect(result.error.message).toBe('Failed to create reminder: disk I/O error')
      }
    })

    it('wraps a failed listing', async () => {
      const broken = failing({
        countRemindersByAgent: async () => {
          throw new Error('database is locked')
        },
      })
      const result = await broken.list(AGENT)
      expect(!result.ok && result.error instanceof StoreFailureError).toBe(true)
    })
  })
})

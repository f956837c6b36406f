/**
 * SQLite Adapter
 *
 * Durable implementation of the reminder adapter using better-sqlite3.
 * Reminders, the per-agent id counter and the schema version live in one
 * database file, so a restarted process sees exactly what was committed.
 */
import Database from 'better-sqlite3'
import type { Adapter, Reminder, ReminderChanges, PageRequest, Instant, LocalDateTime } from './adapter'
import { DuplicateKeyError, NotFoundError, createTransactionQueue } from './adapter'

export { DuplicateKeyError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  inTransaction(): Promise<boolean>
  getSchemaVersion(): Promise<number>
}

export type SqliteAdapter = Adapter & SqliteExtras

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS reminder (
    agent_id TEXT NOT NULL,
    id INTEGER NOT NULL,
    description TEXT NOT NULL,
    recurrence_rule TEXT,
    anchor_at TEXT NOT NULL,      -- UTC, YYYY-MM-DDTHH:mm:ssZ
    next_fire_at TEXT NOT NULL,   -- UTC, YYYY-MM-DDTHH:mm:ssZ
    created_at TEXT NOT NULL,     -- reference timezone wall clock
    modified_at TEXT NOT NULL,
    PRIMARY KEY (agent_id, id),
    UNIQUE (agent_id, description)
  );
  CREATE INDEX IF NOT EXISTS idx_reminder_next_fire ON reminder(next_fire_at);

  CREATE TABLE IF NOT EXISTS reminder_counter (
    agent_id TEXT PRIMARY KEY,
    last_id INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type ReminderRow = {
  agent_id: string
  id: number
  description: string
  recurrence_rule: string | null
  anchor_at: Instant
  next_fire_at: Instant
  created_at: LocalDateTime
  modified_at: LocalDateTime
}

type CounterRow = {
  last_id: number
}

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toReminder(row: ReminderRow): Reminder {
  return {
    agentId: row.agent_id,
    id: row.id,
    description: row.description,
    recurrenceRule: row.recurrence_rule,
    anchorAt: row.anchor_at,
    nextFireAt: row.next_fire_at,
    createdAt: row.created_at,
    modifiedAt: row.modified_at,
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.pragma('journal_mode = WAL')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const enqueue = createTransactionQueue()

  const selectOne = db.prepare<[string, number], ReminderRow>(
    'SELECT * FROM reminder WHERE agent_id = ? AND id = ?',
  )

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      return enqueue(async () => {
        db.exec('BEGIN IMMEDIATE')
        try {
          const result = await fn()
          db.exec('COMMIT')
          return result
        } catch (e) {
          db.exec('ROLLBACK')
          throw e
        }
      })
    },

    // ================================================================
    // Reminder
    // ================================================================
    async createReminder(reminder: Reminder) {
      safe(() =>
        db.prepare(
          `INSERT INTO reminder
             (agent_id, id, description, recurrence_rule, anchor_at, next_fire_at, created_at, modified_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        ).run(
          reminder.agentId, reminder.id, reminder.description, reminder.recurrenceRule,
          reminder.anchorAt, reminder.nextFireAt, reminder.createdAt, reminder.modifiedAt,
        ),
      )
    },

    async getReminder(agentId: string, id: number) {
      const row = selectOne.get(agentId, id)
      return row ? toReminder(row) : null
    },

    async getReminderByDescription(agentId: string, description: string) {
      const row = db.prepare<[string, string], ReminderRow>(
        'SELECT * FROM reminder WHERE agent_id = ? AND description = ?',
      ).get(agentId, description)
      return row ? toReminder(row) : null
    },

    async getRemindersByAgent(agentId: string, page?: PageRequest) {
      if (!page) {
        const rows = db.prepare<[string], ReminderRow>(
          'SELECT * FROM reminder WHERE agent_id = ? ORDER BY id ASC',
        ).all(agentId)
        return rows.map(toReminder)
      }
      const rows = db.prepare<[string, number, number], ReminderRow>(
        'SELECT * FROM reminder WHERE agent_id = ? ORDER BY id ASC LIMIT ? OFFSET ?',
      ).all(agentId, page.limit, page.offset)
      return rows.map(toReminder)
    },

    async countRemindersByAgent(agentId: string) {
      const row = db.prepare<[string], { n: number }>(
        'SELECT COUNT(*) as n FROM reminder WHERE agent_id = ?',
      ).get(agentId)
      return row?.n ?? 0
    },

    async getAllReminders() {
      const rows = db.prepare<[], ReminderRow>('SELECT * FROM reminder ORDER BY agent_id ASC, id ASC').all()
      return rows.map(toReminder)
    },

    async updateReminder(agentId: string, id: number, changes: ReminderChanges) {
      const existing = selectOne.get(agentId, id)
      if (!existing) throw new NotFoundError(`Reminder ${id} not found for agent '${agentId}'`)
      const merged = { ...toReminder(existing), ...changes }
      db.prepare(
        'UPDATE reminder SET next_fire_at = ?, modified_at = ? WHERE agent_id = ? AND id = ?',
      ).run(merged.nextFireAt, merged.modifiedAt, agentId, id)
    },

    async deleteReminder(agentId: string, id: number) {
      db.prepare('DELETE FROM reminder WHERE agent_id = ? AND id = ?').run(agentId, id)
    },

    // ================================================================
    // Counter
    // ================================================================
    async getLastReminderId(agentId: string) {
      const row = db.prepare<[string], CounterRow>(
        'SELECT last_id FROM reminder_counter WHERE agent_id = ?',
      ).get(agentId)
      return row?.last_id ?? 0
    },

    async setLastReminderId(agentId: string, id: number) {
      db.prepare(
        `INSERT INTO reminder_counter (agent_id, last_id) VALUES (?, ?)
         ON CONFLICT(agent_id) DO UPDATE SET last_id = excluded.last_id`,
      ).run(agentId, id)
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async inTransaction() {
      return db.inTransaction
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },
  }

  return adapter
}

/**
 * Reminder Service
 *
 * Composition root: wires configuration, persistence, the store, the notifier,
 * the scheduler and the agent-facing tools, and owns their lifecycle.
 */

import type { Adapter } from './adapter'
import { createSqliteAdapter } from './sqlite-adapter'
import { createReminderStore, type ReminderStore } from './reminder-store'
import { createScheduler, type Scheduler } from './scheduler'
import { createHttpNotifier, type Notifier } from './notifier'
import { createReminderTools, type ReminderTools } from './reminder-tools'
import { type Logger, createConsoleLogger } from './logger'
import { type ReminderConfig, type Env, loadConfig, readEnv } from './config'
import { fromEpochMs } from './time-date'
import { type Result, Ok, Err } from './result'
import { StoreFailureError, type ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ReminderServiceOptions = {
  config: ReminderConfig
  /** Defaults to a SQLite adapter at `config.dbPath` */
  adapter?: Adapter
  /** Defaults to the HTTP notifier described by `config.notifier` */
  notifier?: Notifier
  logger?: Logger
  /** Epoch milliseconds */
  now?: () => number
}

export type ReminderService = {
  config: ReminderConfig
  store: ReminderStore
  scheduler: Scheduler
  tools: ReminderTools
  /** Arms every persisted reminder; resolves to how many were armed */
  start(): Promise<Result<number, StoreFailureError>>
  /** Drains the scheduler, then releases the adapter */
  shutdown(): Promise<void>
}

// ============================================================================
// Factory
// ============================================================================

export async function createReminderService(options: ReminderServiceOptions): Promise<ReminderService> {
  const { config } = options
  const logger = options.logger ?? createConsoleLogger({ minLevel: config.logLevel })
  const now = options.now ?? (() => Date.now())
  const clock = () => fromEpochMs(now(), config.timezone)

  const adapter = options.adapter ?? (await createSqliteAdapter(config.dbPath))
  const notifier = options.notifier ?? createHttpNotifier(config.notifier)

  const store = createReminderStore({ adapter, clock })
  const scheduler = createScheduler({ store, notifier, timezone: config.timezone, logger, now })
  const tools = createReminderTools({
    store,
    scheduler,
    timezone: config.timezone,
    now,
    pageSize: config.pageSize,
    logger,
  })

  let stopped = false

  return {
    config,
    store,
    scheduler,
    tools,

    async start() {
      const started = await scheduler.start()
      if (!started.ok) logger.error('Failed to load persisted reminders', started.error)
      return started
    },

    async shutdown() {
      if (stopped) return
      stopped = true
      await scheduler.shutdown()
      await adapter.close?.()
    },
  }
}

/**
 * Reads configuration from the environment (and `envFile`, when given),
 * builds the service and arms the persisted reminders.
 */
export async function startReminderService(
  options: { envFile?: string; env?: Env; logger?: Logger; notifier?: Notifier } = {},
): Promise<Result<ReminderService, ValidationError | StoreFailureError>> {
  const config = loadConfig(readEnv({ envFile: options.envFile, env: options.env }))
  if (!config.ok) return config

  let adapter: Adapter
  try {
    adapter = await createSqliteAdapter(config.value.dbPath)
  } catch (e) {
    const detail = e instanceof Error ? `: ${e.message}` : ''
    return Err(new StoreFailureError(`Failed to open database at ${config.value.dbPath}${detail}`, e))
  }

  const service = await createReminderService({
    config: config.value,
    adapter,
    logger: options.logger,
    notifier: options.notifier,
  })
  const started = await service.start()
  if (!started.ok) {
    await service.shutdown()
    return Err(started.error)
  }
  return Ok(service)
}

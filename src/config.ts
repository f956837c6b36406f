/**
 * Configuration
 *
 * Environment variables (optionally seeded from a .env file) validated by a
 * zod schema into the service's typed configuration.
 */

import { z } from 'zod'
import { config as loadDotenv } from 'dotenv'
import { isValidTimezone } from './time-date'
import { type Result, Ok, Err } from './result'
import { ValidationError } from './errors'

// ============================================================================
// Schema
// ============================================================================

const EnvSchema = z.object({
  REMINDERS_DB_PATH: z.string().min(1).default('reminders.db'),
  REMINDERS_TIMEZONE: z
    .string()
    .default('UTC')
    .refine(isValidTimezone, { message: 'must be a valid IANA timezone name' }),
  REMINDERS_NOTIFIER_URL: z.string().url(),
  REMINDERS_NOTIFIER_TOKEN: z.string().min(1),
  REMINDERS_NOTIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  REMINDERS_PAGE_SIZE: z.coerce.number().int().positive().default(10),
  REMINDERS_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

export type ReminderConfig = {
  dbPath: string
  timezone: string
  notifier: {
    baseUrl: string
    token: string
    timeoutMs: number
  }
  pageSize: number
  logLevel: z.infer<typeof EnvSchema>['REMINDERS_LOG_LEVEL']
}

export type Env = Record<string, string | undefined>

// ============================================================================
// Loading
// ============================================================================

/** Variables from `envFile` (when given) overlaid by `env`. The file never overrides the environment. */
export function readEnv(options: { envFile?: string; env?: Env } = {}): Env {
  const fromFile: Record<string, string> = {}
  if (options.envFile !== undefined) {
    loadDotenv({ path: options.envFile, processEnv: fromFile })
  }
  return { ...fromFile, ...(options.env ?? process.env) }
}

export function loadConfig(env: Env): Result<ReminderConfig, ValidationError> {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    return Err(new ValidationError(`Invalid configuration: ${issues.join('; ')}`))
  }

  const v = parsed.data
  return Ok({
    dbPath: v.REMINDERS_DB_PATH,
    timezone: v.REMINDERS_TIMEZONE,
    notifier: {
      baseUrl: v.REMINDERS_NOTIFIER_URL,
      token: v.REMINDERS_NOTIFIER_TOKEN,
      timeoutMs: v.REMINDERS_NOTIFIER_TIMEOUT_MS,
    },
    pageSize: v.REMINDERS_PAGE_SIZE,
    logLevel: v.REMINDERS_LOG_LEVEL,
  })
}

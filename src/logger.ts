/**
 * Logger
 *
 * Structured, component-scoped logging behind a small interface so the
 * scheduler and service can be handed a silent logger in tests. The default
 * implementation writes one line per entry through `console`.
 */

// ============================================================================
// Levels
// ============================================================================

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const

export type LogLevel = keyof typeof LOG_LEVELS

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

// ============================================================================
// Interface
// ============================================================================

export type LogData = Record<string, unknown>

export interface Logger {
  debug(message: string, data?: LogData): void
  info(message: string, data?: LogData): void
  warn(message: string, data?: LogData): void
  error(message: string, error?: unknown, data?: LogData): void
  /** Logger whose entries carry `component` (dot-joined onto the parent's) */
  child(component: string): Logger
}

// ============================================================================
// Console Logger
// ============================================================================

type EntryLevel = Exclude<LogLevel, 'silent'>

const LEVEL_LABELS: Record<EntryLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

export type LogSink = (level: EntryLevel, line: string) => void

export type ConsoleLoggerOptions = {
  minLevel?: LogLevel
  component?: string
  /** Receives each formatted line; defaults to the matching console method */
  sink?: LogSink
  /** ISO timestamp source */
  now?: () => string
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug': console.debug(line); break
    case 'info': console.info(line); break
    case 'warn': console.warn(line); break
    case 'error': console.error(line); break
  }
}

function describeError(error: unknown): LogData {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? { code: error.code } : {}
    return { error: { name: error.name, message: error.message, ...code } }
  }
  return error === undefined ? {} : { error: String(error) }
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = options.minLevel ?? 'info'
  const component = options.component ?? 'reminders'
  const sink = options.sink ?? consoleSink
  const now = options.now ?? (() => new Date().toISOString())

  function write(level: EntryLevel, message: string, data: LogData) {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return
    const payload = Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : ''
    sink(level, `${now()} ${LEVEL_LABELS[level]} [${component}] ${message}${payload}`)
  }

  return {
    debug(message, data = {}) { write('debug', message, data) },
    info(message, data = {}) { write('info', message, data) },
    warn(message, data = {}) { write('warn', message, data) },
    error(message, error, data = {}) { write('error', message, { ...data, ...describeError(error) }) },
    child(name) {
      return createConsoleLogger({ minLevel, component: `${component}.${name}`, sink, now })
    },
  }
}

export function createSilentLogger(): Logger {
  const silent: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
    child() { return silent },
  }
  return silent
}

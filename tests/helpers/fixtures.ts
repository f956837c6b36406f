/**
 * Shared test fixtures.
 */

import { vi } from 'vitest'
import { parseDateTime, toEpochMs, toInstant, type Instant, type LocalDateTime } from '../../src/time-date'
import { Ok, type Result } from '../../src/result'
import type { Notifier } from '../../src/notifier'
import type { DeliveryFailureError } from '../../src/errors'
import type { Logger } from '../../src/logger'

/** Parses a wall-clock datetime, failing the test on bad input. */
export function dt(s: string): LocalDateTime {
  const parsed = parseDateTime(s)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

/** The instant at which the wall clock in `tz` reads `s`. */
export function at(s: string, tz = 'UTC'): Instant {
  return toInstant(toEpochMs(dt(s), tz))
}

/** Unwraps an Ok result, failing the test on Err. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error
  return result.value
}

export function createFakeNotifier() {
  const notify = vi.fn<Notifier['notify']>(async () => Ok(undefined))
  const notifier: Notifier = { notify }
  return { notifier, notify }
}

/** A notification that stays in flight until `resolve` is called. */
export function deferredDelivery() {
  let release: (result: Result<void, DeliveryFailureError>) => void = () => {}
  const promise = new Promise<Result<void, DeliveryFailureError>>((resolve) => {
    release = resolve
  })
  return {
    promise,
    resolve: () => release(Ok(undefined)),
  }
}

export function createSpyLogger() {
  const logger = {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    child: vi.fn<Logger['child']>(),
  }
  logger.child.mockImplementation(() => logger)
  return logger
}

/** Lets every pending promise chain settle without advancing fake time. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

/**
 * Consolidated error system.
 *
 * All error classes extend ReminderError, which carries a typed error code.
 * Modules re-export the classes they throw so their import paths stay local.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ReminderErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  STORE_FAILURE: 'STORE_FAILURE',

  // Reminder store
  DUPLICATE_DESCRIPTION: 'DUPLICATE_DESCRIPTION',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION: 'VALIDATION',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Recurrence
  INVALID_SCHEDULE: 'INVALID_SCHEDULE',

  // Notifier
  DELIVERY_FAILURE: 'DELIVERY_FAILURE',
} as const

export type ReminderErrorCode = (typeof ReminderErrorCode)[keyof typeof ReminderErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ReminderError extends Error {
  readonly code: ReminderErrorCode

  constructor(code: ReminderErrorCode, message: string) {
    super(message)
    this.name = 'ReminderError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

/** Persistence is unavailable or rejected the operation. */
export class StoreFailureError extends ReminderError {
  readonly underlying: unknown

  constructor(message: string, underlying?: unknown) {
    super(ReminderErrorCode.STORE_FAILURE, message)
    this.name = 'StoreFailureError'
    this.underlying = underlying
  }
}

// ============================================================================
// Reminder Store Errors
// ============================================================================

export class DuplicateDescriptionError extends ReminderError {
  readonly description: string

  constructor(description: string) {
    super(ReminderErrorCode.DUPLICATE_DESCRIPTION, `A reminder with the description "${description}" already exists.`)
    this.name = 'DuplicateDescriptionError'
    this.description = description
  }
}

export class NotFoundError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ValidationError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Recurrence Errors
// ============================================================================

export class InvalidScheduleError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.INVALID_SCHEDULE, message)
    this.name = 'InvalidScheduleError'
  }
}

// ============================================================================
// Notifier Errors
// ============================================================================

export class DeliveryFailureError extends ReminderError {
  readonly status: number | null

  constructor(message: string, status: number | null = null) {
    super(ReminderErrorCode.DELIVERY_FAILURE, message)
    this.name = 'DeliveryFailureError'
    this.status = status
  }
}

/**
 * Consolidated error system for program-intervals.
 *
 * All error classes extend ProgramIntervalsError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import from either place.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ProgramIntervalsErrorCode = {
  // Mutation boundary
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_NAME: 'INVALID_NAME',

  // Storage
  STORAGE_FAILURE: 'STORAGE_FAILURE',

  // Time of day
  PARSE_ERROR: 'PARSE_ERROR',

  // Configuration
  CONFIG: 'CONFIG',
} as const

export type ProgramIntervalsErrorCode =
  (typeof ProgramIntervalsErrorCode)[keyof typeof ProgramIntervalsErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ProgramIntervalsError extends Error {
  readonly code: ProgramIntervalsErrorCode

  constructor(code: ProgramIntervalsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProgramIntervalsError'
    this.code = code
  }
}

// ============================================================================
// Mutation Errors
// ============================================================================

export class DuplicateKeyError extends ProgramIntervalsError {
  constructor(message: string) {
    super(ProgramIntervalsErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends ProgramIntervalsError {
  constructor(message: string) {
    super(ProgramIntervalsErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidNameError extends ProgramIntervalsError {
  constructor(message: string) {
    super(ProgramIntervalsErrorCode.INVALID_NAME, message)
    this.name = 'InvalidNameError'
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

export class StorageFailureError extends ProgramIntervalsError {
  constructor(message: string, cause?: unknown) {
    super(ProgramIntervalsErrorCode.STORAGE_FAILURE, message, { cause })
    this.name = 'StorageFailureError'
  }
}

// ============================================================================
// Time of Day Errors
// ============================================================================

export class ParseError extends ProgramIntervalsError {
  constructor(message: string) {
    super(ProgramIntervalsErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends ProgramIntervalsError {
  constructor(message: string) {
    super(ProgramIntervalsErrorCode.CONFIG, message)
    this.name = 'ConfigError'
  }
}

/**
 * Wraps anything that is not already a domain error as a StorageFailureError.
 * Domain errors pass through so callers still see DuplicateKey/NotFound/InvalidName.
 */
export function toStorageFailure(e: unknown, context: string): ProgramIntervalsError {
  if (e instanceof ProgramIntervalsError) return e
  const detail = e instanceof Error ? e.message : String(e)
  return new StorageFailureError(`${context}: ${detail}`, e)
}

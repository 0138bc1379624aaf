/**
 * program-intervals
 *
 * Public API exports
 */

// Error system (base class, codes, error classes)
export {
  ProgramIntervalsError, ProgramIntervalsErrorCode,
  DuplicateKeyError, NotFoundError, InvalidNameError,
  StorageFailureError, ParseError, ConfigError,
} from './errors'
export type { ProgramIntervalsErrorCode as ProgramIntervalsErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time of day (branded type + range utilities)
export type { LocalTime, TimeInput, TimeRange } from './time-of-day'
export {
  MINUTES_PER_HOUR, MINUTES_PER_DAY,
  parseTime, toTime, makeTime, fromMinutes, toMinutes, hourOf, minuteOf,
  compareTimes, makeRange, wrapsMidnight, isZeroLength, rangeEquals, formatRange,
} from './time-of-day'

// Interval calculator
export { INTERVAL_MINUTES, durationMinutes, countIntervals, isIntervalAligned } from './interval-calculator'

// Adapter (persistence interface + in-memory mock)
export type { Adapter, ProgramRow, ProgramChanges, IntervalRow } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter, SqliteExtras, SqliteAdapterOptions } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Configuration
export type { IntervalsOptions, IntervalsOptionsInput, EnvConfig } from './config'
export {
  DEFAULT_MAX_NAME_LENGTH, DEFAULT_SUSPICIOUS_PATTERNS, DEFAULT_REJECTED_IMPORT_PATTERNS,
  IntervalsOptionsSchema, resolveOptions, configFromEnv,
} from './config'

// Domain types (stores are internal; writes go through the facade)
export type {
  Program, IntervalRecord, ProgramSort, ProgramReader, IntervalReader,
  MalformedProgram, ProgramScan,
} from './internal/types'

// Import results
export type { ImportRow, ImportRejection, ImportResult, ClearOutcome } from './synchronizer'

// Integrity validator
export type {
  CheckId, StoreName, ProgramRef, Evidence, Finding, CategoryResult,
  ValidationSummary, ValidationReport, ValidationSnapshot, ValidatorOptions,
  IntegrityValidator,
} from './integrity-validator'
export {
  CheckCategory, CHECK_CATEGORIES,
  checkReferentialIntegrity, checkTimeConstraints, checkIntervalCalculations,
  checkDataQuality, checkBusinessRules, findOverlaps, findDiscontinuities,
  validateSnapshot, createIntegrityValidator,
} from './integrity-validator'

// Report formatting
export { formatReport, formatEvidence, formatCategoryTitle, REMEDIATION_HINTS } from './report-format'

// Public API
export type {
  Logger, ProgramIntervals, ProgramIntervalsConfig, ProgramIntervalsEvents,
  ProgramIntervalsEvent, ProgramIntervalsStats, ProgramUpdateInput,
} from './public-api'
export { createProgramIntervals, openProgramIntervals } from './public-api'

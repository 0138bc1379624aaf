/**
 * Public API Module
 *
 * Consumer-facing interface that ties all components together.
 * Handles option parsing, locking, event emission and time input conversion.
 *
 * Mutations hold the write side of the lock and run through the synchronizer;
 * queries and validation runs hold the read side, so they may run alongside
 * each other but never observe a mutation halfway through.
 */

import type { Adapter } from './adapter'
import { createSqliteAdapter } from './sqlite-adapter'
import { type TimeRange, type TimeInput, makeRange } from './time-of-day'
import { countIntervals } from './interval-calculator'
import { type IntervalsOptionsInput, resolveOptions, configFromEnv } from './config'
import { createProgramStore } from './internal/program-store'
import { createIntervalStore } from './internal/interval-store'
import { createReadWriteLock } from './internal/rw-lock'
import type { Program, ProgramSort } from './internal/types'
import { createSynchronizer, type ImportRow, type ImportResult, type ClearOutcome } from './synchronizer'
import { createIntegrityValidator, type ValidationReport } from './integrity-validator'
import { formatReport } from './report-format'

// ============================================================================
// Error Classes
// ============================================================================

export {
  DuplicateKeyError, NotFoundError, InvalidNameError,
  StorageFailureError, ParseError, ConfigError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type { Adapter } from './adapter'
export type { Program, IntervalRecord, ProgramSort } from './internal/types'
export type { ImportRow, ImportResult, ImportRejection, ClearOutcome } from './synchronizer'

export type Logger = {
  error(...args: unknown[]): void
}

export type ProgramIntervalsConfig = IntervalsOptionsInput & {
  adapter: Adapter
  logger?: Logger
}

export type ProgramUpdateInput = {
  newName?: string
  start: TimeInput
  end: TimeInput
}

export type ProgramIntervalsStats = {
  totalPrograms: number
  totalIntervals: number
}

export type ProgramIntervalsEvents = {
  programInserted: { program: Program; intervalCount: number }
  programUpdated: { previousName: string; name: string; range: TimeRange; intervalCount: number; affected: number }
  programDeleted: { name: string; removed: number }
  programsCleared: ClearOutcome
  validated: { overallValid: boolean; totalErrors: number; totalWarnings: number }
}

export type ProgramIntervalsEvent = keyof ProgramIntervalsEvents

export type ProgramIntervals = {
  insertProgram(name: string, start: TimeInput, end: TimeInput): Promise<Program>
  updateProgram(name: string, changes: ProgramUpdateInput): Promise<void>
  deleteProgram(name: string): Promise<void>
  importPrograms(rows: readonly ImportRow[], options?: { validateOnly?: boolean }): Promise<ImportResult>
  clearPrograms(): Promise<ClearOutcome>
  getIntervalCount(name: string): Promise<number | null>
  listPrograms(options?: { sortBy?: ProgramSort }): Promise<Program[]>
  getStats(): Promise<ProgramIntervalsStats>
  runValidation(): Promise<ValidationReport>
  formatReport(report: ValidationReport): string
  on<E extends ProgramIntervalsEvent>(event: E, handler: (payload: ProgramIntervalsEvents[E]) => void): void
  close(): Promise<void>
}

type HandlerMap = {
  [E in ProgramIntervalsEvent]: Array<(payload: ProgramIntervalsEvents[E]) => void>
}

// ============================================================================
// Factory
// ============================================================================

export function createProgramIntervals(config: ProgramIntervalsConfig): ProgramIntervals {
  const { adapter, logger = console, ...optionInput } = config
  const options = resolveOptions(optionInput)

  const programs = createProgramStore({ adapter })
  const intervals = createIntervalStore({ adapter })
  const lock = createReadWriteLock()
  const synchronizer = createSynchronizer({
    adapter,
    programs,
    intervals,
    maxNameLength: options.maxNameLength,
    rejectedImportPatterns: options.rejectedImportPatterns,
  })
  const validator = createIntegrityValidator({
    programs: programs.reader,
    intervals: intervals.reader,
    options,
  })

  // Event handlers
  const eventHandlers: HandlerMap = {
    programInserted: [],
    programUpdated: [],
    programDeleted: [],
    programsCleared: [],
    validated: [],
  }

  function emit<E extends ProgramIntervalsEvent>(event: E, payload: ProgramIntervalsEvents[E]): void {
    const handlers: Array<(payload: ProgramIntervalsEvents[E]) => void> = eventHandlers[event]
    for (const handler of handlers) {
      try { handler(payload) } catch (e) { logger.error(`Event handler error on '${event}':`, e) }
    }
  }

  function on<E extends ProgramIntervalsEvent>(event: E, handler: (payload: ProgramIntervalsEvents[E]) => void) {
    const handlers: Array<(payload: ProgramIntervalsEvents[E]) => void> = eventHandlers[event]
    handlers.push(handler)
  }

  // ========== Mutations ==========

  async function insertProgram(name: string, start: TimeInput, end: TimeInput): Promise<Program> {
    const range = makeRange(start, end)
    const program = await lock.write(() => synchronizer.insert(name, range))
    emit('programInserted', { program, intervalCount: countIntervals(range) })
    return program
  }

  async function updateProgram(name: string, changes: ProgramUpdateInput): Promise<void> {
    const range = makeRange(changes.start, changes.end)
    const outcome = await lock.write(() =>
      synchronizer.update(name, {
        range,
        ...(changes.newName !== undefined ? { newName: changes.newName } : {}),
      }),
    )
    emit('programUpdated', {
      previousName: outcome.previousName,
      name: changes.newName ?? name,
      range,
      intervalCount: outcome.intervalCount,
      affected: outcome.programs.length,
    })
  }

  async function deleteProgram(name: string): Promise<void> {
    const removed = await lock.write(() => synchronizer.remove(name))
    if (removed > 0) emit('programDeleted', { name, removed })
  }

  async function importPrograms(
    rows: readonly ImportRow[],
    importOptions?: { validateOnly?: boolean },
  ): Promise<ImportResult> {
    return lock.write(() => synchronizer.importRows(rows, importOptions))
  }

  async function clearPrograms(): Promise<ClearOutcome> {
    const outcome = await lock.write(() => synchronizer.clear())
    emit('programsCleared', outcome)
    return outcome
  }

  // ========== Queries ==========

  function getIntervalCount(name: string): Promise<number | null> {
    return lock.read(() => intervals.get(name))
  }

  async function listPrograms(listOptions?: { sortBy?: ProgramSort }): Promise<Program[]> {
    return lock.read(() => programs.list(listOptions))
  }

  async function getStats(): Promise<ProgramIntervalsStats> {
    return lock.read(async () => ({
      totalPrograms: await programs.count(),
      totalIntervals: await intervals.count(),
    }))
  }

  // ========== Validation ==========

  async function runValidation(): Promise<ValidationReport> {
    const report = await lock.read(() => validator.run())
    emit('validated', {
      overallValid: report.overallValid,
      totalErrors: report.summary.totalErrors,
      totalWarnings: report.summary.totalWarnings,
    })
    return report
  }

  // ========== Lifecycle ==========

  async function close(): Promise<void> {
    await lock.write(async () => {
      await adapter.close?.()
    })
  }

  return {
    insertProgram,
    updateProgram,
    deleteProgram,
    importPrograms,
    clearPrograms,
    getIntervalCount,
    listPrograms,
    getStats,
    runValidation,
    formatReport,
    on,
    close,
  }
}

/**
 * Opens a SQLite-backed instance from PROGRAM_INTERVALS_* environment variables.
 */
export async function openProgramIntervals(
  env: Record<string, string | undefined>,
  overrides: { logger?: Logger } = {},
): Promise<ProgramIntervals> {
  const { dbPath, options } = configFromEnv(env)
  const adapter = await createSqliteAdapter(dbPath)
  return createProgramIntervals({ adapter, ...options, ...overrides })
}

/**
 * Synchronizer
 *
 * The only write path into the program store. Every program mutation is
 * paired with the matching interval-store write inside one adapter
 * transaction, so the two stores are never observed half-updated.
 *
 * Storage errors roll the transaction back and surface as
 * StorageFailureError; domain errors pass through unchanged.
 */

import type { Adapter } from './adapter'
import {
  type LocalTime, type TimeRange, type TimeInput,
  toTime, makeRange, rangeEquals, formatRange,
} from './time-of-day'
import { countIntervals } from './interval-calculator'
import { type Result, Ok, Err } from './result'
import type { ProgramStore } from './internal/program-store'
import type { IntervalStore } from './internal/interval-store'
import type { Program } from './internal/types'
import { nowISO } from './internal/helpers'
import {
  DuplicateKeyError, NotFoundError, InvalidNameError,
  ParseError, ProgramIntervalsError, StorageFailureError, toStorageFailure,
} from './errors'

export { DuplicateKeyError, NotFoundError, InvalidNameError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ProgramUpdate = {
  newName?: string
  range: TimeRange
}

export type ImportRow = {
  name: string
  start: TimeInput
  end: TimeInput
}

export type ImportRejection = {
  index: number
  row: ImportRow
  /** Every problem found with the row, in field order. */
  reasons: string[]
}

export type ImportResult = {
  imported: number
  rejected: ImportRejection[]
}

export type ClearOutcome = {
  programs: number
  intervals: number
}

export type UpdateOutcome = {
  previousName: string
  programs: Program[]
  intervalCount: number
}

type SynchronizerDeps = {
  adapter: Adapter
  programs: ProgramStore
  intervals: IntervalStore
  maxNameLength: number
  rejectedImportPatterns: readonly string[]
}

type CleanRow = {
  name: string
  range: TimeRange
}

// ============================================================================
// Factory
// ============================================================================

export function createSynchronizer(deps: SynchronizerDeps) {
  const { adapter, programs, intervals, maxNameLength, rejectedImportPatterns } = deps

  function nameProblems(name: string): string[] {
    if (name.trim().length === 0) return ['Program name must not be empty']
    if (name.length > maxNameLength) {
      return [`Program name exceeds ${maxNameLength} characters (got ${name.length})`]
    }
    return []
  }

  function checkName(name: string): void {
    const [problem] = nameProblems(name)
    if (problem !== undefined) throw new InvalidNameError(problem)
  }

  // ========== Import row checks ==========

  function importNameProblems(name: string): string[] {
    const problems = nameProblems(name)
    const lower = name.toLowerCase()
    if (lower.includes('null')) problems.push('Program name contains NULL value')
    for (const pattern of rejectedImportPatterns) {
      if (lower.includes(pattern)) problems.push(`Program name contains potentially dangerous pattern: ${pattern}`)
    }
    return problems
  }

  // Schedule exports write the end of the day as 24:00.
  function importTime(label: string, input: TimeInput): Result<LocalTime, string> {
    const value = typeof input === 'string' ? input.trim() : input
    if (value === '') return Err(`${label} is missing or empty`)
    try {
      return Ok(toTime(value === '24:00' ? '00:00' : value))
    } catch (e) {
      if (!(e instanceof ParseError)) throw e
      return Err(`${label}: ${e.message}`)
    }
  }

  function cleanImportRow(row: ImportRow): Result<CleanRow, string[]> {
    const name = row.name.trim()
    const start = importTime('Start time', row.start)
    const end = importTime('End time', row.end)
    const problems = importNameProblems(name)
    if (!start.ok) problems.push(start.error)
    if (!end.ok) problems.push(end.error)
    if (!start.ok || !end.ok || problems.length > 0) return Err(problems)
    return Ok({ name, range: makeRange(start.value, end.value) })
  }

  async function atomically<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await adapter.transaction(fn)
    } catch (e) {
      throw toStorageFailure(e, `${operation} failed`)
    }
  }

  // ========== Unsynchronized steps (callers hold the transaction) ==========

  async function insertProgram(name: string, range: TimeRange, at: string): Promise<Program> {
    checkName(name)
    const existing = await programs.findByName(name)
    if (existing.some((p) => rangeEquals(p.range, range))) {
      throw new DuplicateKeyError(`Program '${name}' ${formatRange(range)} already exists`)
    }
    const program = await programs.add(name, range, at)
    await intervals.set(name, countIntervals(range), at)
    return program
  }

  // ========== Operations ==========

  async function insert(name: string, range: TimeRange): Promise<Program> {
    return atomically('insert', () => insertProgram(name, range, nowISO()))
  }

  async function update(name: string, changes: ProgramUpdate): Promise<UpdateOutcome> {
    const targetName = changes.newName ?? name
    checkName(targetName)

    return atomically('update', async () => {
      const matches = await programs.findByName(name)
      if (matches.length === 0) {
        throw new NotFoundError(`Program '${name}' not found`)
      }

      for (const program of matches) {
        await programs.replace(program.id, targetName, changes.range)
      }

      if (targetName !== name) {
        await intervals.remove(name)
      }
      const intervalCount = countIntervals(changes.range)
      await intervals.set(targetName, intervalCount, nowISO())

      return {
        previousName: name,
        programs: matches.map((p) => ({ ...p, name: targetName, range: changes.range })),
        intervalCount,
      }
    })
  }

  /** Removes every program called `name` and its interval record. Unknown names are a no-op. */
  async function remove(name: string): Promise<number> {
    return atomically('delete', async () => {
      const matches = await programs.findByName(name)
      if (matches.length === 0) return 0
      for (const program of matches) {
        await programs.remove(program.id)
      }
      await intervals.remove(name)
      return matches.length
    })
  }

  /**
   * Validates each row and inserts the valid ones in a single transaction.
   * Fields are trimmed first. A rejected row lists all of its problems and
   * does not abort the batch; a storage failure does.
   */
  async function importRows(
    rows: readonly ImportRow[],
    options: { validateOnly?: boolean } = {},
  ): Promise<ImportResult> {
    const validateOnly = options.validateOnly ?? false

    return atomically('import', async () => {
      const at = nowISO()
      const seen = new Set<string>()
      const rejected: ImportRejection[] = []
      let imported = 0

      for (const [index, row] of rows.entries()) {
        const clean = cleanImportRow(row)
        if (!clean.ok) {
          rejected.push({ index, row, reasons: clean.error })
          continue
        }
        const { name, range } = clean.value
        try {
          const key = `${name}\u0000${range.start}\u0000${range.end}`
          if (seen.has(key)) {
            throw new DuplicateKeyError(`Program '${name}' ${formatRange(range)} repeated in import`)
          }
          seen.add(key)
          if (validateOnly) {
            const existing = await programs.findByName(name)
            if (existing.some((p) => rangeEquals(p.range, range))) {
              throw new DuplicateKeyError(`Program '${name}' ${formatRange(range)} already exists`)
            }
          } else {
            await insertProgram(name, range, at)
          }
          imported++
        } catch (e) {
          if (!(e instanceof ProgramIntervalsError) || e instanceof StorageFailureError) throw e
          rejected.push({ index, row, reasons: [e.message] })
        }
      }

      return { imported, rejected }
    })
  }

  /** Empties both stores together. */
  async function clear(): Promise<ClearOutcome> {
    return atomically('clear', async () => {
      const intervalCount = await intervals.clear()
      const programCount = await programs.clear()
      return { programs: programCount, intervals: intervalCount }
    })
  }

  return {
    insert,
    update,
    remove,
    importRows,
    clear,
  }
}

export type Synchronizer = ReturnType<typeof createSynchronizer>

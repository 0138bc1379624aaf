/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory mock implementation.
 * All methods are async so synchronous (better-sqlite3) and asynchronous
 * backends share one contract.
 *
 * The adapter is the raw storage layer: it enforces only the structural
 * constraints of the two tables (unique program id, unique name/start/end
 * triple, one interval row per name). Keeping the tables in step with each
 * other is the synchronizer's job.
 */

import { DuplicateKeyError, NotFoundError } from './errors'

export type { LocalTime } from './time-of-day'
export { DuplicateKeyError, NotFoundError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

/** Times are stored as text; only the program store parses them. */
export type ProgramRow = {
  id: string
  name: string
  start: string
  end: string
  createdAt: string
}

export type ProgramChanges = Partial<Pick<ProgramRow, 'name' | 'start' | 'end'>>

export type IntervalRow = {
  programName: string
  intervalCount: number
  createdAt: string
  updatedAt: string
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Program
  createProgram(program: ProgramRow): Promise<void>
  getProgram(id: string): Promise<ProgramRow | null>
  getProgramsByName(name: string): Promise<ProgramRow[]>
  getAllPrograms(): Promise<ProgramRow[]>
  updateProgram(id: string, changes: ProgramChanges): Promise<void>
  deleteProgram(id: string): Promise<void>
  /** Removes every program row and returns how many there were. */
  deleteAllPrograms(): Promise<number>

  // Program Interval
  upsertInterval(programName: string, intervalCount: number, at: string): Promise<void>
  getInterval(programName: string): Promise<IntervalRow | null>
  getAllIntervals(): Promise<IntervalRow[]>
  deleteInterval(programName: string): Promise<void>
  deleteAllIntervals(): Promise<number>

  // Lifecycle (optional, persistent adapters implement it)
  close?(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  const state = {
    programs: new Map<string, ProgramRow>(),
    intervals: new Map<string, IntervalRow>(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  function restoreState(snap: typeof state) {
    Object.assign(state, snap)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function findTriple(name: string, start: string, end: string, exceptId?: string): ProgramRow | undefined {
    for (const p of state.programs.values()) {
      if (p.id !== exceptId && p.name === name && p.start === start && p.end === end) return p
    }
    return undefined
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          restoreState(snapshot)
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Program
    // ================================================================
    async createProgram(program: ProgramRow) {
      if (state.programs.has(program.id)) {
        throw new DuplicateKeyError(`Program '${program.id}' already exists`)
      }
      if (findTriple(program.name, program.start, program.end)) {
        throw new DuplicateKeyError(
          `Program '${program.name}' ${program.start}-${program.end} already exists`,
        )
      }
      state.programs.set(program.id, clone(program))
    },

    async getProgram(id: string) {
      const p = state.programs.get(id)
      return p ? clone(p) : null
    },

    async getProgramsByName(name: string) {
      return [...state.programs.values()].filter((p) => p.name === name).map(clone)
    },

    async getAllPrograms() {
      return [...state.programs.values()].map(clone)
    },

    async updateProgram(id: string, changes: ProgramChanges) {
      const existing = state.programs.get(id)
      if (!existing) throw new NotFoundError(`Program '${id}' not found`)
      const next = { ...existing, ...changes }
      if (findTriple(next.name, next.start, next.end, id)) {
        throw new DuplicateKeyError(`Program '${next.name}' ${next.start}-${next.end} already exists`)
      }
      state.programs.set(id, next)
    },

    async deleteProgram(id: string) {
      state.programs.delete(id)
    },

    async deleteAllPrograms() {
      const removed = state.programs.size
      state.programs = new Map()
      return removed
    },

    // ================================================================
    // Program Interval
    // ================================================================
    async upsertInterval(programName: string, intervalCount: number, at: string) {
      const existing = state.intervals.get(programName)
      state.intervals.set(programName, {
        programName,
        intervalCount,
        createdAt: existing?.createdAt ?? at,
        updatedAt: at,
      })
    },

    async getInterval(programName: string) {
      const row = state.intervals.get(programName)
      return row ? clone(row) : null
    },

    async getAllIntervals() {
      return [...state.intervals.values()].map(clone)
    },

    async deleteInterval(programName: string) {
      state.intervals.delete(programName)
    },

    async deleteAllIntervals() {
      const removed = state.intervals.size
      state.intervals = new Map()
      return removed
    },

    async close() {
      state.programs.clear()
      state.intervals.clear()
    },
  }

  return adapter
}

/**
 * SQLite Adapter
 *
 * Production implementation of the program-intervals adapter using better-sqlite3.
 * Two tables mirror the domain: `programs` (source) and `program_intervals` (derived).
 * No triggers: the synchronizer performs every paired write explicitly.
 */
import Database from 'better-sqlite3'
import type { Adapter, ProgramRow, ProgramChanges, IntervalRow } from './adapter'
import { DuplicateKeyError, NotFoundError, StorageFailureError } from './errors'

export { DuplicateKeyError, NotFoundError, StorageFailureError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  execute(sql: string): Promise<void>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter = Adapter & SqliteExtras

export type SqliteAdapterOptions = {
  /** Milliseconds to wait on a locked database before failing (driver default 5000). */
  busyTimeoutMs?: number
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS programs (
    id TEXT PRIMARY KEY,
    program_name TEXT NOT NULL,
    start_time TEXT NOT NULL,
    end_time TEXT NOT NULL,
    created_at TEXT NOT NULL,
    UNIQUE(program_name, start_time, end_time)
  );
  CREATE INDEX IF NOT EXISTS idx_programs_name ON programs(program_name);
  CREATE INDEX IF NOT EXISTS idx_programs_times ON programs(start_time, end_time);

  CREATE TABLE IF NOT EXISTS program_intervals (
    program_name TEXT PRIMARY KEY,
    interval_count INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  throw new StorageFailureError(msg, e)
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type ProgramSqlRow = {
  id: string
  program_name: string
  start_time: string
  end_time: string
  created_at: string
}

type IntervalSqlRow = {
  program_name: string
  interval_count: number
  created_at: string
  updated_at: string
}

type NameRow = {
  name: string
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toProgram(row: ProgramSqlRow): ProgramRow {
  return {
    id: row.id,
    name: row.program_name,
    start: row.start_time,
    end: row.end_time,
    createdAt: row.created_at,
  }
}

function toInterval(row: IntervalSqlRow): IntervalRow {
  return {
    programName: row.program_name,
    intervalCount: row.interval_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(
  path: string,
  options: SqliteAdapterOptions = {},
): Promise<SqliteAdapter> {
  const db = safe(() =>
    options.busyTimeoutMs === undefined ? new Database(path) : new Database(path, { timeout: options.busyTimeoutMs }),
  )
  safe(() => db.exec(SCHEMA_SQL))

  let _inTx = false

  const PROGRAM_COLUMNS = 'id, program_name, start_time, end_time, created_at'

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      safe(() => db.exec('BEGIN IMMEDIATE'))
      _inTx = true
      try {
        const result = await fn()
        safe(() => db.exec('COMMIT'))
        return result
      } catch (e) {
        if (db.inTransaction) db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Program
    // ================================================================
    async createProgram(program: ProgramRow) {
      safe(() =>
        db.prepare<[string, string, string, string, string]>(
          `INSERT INTO programs (${PROGRAM_COLUMNS}) VALUES (?, ?, ?, ?, ?)`,
        ).run(program.id, program.name, program.start, program.end, program.createdAt),
      )
    },

    async getProgram(id: string) {
      const row = safe(() =>
        db.prepare<[string], ProgramSqlRow>(`SELECT ${PROGRAM_COLUMNS} FROM programs WHERE id = ?`).get(id),
      )
      return row ? toProgram(row) : null
    },

    async getProgramsByName(name: string) {
      const rows = safe(() =>
        db.prepare<[string], ProgramSqlRow>(
          `SELECT ${PROGRAM_COLUMNS} FROM programs WHERE program_name = ? ORDER BY rowid`,
        ).all(name),
      )
      return rows.map(toProgram)
    },

    async getAllPrograms() {
      const rows = safe(() =>
        db.prepare<[], ProgramSqlRow>(`SELECT ${PROGRAM_COLUMNS} FROM programs ORDER BY rowid`).all(),
      )
      return rows.map(toProgram)
    },

    async updateProgram(id: string, changes: ProgramChanges) {
      const info = safe(() =>
        db.prepare<[string | null, string | null, string | null, string]>(`
          UPDATE programs SET
            program_name = COALESCE(?, program_name),
            start_time = COALESCE(?, start_time),
            end_time = COALESCE(?, end_time)
          WHERE id = ?
        `).run(changes.name ?? null, changes.start ?? null, changes.end ?? null, id),
      )
      if (info.changes === 0) throw new NotFoundError(`Program '${id}' not found`)
    },

    async deleteProgram(id: string) {
      safe(() => db.prepare<[string]>('DELETE FROM programs WHERE id = ?').run(id))
    },

    async deleteAllPrograms() {
      return safe(() => db.prepare<[]>('DELETE FROM programs').run()).changes
    },

    // ================================================================
    // Program Interval
    // ================================================================
    async upsertInterval(programName: string, intervalCount: number, at: string) {
      safe(() =>
        db.prepare<[string, number, string, string]>(`
          INSERT INTO program_intervals (program_name, interval_count, created_at, updated_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT (program_name) DO UPDATE SET
            interval_count = excluded.interval_count,
            updated_at = excluded.updated_at
        `).run(programName, intervalCount, at, at),
      )
    },

    async getInterval(programName: string) {
      const row = safe(() =>
        db.prepare<[string], IntervalSqlRow>(
          'SELECT program_name, interval_count, created_at, updated_at FROM program_intervals WHERE program_name = ?',
        ).get(programName),
      )
      return row ? toInterval(row) : null
    },

    async getAllIntervals() {
      const rows = safe(() =>
        db.prepare<[], IntervalSqlRow>(
          'SELECT program_name, interval_count, created_at, updated_at FROM program_intervals ORDER BY rowid',
        ).all(),
      )
      return rows.map(toInterval)
    },

    async deleteInterval(programName: string) {
      safe(() => db.prepare<[string]>('DELETE FROM program_intervals WHERE program_name = ?').run(programName))
    },

    async deleteAllIntervals() {
      return safe(() => db.prepare<[]>('DELETE FROM program_intervals').run()).changes
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], NameRow>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async execute(sql: string) {
      safe(() => db.exec(sql))
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}

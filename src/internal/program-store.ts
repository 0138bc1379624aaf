/**
 * Program Store
 *
 * Authoritative program collection over the adapter. Converts rows into
 * Program values with frozen ranges and offers the name lookup and
 * start-ordered listing the synchronizer and validator join on. Rows whose
 * stored times do not parse fail `list` and `findByName`; `scan` reports them.
 *
 * Pairing with the interval store lives in the synchronizer.
 */

import type { Adapter, ProgramRow } from '../adapter'
import { type TimeRange, parseTime } from '../time-of-day'
import { type Result, Ok, Err } from '../result'
import { StorageFailureError } from '../errors'
import type { Program, ProgramReader, ProgramScan, ProgramSort, MalformedProgram } from './types'
import { uuid, compareByStart } from './helpers'

type ProgramStoreDeps = {
  adapter: Adapter
}

function readRow(row: ProgramRow): Result<Program, MalformedProgram> {
  const start = parseTime(row.start)
  const end = parseTime(row.end)
  if (!start.ok || !end.ok) {
    const reasons = [start, end].flatMap((r) => (r.ok ? [] : [r.error.message]))
    return Err({ id: row.id, name: row.name, start: row.start, end: row.end, reason: reasons.join('; ') })
  }
  return Ok({
    id: row.id,
    name: row.name,
    range: Object.freeze({ start: start.value, end: end.value }),
    createdAt: row.createdAt,
  })
}

function toProgram(row: ProgramRow): Program {
  const read = readRow(row)
  if (!read.ok) {
    throw new StorageFailureError(`Stored program '${read.error.name}' has unreadable times: ${read.error.reason}`)
  }
  return read.value
}

export function createProgramStore(deps: ProgramStoreDeps) {
  const { adapter } = deps

  // ========== Reader ==========

  async function list(options?: { sortBy?: ProgramSort }): Promise<Program[]> {
    const programs = (await adapter.getAllPrograms()).map(toProgram)
    return options?.sortBy === 'start' ? programs.sort(compareByStart) : programs
  }

  /** Like `list`, but sets rows with unreadable times aside instead of failing. */
  async function scan(): Promise<ProgramScan> {
    const programs: Program[] = []
    const malformed: MalformedProgram[] = []
    for (const row of await adapter.getAllPrograms()) {
      const read = readRow(row)
      if (read.ok) programs.push(read.value)
      else malformed.push(read.error)
    }
    return { programs: programs.sort(compareByStart), malformed }
  }

  const reader: ProgramReader = { list, scan }

  // ========== Queries ==========

  async function findByName(name: string): Promise<Program[]> {
    return (await adapter.getProgramsByName(name)).map(toProgram)
  }

  async function count(): Promise<number> {
    return (await adapter.getAllPrograms()).length
  }

  // ========== Mutations ==========

  async function add(name: string, range: TimeRange, at: string): Promise<Program> {
    const row: ProgramRow = { id: uuid(), name, start: range.start, end: range.end, createdAt: at }
    await adapter.createProgram(row)
    return toProgram(row)
  }

  async function replace(id: string, name: string, range: TimeRange): Promise<void> {
    await adapter.updateProgram(id, { name, start: range.start, end: range.end })
  }

  async function remove(id: string): Promise<void> {
    await adapter.deleteProgram(id)
  }

  async function clear(): Promise<number> {
    return adapter.deleteAllPrograms()
  }

  return {
    reader,
    list,
    scan,
    findByName,
    count,
    add,
    replace,
    remove,
    clear,
  }
}

export type ProgramStore = ReturnType<typeof createProgramStore>

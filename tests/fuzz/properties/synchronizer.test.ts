/**
 * Property tests for the synchronizer.
 *
 * Runs random insert/update/remove sequences against the in-memory adapter
 * and compares both stores with a plain name -> count model after every step.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { syncOperationGen, type SyncOperation } from '../generators/programs'
import { createMockAdapter } from '../../../src/adapter'
import { createProgramStore } from '../../../src/internal/program-store'
import { createIntervalStore } from '../../../src/internal/interval-store'
import { createSynchronizer } from '../../../src/synchronizer'
import { createIntegrityValidator } from '../../../src/integrity-validator'
import { countIntervals } from '../../../src/interval-calculator'
import { resolveOptions } from '../../../src/config'
import { ProgramIntervalsError } from '../../../src/errors'
import { compareStrings } from '../../../src/internal/helpers'

// ============================================================================
// Harness
// ============================================================================

function setup() {
  const adapter = createMockAdapter()
  const programs = createProgramStore({ adapter })
  const intervals = createIntervalStore({ adapter })
  const options = resolveOptions()
  const sync = createSynchronizer({
    adapter, programs, intervals,
    maxNameLength: options.maxNameLength,
    rejectedImportPatterns: options.rejectedImportPatterns,
  })
  const validator = createIntegrityValidator({
    programs: programs.reader,
    intervals: intervals.reader,
    options,
  })
  return { programs, intervals, sync, validator }
}

type Model = Map<string, number>

/** Applies one operation to the system and, when it succeeds, to the model. */
async function apply(system: ReturnType<typeof setup>, model: Model, op: SyncOperation): Promise<void> {
  try {
    switch (op.type) {
      case 'insert':
        await system.sync.insert(op.name, op.range)
        model.set(op.name, countIntervals(op.range))
        break
      case 'update': {
        const outcome = await system.sync.update(op.name, {
          range: op.range,
          ...(op.newName !== undefined ? { newName: op.newName } : {}),
        })
        model.delete(op.name)
        model.set(op.newName ?? op.name, outcome.intervalCount)
        break
      }
      case 'remove':
        await system.sync.remove(op.name)
        model.delete(op.name)
        break
    }
  } catch (e) {
    // Rejected operations must be domain errors and leave the model untouched.
    expect(e).toBeInstanceOf(ProgramIntervalsError)
  }
}

function entries(map: Map<string, number>): [string, number][] {
  return [...map.entries()].sort(([a], [b]) => compareStrings(a, b))
}

// ============================================================================
// Properties
// ============================================================================

describe('Synchronizer properties', () => {
  it('interval records always match the model', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(syncOperationGen(), { maxLength: 25 }), async (ops) => {
        const system = setup()
        const model: Model = new Map()

        for (const op of ops) {
          await apply(system, model, op)

          const records = await system.intervals.list()
          const programs = await system.programs.list()
          expect(entries(new Map(records.map((r) => [r.programName, r.intervalCount])))).toEqual(entries(model))
          expect([...new Set(programs.map((p) => p.name))].sort(compareStrings))
            .toEqual([...model.keys()].sort(compareStrings))
        }
      }),
    )
  })

  it('a name held by one program carries that program\'s count', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(syncOperationGen(), { maxLength: 25 }), async (ops) => {
        const system = setup()
        const model: Model = new Map()
        for (const op of ops) await apply(system, model, op)

        const programs = await system.programs.list()
        for (const program of programs) {
          const sharing = programs.filter((p) => p.name === program.name)
          if (sharing.length === 1) {
            expect(await system.intervals.get(program.name)).toBe(countIntervals(program.range))
          }
        }
      }),
    )
  })

  it('referential integrity holds after any sequence', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(syncOperationGen(), { maxLength: 25 }), async (ops) => {
        const system = setup()
        const model: Model = new Map()
        for (const op of ops) await apply(system, model, op)

        const report = await system.validator.run()
        expect(report.categories.find((c) => c.category === 'referential_integrity')?.valid).toBe(true)
      }),
    )
  })
})

/**
 * Segment 03: Adapter (In-Memory Mock) Tests
 *
 * Tests the adapter interface - the raw two-table storage layer - through
 * the in-memory mock used by every other segment.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import {
  createMockAdapter,
  type Adapter,
  type ProgramRow,
  type LocalTime,
  DuplicateKeyError,
  NotFoundError,
} from '../src/adapter'

function program(id: string, name: string, start: string, end: string): ProgramRow {
  return {
    id,
    name,
    start: start as LocalTime,
    end: end as LocalTime,
    createdAt: '2024-01-15T10:00:00.000Z',
  }
}

let adapter: Adapter

beforeEach(() => {
  adapter = createMockAdapter()
})

// ============================================================================
// 1. TRANSACTION SEMANTICS
// ============================================================================

describe('Transaction Semantics', () => {
  it('transaction commits on success', async () => {
    await adapter.transaction(async () => {
      await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
      await adapter.upsertInterval('News', 4, '2024-01-15T10:00:00.000Z')
    })
    expect(await adapter.getProgram('p1')).toEqual(program('p1', 'News', '09:00', '10:00'))
    expect((await adapter.getInterval('News'))?.intervalCount).toBe(4)
  })

  it('transaction rolls back both tables on error', async () => {
    await expect(
      adapter.transaction(async () => {
        await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
        await adapter.upsertInterval('News', 4, '2024-01-15T10:00:00.000Z')
        throw new Error('Deliberate failure')
      }),
    ).rejects.toThrow('Deliberate failure')

    expect(await adapter.getAllPrograms()).toEqual([])
    expect(await adapter.getAllIntervals()).toEqual([])
  })

  it('nested transactions roll back with the outermost', async () => {
    await adapter.createProgram(program('p0', 'Weather', '08:00', '08:15'))
    await expect(
      adapter.transaction(async () => {
        await adapter.transaction(async () => {
          await adapter.deleteProgram('p0')
        })
        throw new Error('outer failure')
      }),
    ).rejects.toThrow('outer failure')

    expect((await adapter.getAllPrograms()).map((p) => p.id)).toEqual(['p0'])
  })

  it('a caught inner failure does not undo the outer transaction', async () => {
    await adapter.transaction(async () => {
      await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
      await adapter.transaction(async () => {
        throw new Error('inner')
      }).catch(() => undefined)
    })
    expect(await adapter.getProgram('p1')).not.toBeNull()
  })
})

// ============================================================================
// 2. PROGRAMS
// ============================================================================

describe('Programs', () => {
  it('returns copies, not live rows', async () => {
    await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
    const row = await adapter.getProgram('p1')
    if (row) row.name = 'Changed'
    expect((await adapter.getProgram('p1'))?.name).toBe('News')
  })

  it('rejects a duplicate id', async () => {
    await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
    await expect(adapter.createProgram(program('p1', 'Sport', '11:00', '12:00')))
      .rejects.toThrow(DuplicateKeyError)
  })

  it('rejects a duplicate name/start/end triple', async () => {
    await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
    await expect(adapter.createProgram(program('p2', 'News', '09:00', '10:00')))
      .rejects.toThrow("Program 'News' 09:00-10:00 already exists")
  })

  it('allows the same name with a different range', async () => {
    await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
    await adapter.createProgram(program('p2', 'News', '18:00', '19:00'))
    expect((await adapter.getProgramsByName('News')).map((p) => p.id)).toEqual(['p1', 'p2'])
  })

  it('getAllPrograms keeps insertion order', async () => {
    await adapter.createProgram(program('b', 'Late', '22:00', '23:00'))
    await adapter.createProgram(program('a', 'Early', '06:00', '07:00'))
    expect((await adapter.getAllPrograms()).map((p) => p.id)).toEqual(['b', 'a'])
  })

  it('updateProgram applies partial changes', async () => {
    await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
    await adapter.updateProgram('p1', { end: '10:30' as LocalTime })
    expect(await adapter.getProgram('p1')).toEqual(program('p1', 'News', '09:00', '10:30'))
  })

  it('updateProgram throws NotFoundError for an unknown id', async () => {
    await expect(adapter.updateProgram('missing', { name: 'X' })).rejects.toThrow(NotFoundError)
  })

  it('updateProgram refuses to create a duplicate triple', async () => {
    await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
    await adapter.createProgram(program('p2', 'News', '11:00', '12:00'))
    await expect(
      adapter.updateProgram('p2', { start: '09:00' as LocalTime, end: '10:00' as LocalTime }),
    ).rejects.toThrow(DuplicateKeyError)
  })

  it('deleteProgram is silent for an unknown id', async () => {
    await expect(adapter.deleteProgram('missing')).resolves.toBeUndefined()
  })
})

// ============================================================================
// 3. INTERVAL RECORDS
// ============================================================================

describe('Interval Records', () => {
  it('upsert keeps createdAt and moves updatedAt', async () => {
    await adapter.upsertInterval('News', 4, '2024-01-15T10:00:00.000Z')
    await adapter.upsertInterval('News', 6, '2024-01-16T10:00:00.000Z')
    expect(await adapter.getInterval('News')).toEqual({
      programName: 'News',
      intervalCount: 6,
      createdAt: '2024-01-15T10:00:00.000Z',
      updatedAt: '2024-01-16T10:00:00.000Z',
    })
  })

  it('getInterval returns null for an unknown name', async () => {
    expect(await adapter.getInterval('nothing')).toBeNull()
  })

  it('deleteInterval removes the record', async () => {
    await adapter.upsertInterval('News', 4, '2024-01-15T10:00:00.000Z')
    await adapter.deleteInterval('News')
    expect(await adapter.getAllIntervals()).toEqual([])
  })

  it('bulk deletes inside a failed transaction are rolled back', async () => {
    await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
    await adapter.upsertInterval('News', 4, '2024-01-15T10:00:00.000Z')
    await expect(
      adapter.transaction(async () => {
        expect(await adapter.deleteAllIntervals()).toBe(1)
        expect(await adapter.deleteAllPrograms()).toBe(1)
        throw new Error('clear failed')
      }),
    ).rejects.toThrow('clear failed')
    expect((await adapter.getAllPrograms()).map((p) => p.id)).toEqual(['p1'])
    expect((await adapter.getInterval('News'))?.intervalCount).toBe(4)
  })

  it('close empties both tables', async () => {
    await adapter.createProgram(program('p1', 'News', '09:00', '10:00'))
    await adapter.upsertInterval('News', 4, '2024-01-15T10:00:00.000Z')
    await adapter.close?.()
    expect(await adapter.getAllPrograms()).toEqual([])
    expect(await adapter.getAllIntervals()).toEqual([])
  })
})

/**
 * Interval Store
 *
 * Derived program name -> interval count collection over the adapter.
 * Written only by the synchronizer.
 */

import type { Adapter } from '../adapter'
import type { IntervalRecord, IntervalReader } from './types'

type IntervalStoreDeps = {
  adapter: Adapter
}

export function createIntervalStore(deps: IntervalStoreDeps) {
  const { adapter } = deps

  // ========== Reader ==========

  async function list(): Promise<IntervalRecord[]> {
    return adapter.getAllIntervals()
  }

  const reader: IntervalReader = { list }

  // ========== Operations ==========

  async function get(programName: string): Promise<number | null> {
    const row = await adapter.getInterval(programName)
    return row ? row.intervalCount : null
  }

  async function set(programName: string, intervalCount: number, at: string): Promise<void> {
    await adapter.upsertInterval(programName, intervalCount, at)
  }

  async function remove(programName: string): Promise<void> {
    await adapter.deleteInterval(programName)
  }

  async function count(): Promise<number> {
    return (await adapter.getAllIntervals()).length
  }

  async function clear(): Promise<number> {
    return adapter.deleteAllIntervals()
  }

  return {
    reader,
    list,
    get,
    set,
    remove,
    count,
    clear,
  }
}

export type IntervalStore = ReturnType<typeof createIntervalStore>

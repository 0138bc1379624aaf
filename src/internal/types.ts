/**
 * Internal Types
 *
 * Domain shapes shared by the stores, the synchronizer and the validator.
 */

import type { TimeRange } from '../time-of-day'

// ============================================================================
// Domain Types
// ============================================================================

export type Program = {
  id: string
  name: string
  range: TimeRange
  createdAt: string
}

export type IntervalRecord = {
  programName: string
  intervalCount: number
  createdAt: string
  updatedAt: string
}

/** A stored program row whose start or end is not a valid HH:MM time. */
export type MalformedProgram = {
  id: string
  name: string
  start: string
  end: string
  reason: string
}

/** Stored programs split into readable ones and those with unreadable times. */
export type ProgramScan = {
  programs: Program[]
  malformed: MalformedProgram[]
}

export type ProgramSort = 'start' | 'insertion'

// ============================================================================
// Readers
// ============================================================================

/** Read side of the program store, handed to the validator. */
export type ProgramReader = {
  list(options?: { sortBy?: ProgramSort }): Promise<Program[]>
  scan(): Promise<ProgramScan>
}

/** Read side of the interval store, handed to the validator. */
export type IntervalReader = {
  list(): Promise<IntervalRecord[]>
}

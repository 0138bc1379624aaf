/**
 * Program generators.
 *
 * Arbitraries for times, ranges and synchronizer operation sequences.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { fromMinutes, makeRange, MINUTES_PER_DAY, type LocalTime, type TimeRange } from '../../../src/time-of-day'
import type { Program } from '../../../src/internal/types'

// ============================================================================
// Times and Ranges
// ============================================================================

export const minuteOfDayGen = (): Arbitrary<number> => fc.integer({ min: 0, max: MINUTES_PER_DAY - 1 })

export const localTimeGen = (): Arbitrary<LocalTime> => minuteOfDayGen().map(fromMinutes)

/** Mostly quarter-hour aligned, so ranges meet and collide often. */
export const slotTimeGen = (): Arbitrary<LocalTime> =>
  fc.oneof(
    { weight: 4, arbitrary: fc.integer({ min: 0, max: 95 }).map((q) => fromMinutes(q * 15)) },
    { weight: 1, arbitrary: localTimeGen() },
  )

export const timeRangeGen = (): Arbitrary<TimeRange> =>
  fc.tuple(slotTimeGen(), slotTimeGen()).map(([start, end]) => makeRange(start, end))

// ============================================================================
// Names and Programs
// ============================================================================

/** A small pool so that renames and repeated names are common. */
export const programNameGen = (): Arbitrary<string> => fc.constantFrom('News', 'Sport', 'Movie', 'Kids', 'Weather')

export const programGen = (): Arbitrary<Program> =>
  fc.record({
    id: fc.uuid(),
    name: programNameGen(),
    range: timeRangeGen(),
    createdAt: fc.constant('2024-01-15T10:00:00.000Z'),
  })

// ============================================================================
// Operations
// ============================================================================

export type SyncOperation =
  | { type: 'insert'; name: string; range: TimeRange }
  | { type: 'update'; name: string; newName: string | undefined; range: TimeRange }
  | { type: 'remove'; name: string }

export const syncOperationGen = (): Arbitrary<SyncOperation> =>
  fc.oneof(
    { weight: 3, arbitrary: fc.record({ type: fc.constant('insert' as const), name: programNameGen(), range: timeRangeGen() }) },
    {
      weight: 2,
      arbitrary: fc.record({
        type: fc.constant('update' as const),
        name: programNameGen(),
        newName: fc.option(programNameGen(), { nil: undefined }),
        range: timeRangeGen(),
      }),
    },
    { weight: 1, arbitrary: fc.record({ type: fc.constant('remove' as const), name: programNameGen() }) },
  )

/**
 * Interval Calculator
 *
 * Counts the complete 15-minute buckets in a daily time range.
 *
 * Rules, in priority order:
 * - start == end -> 0 (a literal 00:00-00:00 full day also counts as 0)
 * - end > start  -> end - start minutes
 * - end < start  -> minutes left before midnight plus minutes after it
 * - count = floor(duration / 15)
 */

import { type TimeRange, MINUTES_PER_DAY, toMinutes } from './time-of-day'

export const INTERVAL_MINUTES = 15

export function durationMinutes(range: TimeRange): number {
  if (range.start === range.end) return 0
  const start = toMinutes(range.start)
  const end = toMinutes(range.end)
  if (end > start) return end - start
  return MINUTES_PER_DAY - start + end
}

export function countIntervals(range: TimeRange): number {
  return Math.floor(durationMinutes(range) / INTERVAL_MINUTES)
}

/** True when the time sits on a 15-minute boundary (:00, :15, :30, :45). */
export function isIntervalAligned(minutes: number): boolean {
  return minutes % INTERVAL_MINUTES === 0
}

/**
 * Time of Day
 *
 * Branded HH:MM time-of-day values, minutes-since-midnight conversion and the
 * immutable TimeRange value type. No dates, no timezones: a range whose end is
 * earlier than its start runs past midnight into the next day.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localTime: unique symbol

/** 24-hour, zero-padded time of day: HH:MM */
export type LocalTime = string & { readonly [__localTime]: true }

/** Time of day as accepted at the API boundary: HH:MM or minutes since midnight. */
export type TimeInput = string | number

export type TimeRange = {
  readonly start: LocalTime
  readonly end: LocalTime
}

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const MINUTES_PER_HOUR = 60
export const MINUTES_PER_DAY = 24 * MINUTES_PER_HOUR

// ============================================================================
// Helpers
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

// ============================================================================
// Parsing
// ============================================================================

export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))

  return Ok(str as LocalTime)
}

/** Accepts HH:MM or minutes since midnight; throws ParseError on anything else. */
export function toTime(input: TimeInput): LocalTime {
  if (typeof input === 'number') return fromMinutes(input)
  const result = parseTime(input)
  if (!result.ok) throw result.error
  return result.value
}

// ============================================================================
// Construction & Conversion
// ============================================================================

export function makeTime(hour: number, minute: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}` as LocalTime
}

export function fromMinutes(minutes: number): LocalTime {
  if (!Number.isInteger(minutes) || minutes < 0 || minutes >= MINUTES_PER_DAY) {
    throw new ParseError(`Minutes since midnight out of range: ${minutes}`)
  }
  return makeTime(Math.floor(minutes / MINUTES_PER_HOUR), minutes % MINUTES_PER_HOUR)
}

export function toMinutes(time: LocalTime): number {
  return hourOf(time) * MINUTES_PER_HOUR + minuteOf(time)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

// ============================================================================
// Comparison
// ============================================================================

// Zero-padded HH:MM sorts lexically in time order.
export function compareTimes(a: LocalTime, b: LocalTime): number {
  return a < b ? -1 : a > b ? 1 : 0
}

// ============================================================================
// Ranges
// ============================================================================

export function makeRange(start: TimeInput, end: TimeInput): TimeRange {
  return Object.freeze({ start: toTime(start), end: toTime(end) })
}

export function wrapsMidnight(range: TimeRange): boolean {
  return compareTimes(range.end, range.start) < 0
}

export function isZeroLength(range: TimeRange): boolean {
  return range.start === range.end
}

export function rangeEquals(a: TimeRange, b: TimeRange): boolean {
  return a.start === b.start && a.end === b.end
}

export function formatRange(range: TimeRange): string {
  return `${range.start}-${range.end}`
}

/**
 * Internal Helpers
 *
 * Pure utility functions shared across internal modules.
 */

import { randomUUID } from 'node:crypto'
import { compareTimes } from '../time-of-day'
import type { Program } from './types'

// ============================================================================
// ID Generation
// ============================================================================

export function uuid(): string {
  return randomUUID()
}

// ============================================================================
// Timestamps
// ============================================================================

export function nowISO(): string {
  return new Date().toISOString()
}

// ============================================================================
// Ordering
// ============================================================================

/** Orders by start, then end, then name, then id so equal starts sort stably. */
export function compareByStart(a: Program, b: Program): number {
  return (
    compareTimes(a.range.start, b.range.start) ||
    compareTimes(a.range.end, b.range.end) ||
    compareStrings(a.name, b.name) ||
    compareStrings(a.id, b.id)
  )
}

// Code-unit order, independent of the host locale.
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

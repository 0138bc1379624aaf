/**
 * Integrity Validator
 *
 * Read-only audit of the program store against the interval store. It does
 * not trust the synchronizer: both stores are read as they are and every
 * relationship is re-derived.
 *
 * Five categories run over one snapshot:
 * - referential integrity (missing and orphaned interval records)
 * - interval calculations (stored count vs recomputed count)
 * - time constraints (unreadable times, overlaps; gaps when a contiguous day is expected)
 * - data quality (blank, over-long and duplicate names; zero-duration programs)
 * - business rules (warnings only: suspicious names, reversed ranges, off-grid slots)
 *
 * Joins go through a name-keyed index; overlap and gap detection scan the
 * programs ordered by start time. Every list is emitted in a fixed order so
 * two runs over unchanged stores give equal reports.
 */

import {
  type LocalTime, MINUTES_PER_DAY,
  toMinutes, wrapsMidnight, isZeroLength,
} from './time-of-day'
import { countIntervals, isIntervalAligned } from './interval-calculator'
import type { IntervalsOptions } from './config'
import type {
  Program, MalformedProgram, IntervalRecord, ProgramReader, IntervalReader,
} from './internal/types'
import { compareByStart, compareStrings } from './internal/helpers'
import { StorageFailureError } from './errors'

// ============================================================================
// Report Types
// ============================================================================

export const CheckCategory = {
  REFERENTIAL_INTEGRITY: 'referential_integrity',
  TIME_CONSTRAINTS: 'time_constraints',
  INTERVAL_CALCULATIONS: 'interval_calculations',
  DATA_QUALITY: 'data_quality',
  BUSINESS_RULES: 'business_rules',
} as const

export type CheckCategory = (typeof CheckCategory)[keyof typeof CheckCategory]

/** Report order of the categories. */
export const CHECK_CATEGORIES: readonly CheckCategory[] = [
  CheckCategory.REFERENTIAL_INTEGRITY,
  CheckCategory.TIME_CONSTRAINTS,
  CheckCategory.INTERVAL_CALCULATIONS,
  CheckCategory.DATA_QUALITY,
  CheckCategory.BUSINESS_RULES,
]

export type CheckId =
  | 'missing_interval_records'
  | 'orphaned_interval_records'
  | 'incorrect_interval_counts'
  | 'invalid_times'
  | 'overlapping_programs'
  | 'schedule_discontinuities'
  | 'empty_names'
  | 'long_names'
  | 'duplicate_names'
  | 'zero_duration_programs'
  | 'suspicious_names'
  | 'reversed_ranges'
  | 'non_standard_slots'

export type StoreName = 'programs' | 'intervals'

export type ProgramRef = {
  name: string
  start: LocalTime
  end: LocalTime
}

export type Evidence =
  | { kind: 'name'; store: StoreName; name: string }
  | { kind: 'program'; program: ProgramRef }
  | { kind: 'mismatch'; name: string; start: LocalTime; end: LocalTime; stored: number; expected: number }
  | { kind: 'overlap'; first: ProgramRef; second: ProgramRef }
  | { kind: 'discontinuity'; previous: ProgramRef; next: ProgramRef; offsetMinutes: number }
  | { kind: 'duplicate'; name: string; occurrences: number }
  | { kind: 'length'; store: StoreName; name: string; length: number }
  | { kind: 'invalid_time'; name: string; start: string; end: string; reason: string }

export type Finding = {
  category: CheckCategory
  check: CheckId
  description: string
  evidence: Evidence[]
}

export type CategoryResult = {
  category: CheckCategory
  valid: boolean
  errors: Finding[]
  warnings: Finding[]
}

export type ValidationSummary = {
  checksPerformed: number
  totalErrors: number
  totalWarnings: number
}

export type ValidationReport = {
  overallValid: boolean
  errors: Finding[]
  warnings: Finding[]
  summary: ValidationSummary
  categories: CategoryResult[]
}

/** Both stores as read for one validation run; programs ordered by start. */
export type ValidationSnapshot = {
  programs: Program[]
  records: IntervalRecord[]
  /** Program rows whose stored times do not parse. */
  malformed?: MalformedProgram[]
}

export type ValidatorOptions = Pick<
  IntervalsOptions,
  'maxNameLength' | 'expectContiguousSchedule' | 'suspiciousPatterns'
>

// ============================================================================
// Helpers
// ============================================================================

const NOON = 12 * 60

function ref(program: Program): ProgramRef {
  return { name: program.name, start: program.range.start, end: program.range.end }
}

function plural(n: number, singular: string, pluralForm = `${singular}s`): string {
  return `${n} ${n === 1 ? singular : pluralForm}`
}

function uniqueSorted(names: Iterable<string>): string[] {
  return [...new Set(names)].sort(compareStrings)
}

/** Names of every stored program row, readable or not. */
function programNames(snapshot: ValidationSnapshot): string[] {
  return [...snapshot.programs.map((p) => p.name), ...(snapshot.malformed ?? []).map((m) => m.name)]
}

function isBlank(name: string): boolean {
  return name.trim().length === 0
}

function finding(category: CheckCategory, check: CheckId, description: string, evidence: Evidence[]): Finding {
  return { category, check, description, evidence }
}

function categoryResult(category: CheckCategory, errors: Finding[], warnings: Finding[] = []): CategoryResult {
  return { category, valid: errors.length === 0, errors, warnings }
}

// ============================================================================
// 1. Referential Integrity
// ============================================================================

export function checkReferentialIntegrity(snapshot: ValidationSnapshot): CategoryResult {
  const category = CheckCategory.REFERENTIAL_INTEGRITY
  const names = programNames(snapshot)
  const stored = new Set(names)
  const recordNames = new Set(snapshot.records.map((r) => r.programName))
  const errors: Finding[] = []

  const missing = uniqueSorted(names.filter((n) => !recordNames.has(n)))
  if (missing.length > 0) {
    errors.push(finding(
      category, 'missing_interval_records',
      `Found ${plural(missing.length, 'program')} without interval records`,
      missing.map((name): Evidence => ({ kind: 'name', store: 'programs', name })),
    ))
  }

  const orphaned = uniqueSorted(snapshot.records.map((r) => r.programName).filter((n) => !stored.has(n)))
  if (orphaned.length > 0) {
    errors.push(finding(
      category, 'orphaned_interval_records',
      `Found ${plural(orphaned.length, 'orphaned interval record')}`,
      orphaned.map((name): Evidence => ({ kind: 'name', store: 'intervals', name })),
    ))
  }

  return categoryResult(category, errors)
}

// ============================================================================
// 2. Interval Calculations
// ============================================================================

export function checkIntervalCalculations(snapshot: ValidationSnapshot): CategoryResult {
  const category = CheckCategory.INTERVAL_CALCULATIONS
  const index = new Map(snapshot.records.map((r) => [r.programName, r]))
  const evidence: Evidence[] = []

  const byName = [...snapshot.programs].sort((a, b) => compareStrings(a.name, b.name) || compareByStart(a, b))
  for (const program of byName) {
    const record = index.get(program.name)
    if (!record) continue
    const expected = countIntervals(program.range)
    if (record.intervalCount !== expected) {
      evidence.push({
        kind: 'mismatch',
        name: program.name,
        start: program.range.start,
        end: program.range.end,
        stored: record.intervalCount,
        expected,
      })
    }
  }

  const errors = evidence.length === 0 ? [] : [finding(
    category, 'incorrect_interval_counts',
    `Found ${plural(evidence.length, 'program')} with incorrect interval calculations`,
    evidence,
  )]
  return categoryResult(category, errors)
}

// ============================================================================
// 3. Time Constraints
// ============================================================================

/**
 * Pairs of non-wrapping programs with A.start < B.end && A.end > B.start.
 * Programs are scanned in start order; the inner scan stops at the first
 * program starting at or after A's end.
 */
export function findOverlaps(programs: readonly Program[]): [Program, Program][] {
  const ordered = programs.filter((p) => !wrapsMidnight(p.range)).sort(compareByStart)
  const pairs: [Program, Program][] = []

  for (let i = 0; i < ordered.length; i++) {
    const a = ordered[i]
    if (!a) continue
    const aStart = toMinutes(a.range.start)
    const aEnd = toMinutes(a.range.end)
    for (let j = i + 1; j < ordered.length; j++) {
      const b = ordered[j]
      if (!b) continue
      if (toMinutes(b.range.start) >= aEnd) break
      if (aStart < toMinutes(b.range.end)) pairs.push([a, b])
    }
  }

  return pairs
}

/**
 * Consecutive programs (by start) where the next one does not begin exactly
 * where the previous one ends, including the wrap from the last program of
 * the day back to the first. Positive offsets are gaps, negative ones overlaps.
 */
export function findDiscontinuities(programs: readonly Program[]): Evidence[] {
  const ordered = [...programs].sort(compareByStart)
  const evidence: Evidence[] = []
  // A lone program has no neighbour to be discontinuous with.
  if (ordered.length < 2) return evidence

  for (let i = 0; i < ordered.length; i++) {
    const previous = ordered[i]
    const next = ordered[(i + 1) % ordered.length]
    if (!previous || !next) continue
    if (next.range.start === previous.range.end) continue
    let offsetMinutes = toMinutes(next.range.start) - toMinutes(previous.range.end)
    // The closing pair crosses midnight back to the first program of the day.
    if (i === ordered.length - 1 && offsetMinutes < 0 && !wrapsMidnight(previous.range)) {
      offsetMinutes += MINUTES_PER_DAY
    }
    evidence.push({ kind: 'discontinuity', previous: ref(previous), next: ref(next), offsetMinutes })
  }

  return evidence
}

export function checkTimeConstraints(snapshot: ValidationSnapshot, options: ValidatorOptions): CategoryResult {
  const category = CheckCategory.TIME_CONSTRAINTS
  const errors: Finding[] = []

  const malformed = snapshot.malformed ?? []
  if (malformed.length > 0) {
    errors.push(finding(
      category, 'invalid_times',
      `Found ${plural(malformed.length, 'program')} with invalid time values`,
      malformed.map(({ name, start, end, reason }): Evidence => ({ kind: 'invalid_time', name, start, end, reason })),
    ))
  }

  const overlaps = findOverlaps(snapshot.programs)
  if (overlaps.length > 0) {
    errors.push(finding(
      category, 'overlapping_programs',
      `Found ${plural(overlaps.length, 'overlapping program pair')}`,
      overlaps.map(([a, b]): Evidence => ({ kind: 'overlap', first: ref(a), second: ref(b) })),
    ))
  }

  if (options.expectContiguousSchedule) {
    const discontinuities = findDiscontinuities(snapshot.programs)
    if (discontinuities.length > 0) {
      errors.push(finding(
        category, 'schedule_discontinuities',
        `Found ${plural(discontinuities.length, 'gap or overlap', 'gaps or overlaps')} between consecutive programs`,
        discontinuities,
      ))
    }
  }

  return categoryResult(category, errors)
}

// ============================================================================
// 4. Data Quality
// ============================================================================

export function checkDataQuality(snapshot: ValidationSnapshot, options: ValidatorOptions): CategoryResult {
  const category = CheckCategory.DATA_QUALITY
  const errors: Finding[] = []
  const { maxNameLength } = options

  // Empty names, in either store
  const empty: Evidence[] = []
  for (const name of programNames(snapshot)) {
    if (isBlank(name)) empty.push({ kind: 'name', store: 'programs', name })
  }
  for (const record of snapshot.records) {
    if (isBlank(record.programName)) empty.push({ kind: 'name', store: 'intervals', name: record.programName })
  }
  if (empty.length > 0) {
    errors.push(finding(
      category, 'empty_names',
      `Found ${plural(empty.length, 'empty program name')}`,
      empty,
    ))
  }

  // Over-long names, in either store
  const long: Evidence[] = []
  for (const name of uniqueSorted(programNames(snapshot))) {
    if (name.length > maxNameLength) long.push({ kind: 'length', store: 'programs', name, length: name.length })
  }
  for (const name of uniqueSorted(snapshot.records.map((r) => r.programName))) {
    if (name.length > maxNameLength) long.push({ kind: 'length', store: 'intervals', name, length: name.length })
  }
  if (long.length > 0) {
    errors.push(finding(
      category, 'long_names',
      `Found ${plural(long.length, 'name')} exceeding ${maxNameLength} characters`,
      long,
    ))
  }

  // Duplicate names in the program store
  const occurrences = new Map<string, number>()
  for (const name of programNames(snapshot)) {
    occurrences.set(name, (occurrences.get(name) ?? 0) + 1)
  }
  const duplicates: Evidence[] = uniqueSorted(occurrences.keys())
    .map((name) => ({ name, count: occurrences.get(name) ?? 0 }))
    .filter(({ count }) => count > 1)
    .map(({ name, count }): Evidence => ({ kind: 'duplicate', name, occurrences: count }))
  if (duplicates.length > 0) {
    errors.push(finding(
      category, 'duplicate_names',
      `Found ${plural(duplicates.length, 'duplicate program name')}`,
      duplicates,
    ))
  }

  // Zero-duration programs
  const zero = snapshot.programs.filter((p) => isZeroLength(p.range))
  if (zero.length > 0) {
    errors.push(finding(
      category, 'zero_duration_programs',
      `Found ${plural(zero.length, 'zero-duration program')}`,
      zero.map((p): Evidence => ({ kind: 'program', program: ref(p) })),
    ))
  }

  return categoryResult(category, errors)
}

// ============================================================================
// 5. Business Rules (warnings only)
// ============================================================================

export function checkBusinessRules(snapshot: ValidationSnapshot, options: ValidatorOptions): CategoryResult {
  const category = CheckCategory.BUSINESS_RULES
  const warnings: Finding[] = []

  const suspicious = uniqueSorted(
    snapshot.programs
      .map((p) => p.name)
      .filter((name) => {
        const lower = name.toLowerCase()
        return options.suspiciousPatterns.some((pattern) => lower.includes(pattern))
      }),
  )
  if (suspicious.length > 0) {
    warnings.push(finding(
      category, 'suspicious_names',
      `Found ${plural(suspicious.length, 'program')} with suspicious names`,
      suspicious.map((name): Evidence => ({ kind: 'name', store: 'programs', name })),
    ))
  }

  // A wrapping range only reads as an overnight slot when it starts after
  // noon and ends before noon; otherwise the times were probably swapped.
  const reversed = snapshot.programs.filter((p) => {
    if (!wrapsMidnight(p.range)) return false
    return !(toMinutes(p.range.start) > NOON && toMinutes(p.range.end) < NOON)
  })
  if (reversed.length > 0) {
    warnings.push(finding(
      category, 'reversed_ranges',
      `Found ${plural(reversed.length, 'program')} whose end time precedes the start outside an overnight slot`,
      reversed.map((p): Evidence => ({ kind: 'program', program: ref(p) })),
    ))
  }

  const offGrid = snapshot.programs.filter(
    (p) => !isIntervalAligned(toMinutes(p.range.start)) || !isIntervalAligned(toMinutes(p.range.end)),
  )
  if (offGrid.length > 0) {
    warnings.push(finding(
      category, 'non_standard_slots',
      `Found ${plural(offGrid.length, 'program')} with non-standard time slots`,
      offGrid.map((p): Evidence => ({ kind: 'program', program: ref(p) })),
    ))
  }

  return categoryResult(category, [], warnings)
}

// ============================================================================
// Report Assembly
// ============================================================================

export function validateSnapshot(snapshot: ValidationSnapshot, options: ValidatorOptions): ValidationReport {
  const ordered: ValidationSnapshot = {
    programs: [...snapshot.programs].sort(compareByStart),
    records: [...snapshot.records].sort((a, b) => compareStrings(a.programName, b.programName)),
    malformed: [...(snapshot.malformed ?? [])].sort((a, b) => compareStrings(a.name, b.name) || compareStrings(a.id, b.id)),
  }

  const categories: CategoryResult[] = [
    checkReferentialIntegrity(ordered),
    checkTimeConstraints(ordered, options),
    checkIntervalCalculations(ordered),
    checkDataQuality(ordered, options),
    checkBusinessRules(ordered, options),
  ]

  const errors = categories.flatMap((c) => c.errors)
  const warnings = categories.flatMap((c) => c.warnings)

  return {
    overallValid: errors.length === 0,
    errors,
    warnings,
    summary: {
      checksPerformed: categories.length,
      totalErrors: errors.length,
      totalWarnings: warnings.length,
    },
    categories,
  }
}

// ============================================================================
// Factory
// ============================================================================

type IntegrityValidatorDeps = {
  programs: ProgramReader
  intervals: IntervalReader
  options: ValidatorOptions
}

export function createIntegrityValidator(deps: IntegrityValidatorDeps) {
  const { programs, intervals, options } = deps

  /** Stored times that do not parse become findings; only a failed read aborts. */
  async function readSnapshot(): Promise<ValidationSnapshot> {
    try {
      const [scan, records] = await Promise.all([
        programs.scan(),
        intervals.list(),
      ])
      return { programs: scan.programs, records, malformed: scan.malformed }
    } catch (e) {
      if (e instanceof StorageFailureError) throw e
      const detail = e instanceof Error ? e.message : String(e)
      throw new StorageFailureError(`Validation aborted, stores unreadable: ${detail}`, e)
    }
  }

  async function run(): Promise<ValidationReport> {
    return validateSnapshot(await readSnapshot(), options)
  }

  return { run, readSnapshot }
}

export type IntegrityValidator = ReturnType<typeof createIntegrityValidator>

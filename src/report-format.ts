/**
 * Report Formatting
 *
 * Plain-text rendering of a ValidationReport: banner, overall status,
 * one section per category with its findings, evidence and a remediation
 * hint for every category that reported something.
 */

import { formatRange } from './time-of-day'
import type {
  CheckCategory, Evidence, Finding, ProgramRef, ValidationReport,
} from './integrity-validator'

const RULE = '='.repeat(60)
const MAX_DISPLAYED_NAME = 40

export const REMEDIATION_HINTS: Record<CheckCategory, string> = {
  referential_integrity:
    'Delete orphaned interval records and re-insert programs missing a record through the synchronizer.',
  time_constraints:
    'Rewrite unreadable times as HH:MM, then move the listed programs so consecutive programs meet without overlapping.',
  interval_calculations:
    'Re-apply each listed program with its current range so the stored count is recomputed.',
  data_quality:
    'Rename blank, over-long or duplicate programs and give zero-duration programs a real end time.',
  business_rules:
    'Review the flagged programs; these rules only warn.',
}

// ============================================================================
// Evidence Lines
// ============================================================================

function showName(name: string): string {
  const shown = name.length > MAX_DISPLAYED_NAME ? `${name.slice(0, MAX_DISPLAYED_NAME)}...` : name
  return JSON.stringify(shown)
}

function showProgram(program: ProgramRef): string {
  return `${showName(program.name)} ${formatRange(program)}`
}

export function formatEvidence(evidence: Evidence): string {
  switch (evidence.kind) {
    case 'name':
      return `${showName(evidence.name)} in ${evidence.store}`
    case 'program':
      return showProgram(evidence.program)
    case 'mismatch':
      return `${showProgram(evidence)}: stored ${evidence.stored}, expected ${evidence.expected}`
    case 'overlap':
      return `${showProgram(evidence.first)} overlaps ${showProgram(evidence.second)}`
    case 'discontinuity': {
      const size = Math.abs(evidence.offsetMinutes)
      const what = evidence.offsetMinutes > 0 ? 'gap' : 'overlap'
      return `${showProgram(evidence.previous)} -> ${showProgram(evidence.next)} (${what} of ${size} min)`
    }
    case 'duplicate':
      return `${showName(evidence.name)} appears ${evidence.occurrences} times`
    case 'length':
      return `${showName(evidence.name)} (${evidence.length} chars) in ${evidence.store}`
    case 'invalid_time':
      return `${showName(evidence.name)} ${evidence.start}-${evidence.end}: ${evidence.reason}`
  }
}

function formatFindings(label: string, findings: Finding[]): string[] {
  if (findings.length === 0) return []
  const lines = [`  ${label}:`]
  for (const f of findings) {
    lines.push(`    - ${f.description}`)
    for (const e of f.evidence) {
      lines.push(`        * ${formatEvidence(e)}`)
    }
  }
  return lines
}

// ============================================================================
// Report
// ============================================================================

export function formatCategoryTitle(category: CheckCategory): string {
  return category.toUpperCase().replace(/_/g, ' ')
}

export function formatReport(report: ValidationReport): string {
  const { summary } = report
  const lines: string[] = [
    RULE,
    'DATA INTEGRITY VALIDATION REPORT',
    RULE,
    `Overall Status: ${report.overallValid ? 'PASS' : 'FAIL'}`,
    `Checks Performed: ${summary.checksPerformed}`,
    `Total Errors: ${summary.totalErrors}`,
    `Total Warnings: ${summary.totalWarnings}`,
    '',
  ]

  for (const result of report.categories) {
    lines.push(`${formatCategoryTitle(result.category)}:`)
    lines.push(`  Status: ${result.valid ? 'PASS' : 'FAIL'}`)
    lines.push(...formatFindings('Errors', result.errors))
    lines.push(...formatFindings('Warnings', result.warnings))
    if (!result.valid || result.warnings.length > 0) {
      lines.push(`  Remediation: ${REMEDIATION_HINTS[result.category]}`)
    }
    lines.push('')
  }

  lines.push(RULE)
  return lines.join('\n')
}

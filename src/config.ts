/**
 * Configuration
 *
 * Option schemas for the facade and the environment variables a host process
 * uses to open a SQLite-backed instance.
 */

import { z } from 'zod'
import { ConfigError } from './errors'

export { ConfigError } from './errors'

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MAX_NAME_LENGTH = 255

/** Lowercase substrings that flag a program name as suspicious. */
export const DEFAULT_SUSPICIOUS_PATTERNS: readonly string[] = [
  'drop', 'delete', 'insert', 'update', 'select', 'script',
  '--', ';', "'", '"',
]

/** Lowercase substrings that make an import reject a row outright. */
export const DEFAULT_REJECTED_IMPORT_PATTERNS: readonly string[] = [
  'drop', 'delete', 'insert', 'update', 'select', '--', ';',
]

// ============================================================================
// Schemas
// ============================================================================

export const IntervalsOptionsSchema = z.object({
  maxNameLength: z.number().int().positive().default(DEFAULT_MAX_NAME_LENGTH),
  expectContiguousSchedule: z.boolean().default(false),
  suspiciousPatterns: z
    .array(z.string().min(1))
    .default([...DEFAULT_SUSPICIOUS_PATTERNS])
    .transform((patterns) => patterns.map((p) => p.toLowerCase())),
  rejectedImportPatterns: z
    .array(z.string().min(1))
    .default([...DEFAULT_REJECTED_IMPORT_PATTERNS])
    .transform((patterns) => patterns.map((p) => p.toLowerCase())),
})

export type IntervalsOptions = z.output<typeof IntervalsOptionsSchema>
export type IntervalsOptionsInput = z.input<typeof IntervalsOptionsSchema>

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1')

const EnvSchema = z.object({
  PROGRAM_INTERVALS_DB_PATH: z.string().min(1).default(':memory:'),
  PROGRAM_INTERVALS_MAX_NAME_LENGTH: z.coerce.number().int().positive().default(DEFAULT_MAX_NAME_LENGTH),
  PROGRAM_INTERVALS_EXPECT_CONTIGUOUS: booleanFlag,
})

export type EnvConfig = {
  dbPath: string
  options: IntervalsOptions
}

// ============================================================================
// Parsing
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

export function resolveOptions(input: IntervalsOptionsInput = {}): IntervalsOptions {
  const parsed = IntervalsOptionsSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${describeIssues(parsed.error)}`)
  }
  return parsed.data
}

export function configFromEnv(env: Record<string, string | undefined>): EnvConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`)
  }
  const vars = parsed.data
  return {
    dbPath: vars.PROGRAM_INTERVALS_DB_PATH,
    options: resolveOptions({
      maxNameLength: vars.PROGRAM_INTERVALS_MAX_NAME_LENGTH,
      expectContiguousSchedule: vars.PROGRAM_INTERVALS_EXPECT_CONTIGUOUS,
    }),
  }
}

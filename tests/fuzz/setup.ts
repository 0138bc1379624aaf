/**
 * Vitest setup file.
 * Configures fast-check global defaults for the property tests.
 *
 *   FUZZ_RUNS=500   deeper runs
 *   FUZZ_SEED=1234  replay a reported failure
 */
import * as fc from 'fast-check'

function intFromEnv(name: string): number | undefined {
  const raw = process.env[name]
  if (raw === undefined || raw === '') return undefined
  const value = parseInt(raw, 10)
  return isNaN(value) ? undefined : value
}

const numRuns = intFromEnv('FUZZ_RUNS') ?? 50
const seed = intFromEnv('FUZZ_SEED')

fc.configureGlobal({
  numRuns,
  ...(seed !== undefined ? { seed } : {}),
})

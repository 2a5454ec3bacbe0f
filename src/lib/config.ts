import { z } from 'zod'
import { ConfigError } from './errors'

// =============================================================================
// Solver Options Schema
// =============================================================================

/** Heuristic values kept per run before the least recently used are evicted */
export const DEFAULT_CACHE_SIZE = 1 << 20

export const solverOptionsSchema = z
  .object({
    // 'parity' decides solvability up front; 'twin-race' searches the twin alongside
    strategy: z.enum(['parity', 'twin-race']).default('parity'),
    // 'parent' skips only the board just left; 'closed-set' skips every expanded board
    dedupe: z.enum(['parent', 'closed-set']).default('closed-set'),
    linearConflict: z.boolean().default(true),
    incremental: z.boolean().default(true),
    cacheSize: z.number().int().positive().default(DEFAULT_CACHE_SIZE),
  })
  .strict()

export type SolverOptions = z.infer<typeof solverOptionsSchema>
export type SolverOptionsInput = z.input<typeof solverOptionsSchema>

export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  strategy: 'parity',
  dedupe: 'closed-set',
  linearConflict: true,
  incremental: true,
  cacheSize: DEFAULT_CACHE_SIZE,
}

// =============================================================================
// Parsing Helpers
// =============================================================================

/**
 * Validates solver options and fills in defaults.
 *
 * @throws ConfigError listing every failed field as "path: message"
 */
export function parseSolverOptions(input: unknown = {}): SolverOptions {
  const result = solverOptionsSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    )
  }
  return result.data
}

/**
 * Command-line front end
 *
 * Usage: solve <puzzle-file> [--strategy parity|twin-race]
 *                            [--dedupe parent|closed-set]
 *                            [--no-linear-conflict] [--no-incremental]
 *                            [--cache-size <n>] [--verbose]
 */

import { Solver } from './ai/solver'
import { formatReport, loadPuzzle } from './game/puzzleFile'
import { parseSolverOptions, type SolverOptions } from './lib/config'
import { InvalidArgumentError } from './lib/errors'
import { logError } from './lib/errorUtils'

export const USAGE =
  'Usage: solve <puzzle-file> [--strategy parity|twin-race] [--dedupe parent|closed-set] ' +
  '[--no-linear-conflict] [--no-incremental] [--cache-size <n>] [--verbose]'

export interface CliArgs {
  file: string
  options: SolverOptions
  verbose: boolean
}

/**
 * Parses arguments (without the node and script paths).
 *
 * @throws InvalidArgumentError on an unknown flag, a missing value or a
 *   missing puzzle file
 * @throws ConfigError if an option value fails validation
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const raw: Record<string, unknown> = {}
  let file: string | undefined
  let verbose = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const takeValue = (): string => {
      const value = argv[++i]
      if (value === undefined) {
        throw new InvalidArgumentError(`Missing value for ${arg}`)
      }
      return value
    }

    switch (arg) {
      case '--strategy':
        raw.strategy = takeValue()
        break
      case '--dedupe':
        raw.dedupe = takeValue()
        break
      case '--no-linear-conflict':
        raw.linearConflict = false
        break
      case '--no-incremental':
        raw.incremental = false
        break
      case '--cache-size':
        raw.cacheSize = Number(takeValue())
        break
      case '--verbose':
        verbose = true
        break
      default:
        if (arg.startsWith('--')) {
          throw new InvalidArgumentError(`Unknown option ${arg}`)
        }
        if (file !== undefined) {
          throw new InvalidArgumentError(`Unexpected argument ${arg}`)
        }
        file = arg
    }
  }

  if (file === undefined) {
    throw new InvalidArgumentError(`Missing puzzle file. ${USAGE}`)
  }

  return { file, options: parseSolverOptions(raw), verbose }
}

/**
 * Runs the solver on a puzzle file and writes the report to stdout.
 *
 * @returns Process exit code: 0 once a report is printed, 1 on any error
 */
export async function main(argv: readonly string[]): Promise<number> {
  try {
    const { file, options, verbose } = parseCliArgs(argv)
    const initial = await loadPuzzle(file)
    const solver = new Solver(initial, options)

    process.stdout.write(formatReport(solver))

    if (verbose) {
      const stats = solver.stats()
      console.error(
        `[solve] ${solver.state()} with ${options.strategy}/${options.dedupe}: ` +
          `${stats.expanded} expanded, ${stats.generated} generated, ` +
          `frontier peak ${stats.maxFrontier}, cache ${stats.cacheHits} hits/${stats.cacheMisses} misses, ` +
          `${stats.elapsedMs}ms`
      )
    }
    return 0
  } catch (err) {
    logError('solve', err)
    return 1
  }
}

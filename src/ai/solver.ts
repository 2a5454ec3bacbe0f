/**
 * A* Solver for Sliding-Tile Puzzles
 *
 * Finds a minimum-move solution for a board, or proves that none exists.
 * The search runs to completion inside the constructor; the instance then
 * only reports the outcome.
 *
 * Solvability is decided by exactly one strategy per run:
 * - 'parity': the board's inversion-parity test, before any search
 * - 'twin-race': the board and its twin are searched from one shared
 *   frontier; whichever reaches the goal first decides. Exactly one of
 *   the two is solvable, so exactly one search can finish.
 */

import { Board } from '../game/board'
import { InvalidArgumentError } from '../lib/errors'
import { type SolverOptions, type SolverOptionsInput, parseSolverOptions } from '../lib/config'
import { HeuristicCache } from './heuristic'
import { PriorityFrontier } from './frontier'
import { SearchArena } from './searchTree'

// ============================================================================
// RESULT TYPES
// ============================================================================

export type SolverState = 'running' | 'solved' | 'infeasible'

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchStats {
  /** Nodes taken off the frontier and expanded */
  expanded: number
  /** Child nodes created */
  generated: number
  /** Largest frontier size during the run */
  maxFrontier: number
  /** Heuristic lookups answered from the cache */
  cacheHits: number
  /** Heuristic lookups that had to be computed */
  cacheMisses: number
  /** Wall-clock time of the run (ms) */
  elapsedMs: number
}

const EMPTY_STATS: SearchStats = {
  expanded: 0,
  generated: 0,
  maxFrontier: 0,
  cacheHits: 0,
  cacheMisses: 0,
  elapsedMs: 0,
}

// ============================================================================
// SOLVER
// ============================================================================

export class Solver {
  readonly options: SolverOptions
  private status: SolverState = 'running'
  private path: Board[] | null = null
  private searchStats: SearchStats = { ...EMPTY_STATS }

  /**
   * @param initial - Board to solve
   * @param options - Strategy, dedupe mode and heuristic settings
   * @throws InvalidArgumentError if no board is given
   * @throws ConfigError if the options are invalid
   */
  constructor(initial: Board | null | undefined, options: SolverOptionsInput = {}) {
    if (!initial) {
      throw new InvalidArgumentError('Cannot solve a missing initial board')
    }
    this.options = parseSolverOptions(options)
    this.run(initial)
  }

  /** True iff a solution was found */
  isSolvable(): boolean {
    return this.status === 'solved'
  }

  /** Minimum number of moves, or -1 if the board is unsolvable */
  moves(): number {
    return this.path === null ? -1 : this.path.length - 1
  }

  /** Boards from the initial board to the goal, or null if unsolvable */
  solution(): Board[] | null {
    return this.path === null ? null : [...this.path]
  }

  state(): SolverState {
    return this.status
  }

  stats(): SearchStats {
    return { ...this.searchStats }
  }

  // ==========================================================================
  // SEARCH
  // ==========================================================================

  private run(initial: Board): void {
    const startedAt = Date.now()
    const cache = new HeuristicCache({
      linearConflict: this.options.linearConflict,
      incremental: this.options.incremental,
      maxSize: this.options.cacheSize,
    })

    try {
      const root = initial.withCache(cache)

      if (this.options.strategy === 'parity' && !root.isSolvable()) {
        this.finish('infeasible', null)
        return
      }

      this.search(root)
    } finally {
      cache.clear()
      const { hits, misses } = cache.stats()
      this.searchStats.cacheHits = hits
      this.searchStats.cacheMisses = misses
      this.searchStats.elapsedMs = Date.now() - startedAt
    }
  }

  private search(root: Board): void {
    const arena = new SearchArena()
    const frontier = new PriorityFrontier()
    const useClosedSet = this.options.dedupe === 'closed-set'
    // Index 0: real search, index 1: twin search
    const closed = [new Set<string>(), new Set<string>()]

    const seed = (board: Board, twin: boolean): void => {
      const h = board.manhattan()
      const node = arena.add({ board, parent: null, g: 0, h, twin })
      frontier.push({ node, priority: h, h })
    }

    seed(root, false)
    if (this.options.strategy === 'twin-race') {
      seed(root.twin(), true)
    }

    for (let entry = frontier.pop(); entry !== undefined; entry = frontier.pop()) {
      const current = arena.get(entry.node)
      const expandedBoards = closed[current.twin ? 1 : 0]

      if (useClosedSet) {
        const key = current.board.key()
        if (expandedBoards.has(key)) continue
        expandedBoards.add(key)
      }

      if (current.board.isGoal()) {
        this.searchStats.maxFrontier = frontier.maxSize
        if (current.twin) {
          this.finish('infeasible', null)
        } else {
          this.finish('solved', arena.path(entry.node))
        }
        return
      }

      this.searchStats.expanded++
      const parentBoard = arena.parentBoard(entry.node)

      for (const board of current.board.neighbors()) {
        if (board.equals(parentBoard)) continue
        if (useClosedSet && expandedBoards.has(board.key())) continue

        const g = current.g + 1
        const h = board.manhattan()
        const node = arena.add({ board, parent: entry.node, g, h, twin: current.twin })
        frontier.push({ node, priority: g + h, h })
        this.searchStats.generated++
      }
    }

    // Unreachable: with a solvable root (parity) or a root/twin pair (race)
    // some goal is always popped
    throw new Error('Search frontier exhausted without reaching a goal')
  }

  private finish(state: Exclude<SolverState, 'running'>, path: Board[] | null): void {
    if (this.status !== 'running') {
      throw new Error(`Solver already finished as ${this.status}`)
    }
    this.status = state
    this.path = path
  }
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Gets a human-readable description of the solver outcome.
 */
export function describeSolverResult(solver: Solver): string {
  switch (solver.state()) {
    case 'solved': {
      const moves = solver.moves()
      return moves === 0 ? 'Already solved' : `Solvable in ${moves} move${moves === 1 ? '' : 's'}`
    }
    case 'infeasible':
      return 'Unsolvable: tile parity cannot reach the goal'
    default:
      return 'Search in progress'
  }
}

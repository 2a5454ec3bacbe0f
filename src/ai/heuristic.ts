/**
 * Distance Heuristics for the Sliding-Tile Solver
 *
 * Manhattan distance with the linear-conflict correction, plus a per-run
 * cache keyed by board content.
 *
 * Linear conflict: within a row, the tiles whose goal is that row must end
 * up in goal order. If only an increasing subsequence of them can stay put,
 * every other one has to step out of the row and back (2 extra moves).
 * The same holds for columns, in the other dimension, so the two passes
 * add up. Counting `k - LIS` per line rather than every inverted pair keeps
 * the estimate admissible when three or more tiles are mutually inverted.
 *
 * A single move changes the moved tile's Manhattan distance by exactly 1
 * and the conflict term of at most two lines by 0 or 2 in total, in the
 * same direction, so the heuristic changes by exactly 1 per move.
 */

import type { Board } from '../game/board'
import { LRUCache, type CacheStats } from '../lib/cache'

// ============================================================================
// TYPES
// ============================================================================

/**
 * How a board was derived from its parent: the tile at `from` slid into
 * the parent's blank at `to`. Only recorded once the parent's value is known.
 */
export interface Derivation {
  parentCells: readonly number[]
  parentEstimate: number
  from: number
  to: number
}

export interface HeuristicOptions {
  /** Add the linear-conflict correction to the Manhattan sum */
  linearConflict: boolean
  /** Update from the parent's value instead of rescanning the board */
  incremental: boolean
}

export interface HeuristicCacheOptions extends HeuristicOptions {
  /** Maximum number of board values kept */
  maxSize: number
}

export const DEFAULT_HEURISTIC_CACHE_OPTIONS: HeuristicCacheOptions = {
  linearConflict: true,
  incremental: true,
  maxSize: 1 << 20,
}

type Axis = 'row' | 'column'

// ============================================================================
// FULL EVALUATION
// ============================================================================

/**
 * Manhattan distance of one tile from its goal cell.
 */
export function tileDistance(tile: number, index: number, n: number): number {
  if (tile === 0) return 0
  const goal = tile - 1
  return (
    Math.abs(Math.floor(goal / n) - Math.floor(index / n)) + Math.abs((goal % n) - (index % n))
  )
}

/**
 * Sum of Manhattan distances of every non-blank tile.
 */
export function manhattanDistance(cells: readonly number[], n: number): number {
  let sum = 0
  for (let i = 0; i < cells.length; i++) {
    sum += tileDistance(cells[i], i, n)
  }
  return sum
}

/**
 * Conflict correction for a single row or column.
 */
export function lineConflict(cells: readonly number[], n: number, axis: Axis, line: number): number {
  const order: number[] = []

  for (let k = 0; k < n; k++) {
    const index = axis === 'row' ? line * n + k : k * n + line
    const tile = cells[index]
    if (tile === 0) continue

    const goal = tile - 1
    if (axis === 'row' && Math.floor(goal / n) === line) {
      order.push(goal % n)
    } else if (axis === 'column' && goal % n === line) {
      order.push(Math.floor(goal / n))
    }
  }

  return 2 * (order.length - longestIncreasingSubsequence(order))
}

/**
 * Conflict correction summed over every row and every column.
 */
export function linearConflicts(cells: readonly number[], n: number): number {
  let total = 0
  for (let line = 0; line < n; line++) {
    total += lineConflict(cells, n, 'row', line)
    total += lineConflict(cells, n, 'column', line)
  }
  return total
}

/**
 * Length of the longest strictly increasing subsequence (patience sorting).
 */
function longestIncreasingSubsequence(values: readonly number[]): number {
  const tails: number[] = []
  for (const value of values) {
    let low = 0
    let high = tails.length
    while (low < high) {
      const mid = (low + high) >>> 1
      if (tails[mid] < value) {
        low = mid + 1
      } else {
        high = mid
      }
    }
    tails[low] = value
  }
  return tails.length
}

// ============================================================================
// INCREMENTAL UPDATE
// ============================================================================

/**
 * Change in the heuristic when the tile at `from` slides into the blank at
 * `to`. Only the moved tile's distance and the two lines it crosses can
 * change: a horizontal move leaves every row's tile order intact, a
 * vertical move every column's.
 *
 * @param before - Cells prior to the move
 * @param after - Cells after the move
 */
export function moveDelta(
  before: readonly number[],
  after: readonly number[],
  n: number,
  from: number,
  to: number,
  linearConflict: boolean
): number {
  const tile = before[from]
  let delta = tileDistance(tile, to, n) - tileDistance(tile, from, n)

  if (!linearConflict) return delta

  const horizontal = Math.floor(from / n) === Math.floor(to / n)
  const axis: Axis = horizontal ? 'column' : 'row'
  const lines = horizontal ? [from % n, to % n] : [Math.floor(from / n), Math.floor(to / n)]

  for (const line of lines) {
    delta += lineConflict(after, n, axis, line) - lineConflict(before, n, axis, line)
  }

  return delta
}

/**
 * Heuristic value of a board, from its parent when a derivation is known
 * and incremental updates are on, otherwise by a full scan.
 */
export function estimateDistance(
  board: Board,
  options: HeuristicOptions,
  origin?: Derivation
): number {
  const n = board.dimension()

  if (origin && options.incremental) {
    const { parentCells, parentEstimate, from, to } = origin
    return parentEstimate + moveDelta(parentCells, board.cells, n, from, to, options.linearConflict)
  }

  const base = manhattanDistance(board.cells, n)
  return options.linearConflict ? base + linearConflicts(board.cells, n) : base
}

// ============================================================================
// CACHE
// ============================================================================

/**
 * Memoizes heuristic values by board content for one solver run.
 *
 * Boards hold a handle to the cache they were built with; the solver owns
 * the cache and clears it when the run ends.
 *
 * @example
 * const cache = new HeuristicCache({ linearConflict: false })
 * const board = Board.fromGrid([[1, 2], [0, 3]], { cache })
 * board.manhattan() // 1
 */
export class HeuristicCache {
  readonly options: HeuristicCacheOptions
  private readonly values: LRUCache<string, number>

  constructor(options: Partial<HeuristicCacheOptions> = {}) {
    this.options = { ...DEFAULT_HEURISTIC_CACHE_OPTIONS, ...options }
    this.values = new LRUCache(this.options.maxSize)
  }

  /**
   * Cached value for the board's content, computing and storing it on a miss.
   */
  estimate(board: Board, origin?: Derivation): number {
    const key = board.key()
    const cached = this.values.get(key)
    if (cached !== undefined) {
      return cached
    }

    const value = estimateDistance(board, this.options, origin)
    this.values.set(key, value)
    return value
  }

  /** Whether a value for this board's content is currently stored */
  has(board: Board): boolean {
    return this.values.has(board.key())
  }

  /** Drops every stored value; hit and miss counts survive */
  clear(): void {
    this.values.clear()
  }

  stats(): CacheStats {
    return this.values.stats()
  }
}

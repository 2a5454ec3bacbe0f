/**
 * Sliding-Tile Board
 *
 * An immutable snapshot of an N-by-N sliding puzzle. Tiles are stored
 * row-major; label 0 is the blank. The goal arrangement is 1..N²-1
 * followed by the blank in the last cell.
 *
 * Boards never change after construction. Moving the blank, swapping for
 * the twin, or rebinding a heuristic cache always produces a new Board.
 */

import { IndexOutOfRangeError, InvalidBoardError } from '../lib/errors'
import {
  type Derivation,
  type HeuristicCache,
  estimateDistance,
  linearConflicts,
  manhattanDistance,
} from '../ai/heuristic'

/** Smallest side length a board may have */
export const MIN_DIMENSION = 2

/**
 * Options accepted by the board factories.
 */
export interface BoardOptions {
  /**
   * Heuristic cache consulted by `manhattan()`. Boards derived from this
   * one (neighbours, twin) share the same cache.
   */
  cache?: HeuristicCache
}

interface BoardInit {
  n: number
  cells: readonly number[]
  blank: number
  cache: HeuristicCache | undefined
  origin: Derivation | undefined
}

export class Board {
  /** Row-major tile labels (frozen) */
  readonly cells: readonly number[]

  private readonly n: number
  private readonly blank: number
  private readonly cache: HeuristicCache | undefined
  // Cleared once the heuristic has been computed
  private origin: Derivation | undefined
  private estimate: number | undefined
  private cachedKey: string | undefined

  private constructor(init: BoardInit) {
    this.n = init.n
    this.cells = Object.freeze(init.cells)
    this.blank = init.blank
    this.cache = init.cache
    this.origin = init.origin
  }

  // ==========================================================================
  // FACTORIES
  // ==========================================================================

  /**
   * Builds a board from an N-by-N grid (grid[row][col]).
   *
   * @throws InvalidBoardError if the grid is not square, is smaller than
   *   2x2, or is not a permutation of 0..N²-1
   */
  static fromGrid(grid: readonly (readonly number[])[], options: BoardOptions = {}): Board {
    const n = grid.length
    if (n < MIN_DIMENSION) {
      throw new InvalidBoardError(`Board side length must be at least ${MIN_DIMENSION}, got ${n}`)
    }

    grid.forEach((row, r) => {
      if (row.length !== n) {
        throw new InvalidBoardError(
          `Board must be square: row ${r + 1} has ${row.length} tiles, expected ${n}`
        )
      }
    })

    return Board.fromTiles(n, grid.flat(), options)
  }

  /**
   * Builds a board from a side length and N² row-major labels.
   *
   * @throws InvalidBoardError on a bad side length, tile count or label set
   */
  static fromTiles(n: number, tiles: readonly number[], options: BoardOptions = {}): Board {
    if (!Number.isInteger(n) || n < MIN_DIMENSION) {
      throw new InvalidBoardError(`Board side length must be at least ${MIN_DIMENSION}, got ${n}`)
    }

    const size = n * n
    if (tiles.length !== size) {
      throw new InvalidBoardError(`Expected ${size} tiles for a ${n}x${n} board, got ${tiles.length}`)
    }

    const seen = new Array<boolean>(size).fill(false)
    let blank = -1

    tiles.forEach((tile, index) => {
      if (!Number.isInteger(tile) || tile < 0 || tile >= size) {
        throw new InvalidBoardError(`Tile ${tile} at position ${index + 1} is outside 0..${size - 1}`)
      }
      if (seen[tile]) {
        throw new InvalidBoardError(
          tile === 0 ? 'Board has more than one blank' : `Tile ${tile} appears more than once`
        )
      }
      seen[tile] = true
      if (tile === 0) blank = index
    })

    // n² distinct labels from 0..n²-1 always include the blank
    return new Board({ n, cells: [...tiles], blank, cache: options.cache, origin: undefined })
  }

  /**
   * The solved board of side n.
   */
  static goal(n: number, options: BoardOptions = {}): Board {
    const size = n * n
    const tiles = Array.from({ length: size }, (_, i) => (i === size - 1 ? 0 : i + 1))
    return Board.fromTiles(n, tiles, options)
  }

  /**
   * Same tiles, bound to a different heuristic cache.
   */
  withCache(cache: HeuristicCache | undefined): Board {
    return new Board({ n: this.n, cells: this.cells, blank: this.blank, cache, origin: undefined })
  }

  // ==========================================================================
  // ACCESSORS
  // ==========================================================================

  dimension(): number {
    return this.n
  }

  /**
   * Tile label at 1-based (row, col).
   *
   * @throws IndexOutOfRangeError if either coordinate is outside [1, N]
   */
  tileAt(row: number, col: number): number {
    if (!Number.isInteger(row) || row < 1 || row > this.n) {
      throw new IndexOutOfRangeError(`Row ${row} is outside 1..${this.n}`)
    }
    if (!Number.isInteger(col) || col < 1 || col > this.n) {
      throw new IndexOutOfRangeError(`Column ${col} is outside 1..${this.n}`)
    }
    return this.cells[(row - 1) * this.n + (col - 1)]
  }

  /** Row-major index of the blank */
  blankIndex(): number {
    return this.blank
  }

  /** Copy of the row-major labels */
  tiles(): number[] {
    return [...this.cells]
  }

  /** Copy of the labels as a grid (grid[row][col]) */
  rows(): number[][] {
    return Array.from({ length: this.n }, (_, r) => this.cells.slice(r * this.n, (r + 1) * this.n))
  }

  /**
   * Content key: equal boards have equal keys.
   */
  key(): string {
    if (this.cachedKey === undefined) {
      this.cachedKey = this.cells.join(',')
    }
    return this.cachedKey
  }

  // ==========================================================================
  // DISTANCES
  // ==========================================================================

  /**
   * Number of tiles (excluding the blank) not in their goal position.
   */
  hamming(): number {
    let count = 0
    for (let i = 0; i < this.cells.length; i++) {
      if (i !== this.blank && this.cells[i] !== i + 1) count++
    }
    return count
  }

  /** Plain sum of Manhattan distances, without the conflict correction */
  manhattanDistance(): number {
    return manhattanDistance(this.cells, this.n)
  }

  /** The linear-conflict correction term alone */
  linearConflicts(): number {
    return linearConflicts(this.cells, this.n)
  }

  /**
   * Search heuristic: Manhattan distance plus the linear-conflict
   * correction (unless the bound cache disables it).
   *
   * Computed once per board. With a cache, equal boards share one value
   * and a board derived by a single move from a board whose value was
   * already known is updated from that value.
   */
  manhattan(): number {
    if (this.estimate === undefined) {
      const origin = this.origin
      this.origin = undefined
      this.estimate = this.cache
        ? this.cache.estimate(this, origin)
        : estimateDistance(this, { linearConflict: true, incremental: true }, origin)
    }
    return this.estimate
  }

  // ==========================================================================
  // GOAL AND SOLVABILITY
  // ==========================================================================

  isGoal(): boolean {
    if (this.blank !== this.cells.length - 1) return false
    for (let i = 0; i < this.blank; i++) {
      if (this.cells[i] !== i + 1) return false
    }
    return true
  }

  /**
   * Inversion-parity test.
   *
   * Odd N: solvable iff the inversion count is even.
   * Even N: solvable iff (inversions even) XOR (blank row, counted 1-based
   * from the bottom, is even).
   */
  isSolvable(): boolean {
    const inversions = this.inversions()
    if (this.n % 2 === 1) {
      return inversions % 2 === 0
    }
    const blankRowFromBottom = this.n - Math.floor(this.blank / this.n)
    return (inversions % 2 === 0) !== (blankRowFromBottom % 2 === 0)
  }

  /**
   * Pairs of tiles out of ascending order, reading row-major and ignoring
   * the blank.
   */
  inversions(): number {
    let count = 0
    for (let i = 0; i < this.cells.length; i++) {
      const a = this.cells[i]
      if (a === 0) continue
      for (let j = i + 1; j < this.cells.length; j++) {
        const b = this.cells[j]
        if (b !== 0 && a > b) count++
      }
    }
    return count
  }

  // ==========================================================================
  // DERIVED BOARDS
  // ==========================================================================

  /**
   * The board with the first horizontally adjacent pair of non-blank
   * tiles (row-major scan) exchanged. Flips solvability.
   */
  twin(): Board {
    for (let r = 0; r < this.n; r++) {
      for (let c = 0; c < this.n - 1; c++) {
        const i = r * this.n + c
        if (i === this.blank || i + 1 === this.blank) continue
        const cells = [...this.cells]
        cells[i] = this.cells[i + 1]
        cells[i + 1] = this.cells[i]
        return new Board({ n: this.n, cells, blank: this.blank, cache: this.cache, origin: undefined })
      }
    }
    // The blank sits in a single row, so any other row has a pair
    throw new Error(`No swappable pair on a ${this.n}x${this.n} board`)
  }

  /**
   * Boards reachable by sliding one tile into the blank, in the order
   * up, down, left, right (relative to the blank).
   */
  neighbors(): Board[] {
    const row = Math.floor(this.blank / this.n)
    const col = this.blank % this.n
    const result: Board[] = []

    if (row > 0) result.push(this.slide(this.blank - this.n))
    if (row < this.n - 1) result.push(this.slide(this.blank + this.n))
    if (col > 0) result.push(this.slide(this.blank - 1))
    if (col < this.n - 1) result.push(this.slide(this.blank + 1))

    return result
  }

  /**
   * Moves the tile at `from` (orthogonally adjacent to the blank) into the blank.
   */
  private slide(from: number): Board {
    const cells = [...this.cells]
    cells[this.blank] = this.cells[from]
    cells[from] = 0
    return new Board({
      n: this.n,
      cells,
      blank: from,
      cache: this.cache,
      origin:
        this.estimate === undefined
          ? undefined
          : { parentCells: this.cells, parentEstimate: this.estimate, from, to: this.blank },
    })
  }

  // ==========================================================================
  // EQUALITY AND RENDERING
  // ==========================================================================

  /**
   * Value equality: same side length and the same label in every cell.
   */
  equals(other: Board | null | undefined): boolean {
    if (!other) return false
    if (other === this) return true
    if (other.n !== this.n || other.blank !== this.blank) return false
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false
    }
    return true
  }

  /**
   * N on the first line, then one line per row with each label
   * right-aligned to two characters and followed by a space.
   */
  toString(): string {
    const lines = [String(this.n)]
    for (const row of this.rows()) {
      lines.push(row.map((tile) => `${tile.toString().padStart(2)} `).join(''))
    }
    return lines.join('\n') + '\n'
  }
}

/**
 * Random walk of blank moves from `board`, never immediately undoing the
 * previous move. The result is reachable from `board`, so a scramble of
 * the goal is always solvable.
 *
 * @param random - Source of numbers in [0, 1) (default Math.random)
 */
export function scramble(board: Board, steps: number, random: () => number = Math.random): Board {
  let current = board
  let previousBlank = -1

  for (let step = 0; step < steps; step++) {
    const candidates = current.neighbors().filter((next) => next.blankIndex() !== previousBlank)
    const next = candidates[Math.min(Math.floor(random() * candidates.length), candidates.length - 1)]
    previousBlank = current.blankIndex()
    current = next
  }

  return current
}

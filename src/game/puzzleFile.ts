/**
 * Puzzle text format
 *
 * Input: whitespace-separated integers. The first is the side length N,
 * followed by N² tile labels in row-major order (0 = blank). Tokens after
 * the last tile are ignored.
 *
 * Output: the solver report printed by the CLI.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { Board, type BoardOptions, MIN_DIMENSION } from './board'
import { InvalidBoardError } from '../lib/errors'
import type { Solver } from '../ai/solver'

export const NO_SOLUTION_MESSAGE = 'No solution possible'

const integerTokenSchema = z
  .string()
  .regex(/^[+-]?\d+$/, 'must be an integer')
  .transform((token) => Number(token))

function readInteger(token: string, label: string): number {
  const result = integerTokenSchema.safeParse(token)
  if (!result.success) {
    throw new InvalidBoardError(`Expected an integer for ${label}, got "${token}"`)
  }
  return result.data
}

/**
 * Parses puzzle text into a board.
 *
 * @throws InvalidBoardError on missing or non-integer tokens, or any
 *   label-set problem the board itself rejects
 */
export function parsePuzzle(text: string, options: BoardOptions = {}): Board {
  const tokens = text.split(/\s+/).filter((token) => token.length > 0)
  if (tokens.length === 0) {
    throw new InvalidBoardError('Puzzle is empty')
  }

  const n = readInteger(tokens[0], 'the side length')
  if (n < MIN_DIMENSION) {
    throw new InvalidBoardError(`Board side length must be at least ${MIN_DIMENSION}, got ${n}`)
  }

  const size = n * n
  if (tokens.length < size + 1) {
    throw new InvalidBoardError(
      `Expected ${size} tiles after the side length, found ${tokens.length - 1}`
    )
  }

  const tiles = tokens.slice(1, size + 1).map((token, i) => readInteger(token, `tile ${i + 1}`))
  return Board.fromTiles(n, tiles, options)
}

/**
 * Reads and parses a puzzle file.
 */
export async function loadPuzzle(path: string, options: BoardOptions = {}): Promise<Board> {
  const text = await readFile(path, 'utf8')
  return parsePuzzle(text, options)
}

/**
 * Report for a finished solver: either the no-solution line, or the move
 * count followed by every board on the solution path, each followed by a
 * blank line.
 */
export function formatReport(solver: Solver): string {
  const boards = solver.solution()
  if (boards === null) {
    return `${NO_SOLUTION_MESSAGE}\n`
  }

  const lines = [`Minimum number of moves = ${solver.moves()}\n`]
  for (const board of boards) {
    lines.push(`${board.toString()}\n`)
  }
  return lines.join('')
}

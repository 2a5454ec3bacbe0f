import { describe, it, expect } from 'vitest'
import { Board, scramble } from './board'
import { IndexOutOfRangeError, InvalidBoardError } from '../lib/errors'

const GOAL_3 = [
  [1, 2, 3],
  [4, 5, 6],
  [7, 8, 0],
]

describe('Board', () => {
  describe('construction', () => {
    it('builds a board from a square grid', () => {
      const board = Board.fromGrid(GOAL_3)
      expect(board.dimension()).toBe(3)
      expect(board.blankIndex()).toBe(8)
      expect(board.tiles()).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 0])
    })

    it('rejects a non-square grid', () => {
      expect(() => Board.fromGrid([[1, 2], [3]])).toThrow(InvalidBoardError)
      expect(() => Board.fromGrid([[1, 2], [3]])).toThrow(
        'Board must be square: row 2 has 1 tiles, expected 2'
      )
    })

    it('rejects side lengths below 2', () => {
      expect(() => Board.fromGrid([[0]])).toThrow('Board side length must be at least 2, got 1')
      expect(() => Board.fromGrid([])).toThrow(InvalidBoardError)
    })

    it('rejects a wrong tile count', () => {
      expect(() => Board.fromTiles(2, [1, 2, 0])).toThrow('Expected 4 tiles for a 2x2 board, got 3')
    })

    it('rejects duplicate tiles', () => {
      expect(() => Board.fromTiles(2, [1, 3, 3, 0])).toThrow('Tile 3 appears more than once')
    })

    it('rejects a second blank', () => {
      expect(() => Board.fromTiles(2, [0, 1, 2, 0])).toThrow('Board has more than one blank')
    })

    it('rejects labels out of range', () => {
      expect(() => Board.fromTiles(2, [1, 2, 4, 0])).toThrow('Tile 4 at position 3 is outside 0..3')
      expect(() => Board.fromTiles(2, [1, -2, 3, 0])).toThrow(InvalidBoardError)
      expect(() => Board.fromTiles(2, [1, 2.5, 3, 0])).toThrow(InvalidBoardError)
    })

    it('builds the goal board', () => {
      expect(Board.goal(2).tiles()).toEqual([1, 2, 3, 0])
      expect(Board.goal(4).isGoal()).toBe(true)
    })
  })

  describe('immutability', () => {
    it('copies its input', () => {
      const tiles = [1, 2, 3, 0]
      const board = Board.fromTiles(2, tiles)
      tiles[0] = 3
      tiles[2] = 1
      expect(board.tiles()).toEqual([1, 2, 3, 0])
    })

    it('hands out copies and freezes its cells', () => {
      const board = Board.fromGrid(GOAL_3)
      board.tiles()[0] = 9
      board.rows()[0][0] = 9
      expect(board.tileAt(1, 1)).toBe(1)
      expect(Object.isFrozen(board.cells)).toBe(true)
    })

    it('does not change when neighbours are generated', () => {
      const board = Board.fromGrid(GOAL_3)
      board.neighbors()
      board.twin()
      expect(board.isGoal()).toBe(true)
    })
  })

  describe('tileAt', () => {
    it('uses 1-based coordinates', () => {
      const board = Board.fromGrid(GOAL_3)
      expect(board.tileAt(1, 1)).toBe(1)
      expect(board.tileAt(2, 3)).toBe(6)
      expect(board.tileAt(3, 3)).toBe(0)
    })

    it('throws outside [1, N]', () => {
      const board = Board.fromGrid(GOAL_3)
      expect(() => board.tileAt(0, 1)).toThrow(IndexOutOfRangeError)
      expect(() => board.tileAt(1, 4)).toThrow('Column 4 is outside 1..3')
      expect(() => board.tileAt(4, 1)).toThrow('Row 4 is outside 1..3')
    })
  })

  describe('distances', () => {
    it('is zero everywhere for the goal', () => {
      const board = Board.fromGrid(GOAL_3)
      expect(board.hamming()).toBe(0)
      expect(board.manhattan()).toBe(0)
      expect(board.isGoal()).toBe(true)
    })

    it('scores a board one move from the goal', () => {
      const board = Board.fromGrid([
        [1, 2, 3],
        [4, 5, 6],
        [7, 0, 8],
      ])
      expect(board.hamming()).toBe(1)
      expect(board.manhattan()).toBe(1)
      expect(board.isGoal()).toBe(false)
    })

    it('computes hamming and manhattan for a scattered board', () => {
      const board = Board.fromGrid([
        [8, 1, 3],
        [4, 0, 2],
        [7, 6, 5],
      ])
      expect(board.hamming()).toBe(5)
      expect(board.manhattanDistance()).toBe(10)
      expect(board.linearConflicts()).toBe(0)
      expect(board.manhattan()).toBe(10)
    })

    it('adds the linear-conflict correction', () => {
      const board = Board.fromTiles(3, [2, 1, 3, 4, 5, 6, 7, 8, 0])
      expect(board.manhattanDistance()).toBe(2)
      expect(board.linearConflicts()).toBe(2)
      expect(board.manhattan()).toBe(4)
    })

    it('is not the goal when only the blank is misplaced', () => {
      const board = Board.fromTiles(2, [0, 1, 2, 3])
      expect(board.isGoal()).toBe(false)
    })
  })

  describe('isSolvable', () => {
    it('uses inversion parity for odd N', () => {
      const solvable = Board.fromGrid([
        [8, 1, 3],
        [4, 0, 2],
        [7, 6, 5],
      ])
      expect(solvable.inversions()).toBe(12)
      expect(solvable.isSolvable()).toBe(true)

      const unsolvable = Board.fromGrid([
        [1, 8, 3],
        [4, 0, 2],
        [7, 6, 5],
      ])
      expect(unsolvable.inversions()).toBe(11)
      expect(unsolvable.isSolvable()).toBe(false)
    })

    it('combines inversions with the blank row for even N', () => {
      // blank in the bottom row (row 1 from the bottom), no inversions
      expect(Board.fromTiles(2, [1, 2, 3, 0]).isSolvable()).toBe(true)
      expect(Board.fromTiles(2, [1, 2, 0, 3]).isSolvable()).toBe(true)
      // blank one row up (row 2 from the bottom), one inversion
      expect(Board.fromTiles(2, [1, 0, 3, 2]).isSolvable()).toBe(true)
      expect(Board.fromTiles(2, [2, 1, 3, 0]).isSolvable()).toBe(false)
      expect(Board.fromTiles(2, [1, 0, 2, 3]).isSolvable()).toBe(false)
    })

    it('agrees with the goal for every size', () => {
      for (let n = 2; n <= 6; n++) {
        expect(Board.goal(n).isSolvable()).toBe(true)
      }
    })
  })

  describe('twin', () => {
    it('swaps the first pair in the first row', () => {
      expect(Board.fromGrid(GOAL_3).twin().tiles()).toEqual([2, 1, 3, 4, 5, 6, 7, 8, 0])
    })

    it('skips pairs that include the blank', () => {
      const blankFirst = Board.fromTiles(3, [0, 1, 3, 4, 2, 5, 7, 8, 6])
      expect(blankFirst.twin().tiles()).toEqual([0, 3, 1, 4, 2, 5, 7, 8, 6])

      const blankMiddle = Board.fromTiles(3, [1, 0, 3, 4, 2, 5, 7, 8, 6])
      expect(blankMiddle.twin().tiles()).toEqual([1, 0, 3, 2, 4, 5, 7, 8, 6])
    })

    it('never moves the blank', () => {
      const board = Board.fromTiles(2, [0, 1, 2, 3])
      const twin = board.twin()
      expect(twin.blankIndex()).toBe(0)
      expect(twin.tiles()).toEqual([0, 1, 3, 2])
    })

    it('flips solvability', () => {
      const boards = [
        Board.fromGrid(GOAL_3),
        Board.fromTiles(3, [8, 1, 3, 4, 0, 2, 7, 6, 5]),
        Board.fromTiles(3, [1, 8, 3, 4, 0, 2, 7, 6, 5]),
        Board.goal(4),
        Board.fromTiles(4, [1, 2, 3, 4, 5, 6, 0, 8, 9, 10, 7, 11, 13, 14, 15, 12]),
      ]
      for (const board of boards) {
        expect(board.twin().isSolvable()).toBe(!board.isSolvable())
      }
    })

    it('is undone by taking the twin again', () => {
      const board = Board.fromTiles(3, [8, 1, 3, 4, 0, 2, 7, 6, 5])
      expect(board.twin().twin().equals(board)).toBe(true)
    })
  })

  describe('neighbors', () => {
    it('enumerates up, down, left, right for a centre blank', () => {
      const board = Board.fromTiles(3, [1, 2, 3, 4, 0, 5, 6, 7, 8])
      expect(board.neighbors().map((b) => b.tiles())).toEqual([
        [1, 0, 3, 4, 2, 5, 6, 7, 8],
        [1, 2, 3, 4, 7, 5, 6, 0, 8],
        [1, 2, 3, 0, 4, 5, 6, 7, 8],
        [1, 2, 3, 4, 5, 0, 6, 7, 8],
      ])
    })

    it('has two neighbours in a corner', () => {
      const neighbors = Board.goal(2).neighbors()
      expect(neighbors.map((b) => b.tiles())).toEqual([
        [1, 0, 3, 2],
        [1, 2, 0, 3],
      ])
    })

    it('has three neighbours on an edge', () => {
      const board = Board.fromTiles(3, [1, 2, 3, 4, 5, 6, 7, 0, 8])
      expect(board.neighbors()).toHaveLength(3)
    })

    it('moves exactly one tile into the blank', () => {
      const board = Board.fromTiles(3, [8, 1, 3, 4, 0, 2, 7, 6, 5])
      for (const neighbor of board.neighbors()) {
        const changed = board.tiles().filter((tile, i) => tile !== neighbor.cells[i])
        expect(changed).toHaveLength(2)
        expect(changed).toContain(0)
      }
    })
  })

  describe('equality', () => {
    it('compares by content', () => {
      const a = Board.fromGrid(GOAL_3)
      const b = Board.fromTiles(3, [1, 2, 3, 4, 5, 6, 7, 8, 0])
      expect(a).not.toBe(b)
      expect(a.equals(b)).toBe(true)
      expect(a.key()).toBe(b.key())
    })

    it('distinguishes different boards', () => {
      const a = Board.fromGrid(GOAL_3)
      expect(a.equals(a.twin())).toBe(false)
      expect(a.equals(Board.goal(2))).toBe(false)
      expect(a.equals(null)).toBe(false)
      expect(a.equals(undefined)).toBe(false)
    })

    it('treats a neighbour of a neighbour as the original', () => {
      const board = Board.fromGrid(GOAL_3)
      const back = board.neighbors()[0].neighbors().find((b) => b.equals(board))
      expect(back).toBeDefined()
    })
  })

  describe('toString', () => {
    it('renders N then the padded grid', () => {
      expect(Board.goal(2).toString()).toBe('2\n 1  2 \n 3  0 \n')
    })

    it('pads two-digit labels to the same width', () => {
      const rendered = Board.goal(4).toString().split('\n')
      expect(rendered[0]).toBe('4')
      expect(rendered[3]).toBe(' 9 10 11 12 ')
      expect(rendered[4]).toBe('13 14 15  0 ')
    })
  })

  describe('scramble', () => {
    it('walks the blank without undoing the previous move', () => {
      const board = scramble(Board.fromGrid(GOAL_3), 2, () => 0)
      expect(board.tiles()).toEqual([1, 2, 0, 4, 5, 3, 7, 8, 6])
    })

    it('returns the same board for zero steps', () => {
      const goal = Board.fromGrid(GOAL_3)
      expect(scramble(goal, 0).equals(goal)).toBe(true)
    })

    it('always produces solvable boards from the goal', () => {
      let seed = 7
      const random = () => {
        seed = (seed * 16807) % 2147483647
        return seed / 2147483647
      }
      for (let i = 0; i < 20; i++) {
        expect(scramble(Board.goal(4), 30, random).isSolvable()).toBe(true)
      }
    })
  })
})

/**
 * Search Tree Arena
 *
 * Search nodes live in one array and refer to their parent by index, so
 * path reconstruction is a walk over handles rather than object links.
 */

import type { Board } from '../game/board'

export interface SearchNode {
  board: Board
  /** Arena index of the parent, or null for a root */
  parent: number | null
  /** Moves from this node's root */
  g: number
  /** Heuristic estimate of the remaining moves */
  h: number
  /** Belongs to the twin (unsolvability) search rather than the real one */
  twin: boolean
}

export class SearchArena {
  private nodes: SearchNode[] = []

  get size(): number {
    return this.nodes.length
  }

  /**
   * Stores a node and returns its handle.
   */
  add(node: SearchNode): number {
    this.nodes.push(node)
    return this.nodes.length - 1
  }

  get(handle: number): SearchNode {
    const node = this.nodes[handle]
    if (node === undefined) {
      throw new RangeError(`No search node with handle ${handle}`)
    }
    return node
  }

  /** Board of the node's parent, if it has one */
  parentBoard(handle: number): Board | undefined {
    const { parent } = this.get(handle)
    return parent === null ? undefined : this.get(parent).board
  }

  /**
   * Boards from the root down to the given node, inclusive.
   */
  path(handle: number): Board[] {
    const boards: Board[] = []
    let current: number | null = handle

    while (current !== null) {
      const node = this.get(current)
      boards.push(node.board)
      current = node.parent
    }

    return boards.reverse()
  }

  clear(): void {
    this.nodes = []
  }
}

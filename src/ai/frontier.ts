/**
 * Priority Frontier
 *
 * Binary min-heap of search-node handles ordered by estimated total cost
 * (g + h). Ties go to the smaller h (closer to the goal), then to the entry
 * inserted first, so a run is reproducible.
 */

export interface FrontierEntry {
  /** Handle of the node in the search arena */
  node: number
  /** Estimated total cost g + h */
  priority: number
  /** Heuristic part of the priority */
  h: number
}

interface HeapItem extends FrontierEntry {
  sequence: number
}

function before(a: HeapItem, b: HeapItem): boolean {
  if (a.priority !== b.priority) return a.priority < b.priority
  if (a.h !== b.h) return a.h < b.h
  return a.sequence < b.sequence
}

export class PriorityFrontier {
  private heap: HeapItem[] = []
  private inserted = 0
  private peak = 0

  get size(): number {
    return this.heap.length
  }

  /** Largest size the frontier has reached */
  get maxSize(): number {
    return this.peak
  }

  isEmpty(): boolean {
    return this.heap.length === 0
  }

  push(entry: FrontierEntry): void {
    this.heap.push({ ...entry, sequence: this.inserted++ })
    this.siftUp(this.heap.length - 1)
    this.peak = Math.max(this.peak, this.heap.length)
  }

  /**
   * Removes and returns the lowest-priority entry, or undefined when empty.
   */
  pop(): FrontierEntry | undefined {
    const top = this.heap[0]
    if (top === undefined) return undefined

    const last = this.heap.pop()
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last
      this.siftDown(0)
    }

    return { node: top.node, priority: top.priority, h: top.h }
  }

  peek(): FrontierEntry | undefined {
    const top = this.heap[0]
    return top === undefined ? undefined : { node: top.node, priority: top.priority, h: top.h }
  }

  clear(): void {
    this.heap = []
    this.inserted = 0
    this.peak = 0
  }

  private siftUp(index: number): void {
    const item = this.heap[index]
    while (index > 0) {
      const parent = (index - 1) >> 1
      if (!before(item, this.heap[parent])) break
      this.heap[index] = this.heap[parent]
      index = parent
    }
    this.heap[index] = item
  }

  private siftDown(index: number): void {
    const item = this.heap[index]
    const length = this.heap.length

    for (;;) {
      const left = 2 * index + 1
      if (left >= length) break

      const right = left + 1
      const child = right < length && before(this.heap[right], this.heap[left]) ? right : left
      if (!before(this.heap[child], item)) break

      this.heap[index] = this.heap[child]
      index = child
    }
    this.heap[index] = item
  }
}

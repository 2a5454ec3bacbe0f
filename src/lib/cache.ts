/**
 * Cache utilities
 *
 * A bounded LRU map that counts hits and misses, used to memoize
 * per-board values for the duration of a single solver run.
 */

/**
 * Hit/miss counters for a cache.
 */
export interface CacheStats {
  hits: number
  misses: number
  size: number
}

/**
 * A simple LRU (Least Recently Used) cache.
 *
 * When the cache reaches its maximum size, the least recently used
 * entry is evicted to make room for the new one.
 *
 * @example
 * const cache = new LRUCache<string, number>(100)
 * cache.set('1 2 3 0', 42)
 * cache.get('1 2 3 0') // 42
 */
export class LRUCache<K, V> {
  private cache = new Map<K, V>()
  private readonly maxSize: number
  private hits = 0
  private misses = 0

  /**
   * @param maxSize - Maximum number of entries to store (default: 1000)
   */
  constructor(maxSize = 1000) {
    this.maxSize = maxSize
  }

  /**
   * Gets a value from the cache, counting a hit or a miss.
   * Accessing a key moves it to the "most recently used" position.
   */
  get(key: K): V | undefined {
    const value = this.cache.get(key)
    if (value === undefined) {
      this.misses++
      return undefined
    }

    this.hits++
    // Move to end (most recently used) by re-inserting
    this.cache.delete(key)
    this.cache.set(key, value)
    return value
  }

  /**
   * Sets a value in the cache.
   * If the cache is at capacity, evicts the least recently used entry.
   */
  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key)
    } else if (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next()
      if (!firstKey.done) {
        this.cache.delete(firstKey.value)
      }
    }

    this.cache.set(key, value)
  }

  /**
   * Checks if a key exists. Does NOT affect ordering or counters.
   */
  has(key: K): boolean {
    return this.cache.has(key)
  }

  /**
   * Clears all entries. Counters are kept so they can be read after teardown.
   */
  clear(): void {
    this.cache.clear()
  }

  get size(): number {
    return this.cache.size
  }

  get capacity(): number {
    return this.maxSize
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.cache.size }
  }
}

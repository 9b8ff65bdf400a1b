/**
 * Backing store of a `ResolutionCache`. `Map` satisfies it; anything with the same
 * operations (an LRU, an instrumented map in tests) can be injected instead.
 */
export interface CacheStore<V> {
  get(key: string): V | undefined
  has(key: string): boolean
  set(key: string, value: V): unknown
  clear(): void
  readonly size: number
}

/**
 * Get-or-populate cache of resolved references, keyed by the reference string.
 *
 * Only successful resolutions are stored: when `populate` throws, nothing is written and the
 * error propagates, so the next lookup tries again. Entries are never evicted.
 */
export class ResolutionCache {
  readonly #store: CacheStore<unknown>

  constructor(store: CacheStore<unknown> = new Map<string, unknown>()) {
    this.#store = store
  }

  /**
   * Return the cached value for `reference`, calling `populate` and storing its result on a miss.
   * An entry that already exists is never overwritten.
   */
  getOrPopulate(reference: string, populate: () => unknown): unknown {
    if (this.#store.has(reference)) {
      return this.#store.get(reference)
    }

    const value = populate()
    // populate may have resolved the same reference itself; the first stored value wins
    if (this.#store.has(reference)) {
      return this.#store.get(reference)
    }
    this.#store.set(reference, value)
    return value
  }

  has(reference: string): boolean {
    return this.#store.has(reference)
  }

  clear(): void {
    this.#store.clear()
  }

  get size(): number {
    return this.#store.size
  }
}

/**
 * The process-wide cache shared by every resolver that is not given its own
 */
export const defaultResolutionCache = new ResolutionCache()

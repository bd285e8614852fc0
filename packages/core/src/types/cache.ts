/**
 * Cache entry wrapper used by the monitors' TTL caches.
 *
 * Entries are never mutated; a refresh replaces the whole entry.
 */
export interface CacheEntry<T> {
  /** Cached value. */
  value: T;

  /** Timestamp (ms, from the cache's clock) when the value was fetched. */
  fetchedAt: number;
}

/**
 * Point-in-time cache statistics.
 */
export interface CacheStats {
  /** Total number of entries, stale ones included. */
  size: number;

  /** Number of entries still fresh under the TTL at call time. */
  entries: number;
}

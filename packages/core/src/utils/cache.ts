import type { CacheEntry, CacheStats } from '../types/cache.js';

import { defaultNow, type NowFn } from './time.js';

type TtlCacheOptions = {
  /** Time-to-live in milliseconds. */
  ttlMs: number;

  /**
   * Time source override used in tests.
   *
   * Defaults to `Date.now`.
   */
  now?: NowFn;
};

/**
 * Simple in-memory TTL cache owned by a single monitor.
 *
 * Stale entries stay in the map until they are replaced or pruned, so
 * `stats().size` keeps counting them; `get` just never returns them.
 */
export class TtlCache<K, T> {
  private readonly store = new Map<K, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: NowFn;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = Math.max(0, options.ttlMs);
    this.now = options.now ?? defaultNow;
  }

  /**
   * Fresh value for `key`, or undefined when absent or stale.
   */
  get(key: K): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (!this.isFresh(entry)) return undefined;
    return entry.value;
  }

  set(key: K, value: T): void {
    this.store.set(key, { value, fetchedAt: this.now() });
  }

  stats(): CacheStats {
    let entries = 0;
    for (const entry of this.store.values()) {
      if (this.isFresh(entry)) entries += 1;
    }
    return { size: this.store.size, entries };
  }

  /**
   * Remove stale entries.
   * @returns Number of entries removed
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (!this.isFresh(entry)) {
        this.store.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * @returns Number of entries cleared
   */
  clear(): number {
    const size = this.store.size;
    this.store.clear();
    return size;
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return this.now() - entry.fetchedAt < this.ttlMs;
  }
}

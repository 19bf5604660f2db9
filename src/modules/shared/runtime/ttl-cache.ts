/**
 * EXPIRING CACHE
 * ==============
 *
 * In-memory key/value store with a fixed TTL per instance.
 *
 * Used for:
 * - Loot pool snapshots (5 min TTL)
 * - Aspect → class mapping (1 h TTL)
 *
 * Expiry is lazy: an entry is checked against the clock on read and never
 * evicted in the background. The key space (pool types, a single mapping key)
 * is small and fixed, so the map is unbounded.
 */

import { defaultClock, type Clock } from './host.deps.js';

export type CacheEntry<T> = {
  value: T;
  insertedAt: number;
};

export interface ExpiringCacheOptions {
  ttlMs: number;
  clock?: Clock;
}

export class ExpiringCache<K, T> {
  private map = new Map<K, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(options: ExpiringCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? defaultClock;
  }

  /**
   * Get value if inserted less than ttlMs ago
   */
  get(key: K): T | null {
    const e = this.map.get(key);
    if (!e || !this.isFresh(e)) {
      this.misses++;
      return null;
    }
    this.hits++;
    return e.value;
  }

  /**
   * Store value, stamped with the current clock time
   */
  put(key: K, value: T): void {
    this.map.set(key, {
      value,
      insertedAt: this.clock.now(),
    });
  }

  /**
   * Raw entry regardless of age. Does not count as a hit or miss.
   */
  peek(key: K): CacheEntry<T> | null {
    return this.map.get(key) ?? null;
  }

  size(): number {
    return this.map.size;
  }

  stats() {
    return {
      size: this.map.size,
      ttlMs: this.ttlMs,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return this.clock.now() - entry.insertedAt < this.ttlMs;
  }
}

/**
 * POOL AGGREGATOR
 * ===============
 *
 * Fan-out / fan-in over the pool data source, fronted by a 5 minute cache.
 *
 * - Cache hits are served without touching upstream
 * - Misses are fetched concurrently and all settle before returning
 * - A failed pool is left out of the result; the others are unaffected
 * - Concurrent misses on the same pool share one upstream request
 */

import type {
  PoolDataSource,
  PoolSnapshot,
  Rarity,
  TaggedPoolItem,
} from '../contracts/lootpool.types.js';
import { ExpiringCache } from '../../shared/runtime/ttl-cache.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import {
  createConsoleLogger,
  defaultClock,
  type Clock,
  type Logger,
} from '../../shared/runtime/host.deps.js';
import { normalizeRarity } from '../contracts/lootpool.schemas.js';
import { errorMessage } from '../../../common/errors.js';

export interface PoolAggregatorOptions {
  source: PoolDataSource;
  ttlMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export class PoolAggregator {
  private readonly cache: ExpiringCache<string, PoolSnapshot>;
  private readonly inflight = new RequestCoalescer<PoolSnapshot | null>();
  private readonly source: PoolDataSource;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: PoolAggregatorOptions) {
    this.source = options.source;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? createConsoleLogger('PoolAggregator');
    this.cache = new ExpiringCache({
      ttlMs: options.ttlMs ?? 5 * 60 * 1000, // 5 minutes
      clock: this.clock,
    });
  }

  /**
   * Snapshot for every requested pool that has data. Never rejects.
   */
  async fetchMany(poolTypes: readonly string[]): Promise<Map<string, PoolSnapshot>> {
    const unique = [...new Set(poolTypes)];
    const settled = await Promise.allSettled(unique.map((poolType) => this.fetchOne(poolType)));

    const result = new Map<string, PoolSnapshot>();
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled' && outcome.value) {
        result.set(unique[i], outcome.value);
      }
    });
    return result;
  }

  /**
   * Cached snapshot, or one upstream fetch on a miss. null when upstream has
   * no data for the pool.
   */
  async fetchOne(poolType: string): Promise<PoolSnapshot | null> {
    const cached = this.cache.get(poolType);
    if (cached) return cached;

    return this.inflight.run(poolType, () => this.load(poolType));
  }

  /**
   * Items of one rarity across pools, each tagged with its pool. Pools keep
   * the requested order; items keep their pool order. Rarity is matched
   * case-insensitively.
   */
  async topRarityAcrossPools(poolTypes: readonly string[], rarity: Rarity): Promise<TaggedPoolItem[]> {
    const snapshots = await this.fetchMany(poolTypes);
    const wanted = normalizeRarity(rarity);
    const items: TaggedPoolItem[] = [];

    for (const snapshot of snapshots.values()) {
      for (const item of snapshot.items) {
        if (normalizeRarity(item.rarity) === wanted) {
          items.push({ ...item, poolType: snapshot.poolType });
        }
      }
    }
    return items;
  }

  stats() {
    return {
      ...this.cache.stats(),
      inFlight: this.inflight.size(),
    };
  }

  private async load(poolType: string): Promise<PoolSnapshot | null> {
    const startMs = this.clock.now();
    try {
      const payload = await this.source.getPool(poolType);
      if (!payload) {
        this.logger.warn({ poolType }, 'No pool data from upstream');
        return null;
      }

      const snapshot: PoolSnapshot = {
        poolType,
        items: payload.items,
        fetchedAt: this.clock.now(),
      };
      this.cache.put(poolType, snapshot);
      this.logger.info(
        { poolType, items: snapshot.items.length, latencyMs: snapshot.fetchedAt - startMs },
        'Pool fetched',
      );
      return snapshot;
    } catch (error) {
      this.logger.error({ poolType, error: errorMessage(error) }, 'Pool fetch failed');
      return null;
    }
  }
}

/**
 * Lootpool Module
 *
 * Weekly raid loot pools and per-player progress scores:
 * - Pool snapshots (5 min cache, concurrent fetch, partial failure tolerated)
 * - Today's gambits (same cache window as pools)
 * - Aspect → class mapping (1 h cache)
 * - Tier-weighted distance-to-completion score
 * - Weekly reset window
 *
 * createLootpoolModule builds the collaborators once; everything that needs
 * a cache receives it from here.
 */

import type {
  CategorySource,
  GambitSource,
  PlayerProgressSource,
  PoolDataSource,
} from './contracts/lootpool.types.js';
import { WynnExtrasProvider, WynncraftProvider } from './providers/index.js';
import {
  CategoryMappingCache,
  GambitFeed,
  PoolAggregator,
  TierScoreEngine,
} from './services/index.js';
import { defaultClock, type Clock, type Logger } from '../shared/runtime/host.deps.js';

export interface LootpoolModuleOptions {
  poolSource?: PoolDataSource;
  gambitSource?: GambitSource;
  categorySource?: CategorySource;
  playerSource?: PlayerProgressSource;
  poolApiBaseUrl?: string;
  categoryApiBaseUrl?: string;
  httpTimeoutMs?: number;
  poolCacheTtlMs?: number;
  categoryCacheTtlMs?: number;
  engine?: TierScoreEngine;
  clock?: Clock;
  logger?: Logger;
}

export interface LootpoolModule {
  aggregator: PoolAggregator;
  gambits: GambitFeed;
  categories: CategoryMappingCache;
  engine: TierScoreEngine;
  players: PlayerProgressSource;
  clock: Clock;
}

export function createLootpoolModule(options: LootpoolModuleOptions = {}): LootpoolModule {
  let wynnExtras: WynnExtrasProvider | null = null;
  const defaultWynnExtras = (): WynnExtrasProvider => {
    if (!wynnExtras) {
      wynnExtras = new WynnExtrasProvider({
        baseUrl: options.poolApiBaseUrl,
        timeout: options.httpTimeoutMs,
      });
    }
    return wynnExtras;
  };

  const poolSource = options.poolSource ?? defaultWynnExtras();
  const gambitSource = options.gambitSource ?? defaultWynnExtras();
  const playerSource = options.playerSource ?? defaultWynnExtras();
  const categorySource = options.categorySource ?? new WynncraftProvider({
    baseUrl: options.categoryApiBaseUrl,
    timeout: options.httpTimeoutMs,
  });

  const clock = options.clock ?? defaultClock;

  return {
    aggregator: new PoolAggregator({
      source: poolSource,
      ttlMs: options.poolCacheTtlMs,
      clock,
      logger: options.logger,
    }),
    gambits: new GambitFeed({
      source: gambitSource,
      ttlMs: options.poolCacheTtlMs,
      clock,
      logger: options.logger,
    }),
    categories: new CategoryMappingCache({
      source: categorySource,
      ttlMs: options.categoryCacheTtlMs,
      clock,
      logger: options.logger,
    }),
    engine: options.engine ?? new TierScoreEngine(),
    players: playerSource,
    clock,
  };
}

export { lootpoolRoutes } from './lootpool.routes.js';

export * from './contracts/lootpool.types.js';
export * from './services/index.js';
export { POOL_TYPES, POOL_NAMES, isPoolType, RESET_ANCHOR } from './lootpool.config.js';

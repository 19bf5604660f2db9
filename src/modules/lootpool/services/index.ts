export { TierScoreEngine, clampAmount, weightKey } from './tier-score.engine.js';
export type { TierScoreEngineConfig } from './tier-score.engine.js';
export { CategoryMappingCache } from './category-mapping.cache.js';
export type { CategoryMappingCacheOptions } from './category-mapping.cache.js';
export { PoolAggregator } from './pool.aggregator.js';
export type { PoolAggregatorOptions } from './pool.aggregator.js';
export { GambitFeed } from './gambit.feed.js';
export type { GambitFeedOptions } from './gambit.feed.js';
export { weeklyWindow, lootpoolResetWindow, toUnixSeconds, WEEK_MS } from './reset-window.js';
export {
  sortByRarity,
  rarityRank,
  toProgressMap,
  isItemMaxed,
  filterPoolItems,
  summarizeCategoryProgress,
} from './pool.view.js';

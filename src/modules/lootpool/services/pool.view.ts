/**
 * Pool views
 *
 * Helpers the presentation layer uses to shape pool data: rarity ordering,
 * maxed filtering and per-class progress.
 */

import type {
  CategoryMapping,
  CategoryProgress,
  CategoryProgressSummary,
  PlayerAspect,
  PlayerProgress,
  PoolFilter,
  PoolItem,
} from '../contracts/lootpool.types.js';
import { CATEGORIES, RARITY_ORDER, UNKNOWN_RARITY_RANK } from '../lootpool.config.js';
import { normalizeRarity } from '../contracts/lootpool.schemas.js';
import { clampAmount, type TierScoreEngine } from './tier-score.engine.js';

export function rarityRank(rarity: string): number {
  return RARITY_ORDER[normalizeRarity(rarity)] ?? UNKNOWN_RARITY_RANK;
}

/** Stable: items of equal rarity keep their pool order */
export function sortByRarity<T extends PoolItem>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => rarityRank(a.rarity) - rarityRank(b.rarity));
}

/**
 * Later entries for the same name win; amounts are clamped to >= 0.
 */
export function toProgressMap(entries: readonly PlayerAspect[]): PlayerProgress {
  const progress = new Map<string, number>();
  for (const entry of entries) {
    progress.set(entry.name, clampAmount(entry.amount));
  }
  return progress;
}

/**
 * An item is maxed only when the player has an entry for it at or above the
 * rarity max.
 */
export function isItemMaxed(item: PoolItem, progress: PlayerProgress, engine: TierScoreEngine): boolean {
  const amount = progress.get(item.name);
  return amount !== undefined && engine.isMaxed(item.rarity, amount);
}

export function filterPoolItems<T extends PoolItem>(
  items: readonly T[],
  progress: PlayerProgress,
  filter: PoolFilter,
  engine: TierScoreEngine,
): T[] {
  if (filter === 'all') return [...items];

  const wantMaxed = filter === 'maxed';
  return items.filter((item) => isItemMaxed(item, progress, engine) === wantMaxed);
}

/**
 * Maxed vs total aspects per class. Totals come from the class mapping;
 * aspects the mapping does not know are ignored. Classes without any aspect
 * are left out.
 */
export function summarizeCategoryProgress(
  mapping: CategoryMapping,
  entries: readonly PlayerAspect[],
  engine: TierScoreEngine,
  categories: readonly string[] = CATEGORIES,
): CategoryProgressSummary {
  const byCategory = new Map<string, CategoryProgress>(
    categories.map((category) => [category, { category, total: 0, maxed: 0, maxedNames: [] }]),
  );

  for (const category of mapping.values()) {
    const stats = byCategory.get(category);
    if (stats) stats.total++;
  }

  for (const entry of entries) {
    const category = mapping.get(entry.name);
    const stats = category === undefined ? undefined : byCategory.get(category);
    if (!stats || !engine.isMaxed(entry.rarity, entry.amount)) continue;

    stats.maxed++;
    stats.maxedNames.push(entry.name);
  }

  const visible = [...byCategory.values()].filter((stats) => stats.total > 0);
  return {
    totalMaxed: visible.reduce((sum, stats) => sum + stats.maxed, 0),
    totalItems: visible.reduce((sum, stats) => sum + stats.total, 0),
    categories: visible,
  };
}

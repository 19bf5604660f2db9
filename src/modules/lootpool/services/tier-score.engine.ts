/**
 * TIER SCORE ENGINE
 * =================
 *
 * Converts raw progress counters into a weighted "distance to completion".
 *
 * Each rarity's completion is split into tiers by ascending thresholds; the
 * last threshold is the rarity max. An item's score is the work left in its
 * current tier times the weight of the current → target transition. A pool's
 * score is the sum over its items. Exactly 0 means everything is maxed.
 *
 * Pure and stateless: tables are fixed at construction.
 */

import type {
  PlayerProgress,
  PoolItem,
  Rarity,
  RarityTierTable,
  TierInfo,
  TierWeightTable,
} from '../contracts/lootpool.types.js';
import {
  FALLBACK_MAX,
  FALLBACK_WEIGHT,
  RARITY_MAX,
  TIER_THRESHOLDS,
  TIER_WEIGHTS,
} from '../lootpool.config.js';
import { normalizeRarity } from '../contracts/lootpool.schemas.js';

export interface TierScoreEngineConfig {
  thresholds?: RarityTierTable;
  weights?: TierWeightTable;
  maxAmounts?: Readonly<Record<Rarity, number>>;
  fallbackMax?: number;
  fallbackWeight?: number;
}

const MAXED: TierInfo = { currentTier: 0, targetTier: 0, remainingInTier: 0 };

export function weightKey(fromTier: number, toTier: number): string {
  return `${fromTier}->${toTier}`;
}

/**
 * Negative and NaN counts are treated as no progress. +Infinity is kept and
 * reads as maxed.
 */
export function clampAmount(amount: number): number {
  return Number.isNaN(amount) || amount < 0 ? 0 : amount;
}

export class TierScoreEngine {
  private readonly thresholds: RarityTierTable;
  private readonly weights: TierWeightTable;
  private readonly maxAmounts: Readonly<Record<Rarity, number>>;
  private readonly fallbackMax: number;
  private readonly fallbackWeight: number;

  constructor(config: TierScoreEngineConfig = {}) {
    this.thresholds = config.thresholds ?? TIER_THRESHOLDS;
    this.weights = config.weights ?? TIER_WEIGHTS;
    this.maxAmounts = config.maxAmounts ?? RARITY_MAX;
    this.fallbackMax = config.fallbackMax ?? FALLBACK_MAX;
    this.fallbackWeight = config.fallbackWeight ?? FALLBACK_WEIGHT;

    for (const [rarity, table] of Object.entries(this.thresholds)) {
      assertValidTable(rarity, table, this.maxAmounts[rarity]);
    }
  }

  /**
   * Max count for a rarity: the configured max, else the last threshold of
   * its tier table, else the fallback max. Rarity is matched
   * case-insensitively, as are all public methods.
   */
  maxFor(rarity: Rarity): number {
    const key = normalizeRarity(rarity);
    const table = this.thresholds[key];
    return this.maxAmounts[key]
      ?? (table ? table[table.length - 1] : undefined)
      ?? this.fallbackMax;
  }

  tierInfo(rarity: Rarity, amount: number): TierInfo {
    const value = clampAmount(amount);
    const table = this.tableFor(normalizeRarity(rarity));
    const max = table[table.length - 1];

    if (value >= max) return { ...MAXED };

    let reached = 0;
    for (const threshold of table) {
      if (threshold > value) break;
      reached++;
    }

    const currentTier = Math.max(1, reached);
    const isLastTier = currentTier >= table.length;
    const targetTier = isLastTier ? currentTier : currentTier + 1;
    const tierEnd = isLastTier ? max : table[currentTier];

    return {
      currentTier,
      targetTier,
      remainingInTier: tierEnd - value,
    };
  }

  aspectScore(rarity: Rarity, amount: number): number {
    const info = this.tierInfo(rarity, amount);
    if (info.currentTier === 0) return 0;

    return info.remainingInTier * this.weightFor(normalizeRarity(rarity), info.currentTier, info.targetTier);
  }

  /**
   * Sum of aspectScore over the pool. Items the player never obtained count
   * from zero.
   */
  poolScore(items: readonly PoolItem[], progress: PlayerProgress): number {
    let total = 0;
    for (const item of items) {
      total += this.aspectScore(item.rarity, progress.get(item.name) ?? 0);
    }
    return total;
  }

  isMaxed(rarity: Rarity, amount: number): boolean {
    return clampAmount(amount) >= this.maxFor(rarity);
  }

  remainingToMax(rarity: Rarity, amount: number): number {
    return Math.max(0, this.maxFor(rarity) - clampAmount(amount));
  }

  private tableFor(rarity: Rarity): readonly number[] {
    return this.thresholds[rarity] ?? [this.maxFor(rarity)];
  }

  private weightFor(rarity: Rarity, fromTier: number, toTier: number): number {
    return this.weights[rarity]?.[weightKey(fromTier, toTier)] ?? this.fallbackWeight;
  }
}

function assertValidTable(rarity: Rarity, table: readonly number[], max: number | undefined): void {
  if (table.length === 0 || table[0] <= 0) {
    throw new Error(`Tier table for '${rarity}' must start above 0`);
  }
  for (let i = 1; i < table.length; i++) {
    if (table[i] <= table[i - 1]) {
      throw new Error(`Tier table for '${rarity}' must be strictly increasing`);
    }
  }
  if (max !== undefined && table[table.length - 1] !== max) {
    throw new Error(`Tier table for '${rarity}' must end at its max (${max})`);
  }
}

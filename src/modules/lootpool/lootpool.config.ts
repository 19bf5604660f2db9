/**
 * LOOTPOOL CONFIG
 *
 * Pool catalogue, rarity tables and the weekly reset anchor.
 *
 * Tier weights are front-loaded: early tiers of a rarity cost more per
 * remaining unit than late ones.
 */

import type { RarityTierTable, TierWeightTable } from './contracts/lootpool.types.js';

export const POOL_TYPES = ['NOTG', 'NOL', 'TCC', 'TNA'] as const;
export type PoolType = (typeof POOL_TYPES)[number];

export const POOL_NAMES: Record<PoolType, string> = {
  NOTG: 'Nest of the Grootslangs',
  NOL: "Orphion's Nexus of Light",
  TCC: 'The Canyon Colossus',
  TNA: 'The Nameless Anomaly',
};

const POOL_TYPE_SET: ReadonlySet<string> = new Set(POOL_TYPES);

export function isPoolType(value: string): value is PoolType {
  return POOL_TYPE_SET.has(value);
}

export const CATEGORIES = ['warrior', 'mage', 'archer', 'assassin', 'shaman'] as const;

export const TOP_RARITY = 'mythic';

export const RARITY_ORDER: Record<string, number> = {
  mythic: 0,
  fabled: 1,
  legendary: 2,
};
export const UNKNOWN_RARITY_RANK = 99;

export const RARITY_MAX: Record<string, number> = {
  mythic: 15,
  fabled: 75,
  legendary: 150,
};
export const FALLBACK_MAX = 150;
export const FALLBACK_WEIGHT = 1.0;

export const TIER_THRESHOLDS: RarityTierTable = {
  mythic: [1, 5, 15],
  fabled: [1, 15, 75],
  legendary: [1, 30, 150],
};

export const TIER_WEIGHTS: TierWeightTable = {
  mythic: { '1->2': 13.55, '2->3': 10.0 },
  fabled: { '1->2': 1.5, '2->3': 0.5 },
  legendary: { '1->2': 0.8, '2->3': 0.25 },
};

// Friday 19:00 CET; winter offset used all year
export const RESET_ANCHOR = {
  weekday: 5,
  hour: 19,
  utcOffsetHours: 1,
} as const;

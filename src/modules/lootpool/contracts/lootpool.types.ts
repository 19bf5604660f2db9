/**
 * Lootpool Contracts
 *
 * Records shared by the score engine, the caches and the providers.
 * Upstream payloads are parsed into these shapes at the provider boundary.
 */

// ═══════════════════════════════════════════════════════════════
// POOL DATA
// ═══════════════════════════════════════════════════════════════

/** Rarity names as stored: lower-case, e.g. 'mythic' */
export type Rarity = string;

export interface PoolItem {
  readonly name: string;
  readonly rarity: Rarity;
  readonly category?: string;
}

export interface PoolSnapshot {
  readonly poolType: string;
  readonly items: readonly PoolItem[];
  readonly fetchedAt: number;
}

export interface PoolPayload {
  readonly items: readonly PoolItem[];
}

export type TaggedPoolItem = PoolItem & { readonly poolType: string };

// ═══════════════════════════════════════════════════════════════
// GAMBITS (daily)
// ═══════════════════════════════════════════════════════════════

export interface Gambit {
  readonly name: string;
  readonly description: string;
}

export interface GambitSnapshot {
  readonly gambits: readonly Gambit[];
  readonly fetchedAt: number;
}

// ═══════════════════════════════════════════════════════════════
// PLAYER DATA
// ═══════════════════════════════════════════════════════════════

/** item name → progress count */
export type PlayerProgress = ReadonlyMap<string, number>;

export interface PlayerAspect {
  readonly name: string;
  readonly amount: number;
  readonly rarity: Rarity;
}

// ═══════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════

export interface CategoryItem {
  readonly name: string;
  readonly rarity?: Rarity;
}

/** item name → category */
export type CategoryMapping = ReadonlyMap<string, string>;

// ═══════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════

/** rarity → ascending thresholds, last one is the rarity max */
export type RarityTierTable = Readonly<Record<Rarity, readonly number[]>>;

/** rarity → "from->to" → weight */
export type TierWeightTable = Readonly<Record<Rarity, Readonly<Record<string, number>>>>;

export interface TierInfo {
  currentTier: number;
  targetTier: number;
  remainingInTier: number;
}

export type PoolFilter = 'all' | 'maxed' | 'non_maxed';

export interface CategoryProgress {
  category: string;
  total: number;
  maxed: number;
  maxedNames: string[];
}

export interface CategoryProgressSummary {
  totalMaxed: number;
  totalItems: number;
  categories: CategoryProgress[];
}

// ═══════════════════════════════════════════════════════════════
// EXTERNAL SOURCES
// ═══════════════════════════════════════════════════════════════

/**
 * Resolves to null on a non-success response; may reject on transport errors.
 */
export interface PoolDataSource {
  getPool(poolType: string): Promise<PoolPayload | null>;
}

/**
 * Today's gambits. Same contract as PoolDataSource: null on a non-success
 * response, may reject on transport errors.
 */
export interface GambitSource {
  getGambits(): Promise<Gambit[] | null>;
}

export interface CategorySource {
  getCategoryItems(category: string): Promise<CategoryItem[] | null>;
}

export interface PlayerProgressSource {
  getProgress(player: string): Promise<PlayerAspect[] | null>;
}

export interface ResetWindow {
  lastReset: Date;
  nextReset: Date;
}

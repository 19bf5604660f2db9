/**
 * Upstream payload schemas
 *
 * Every payload is parsed here before it reaches the core. Missing or
 * mistyped fields fall back to defaults (empty list, zero amount, empty
 * rarity); entries without a usable name are dropped.
 */

import { z } from 'zod';
import type {
  CategoryItem,
  Gambit,
  PlayerAspect,
  PoolItem,
  PoolPayload,
} from './lootpool.types.js';

const optionalText = z.string().min(1).optional().catch(undefined);

const poolAspectSchema = z.object({
  name: z.string().catch(''),
  rarity: z.string().catch(''),
  requiredClass: optionalText,
});

const playerAspectSchema = z.object({
  name: z.string().catch(''),
  amount: z.coerce.number().catch(0),
  rarity: z.string().catch(''),
});

const aspectListSchema = z.object({
  aspects: z.array(z.unknown()).catch([]),
}).catch({ aspects: [] });

const gambitSchema = z.object({
  name: z.string().catch(''),
  description: z.string().catch(''),
});

const gambitListSchema = z.object({
  gambits: z.array(z.unknown()).catch([]),
}).catch({ gambits: [] });

const uploadedPlayerSchema = z.object({
  playerName: z.string(),
  playerUuid: z.string().min(1),
});

const categoryDetailsSchema = z.object({
  rarity: optionalText,
}).catch({ rarity: undefined });

export function normalizeRarity(rarity: string): string {
  return rarity.trim().toLowerCase();
}

export function parsePoolPayload(raw: unknown): PoolPayload {
  const { aspects } = aspectListSchema.parse(raw);
  const items: PoolItem[] = [];

  for (const entry of aspects) {
    const parsed = poolAspectSchema.safeParse(entry);
    if (!parsed.success || parsed.data.name === '') continue;

    const { name, rarity, requiredClass } = parsed.data;
    items.push(requiredClass
      ? { name, rarity: normalizeRarity(rarity), category: requiredClass.toLowerCase() }
      : { name, rarity: normalizeRarity(rarity) });
  }

  return { items };
}

export function parsePlayerAspects(raw: unknown): PlayerAspect[] {
  const { aspects } = aspectListSchema.parse(raw);
  const result: PlayerAspect[] = [];

  for (const entry of aspects) {
    const parsed = playerAspectSchema.safeParse(entry);
    if (!parsed.success || parsed.data.name === '') continue;

    result.push({
      name: parsed.data.name,
      amount: parsed.data.amount,
      rarity: normalizeRarity(parsed.data.rarity),
    });
  }

  return result;
}

export function parseGambits(raw: unknown): Gambit[] {
  const { gambits } = gambitListSchema.parse(raw);
  const result: Gambit[] = [];

  for (const entry of gambits) {
    const parsed = gambitSchema.safeParse(entry);
    if (!parsed.success || parsed.data.name === '') continue;

    result.push({ name: parsed.data.name, description: parsed.data.description });
  }

  return result;
}

export interface UploadedPlayer {
  playerName: string;
  playerUuid: string;
}

export function parseUploadedPlayers(raw: unknown): UploadedPlayer[] {
  if (!Array.isArray(raw)) return [];

  const players: UploadedPlayer[] = [];
  for (const entry of raw) {
    const parsed = uploadedPlayerSchema.safeParse(entry);
    if (parsed.success) players.push(parsed.data);
  }
  return players;
}

export function parseCategoryItems(raw: unknown): CategoryItem[] {
  const parsed = z.record(z.unknown()).safeParse(raw);
  if (!parsed.success) return [];

  return Object.entries(parsed.data).map(([name, details]) => {
    const { rarity } = categoryDetailsSchema.parse(details);
    return rarity ? { name, rarity: normalizeRarity(rarity) } : { name };
  });
}

/**
 * Lootpool API Routes
 *
 * Read-only JSON views over the lootpool core. Mounted under /api/lootpool.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { LootpoolModule } from './index.js';
import type { PlayerProgress, PoolItem } from './contracts/lootpool.types.js';
import { POOL_NAMES, POOL_TYPES, TOP_RARITY, isPoolType, type PoolType } from './lootpool.config.js';
import {
  filterPoolItems,
  isItemMaxed,
  sortByRarity,
  summarizeCategoryProgress,
  toProgressMap,
} from './services/pool.view.js';
import { lootpoolResetWindow, toUnixSeconds } from './services/reset-window.js';
import { AppError, NotFoundError, ValidationError } from '../../common/errors.js';

export interface LootpoolRoutesOptions {
  lootpool: LootpoolModule;
}

const playerName = z.string().trim().min(3).max(16);

const poolsQuerySchema = z.object({
  types: z.string().optional(),
});

const poolQuerySchema = z.object({
  player: playerName.optional(),
  filter: z.enum(['all', 'maxed', 'non_maxed']).default('all'),
});

const poolParamsSchema = z.object({
  poolType: z.string().min(1),
});

const playerParamsSchema = z.object({
  player: playerName,
});

function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

function toPoolType(value: string): PoolType {
  const normalized = value.trim().toUpperCase();
  if (!isPoolType(normalized)) {
    throw new AppError(400, 'UNKNOWN_POOL_TYPE', `Unknown pool type: ${value}`);
  }
  return normalized;
}

export async function lootpoolRoutes(fastify: FastifyInstance, opts: LootpoolRoutesOptions): Promise<void> {
  const { aggregator, gambits, categories, engine, players, clock } = opts.lootpool;

  /**
   * GET /api/lootpool/health
   */
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ok: true,
      module: 'lootpool',
      caches: {
        pools: aggregator.stats(),
        gambits: gambits.stats(),
        categories: categories.stats(),
      },
    });
  });

  /**
   * GET /api/lootpool/reset-window
   */
  fastify.get('/reset-window', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { lastReset, nextReset } = lootpoolResetWindow(clock.now());

    return reply.send({
      ok: true,
      data: {
        lastReset: lastReset.toISOString(),
        nextReset: nextReset.toISOString(),
        lastResetUnix: toUnixSeconds(lastReset),
        nextResetUnix: toUnixSeconds(nextReset),
      },
    });
  });

  /**
   * GET /api/lootpool/overview
   * Mythic aspects of every pool this week
   */
  fastify.get('/overview', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { nextReset } = lootpoolResetWindow(clock.now());
    const mythics = await aggregator.topRarityAcrossPools(POOL_TYPES, TOP_RARITY);
    const mapping = mythics.length > 0 ? await categories.getMapping() : new Map<string, string>();

    const pools = POOL_TYPES
      .map((poolType) => ({
        poolType,
        name: POOL_NAMES[poolType],
        items: mythics
          .filter((item) => item.poolType === poolType)
          .map((item) => ({
            name: item.name,
            category: item.category ?? mapping.get(item.name) ?? null,
          })),
      }))
      .filter((pool) => pool.items.length > 0);

    return reply.send({
      ok: true,
      data: {
        nextReset: nextReset.toISOString(),
        nextResetUnix: toUnixSeconds(nextReset),
        pools,
      },
    });
  });

  /**
   * GET /api/lootpool/pools?types=NOTG,NOL
   */
  fastify.get('/pools', async (request: FastifyRequest, reply: FastifyReply) => {
    const { types } = parseInput(poolsQuerySchema, request.query);
    const requested = types
      ? types.split(',').filter((value) => value.trim() !== '').map(toPoolType)
      : [...POOL_TYPES];

    const snapshots = await aggregator.fetchMany(requested);

    return reply.send({
      ok: true,
      data: {
        pools: Object.fromEntries(snapshots),
        missing: requested.filter((poolType) => !snapshots.has(poolType)),
      },
    });
  });

  /**
   * GET /api/lootpool/pools/:poolType?player=&filter=all|maxed|non_maxed
   */
  fastify.get('/pools/:poolType', async (request: FastifyRequest, reply: FastifyReply) => {
    const poolType = toPoolType(parseInput(poolParamsSchema, request.params).poolType);
    const { player, filter } = parseInput(poolQuerySchema, request.query);

    const snapshot = await aggregator.fetchOne(poolType);
    if (!snapshot) {
      throw new NotFoundError('POOL_UNAVAILABLE', `No loot pool available for ${poolType}`);
    }

    let progress: PlayerProgress = new Map();
    let score: { value: number; maxed: boolean } | null = null;
    if (player) {
      const entries = await players.getProgress(player);
      if (!entries) {
        throw new NotFoundError('PLAYER_NOT_FOUND', `No aspect data for player ${player}`);
      }
      progress = toProgressMap(entries);
      const value = engine.poolScore(snapshot.items, progress);
      score = { value, maxed: value === 0 };
    }

    const mapping = await categories.getMapping();
    const visible: PoolItem[] = filterPoolItems(sortByRarity(snapshot.items), progress, filter, engine);

    return reply.send({
      ok: true,
      data: {
        poolType,
        name: POOL_NAMES[poolType],
        fetchedAt: new Date(snapshot.fetchedAt).toISOString(),
        filter,
        score,
        items: visible.map((item) => ({
          name: item.name,
          rarity: item.rarity,
          category: item.category ?? mapping.get(item.name) ?? null,
          amount: progress.get(item.name) ?? 0,
          maxed: isItemMaxed(item, progress, engine),
        })),
      },
    });
  });

  /**
   * GET /api/lootpool/gambits
   * Today's gambits
   */
  fastify.get('/gambits', async (_request: FastifyRequest, reply: FastifyReply) => {
    const snapshot = await gambits.getToday();
    if (!snapshot) {
      throw new NotFoundError('GAMBITS_UNAVAILABLE', 'No gambits available for today');
    }

    return reply.send({
      ok: true,
      data: {
        fetchedAt: new Date(snapshot.fetchedAt).toISOString(),
        gambits: snapshot.gambits,
      },
    });
  });

  /**
   * GET /api/lootpool/players/:player/categories
   * Maxed aspects per class
   */
  fastify.get('/players/:player/categories', async (request: FastifyRequest, reply: FastifyReply) => {
    const { player } = parseInput(playerParamsSchema, request.params);

    const entries = await players.getProgress(player);
    if (!entries) {
      throw new NotFoundError('PLAYER_NOT_FOUND', `No aspect data for player ${player}`);
    }

    const mapping = await categories.getMapping();
    return reply.send({
      ok: true,
      data: {
        player,
        ...summarizeCategoryProgress(mapping, entries, engine),
      },
    });
  });
}

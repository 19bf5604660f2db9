/**
 * Lootpool HTTP Routes Tests
 *
 * The app is built around in-process sources and a fixed clock and driven
 * through fastify.inject.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import { createLootpoolModule } from '../index.js';
import type {
  CategoryItem,
  Gambit,
  PlayerAspect,
  PoolPayload,
} from '../contracts/lootpool.types.js';
import type { Logger } from '../../shared/runtime/host.deps.js';

const NOW = Date.parse('2026-10-16T17:00:00Z');

const POOLS: Record<string, PoolPayload> = {
  NOTG: {
    items: [
      { name: 'Aspect of Stone', rarity: 'legendary' },
      { name: 'Aspect of Embers', rarity: 'mythic', category: 'mage' },
      { name: 'Aspect of Tides', rarity: 'fabled' },
      { name: 'Aspect of the Bulwark', rarity: 'mythic' },
    ],
  },
  NOL: {
    items: [{ name: 'Aspect of Light', rarity: 'mythic' }],
  },
  TCC: {
    items: [{ name: 'Aspect of the Canyon', rarity: 'legendary' }],
  },
};

const CLASSES: Record<string, CategoryItem[]> = {
  warrior: [{ name: 'Aspect of the Bulwark', rarity: 'mythic' }],
  mage: [{ name: 'Aspect of Embers', rarity: 'mythic' }, { name: 'Aspect of Tides', rarity: 'fabled' }],
};

const PLAYERS: Record<string, PlayerAspect[]> = {
  TestPlayer: [
    { name: 'Aspect of Embers', amount: 15, rarity: 'mythic' },
    { name: 'Aspect of Tides', amount: 20, rarity: 'fabled' },
    { name: 'Aspect of the Bulwark', amount: 4, rarity: 'mythic' },
  ],
};

describe('lootpool routes', () => {
  let app: FastifyInstance;
  let gambits: Gambit[] | null;
  const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const getPool = vi.fn(async (poolType: string) => POOLS[poolType] ?? null);

  beforeEach(async () => {
    vi.clearAllMocks();
    gambits = [{ name: 'Glutton', description: 'Healing potions heal 20% less' }];
    const lootpool = createLootpoolModule({
      poolSource: { getPool },
      gambitSource: { getGambits: async () => gambits },
      categorySource: { getCategoryItems: async (category) => CLASSES[category] ?? null },
      playerSource: { getProgress: async (player) => PLAYERS[player] ?? null },
      clock: { now: () => NOW },
      logger,
    });
    app = buildApp({ lootpool, logLevel: 'silent' });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /api/lootpool/health reports cache stats', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/lootpool/health' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.caches.pools).toEqual({ size: 0, ttlMs: 300000, hits: 0, misses: 0, hitRate: 0, inFlight: 0 });
  });

  it('GET /api/lootpool/reset-window returns the current weekly window', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/lootpool/reset-window' });

    expect(res.json()).toEqual({
      ok: true,
      data: {
        lastReset: '2026-10-09T18:00:00.000Z',
        nextReset: '2026-10-16T18:00:00.000Z',
        lastResetUnix: Date.parse('2026-10-09T18:00:00Z') / 1000,
        nextResetUnix: Date.parse('2026-10-16T18:00:00Z') / 1000,
      },
    });
  });

  it('GET /api/lootpool/overview groups mythics by pool with their class', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/lootpool/overview' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual({
      nextReset: '2026-10-16T18:00:00.000Z',
      nextResetUnix: Date.parse('2026-10-16T18:00:00Z') / 1000,
      pools: [
        {
          poolType: 'NOTG',
          name: 'Nest of the Grootslangs',
          items: [
            { name: 'Aspect of Embers', category: 'mage' },
            { name: 'Aspect of the Bulwark', category: 'warrior' },
          ],
        },
        {
          poolType: 'NOL',
          name: "Orphion's Nexus of Light",
          items: [{ name: 'Aspect of Light', category: null }],
        },
      ],
    });
  });

  describe('GET /api/lootpool/pools', () => {
    it('returns the requested pools and lists the unavailable ones', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/pools?types=notg,tna' });

      expect(res.statusCode).toBe(200);
      expect(res.json().data).toEqual({
        pools: {
          NOTG: { poolType: 'NOTG', items: POOLS.NOTG.items, fetchedAt: NOW },
        },
        missing: ['TNA'],
      });
    });

    it('requests every pool once when no types are given', async () => {
      await app.inject({ method: 'GET', url: '/api/lootpool/pools' });
      await app.inject({ method: 'GET', url: '/api/lootpool/pools' });

      expect(getPool.mock.calls.map(([poolType]) => poolType)).toEqual(['NOTG', 'NOL', 'TCC', 'TNA', 'TNA']);
    });

    it('rejects an unknown pool type', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/pools?types=NOTG,XYZ' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ ok: false, error: 'UNKNOWN_POOL_TYPE', message: 'Unknown pool type: XYZ' });
    });
  });

  describe('GET /api/lootpool/pools/:poolType', () => {
    it('lists the pool by rarity without a player', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/pools/nol' });

      expect(res.statusCode).toBe(200);
      expect(res.json().data).toEqual({
        poolType: 'NOL',
        name: "Orphion's Nexus of Light",
        fetchedAt: '2026-10-16T17:00:00.000Z',
        filter: 'all',
        score: null,
        items: [{ name: 'Aspect of Light', rarity: 'mythic', category: null, amount: 0, maxed: false }],
      });
    });

    it('scores the whole pool for a player and filters the listed items', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/lootpool/pools/NOTG?player=TestPlayer&filter=non_maxed',
      });

      expect(res.statusCode).toBe(200);
      const { data } = res.json();
      // Bulwark 1 * 13.55 + Tides 55 * 0.5 + Stone 1 * 0.8
      expect(data.score.value).toBeCloseTo(41.85, 10);
      expect(data.score.maxed).toBe(false);
      expect(data.items).toEqual([
        { name: 'Aspect of the Bulwark', rarity: 'mythic', category: 'warrior', amount: 4, maxed: false },
        { name: 'Aspect of Tides', rarity: 'fabled', category: 'mage', amount: 20, maxed: false },
        { name: 'Aspect of Stone', rarity: 'legendary', category: null, amount: 0, maxed: false },
      ]);
    });

    it('lists only maxed items for the maxed filter', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/lootpool/pools/NOTG?player=TestPlayer&filter=maxed',
      });

      expect(res.json().data.items).toEqual([
        { name: 'Aspect of Embers', rarity: 'mythic', category: 'mage', amount: 15, maxed: true },
      ]);
    });

    it('returns 404 when the pool is unavailable', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/pools/TNA' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        ok: false,
        error: 'POOL_UNAVAILABLE',
        message: 'No loot pool available for TNA',
      });
    });

    it('returns 404 for a player without aspect data', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/pools/NOTG?player=Ghost' });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('PLAYER_NOT_FOUND');
    });

    it('rejects a player name that is too short', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/pools/NOTG?player=ab' });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });

    it('rejects an unknown filter', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/pools/NOTG?filter=best' });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /api/lootpool/gambits', () => {
    it('returns today\'s gambits', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/gambits' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        ok: true,
        data: {
          fetchedAt: '2026-10-16T17:00:00.000Z',
          gambits: [{ name: 'Glutton', description: 'Healing potions heal 20% less' }],
        },
      });
    });

    it('returns 404 when no gambits are available', async () => {
      gambits = null;
      const res = await app.inject({ method: 'GET', url: '/api/lootpool/gambits' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        ok: false,
        error: 'GAMBITS_UNAVAILABLE',
        message: 'No gambits available for today',
      });
    });
  });

  it('GET /api/lootpool/players/:player/categories summarizes maxed aspects per class', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/lootpool/players/TestPlayer/categories' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual({
      player: 'TestPlayer',
      totalMaxed: 1,
      totalItems: 3,
      categories: [
        { category: 'warrior', total: 1, maxed: 0, maxedNames: [] },
        { category: 'mage', total: 2, maxed: 1, maxedNames: ['Aspect of Embers'] },
      ],
    });
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/lootpool/nothing-here' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});

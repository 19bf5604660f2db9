/**
 * WynnExtras Provider
 * Source: WynnExtras API (loot pools, gambits, uploaded player aspects)
 *
 * Endpoints:
 * - GET /raid/loot-pool?raidType=NOTG
 * - GET /gambit                  today's gambits
 * - GET /aspects/list            players who uploaded aspects
 * - GET /aspects?playerUuid=...  one player's aspect counts
 *
 * Non-200 responses resolve to null. Transport errors on pool and gambit
 * requests are left to the caller (the cached feeds isolate them); player
 * lookups catch them and resolve to null.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type {
  Gambit,
  GambitSource,
  PlayerAspect,
  PlayerProgressSource,
  PoolDataSource,
  PoolPayload,
} from '../contracts/lootpool.types.js';
import {
  parseGambits,
  parsePlayerAspects,
  parsePoolPayload,
  parseUploadedPlayers,
} from '../contracts/lootpool.schemas.js';
import { createConsoleLogger, type Logger } from '../../shared/runtime/host.deps.js';
import { errorMessage } from '../../../common/errors.js';

export interface WynnExtrasProviderConfig {
  baseUrl: string;
  timeout: number;
  adapter?: AxiosRequestConfig['adapter'];
  logger?: Logger;
}

const DEFAULT_CONFIG: WynnExtrasProviderConfig = {
  baseUrl: 'http://wynnextras.com',
  timeout: 10000,
};

export class WynnExtrasProvider implements PoolDataSource, GambitSource, PlayerProgressSource {
  private client: AxiosInstance;
  private config: WynnExtrasProviderConfig;
  private logger: Logger;

  constructor(config: Partial<WynnExtrasProviderConfig> = {}) {
    this.config = {
      ...config,
      baseUrl: config.baseUrl ?? DEFAULT_CONFIG.baseUrl,
      timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    };
    this.logger = this.config.logger ?? createConsoleLogger('WynnExtras');

    this.client = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      adapter: this.config.adapter,
      validateStatus: () => true,
      headers: {
        'X-Client': 'lootpool-service',
      },
    });
  }

  // ============================================
  // LOOT POOLS
  // ============================================

  async getPool(poolType: string): Promise<PoolPayload | null> {
    const response = await this.client.get<unknown>('/raid/loot-pool', {
      params: { raidType: poolType },
    });

    if (response.status !== 200) {
      this.logger.warn({ poolType, status: response.status }, 'Loot pool request rejected');
      return null;
    }

    const payload = parsePoolPayload(response.data);
    this.logger.debug?.({ poolType, items: payload.items.length }, 'Loot pool fetched');
    return payload;
  }

  // ============================================
  // GAMBITS
  // ============================================

  async getGambits(): Promise<Gambit[] | null> {
    const response = await this.client.get<unknown>('/gambit');

    if (response.status !== 200) {
      this.logger.warn({ status: response.status }, 'Gambit request rejected');
      return null;
    }
    return parseGambits(response.data);
  }

  // ============================================
  // PLAYER ASPECTS
  // ============================================

  /**
   * Aspect counts for a player name, matched case-insensitively against the
   * players who uploaded their aspects.
   */
  async getProgress(player: string): Promise<PlayerAspect[] | null> {
    try {
      const uuid = await this.findPlayerUuid(player);
      if (!uuid) return null;

      return await this.getProgressByUuid(uuid);
    } catch (error) {
      this.handleError('getProgress', error);
      return null;
    }
  }

  async getProgressByUuid(uuid: string): Promise<PlayerAspect[] | null> {
    try {
      const response = await this.client.get<unknown>('/aspects', {
        params: { playerUuid: uuid.replace(/-/g, '') },
      });
      if (response.status !== 200) return null;

      return parsePlayerAspects(response.data);
    } catch (error) {
      this.handleError('getProgressByUuid', error);
      return null;
    }
  }

  private async findPlayerUuid(player: string): Promise<string | null> {
    const response = await this.client.get<unknown>('/aspects/list');
    if (response.status !== 200) return null;

    const wanted = player.toLowerCase();
    const match = parseUploadedPlayers(response.data)
      .find((entry) => entry.playerName.toLowerCase() === wanted);
    return match?.playerUuid ?? null;
  }

  private handleError(method: string, error: unknown): void {
    this.logger.warn({ method, error: errorMessage(error) }, 'Request failed');
  }
}

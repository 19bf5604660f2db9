/**
 * Wynncraft Provider
 * Source: Wynncraft public API v3 (no key required)
 *
 * Endpoint: GET /aspects/{class} → { [aspectName]: details }
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { CategoryItem, CategorySource } from '../contracts/lootpool.types.js';
import { parseCategoryItems } from '../contracts/lootpool.schemas.js';
import { createConsoleLogger, type Logger } from '../../shared/runtime/host.deps.js';

export interface WynncraftProviderConfig {
  baseUrl: string;
  timeout: number;
  adapter?: AxiosRequestConfig['adapter'];
  logger?: Logger;
}

const DEFAULT_CONFIG: WynncraftProviderConfig = {
  baseUrl: 'https://api.wynncraft.com/v3',
  timeout: 10000,
};

export class WynncraftProvider implements CategorySource {
  private client: AxiosInstance;
  private logger: Logger;

  constructor(config: Partial<WynncraftProviderConfig> = {}) {
    const resolved = {
      ...config,
      baseUrl: config.baseUrl ?? DEFAULT_CONFIG.baseUrl,
      timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    };
    this.logger = resolved.logger ?? createConsoleLogger('Wynncraft');

    this.client = axios.create({
      baseURL: resolved.baseUrl,
      timeout: resolved.timeout,
      adapter: resolved.adapter,
      validateStatus: () => true,
    });
  }

  async getCategoryItems(category: string): Promise<CategoryItem[] | null> {
    const response = await this.client.get<unknown>(`/aspects/${encodeURIComponent(category)}`);

    if (response.status !== 200) {
      this.logger.warn({ category, status: response.status }, 'Aspect class request rejected');
      return null;
    }
    return parseCategoryItems(response.data);
  }
}

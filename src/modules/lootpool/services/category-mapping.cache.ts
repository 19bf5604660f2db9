/**
 * CATEGORY MAPPING CACHE
 * ======================
 *
 * Aspect name → class, built from one classification request per class and
 * held for an hour.
 *
 * A refresh replaces the whole mapping and only commits a non-empty one.
 * When every class fails, or the answers list no aspects, the previous
 * mapping keeps being served and its timestamp is left alone, so the next
 * call tries again.
 */

import type {
  CategoryMapping,
  CategorySource,
} from '../contracts/lootpool.types.js';
import { CATEGORIES } from '../lootpool.config.js';
import { ExpiringCache } from '../../shared/runtime/ttl-cache.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import {
  createConsoleLogger,
  type Clock,
  type Logger,
} from '../../shared/runtime/host.deps.js';
import { errorMessage } from '../../../common/errors.js';

const MAPPING_KEY = 'mapping';
const EMPTY_MAPPING: CategoryMapping = new Map();

export interface CategoryMappingCacheOptions {
  source: CategorySource;
  ttlMs?: number;
  categories?: readonly string[];
  clock?: Clock;
  logger?: Logger;
}

export class CategoryMappingCache {
  private readonly cache: ExpiringCache<string, CategoryMapping>;
  private readonly refreshes = new RequestCoalescer<CategoryMapping>();
  private readonly source: CategorySource;
  private readonly categories: readonly string[];
  private readonly logger: Logger;

  constructor(options: CategoryMappingCacheOptions) {
    this.source = options.source;
    this.categories = options.categories ?? CATEGORIES;
    this.logger = options.logger ?? createConsoleLogger('CategoryMapping');
    this.cache = new ExpiringCache({
      ttlMs: options.ttlMs ?? 60 * 60 * 1000, // 1 hour
      clock: options.clock,
    });
  }

  async getMapping(): Promise<CategoryMapping> {
    const cached = this.cache.get(MAPPING_KEY);
    if (cached) return cached;

    return this.refreshes.run(MAPPING_KEY, () => this.refresh());
  }

  async getCategory(name: string): Promise<string | null> {
    const mapping = await this.getMapping();
    return mapping.get(name) ?? null;
  }

  stats() {
    return this.cache.stats();
  }

  private async refresh(): Promise<CategoryMapping> {
    const results = await Promise.allSettled(
      this.categories.map((category) => this.source.getCategoryItems(category)),
    );

    const mapping = new Map<string, string>();
    let succeeded = 0;

    results.forEach((result, i) => {
      const category = this.categories[i];
      if (result.status === 'rejected') {
        this.logger.warn({ category, error: errorMessage(result.reason) }, 'Class request failed');
        return;
      }
      if (result.value === null) {
        this.logger.warn({ category }, 'Class request returned no data');
        return;
      }

      succeeded++;
      for (const item of result.value) {
        mapping.set(item.name, category);
      }
    });

    if (succeeded === 0 || mapping.size === 0) {
      const stale = this.cache.peek(MAPPING_KEY);
      this.logger.warn(
        { categories: this.categories.length, answered: succeeded, staleEntries: stale?.value.size ?? 0 },
        'Mapping refresh failed, keeping previous mapping',
      );
      return stale?.value ?? EMPTY_MAPPING;
    }

    this.cache.put(MAPPING_KEY, mapping);
    this.logger.info({ entries: mapping.size, classes: succeeded }, 'Mapping refreshed');
    return mapping;
  }
}

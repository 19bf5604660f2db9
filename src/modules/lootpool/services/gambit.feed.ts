/**
 * GAMBIT FEED
 * ===========
 *
 * Today's gambits behind the same cache + single-flight pair the pool
 * aggregator uses. A missing or failed answer resolves to null and is not
 * cached, so the next call asks upstream again.
 */

import type { GambitSnapshot, GambitSource } from '../contracts/lootpool.types.js';
import { ExpiringCache } from '../../shared/runtime/ttl-cache.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import {
  createConsoleLogger,
  defaultClock,
  type Clock,
  type Logger,
} from '../../shared/runtime/host.deps.js';
import { errorMessage } from '../../../common/errors.js';

const GAMBITS_KEY = 'gambits';

export interface GambitFeedOptions {
  source: GambitSource;
  ttlMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export class GambitFeed {
  private readonly cache: ExpiringCache<string, GambitSnapshot>;
  private readonly inflight = new RequestCoalescer<GambitSnapshot | null>();
  private readonly source: GambitSource;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: GambitFeedOptions) {
    this.source = options.source;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? createConsoleLogger('GambitFeed');
    this.cache = new ExpiringCache({
      ttlMs: options.ttlMs ?? 5 * 60 * 1000, // 5 minutes
      clock: this.clock,
    });
  }

  async getToday(): Promise<GambitSnapshot | null> {
    const cached = this.cache.get(GAMBITS_KEY);
    if (cached) return cached;

    return this.inflight.run(GAMBITS_KEY, () => this.load());
  }

  stats() {
    return {
      ...this.cache.stats(),
      inFlight: this.inflight.size(),
    };
  }

  private async load(): Promise<GambitSnapshot | null> {
    try {
      const gambits = await this.source.getGambits();
      if (!gambits) {
        this.logger.warn({}, 'No gambit data from upstream');
        return null;
      }

      const snapshot: GambitSnapshot = { gambits, fetchedAt: this.clock.now() };
      this.cache.put(GAMBITS_KEY, snapshot);
      this.logger.info({ gambits: gambits.length }, 'Gambits fetched');
      return snapshot;
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Gambit fetch failed');
      return null;
    }
  }
}

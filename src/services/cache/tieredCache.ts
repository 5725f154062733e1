// Memory-first cache over an optional shared tier
import { z } from 'zod';
import type { FetchedSource, PipelineResponse, SearchHit } from '@/types/core';
import { errorMessage } from '@/core/errors';
import { logger } from '@/services/logger';
import type { CacheBackend, CacheEntry } from './cacheBackend';

export type CacheCategory = 'enhancement' | 'search' | 'fetch' | 'response';

export interface CacheValueMap {
  enhancement: readonly string[];
  search: readonly SearchHit[];
  fetch: FetchedSource;
  response: PipelineResponse;
}

const searchHitSchema = z.object({
  url: z.string(),
  title: z.string(),
  snippet: z.string(),
  provider: z.string(),
  rank: z.number(),
  score: z.number(),
});

const valueSchemas: { [C in CacheCategory]: z.ZodType<CacheValueMap[C]> } = {
  enhancement: z.array(z.string()),
  search: z.array(searchHitSchema),
  fetch: z.object({
    url: z.string(),
    title: z.string(),
    extractedText: z.string(),
    fetchStatus: z.enum(['ok', 'failed', 'truncated']),
  }),
  response: z.object({
    query: z.string(),
    answer: z.string(),
    sources: z.array(z.string()),
    confidence: z.number(),
    processing_time: z.number(),
    cached: z.boolean(),
    cost_estimate: z.number(),
    timestamp: z.string(),
    degraded: z.boolean(),
  }),
};

export const DEFAULT_TTL_SECONDS: Record<CacheCategory, number> = {
  enhancement: 3600,
  search: 1800,
  fetch: 7200,
  response: 14400,
};

export const CACHE_CATEGORIES: readonly CacheCategory[] = ['enhancement', 'search', 'fetch', 'response'];

export interface TieredCacheOptions {
  ttlSeconds?: Partial<Record<CacheCategory, number>>;
  /** Memory-tier expiry sweep interval (ms). */
  sweepIntervalMs?: number;
  now?: () => number;
}

export interface TierCounters {
  hits: number;
  misses: number;
  errors: number;
}

export interface CacheStats {
  memory: TierCounters;
  shared: (TierCounters & { available: boolean; name: string }) | null;
  writes: number;
  /** Memory-tier entries pushed out by the capacity limit. */
  evictions: number;
  pendingSharedWrites: number;
  hitRate: number;
}

export class TieredCache {
  private readonly ttlSeconds: Record<CacheCategory, number>;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly pendingWrites = new Set<Promise<void>>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly memoryCounters: TierCounters = { hits: 0, misses: 0, errors: 0 };
  private readonly sharedCounters: TierCounters = { hits: 0, misses: 0, errors: 0 };
  private writes = 0;

  constructor(
    private readonly memory: CacheBackend,
    private readonly shared: CacheBackend | null = null,
    options: TieredCacheOptions = {},
  ) {
    this.ttlSeconds = { ...DEFAULT_TTL_SECONDS, ...options.ttlSeconds };
    this.sweepIntervalMs = options.sweepIntervalMs ?? 5 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  /** Stops the sweep, waits for queued shared writes, then closes both tiers. */
  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.flush();
    if (this.shared) await this.shared.close();
    await this.memory.close();
  }

  async flush(): Promise<void> {
    await Promise.allSettled(Array.from(this.pendingWrites));
  }

  async get<C extends CacheCategory>(key: string, category: C): Promise<CacheValueMap[C] | null> {
    const fullKey = cacheKey(category, key);

    const local = await this.readTier(this.memory, fullKey, this.memoryCounters);
    if (local) {
      const value = this.decode(local, category);
      if (value !== null) return value;
      await this.memory.delete(fullKey);
    }

    if (!this.shared || !this.shared.isAvailable()) return null;
    const remote = await this.readTier(this.shared, fullKey, this.sharedCounters);
    if (!remote) return null;

    const value = this.decode(remote, category);
    if (value === null) return null;
    // back-fill keeps the shared entry's expiry
    await this.memory.set({ ...remote, lastAccessed: this.now() });
    return value;
  }

  async set<C extends CacheCategory>(key: string, value: CacheValueMap[C], category: C): Promise<void> {
    const now = this.now();
    const entry: CacheEntry = {
      key: cacheKey(category, key),
      value,
      createdAt: now,
      expiresAt: now + this.ttlSeconds[category] * 1000,
      lastAccessed: now,
    };
    this.writes += 1;
    await this.memory.set(entry);

    const shared = this.shared;
    if (!shared || !shared.isAvailable()) return;
    const write: Promise<void> = shared
      .set(entry)
      .catch((err: unknown) => {
        this.sharedCounters.errors += 1;
        logger.warn('cache:shared_write_failed', { key: entry.key, error: errorMessage(err) });
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }

  /** Drops a key from both tiers; every category when none is given. */
  async invalidate(key: string, category?: CacheCategory): Promise<void> {
    const categories = category ? [category] : CACHE_CATEGORIES;
    for (const c of categories) {
      const fullKey = cacheKey(c, key);
      await this.memory.delete(fullKey);
      if (this.shared && this.shared.isAvailable()) {
        try {
          await this.shared.delete(fullKey);
        } catch (err) {
          this.sharedCounters.errors += 1;
          logger.warn('cache:shared_delete_failed', { key: fullKey, error: errorMessage(err) });
        }
      }
    }
  }

  sweep(): number {
    const removed = this.memory.purgeExpired?.() ?? 0;
    if (removed > 0) logger.debug('cache:swept', { removed });
    return removed;
  }

  hasSharedTier(): boolean {
    return this.shared !== null && this.shared.isAvailable();
  }

  stats(): CacheStats {
    const hits = this.memoryCounters.hits + this.sharedCounters.hits;
    // every lookup ends in exactly one hit or one memory-then-shared miss
    const lookups = this.memoryCounters.hits + this.memoryCounters.misses;
    return {
      memory: { ...this.memoryCounters },
      shared: this.shared
        ? { ...this.sharedCounters, available: this.shared.isAvailable(), name: this.shared.name }
        : null,
      writes: this.writes,
      evictions: this.memory.evictionCount?.() ?? 0,
      pendingSharedWrites: this.pendingWrites.size,
      hitRate: lookups === 0 ? 0 : hits / lookups,
    };
  }

  private async readTier(tier: CacheBackend, key: string, counters: TierCounters): Promise<CacheEntry | null> {
    try {
      const entry = await tier.get(key);
      if (entry) counters.hits += 1;
      else counters.misses += 1;
      return entry;
    } catch (err) {
      counters.errors += 1;
      counters.misses += 1;
      logger.warn('cache:read_failed', { tier: tier.name, key, error: errorMessage(err) });
      return null;
    }
  }

  private decode<C extends CacheCategory>(entry: CacheEntry, category: C): CacheValueMap[C] | null {
    const schema: z.ZodType<CacheValueMap[C]> = valueSchemas[category];
    const parsed = schema.safeParse(entry.value);
    if (parsed.success) return parsed.data;
    logger.warn('cache:invalid_value', { key: entry.key, category });
    return null;
  }
}

function cacheKey(category: CacheCategory, key: string): string {
  return `${category}:${key}`;
}

// Shared Redis tier; reads as a miss whenever Redis is unavailable
import Redis from 'ioredis';
import { logger } from '@/services/logger';
import { cacheEntrySchema, type CacheBackend, type CacheEntry } from './cacheBackend';

function redisError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis';

  private constructor(
    private readonly client: Redis,
    private readonly keyPrefix: string,
    private readonly now: () => number,
  ) {}

  /**
   * Connects and pings once. Returns null (and logs) when Redis cannot be
   * reached, so callers run memory-only.
   */
  static async connect(
    redisUrl: string,
    options: { keyPrefix?: string; now?: () => number } = {},
  ): Promise<RedisCacheBackend | null> {
    const client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      lazyConnect: true,
      retryStrategy(times) {
        if (times > 3) return null;
        return Math.min(times * 200, 2000);
      },
    });

    client.on('error', (err: Error) => {
      logger.warn('redis:error', { error: redisError(err) });
    });

    try {
      await client.connect();
      await client.ping();
      logger.info('redis:connected');
      return new RedisCacheBackend(client, options.keyPrefix ?? 'answer:', options.now ?? Date.now);
    } catch (err) {
      logger.warn('redis:connect_failed', { error: redisError(err) });
      client.disconnect();
      return null;
    }
  }

  isAvailable(): boolean {
    return this.client.status === 'ready';
  }

  async get(key: string): Promise<CacheEntry | null> {
    if (!this.isAvailable()) return null;
    const raw = await this.client.get(this.keyPrefix + key);
    if (!raw) return null;

    const parsed = cacheEntrySchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.warn('redis:malformed_entry', { key });
      return null;
    }
    const entry: CacheEntry = parsed.data;
    return entry.expiresAt > this.now() ? entry : null;
  }

  async set(entry: CacheEntry): Promise<void> {
    if (!this.isAvailable()) return;
    const ttlMs = Math.max(1, Math.round(entry.expiresAt - this.now()));
    await this.client.set(this.keyPrefix + entry.key, JSON.stringify(entry), 'PX', ttlMs);
  }

  async delete(key: string): Promise<void> {
    if (!this.isAvailable()) return;
    await this.client.del(this.keyPrefix + key);
  }

  async close(): Promise<void> {
    if (this.client.status === 'end') return;
    await this.client.quit();
  }
}

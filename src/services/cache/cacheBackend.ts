// Storage contract shared by both cache tiers
import { z } from 'zod';

export interface CacheEntry {
  readonly key: string;
  /** JSON-serializable payload; validated per category on read. */
  readonly value: unknown;
  readonly createdAt: number;
  readonly expiresAt: number;
  readonly lastAccessed: number;
}

export const cacheEntrySchema = z.object({
  key: z.string(),
  value: z.unknown(),
  createdAt: z.number(),
  expiresAt: z.number(),
  lastAccessed: z.number(),
});

/**
 * One tier of the cache. Implementations own their own expiry: an expired
 * entry must read as null.
 */
export interface CacheBackend {
  readonly name: string;
  get(key: string): Promise<CacheEntry | null>;
  set(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  isAvailable(): boolean;
  /** Removes expired entries eagerly; backends with native TTL may omit it. */
  purgeExpired?(): number;
  /** Entries dropped to stay within capacity, for tiers that have one. */
  evictionCount?(): number;
  close(): Promise<void>;
}

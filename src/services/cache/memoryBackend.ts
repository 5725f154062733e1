import { LRUCache } from 'lru-cache';
import type { CacheBackend, CacheEntry } from './cacheBackend';

export class MemoryCacheBackend implements CacheBackend {
  readonly name: string;
  private readonly lru: LRUCache<string, CacheEntry>;
  private evictions = 0;

  constructor(
    maxEntries: number = 1000,
    private readonly now: () => number = Date.now,
    name = 'memory',
  ) {
    this.name = name;
    this.lru = new LRUCache<string, CacheEntry>({
      max: maxEntries,
      dispose: (_value, _key, reason) => {
        if (reason === 'evict') this.evictions++;
      },
    });
  }

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.lru.get(key);
    if (!entry) return null;

    const now = this.now();
    if (entry.expiresAt <= now) {
      this.lru.delete(key);
      return null;
    }

    const touched: CacheEntry = { ...entry, lastAccessed: now };
    this.lru.set(key, touched);
    return touched;
  }

  async set(entry: CacheEntry): Promise<void> {
    this.lru.set(entry.key, entry);
  }

  async delete(key: string): Promise<void> {
    this.lru.delete(key);
  }

  isAvailable(): boolean {
    return true;
  }

  purgeExpired(): number {
    const now = this.now();
    const expired: string[] = [];
    for (const [key, entry] of this.lru.entries()) {
      if (entry.expiresAt <= now) expired.push(key);
    }
    for (const key of expired) this.lru.delete(key);
    return expired.length;
  }

  get size(): number {
    return this.lru.size;
  }

  evictionCount(): number {
    return this.evictions;
  }

  async close(): Promise<void> {
    this.lru.clear();
  }
}

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TieredCache } from '@/services/cache/tieredCache';
import { MemoryCacheBackend } from '@/services/cache/memoryBackend';
import type { CacheBackend, CacheEntry } from '@/services/cache/cacheBackend';

class BrokenBackend implements CacheBackend {
  readonly name = 'broken';
  closed = false;

  async get(): Promise<CacheEntry | null> {
    throw new Error('connection reset');
  }

  async set(): Promise<void> {
    throw new Error('connection reset');
  }

  async delete(): Promise<void> {
    throw new Error('connection reset');
  }

  isAvailable(): boolean {
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('TieredCache', () => {
  let t: number;
  const now = () => t;

  beforeEach(() => {
    t = 1_000_000;
  });

  it('returns what was stored for the same category', async () => {
    const cache = new TieredCache(new MemoryCacheBackend(10, now), null, { now });
    await cache.set('q', ['a', 'b'], 'enhancement');

    expect(await cache.get('q', 'enhancement')).toEqual(['a', 'b']);
    expect(await cache.get('q', 'search')).toBeNull();
  });

  it('expires entries after the category TTL', async () => {
    const cache = new TieredCache(new MemoryCacheBackend(10, now), null, { now, ttlSeconds: { enhancement: 10 } });
    await cache.set('q', ['a'], 'enhancement');

    t += 9_999;
    expect(await cache.get('q', 'enhancement')).toEqual(['a']);
    t += 1;
    expect(await cache.get('q', 'enhancement')).toBeNull();
  });

  it('drops a stored value that does not match its category shape', async () => {
    const memory = new MemoryCacheBackend(10, now);
    const cache = new TieredCache(memory, null, { now });
    await memory.set({ key: 'search:q', value: { bad: true }, createdAt: t, expiresAt: t + 1000, lastAccessed: t });

    expect(await cache.get('q', 'search')).toBeNull();
    expect(memory.size).toBe(0);
  });

  it('back-fills memory from the shared tier', async () => {
    const shared = new MemoryCacheBackend(10, now, 'shared');
    const writer = new TieredCache(new MemoryCacheBackend(10, now), shared, { now });
    await writer.set('q', ['a'], 'enhancement');
    await writer.flush();

    const reader = new TieredCache(new MemoryCacheBackend(10, now), shared, { now });
    expect(await reader.get('q', 'enhancement')).toEqual(['a']);
    expect(await reader.get('q', 'enhancement')).toEqual(['a']);

    const stats = reader.stats();
    expect(stats.memory).toEqual({ hits: 1, misses: 1, errors: 0 });
    expect(stats.shared).toMatchObject({ hits: 1, misses: 0, available: true, name: 'shared' });
    expect(stats.hitRate).toBe(1);
  });

  it('keeps the shared expiry when back-filling', async () => {
    const shared = new MemoryCacheBackend(10, now, 'shared');
    const writer = new TieredCache(new MemoryCacheBackend(10, now), shared, { now, ttlSeconds: { search: 10 } });
    await writer.set('q', [], 'search');
    await writer.flush();

    t += 5_000;
    const reader = new TieredCache(new MemoryCacheBackend(10, now), shared, { now, ttlSeconds: { search: 3600 } });
    expect(await reader.get('q', 'search')).toEqual([]);
    t += 5_000;
    expect(await reader.get('q', 'search')).toBeNull();
  });

  it('reads a failing shared tier as a miss', async () => {
    const cache = new TieredCache(new MemoryCacheBackend(10, now), new BrokenBackend(), { now });
    expect(await cache.get('q', 'enhancement')).toBeNull();
    expect(cache.stats().shared).toMatchObject({ hits: 0, misses: 1, errors: 1 });
  });

  it('does not fail a write when the shared tier rejects it', async () => {
    const cache = new TieredCache(new MemoryCacheBackend(10, now), new BrokenBackend(), { now });
    await expect(cache.set('q', ['a'], 'enhancement')).resolves.toBeUndefined();
    await cache.flush();

    expect(cache.stats()).toMatchObject({ writes: 1, pendingSharedWrites: 0 });
    expect(cache.stats().shared?.errors).toBe(1);
    expect(await cache.get('q', 'enhancement')).toEqual(['a']);
  });

  it('invalidates a key in every category', async () => {
    const cache = new TieredCache(new MemoryCacheBackend(10, now), null, { now });
    await cache.set('k', ['a'], 'enhancement');
    await cache.set('k', [], 'search');
    await cache.invalidate('k');

    expect(await cache.get('k', 'enhancement')).toBeNull();
    expect(await cache.get('k', 'search')).toBeNull();
  });

  it('evicts the least recently used entry at capacity', async () => {
    const cache = new TieredCache(new MemoryCacheBackend(2, now), null, { now });
    await cache.set('a', ['a'], 'enhancement');
    await cache.set('b', ['b'], 'enhancement');
    expect(await cache.get('a', 'enhancement')).toEqual(['a']);
    await cache.set('c', ['c'], 'enhancement');

    expect(await cache.get('b', 'enhancement')).toBeNull();
    expect(await cache.get('a', 'enhancement')).toEqual(['a']);
    expect(await cache.get('c', 'enhancement')).toEqual(['c']);
    expect(cache.stats().evictions).toBe(1);
  });

  it('sweeps expired memory entries', async () => {
    const cache = new TieredCache(new MemoryCacheBackend(10, now), null, { now, ttlSeconds: { enhancement: 1 } });
    await cache.set('a', ['a'], 'enhancement');
    await cache.set('b', ['b'], 'enhancement');
    t += 1_000;
    expect(cache.sweep()).toBe(2);
  });

  it('closes the shared tier on stop', async () => {
    const shared = new BrokenBackend();
    const closeSpy = vi.spyOn(shared, 'close');
    const cache = new TieredCache(new MemoryCacheBackend(10, now), shared, { now });
    cache.start();
    await cache.stop();
    expect(closeSpy).toHaveBeenCalledTimes(1);
  });
});

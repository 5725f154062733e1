// Parallel fan-out, URL dedupe and deterministic ranking
import type { SearchHit } from '@/types/core';
import type { SearchProvider } from '@/types/collaborators';
import { errorMessage, NoUsableSourcesError } from '@/core/errors';
import { logger } from '@/services/logger';
import { searchKey } from '@/services/fingerprint';
import type { TieredCache } from '@/services/cache/tieredCache';
import type { DependencyGuard } from '@/services/dependencyGuard';
import type { RunContext } from '@/services/runContext';

const TRACKING_PARAMS = new Set(['gclid', 'fbclid', 'msclkid', 'mc_cid', 'mc_eid', 'igshid', 'ref', 'ref_src']);

/**
 * Lower-case scheme and host, no fragment, no tracking parameters, no trailing
 * slash on the path. Returns null for anything that is not an http(s) URL.
 */
export function canonicalUrl(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  const kept = new URLSearchParams();
  for (const [k, v] of url.searchParams) {
    const key = k.toLowerCase();
    if (key.startsWith('utm_') || TRACKING_PARAMS.has(key)) continue;
    kept.append(k, v);
  }
  const query = kept.toString();
  const path = url.pathname.replace(/\/+$/, '');
  // URL already lower-cases scheme and host
  return `${url.protocol}//${url.host}${path}${query ? `?${query}` : ''}`;
}

/** Orders by score desc, then provider position asc, then URL. */
function compareHits(a: SearchHit, b: SearchHit): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.rank !== b.rank) return a.rank - b.rank;
  if (a.url !== b.url) return a.url < b.url ? -1 : 1;
  return a.provider < b.provider ? -1 : a.provider > b.provider ? 1 : 0;
}

/**
 * Merges hit lists by canonical URL; for a duplicate the better-ranked copy
 * wins, independent of the order the lists arrive in.
 */
export function mergeHits(lists: ReadonlyArray<readonly SearchHit[]>): SearchHit[] {
  const byUrl = new Map<string, SearchHit>();
  for (const list of lists) {
    for (const hit of list) {
      const url = canonicalUrl(hit.url);
      if (!url) continue;
      const candidate: SearchHit = { ...hit, url };
      const existing = byUrl.get(url);
      if (!existing || compareHits(candidate, existing) < 0) byUrl.set(url, candidate);
    }
  }
  return Array.from(byUrl.values());
}

/** Sorts and assigns final 1-based ranks. */
export function rankHits(hits: readonly SearchHit[], limit?: number): SearchHit[] {
  const sorted = [...hits].sort(compareHits);
  const top = limit === undefined ? sorted : sorted.slice(0, limit);
  return top.map((hit, i) => ({ ...hit, rank: i + 1 }));
}

export interface SearchAggregatorOptions {
  timeoutMs: number;
}

interface QueryOutcome {
  hits: SearchHit[];
  /** A provider answered, or the merged set came from cache. */
  usable: boolean;
}

export class SearchAggregator {
  constructor(
    private readonly providers: readonly SearchProvider[],
    private readonly guard: DependencyGuard,
    private readonly cache: TieredCache,
    private readonly options: SearchAggregatorOptions,
  ) {}

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  /**
   * Searches every query on every provider and returns the merged, ranked set.
   * Throws NoUsableSourcesError when nothing usable came back.
   */
  async search(queries: readonly string[], limit: number, ctx: RunContext): Promise<SearchHit[]> {
    if (this.providers.length === 0) {
      throw new NoUsableSourcesError('search', 'no search providers configured');
    }

    const outcomes = await Promise.all(queries.map((q) => this.searchQuery(q, limit, ctx)));
    if (!outcomes.some((o) => o.usable)) {
      throw new NoUsableSourcesError('search', `all providers failed (${this.providerNames.join(', ')})`);
    }

    const merged = rankHits(mergeHits(outcomes.map((o) => o.hits)));
    if (merged.length === 0) {
      throw new NoUsableSourcesError('search', 'providers returned no hits');
    }
    logger.info('search:merged', {
      fingerprint: ctx.fingerprint,
      queries: queries.length,
      hits: merged.length,
      failedProviders: Array.from(ctx.failedProviders),
    });
    return merged;
  }

  private async searchQuery(query: string, limit: number, ctx: RunContext): Promise<QueryOutcome> {
    const key = searchKey(query, limit);
    const cached = await this.cache.get(key, 'search');
    if (cached) return { hits: [...cached], usable: true };

    const settled = await Promise.allSettled(
      this.providers.map((provider) =>
        this.guard.call(
          ctx,
          { dependency: provider.name, estimatedCost: provider.costPerCall, timeoutMs: this.options.timeoutMs },
          (signal) => provider.search(query, limit, signal),
        ),
      ),
    );

    const lists: SearchHit[][] = [];
    settled.forEach((result, i) => {
      const provider = this.providers[i].name;
      if (result.status === 'fulfilled') {
        lists.push(result.value);
        return;
      }
      ctx.failedProviders.add(provider);
      ctx.absorb(provider, result.reason);
      logger.warn('search:provider_failed', { provider, query: query.slice(0, 60), error: errorMessage(result.reason) });
    });

    if (lists.length === 0) return { hits: [], usable: false };

    const merged = mergeHits(lists);
    await this.cache.set(key, merged, 'search');
    return { hits: merged, usable: true };
  }
}

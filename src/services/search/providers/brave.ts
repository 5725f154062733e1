// Brave Search web results
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SearchHit } from '@/types/core';
import type { SearchProvider } from '@/types/collaborators';
import { logger } from '@/services/logger';
import { retryWithBackoff, type RetryOptions } from '@/utils/retryWithBackoff';
import { isRateLimited, toDependencyError } from '@/utils/httpErrors';
import { relevanceScore } from '../relevance';

const BRAVE_API_URL = 'https://api.search.brave.com/res/v1/web/search';
/** Largest page the API returns. */
const BRAVE_MAX_COUNT = 20;

const braveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            url: z.string(),
            title: z.string().default(''),
            description: z.string().default(''),
          }),
        )
        .default([]),
    })
    .optional(),
});

export interface BraveSearchOptions {
  apiKey: string;
  costPerCall?: number;
  retry?: RetryOptions;
  http?: AxiosInstance;
}

export class BraveSearchProvider implements SearchProvider {
  readonly name = 'brave';
  readonly costPerCall: number;
  private readonly http: AxiosInstance;

  constructor(private readonly options: BraveSearchOptions) {
    this.costPerCall = options.costPerCall ?? 0.005;
    this.http = options.http ?? axios.create();
  }

  async search(query: string, limit: number, signal: AbortSignal): Promise<SearchHit[]> {
    const data = await retryWithBackoff(
      async () => {
        try {
          const res = await this.http.get<unknown>(BRAVE_API_URL, {
            params: {
              q: query,
              count: Math.min(limit, BRAVE_MAX_COUNT),
              search_lang: 'en',
              country: 'US',
              safesearch: 'moderate',
            },
            headers: {
              Accept: 'application/json',
              'Accept-Encoding': 'gzip',
              'X-Subscription-Token': this.options.apiKey,
            },
            signal,
          });
          return res.data;
        } catch (err) {
          throw toDependencyError(this.name, err);
        }
      },
      { ...this.options.retry, shouldRetry: isRateLimited, signal, label: this.name },
    );

    const parsed = braveResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw toDependencyError(this.name, new Error('unexpected response shape'));
    }

    const results = parsed.data.web?.results ?? [];
    const hits = results.slice(0, limit).map(
      (item, i): SearchHit => ({
        url: item.url,
        title: item.title,
        snippet: item.description,
        provider: this.name,
        rank: i + 1,
        score: relevanceScore(query, item.title, item.description),
      }),
    );
    logger.debug('brave:results', { query: query.slice(0, 60), count: hits.length });
    return hits;
  }
}

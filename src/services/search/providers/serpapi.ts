// Google results through SerpApi
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SearchHit } from '@/types/core';
import type { SearchProvider } from '@/types/collaborators';
import { logger } from '@/services/logger';
import { retryWithBackoff, type RetryOptions } from '@/utils/retryWithBackoff';
import { isRateLimited, toDependencyError } from '@/utils/httpErrors';
import { relevanceScore } from '../relevance';

const SERPAPI_URL = 'https://serpapi.com/search';

const serpApiResponseSchema = z.object({
  error: z.string().optional(),
  organic_results: z
    .array(
      z.object({
        link: z.string(),
        title: z.string().default(''),
        snippet: z.string().default(''),
        position: z.number().optional(),
      }),
    )
    .default([]),
});

export interface SerpApiOptions {
  apiKey: string;
  costPerCall?: number;
  retry?: RetryOptions;
  http?: AxiosInstance;
}

export class SerpApiSearchProvider implements SearchProvider {
  readonly name = 'serpapi';
  readonly costPerCall: number;
  private readonly http: AxiosInstance;

  constructor(private readonly options: SerpApiOptions) {
    this.costPerCall = options.costPerCall ?? 0.02;
    this.http = options.http ?? axios.create();
  }

  async search(query: string, limit: number, signal: AbortSignal): Promise<SearchHit[]> {
    const data = await retryWithBackoff(
      async () => {
        try {
          const res = await this.http.get<unknown>(SERPAPI_URL, {
            params: {
              q: query,
              api_key: this.options.apiKey,
              engine: 'google',
              num: Math.min(limit, 20),
              hl: 'en',
              gl: 'us',
              safe: 'active',
              output: 'json',
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

    const parsed = serpApiResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw toDependencyError(this.name, new Error('unexpected response shape'));
    }
    // an empty result page is reported through `error` too
    if (parsed.data.error && !/returned any results/i.test(parsed.data.error)) {
      throw toDependencyError(this.name, new Error(parsed.data.error));
    }

    const hits = parsed.data.organic_results.slice(0, limit).map(
      (item, i): SearchHit => ({
        url: item.link,
        title: item.title,
        snippet: item.snippet,
        provider: this.name,
        rank: item.position ?? i + 1,
        score: relevanceScore(query, item.title, item.snippet, item.position),
      }),
    );
    logger.debug('serpapi:results', { query: query.slice(0, 60), count: hits.length });
    return hits;
  }
}

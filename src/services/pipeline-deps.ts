// Builds the pipeline and its collaborators from settings
import OpenAI from 'openai';
import type { Settings } from '@/config/settings';
import type { SearchProvider, AuditSink } from '@/types/collaborators';
import type { CostRecord } from '@/types/core';
import { CircuitBreakerRegistry } from '@/stability/circuitBreaker';
import { CostTracker, type Budget } from '@/stability/costTracker';
import { MemoryCacheBackend } from '@/services/cache/memoryBackend';
import { RedisCacheBackend } from '@/services/cache/redisBackend';
import { TieredCache } from '@/services/cache/tieredCache';
import { HeuristicQueryEnhancer } from '@/services/queryEnhancer';
import { BraveSearchProvider } from '@/services/search/providers/brave';
import { SerpApiSearchProvider } from '@/services/search/providers/serpapi';
import { WebContentFetcher } from '@/services/contentFetcher';
import { OpenAISynthesizer, openAICompletion, type CompletionFn } from '@/services/answerSynthesizer';
import { SearchPipeline } from '@/services/pipeline';
import { SqliteAuditSink } from '@/db';
import { logger } from '@/services/logger';

function budget(daily: number | undefined, monthly: number | undefined): Budget {
  return { daily, monthly };
}

/** Without an API key the model is unavailable, so every run degrades to excerpts. */
function missingKeyCompletion(): CompletionFn {
  return async () => {
    throw new Error('OPENAI_API_KEY is not set');
  };
}

/**
 * Wires every component from settings. Redis and the audit database are
 * optional: the pipeline runs memory-only and unaudited without them.
 */
export async function createPipeline(settings: Settings): Promise<SearchPipeline> {
  const shared = settings.REDIS_URL ? await RedisCacheBackend.connect(settings.REDIS_URL) : null;
  const cache = new TieredCache(new MemoryCacheBackend(settings.MEMORY_CACHE_SIZE), shared, {
    ttlSeconds: {
      enhancement: settings.CACHE_TTL_QUERY_ENHANCEMENT,
      search: settings.CACHE_TTL_SEARCH_RESULTS,
      fetch: settings.CACHE_TTL_CONTENT,
      response: settings.CACHE_TTL_FINAL_RESPONSE,
    },
  });

  const audit: AuditSink | null = settings.AUDIT_DB_PATH ? SqliteAuditSink.open(settings.AUDIT_DB_PATH) : null;

  const breakers = new CircuitBreakerRegistry({
    failureThreshold: settings.BREAKER_FAILURE_THRESHOLD,
    failureWindowMs: settings.BREAKER_WINDOW_MS,
    openDurationMs: settings.BREAKER_OPEN_MS,
    maxOpenDurationMs: settings.BREAKER_MAX_OPEN_MS,
  });

  const costs = new CostTracker(
    {
      global: budget(settings.DAILY_BUDGET_USD, settings.MONTHLY_BUDGET_USD),
      providers: {
        brave: budget(settings.BRAVE_DAILY_BUDGET, settings.BRAVE_MONTHLY_BUDGET),
        serpapi: budget(settings.SERPAPI_DAILY_BUDGET, settings.SERPAPI_MONTHLY_BUDGET),
        content_fetcher: budget(settings.ZENROWS_DAILY_BUDGET, settings.ZENROWS_MONTHLY_BUDGET),
      },
    },
    Date.now,
    audit ? (record: CostRecord) => audit.appendCost(record) : undefined,
  );

  const providers: SearchProvider[] = [];
  if (settings.BRAVE_SEARCH_API_KEY) providers.push(new BraveSearchProvider({ apiKey: settings.BRAVE_SEARCH_API_KEY }));
  if (settings.SERPAPI_API_KEY) providers.push(new SerpApiSearchProvider({ apiKey: settings.SERPAPI_API_KEY }));
  if (providers.length === 0) {
    logger.warn('pipeline:no_search_providers', { hint: 'set BRAVE_SEARCH_API_KEY or SERPAPI_API_KEY' });
  }

  const synthesizer = new OpenAISynthesizer({
    model: settings.LLM_MODEL,
    maxTokens: settings.LLM_MAX_TOKENS,
    temperature: settings.LLM_TEMPERATURE,
    costPer1kTokens: settings.LLM_COST_PER_1K_TOKENS,
    complete: settings.OPENAI_API_KEY
      ? openAICompletion(new OpenAI({ apiKey: settings.OPENAI_API_KEY, maxRetries: 0 }))
      : missingKeyCompletion(),
  });

  return new SearchPipeline(
    {
      cache,
      breakers,
      costs,
      enhancer: new HeuristicQueryEnhancer(),
      providers,
      fetcher: new WebContentFetcher({
        maxContentLength: settings.MAX_CONTENT_LENGTH,
        zenrowsApiKey: settings.ZENROWS_API_KEY,
      }),
      synthesizer,
      audit,
    },
    {
      timeouts: {
        enhanceMs: settings.ENHANCE_TIMEOUT_MS,
        searchMs: settings.SEARCH_TIMEOUT_MS,
        fetchMs: settings.FETCH_TIMEOUT_MS,
        synthesizeMs: settings.SYNTHESIS_TIMEOUT_MS,
        requestMs: settings.REQUEST_TIMEOUT_MS,
      },
      fetchConcurrency: settings.FETCH_CONCURRENCY,
    },
  );
}

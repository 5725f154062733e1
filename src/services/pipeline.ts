// Request orchestration: enhance → search → fetch → synthesize
import pLimit from 'p-limit';
import {
  degraded,
  failed,
  success,
  type CircuitState,
  type FetchedSource,
  type PipelineResponse,
  type SearchHit,
  type SearchRequest,
  type StageResult,
  type SynthesisResult,
} from '@/types/core';
import type {
  AnswerSynthesizer,
  AuditSink,
  ContentFetcher,
  QueryEnhancer,
  SearchProvider,
} from '@/types/collaborators';
import { errorMessage, NoUsableSourcesError, PipelineError, PipelineTimeoutError } from '@/core/errors';
import type { CircuitBreakerRegistry } from '@/stability/circuitBreaker';
import type { CostStats, CostTracker } from '@/stability/costTracker';
import type { CacheStats, TieredCache } from '@/services/cache/tieredCache';
import { logger } from '@/services/logger';
import { enhancementKey, fetchKey, requestFingerprint } from './fingerprint';
import { SingleFlight } from './singleFlight';
import { DependencyGuard } from './dependencyGuard';
import { RunContext } from './runContext';
import { SearchAggregator, rankHits } from './search/aggregator';
import { createRunMetrics, type MetricsCallback, type RunMetricsCollector } from './pipeline-metrics';
import { buildHealthReport, type HealthReport } from './health';

export const DEGRADED_CONFIDENCE = 0.3;
/** Sources quoted in an answer built without synthesis. */
const FALLBACK_SOURCE_COUNT = 3;
const FALLBACK_EXCERPT_CHARS = 300;

export interface StageTimeouts {
  enhanceMs: number;
  searchMs: number;
  fetchMs: number;
  synthesizeMs: number;
  /** Whole-request deadline. */
  requestMs: number;
}

export const DEFAULT_TIMEOUTS: StageTimeouts = {
  enhanceMs: 3_000,
  searchMs: 10_000,
  fetchMs: 15_000,
  synthesizeMs: 30_000,
  requestMs: 30_000,
};

export interface PipelineDeps {
  cache: TieredCache;
  breakers: CircuitBreakerRegistry;
  costs: CostTracker;
  enhancer: QueryEnhancer;
  providers: readonly SearchProvider[];
  fetcher: ContentFetcher;
  synthesizer: AnswerSynthesizer;
  audit?: AuditSink | null;
}

export interface PipelineOptions {
  timeouts?: Partial<StageTimeouts>;
  fetchConcurrency?: number;
  now?: () => number;
  onMetrics?: MetricsCallback;
}

export interface RunOptions {
  /** Detaches this caller only; the shared run continues for other waiters. */
  signal?: AbortSignal;
}

export interface RequestCounters {
  total: number;
  /** Callers that joined an identical in-flight run. */
  joined: number;
  cacheHits: number;
  completed: number;
  degraded: number;
  failed: number;
  inFlight: number;
}

export interface PipelineStats {
  requests: RequestCounters;
  cache: CacheStats;
  breakers: CircuitState[];
  costs: CostStats;
  absorbedFailures: Record<string, number>;
  uptimeSeconds: number;
}

interface Progress {
  hits: SearchHit[];
  sources: FetchedSource[];
}

export class SearchPipeline {
  private readonly guard: DependencyGuard;
  private readonly aggregator: SearchAggregator;
  private readonly flights = new SingleFlight<PipelineResponse>();
  private readonly timeouts: StageTimeouts;
  private readonly fetchConcurrency: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly counters = { total: 0, joined: 0, cacheHits: 0, completed: 0, degraded: 0, failed: 0 };
  private readonly absorbed = new Map<string, number>();

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions = {},
  ) {
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.fetchConcurrency = Math.max(1, options.fetchConcurrency ?? 4);
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.guard = new DependencyGuard(deps.breakers, deps.costs);
    this.aggregator = new SearchAggregator(deps.providers, this.guard, deps.cache, {
      timeoutMs: this.timeouts.searchMs,
    });
  }

  start(): void {
    this.deps.cache.start();
    this.deps.costs.start();
    logger.info('pipeline:started', {
      providers: this.aggregator.providerNames,
      sharedCache: this.deps.cache.hasSharedTier(),
      audit: Boolean(this.deps.audit),
    });
  }

  async stop(): Promise<void> {
    this.deps.costs.stop();
    await this.deps.cache.stop();
    if (this.deps.audit) await this.deps.audit.close();
    logger.info('pipeline:stopped');
  }

  /**
   * Answers one request. Identical concurrent requests share a single run.
   * Rejects with NoUsableSourcesError or PipelineTimeoutError only when no
   * partial answer exists.
   */
  run(request: SearchRequest, options: RunOptions = {}): Promise<PipelineResponse> {
    this.counters.total += 1;
    const fingerprint = requestFingerprint(request);
    const { promise, shared } = this.flights.do(fingerprint, () => this.execute(request, fingerprint), options.signal);
    if (shared) {
      this.counters.joined += 1;
      logger.debug('pipeline:joined_inflight', { fingerprint });
    }
    return promise;
  }

  stats(): PipelineStats {
    return {
      requests: { ...this.counters, inFlight: this.flights.size },
      cache: this.deps.cache.stats(),
      breakers: this.deps.breakers.snapshots(),
      costs: this.deps.costs.stats(),
      absorbedFailures: Object.fromEntries(this.absorbed),
      uptimeSeconds: Math.round((this.now() - this.startedAt) / 1000),
    };
  }

  health(): HealthReport {
    return buildHealthReport(this.stats(), this.aggregator.providerNames, this.now());
  }

  private async execute(request: SearchRequest, fingerprint: string): Promise<PipelineResponse> {
    const startedAt = this.now();
    const metrics = createRunMetrics(fingerprint, this.now, this.options.onMetrics);

    const hit = await this.deps.cache.get(fingerprint, 'response');
    if (hit) {
      this.counters.cacheHits += 1;
      const response: PipelineResponse = {
        ...hit,
        // same fingerprint, possibly different spelling: echo this caller's query
        query: request.query,
        cached: true,
        processing_time: this.elapsed(startedAt),
      };
      logger.info('pipeline:cache_hit', { fingerprint });
      metrics.finish('cached', 0);
      this.deps.audit?.appendResponse(fingerprint, response);
      return response;
    }

    const deadline = new AbortController();
    const timer = setTimeout(
      () => deadline.abort(new PipelineTimeoutError(this.timeouts.requestMs)),
      this.timeouts.requestMs,
    );
    const ctx = new RunContext(fingerprint, deadline.signal);
    const partial: Progress = { hits: [], sources: [] };

    try {
      const { answer, isDegraded } = await this.runStages(request, ctx, partial, metrics);
      return await this.finalize(request, ctx, answer, isDegraded, startedAt, metrics);
    } catch (err) {
      if (deadline.signal.aborted) {
        const fallback = this.partialAnswer(partial, 'request deadline exceeded');
        if (fallback) {
          ctx.degradedReason = 'request deadline exceeded';
          logger.warn('pipeline:deadline_partial', { fingerprint, sources: partial.sources.length, hits: partial.hits.length });
          return await this.finalize(request, ctx, fallback, true, startedAt, metrics);
        }
        const timeout = new PipelineTimeoutError(this.timeouts.requestMs);
        this.fail(ctx, metrics, timeout);
        throw timeout;
      }
      this.fail(ctx, metrics, err);
      throw err;
    } finally {
      clearTimeout(timer);
      this.tallyAbsorbed(ctx);
    }
  }

  private async runStages(
    request: SearchRequest,
    ctx: RunContext,
    partial: Progress,
    metrics: RunMetricsCollector,
  ): Promise<{ answer: SynthesisResult; isDegraded: boolean }> {
    let endStage = metrics.startStage('enhance');
    const enhanced = await this.enhanceStage(request.query, ctx);
    endStage();
    const queries = enhanced.status === 'failed' ? [request.query.trim()] : enhanced.value;
    ctx.enhancedQueries = queries;
    metrics.recordQueries(queries.length);
    throwIfExpired(ctx);

    endStage = metrics.startStage('search');
    const searched = await this.searchStage(queries, request.maxResults, ctx);
    endStage();
    metrics.recordFailedProviders(Array.from(ctx.failedProviders));
    if (searched.status === 'failed') throw searched.error;
    partial.hits = searched.value;
    metrics.recordHits(searched.value.length);
    throwIfExpired(ctx);

    endStage = metrics.startStage('fetch');
    const fetched = await this.fetchStage(searched.value, ctx, partial);
    endStage();
    metrics.recordFetch(partial.sources.length, ctx.droppedSources.length);
    if (fetched.status === 'failed') throw fetched.error;
    throwIfExpired(ctx);

    endStage = metrics.startStage('synthesize');
    const synthesized = await this.synthesizeStage(request.query, fetched.value, ctx);
    endStage();
    if (synthesized.status === 'failed') throw synthesized.error;
    if (synthesized.status === 'degraded') ctx.degradedReason = synthesized.reason;
    return { answer: synthesized.value, isDegraded: synthesized.status === 'degraded' };
  }

  /** Never fails the run: any problem falls back to the raw query. */
  private async enhanceStage(query: string, ctx: RunContext): Promise<StageResult<string[]>> {
    const original = query.trim();
    const key = enhancementKey(original);
    const cached = await this.deps.cache.get(key, 'enhancement');
    if (cached && cached.length > 0) return success([...cached]);

    const { enhancer } = this.deps;
    try {
      const result = await this.guard.call(
        ctx,
        { dependency: enhancer.name, estimatedCost: 0, timeoutMs: this.timeouts.enhanceMs },
        (signal) => enhancer.enhance(original, signal),
      );
      if (result.length === 0) return degraded([original], 'enhancer returned no queries');
      const queries = uniqueQueries([original, ...result]);
      await this.deps.cache.set(key, queries, 'enhancement');
      return success(queries);
    } catch (err) {
      ctx.absorb(enhancer.name, err);
      logger.warn('pipeline:enhance_fallback', { fingerprint: ctx.fingerprint, error: errorMessage(err) });
      return degraded([original], errorMessage(err));
    }
  }

  private async searchStage(queries: string[], maxResults: number, ctx: RunContext): Promise<StageResult<SearchHit[]>> {
    try {
      const merged = await this.aggregator.search(queries, maxResults, ctx);
      const ranked = rankHits(merged, maxResults);
      return ctx.failedProviders.size > 0
        ? degraded(ranked, `providers failed: ${Array.from(ctx.failedProviders).join(', ')}`)
        : success(ranked);
    } catch (err) {
      return failed(err instanceof Error ? err : new Error(errorMessage(err)));
    }
  }

  /** Bounded-concurrency fetch; failures drop the source. Keeps hit order. */
  private async fetchStage(hits: SearchHit[], ctx: RunContext, partial: Progress): Promise<StageResult<FetchedSource[]>> {
    const limit = pLimit(this.fetchConcurrency);
    const { fetcher } = this.deps;

    const results = await Promise.all(
      hits.map((hit) =>
        limit(async (): Promise<FetchedSource | null> => {
          const key = fetchKey(hit.url);
          const cached = await this.deps.cache.get(key, 'fetch');
          if (cached && cached.fetchStatus !== 'failed') return cached;
          try {
            const source = await this.guard.call(
              ctx,
              { dependency: fetcher.name, estimatedCost: fetcher.costPerRequest, timeoutMs: this.timeouts.fetchMs },
              (signal) => fetcher.fetch(hit.url, signal, hit.title),
            );
            if (source.fetchStatus === 'failed' || !source.extractedText.trim()) {
              ctx.droppedSources.push({ url: hit.url, reason: 'no extractable content' });
              return null;
            }
            await this.deps.cache.set(key, source, 'fetch');
            return source;
          } catch (err) {
            ctx.absorb(fetcher.name, err);
            ctx.droppedSources.push({ url: hit.url, reason: errorMessage(err) });
            return null;
          }
        }),
      ),
    );

    const sources = results.filter((s): s is FetchedSource => s !== null);
    partial.sources = sources;
    if (sources.length === 0) {
      return failed(new NoUsableSourcesError('fetch', `all ${hits.length} fetches failed`));
    }
    const dropped = hits.length - sources.length;
    if (dropped > 0) {
      logger.info('pipeline:sources_dropped', { fingerprint: ctx.fingerprint, dropped, kept: sources.length });
      return degraded(sources, `${dropped} of ${hits.length} sources dropped`);
    }
    return success(sources);
  }

  /** Synthesis problems degrade the answer instead of failing the run. */
  private async synthesizeStage(
    query: string,
    sources: FetchedSource[],
    ctx: RunContext,
  ): Promise<StageResult<SynthesisResult>> {
    const { synthesizer } = this.deps;
    try {
      const result = await this.guard.call(
        ctx,
        {
          dependency: synthesizer.name,
          estimatedCost: synthesizer.estimateCost(query, sources),
          timeoutMs: this.timeouts.synthesizeMs,
          actualCost: (r: SynthesisResult) => r.cost ?? 0,
        },
        (signal) => synthesizer.synthesize(query, sources, signal),
      );
      return success(result);
    } catch (err) {
      ctx.absorb(synthesizer.name, err);
      logger.warn('pipeline:synthesis_degraded', { fingerprint: ctx.fingerprint, error: errorMessage(err) });
      return degraded(fallbackFromSources(sources), errorMessage(err));
    }
  }

  /** Best answer available when the deadline cut the run short. */
  private partialAnswer(partial: Progress, reason: string): SynthesisResult | null {
    if (partial.sources.length > 0) return fallbackFromSources(partial.sources);
    if (partial.hits.length > 0) return fallbackFromHits(partial.hits);
    logger.debug('pipeline:no_partial', { reason });
    return null;
  }

  private async finalize(
    request: SearchRequest,
    ctx: RunContext,
    answer: SynthesisResult,
    isDegraded: boolean,
    startedAt: number,
    metrics: RunMetricsCollector,
  ): Promise<PipelineResponse> {
    const response: PipelineResponse = {
      query: request.query,
      answer: answer.answerText,
      sources: request.includeSources ? [...answer.sourcesUsed] : [],
      confidence: isDegraded ? DEGRADED_CONFIDENCE : answer.confidence,
      processing_time: this.elapsed(startedAt),
      cached: false,
      cost_estimate: ctx.totalCost(),
      timestamp: new Date(this.now()).toISOString(),
      degraded: isDegraded,
    };

    if (isDegraded) {
      this.counters.degraded += 1;
    } else {
      await this.deps.cache.set(ctx.fingerprint, response, 'response');
    }
    this.counters.completed += 1;
    this.deps.audit?.appendResponse(ctx.fingerprint, response);

    metrics.finish(isDegraded ? 'degraded' : 'success', response.cost_estimate);
    logger.info('pipeline:completed', {
      ...ctx.diagnostics(),
      degraded: isDegraded,
      sources: response.sources.length,
      costUsd: response.cost_estimate,
      seconds: response.processing_time,
    });
    return response;
  }

  private fail(ctx: RunContext, metrics: RunMetricsCollector, err: unknown): void {
    this.counters.failed += 1;
    const code = err instanceof PipelineError ? err.code : 'internal';
    metrics.finish('failed', ctx.totalCost(), code);
    logger.warn('pipeline:failed', { ...ctx.diagnostics(), code, error: errorMessage(err) });
  }

  private tallyAbsorbed(ctx: RunContext): void {
    for (const a of ctx.absorbed) {
      const key = `${a.dependency}:${a.code}`;
      this.absorbed.set(key, (this.absorbed.get(key) ?? 0) + 1);
    }
  }

  private elapsed(startedAt: number): number {
    return Math.round(Math.max(0, this.now() - startedAt)) / 1000;
  }
}

function throwIfExpired(ctx: RunContext): void {
  ctx.signal.throwIfAborted();
}

function uniqueQueries(queries: string[]): string[] {
  const seen = new Set<string>();
  return queries.filter((q) => {
    const key = q.trim().toLowerCase();
    if (!key || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function excerpt(text: string): string {
  return text.length > FALLBACK_EXCERPT_CHARS ? `${text.slice(0, FALLBACK_EXCERPT_CHARS).trimEnd()}...` : text;
}

/** Answer assembled from the top source excerpts when synthesis is unavailable. */
export function fallbackFromSources(sources: readonly FetchedSource[]): SynthesisResult {
  const top = sources.slice(0, FALLBACK_SOURCE_COUNT);
  const lines = top.map((s, i) => `${i + 1}. ${s.title}: ${excerpt(s.extractedText)}`);
  return {
    answerText: `An AI-generated answer is unavailable right now. Key excerpts from the top sources:\n\n${lines.join('\n\n')}`,
    confidence: DEGRADED_CONFIDENCE,
    sourcesUsed: top.map((s) => s.url),
  };
}

export function fallbackFromHits(hits: readonly SearchHit[]): SynthesisResult {
  const top = hits.slice(0, FALLBACK_SOURCE_COUNT);
  const lines = top.map((h, i) => `${i + 1}. ${h.title}: ${excerpt(h.snippet)}`);
  return {
    answerText: `An AI-generated answer is unavailable right now. Top search results:\n\n${lines.join('\n\n')}`,
    confidence: DEGRADED_CONFIDENCE,
    sourcesUsed: top.map((h) => h.url),
  };
}

// src/services/pipeline-metrics.ts
// Per-run metrics: one `pipeline_metrics` log line per run, optionally pushed to a callback.
import { logger } from './logger';

export type RunOutcome = 'success' | 'degraded' | 'cached' | 'failed';

export interface RunMetrics {
  fingerprint: string;
  outcome: RunOutcome;
  /** Enhanced queries searched. */
  queryCount: number;
  hitCount: number;
  fetchedCount: number;
  droppedCount: number;
  failedProviders: string[];
  /** Stage → elapsed ms, for the stages that ran. */
  stageMs: Record<string, number>;
  costUsd: number;
  durationMs: number;
  errorCode?: string;
}

export type MetricsCallback = (metrics: RunMetrics) => void;

export interface RunMetricsCollector {
  recordQueries(count: number): void;
  recordHits(count: number): void;
  recordFetch(fetched: number, dropped: number): void;
  recordFailedProviders(providers: string[]): void;
  /** Starts a stage timer; call the returned function when the stage ends. */
  startStage(stage: string): () => void;
  finish(outcome: RunOutcome, costUsd: number, errorCode?: string): RunMetrics;
}

export function createRunMetrics(
  fingerprint: string,
  now: () => number = Date.now,
  callback?: MetricsCallback,
): RunMetricsCollector {
  const startedAt = now();
  const stageMs: Record<string, number> = {};
  const state: Pick<RunMetrics, 'queryCount' | 'hitCount' | 'fetchedCount' | 'droppedCount' | 'failedProviders'> = {
    queryCount: 0,
    hitCount: 0,
    fetchedCount: 0,
    droppedCount: 0,
    failedProviders: [],
  };

  return {
    recordQueries(count) {
      state.queryCount = count;
    },
    recordHits(count) {
      state.hitCount = count;
    },
    recordFetch(fetched, dropped) {
      state.fetchedCount = fetched;
      state.droppedCount = dropped;
    },
    recordFailedProviders(providers) {
      state.failedProviders = providers;
    },
    startStage(stage) {
      const t0 = now();
      return () => {
        stageMs[stage] = now() - t0;
      };
    },
    finish(outcome, costUsd, errorCode) {
      const metrics: RunMetrics = {
        fingerprint,
        outcome,
        ...state,
        stageMs,
        costUsd,
        durationMs: now() - startedAt,
        errorCode,
      };
      logger.info('pipeline_metrics', metrics);
      if (callback) {
        try {
          callback(metrics);
        } catch (err) {
          logger.warn('pipeline_metrics:callback_failed', { err: err instanceof Error ? err.message : String(err) });
        }
      }
      return metrics;
    },
  };
}

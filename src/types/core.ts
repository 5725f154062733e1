// Request, stage and response shapes shared by the pipeline

/** Accepted request; immutable once validated. */
export interface SearchRequest {
  readonly query: string;
  readonly maxResults: number;
  readonly includeSources: boolean;
}

export interface SearchHit {
  /** Canonical URL; dedupe key within a merged set. */
  readonly url: string;
  readonly title: string;
  readonly snippet: string;
  readonly provider: string;
  /** 1-based position after ranking (provider position before merge). */
  readonly rank: number;
  /** Relevance in [0,1]. */
  readonly score: number;
}

export type FetchStatus = 'ok' | 'failed' | 'truncated';

export interface FetchedSource {
  readonly url: string;
  readonly title: string;
  readonly extractedText: string;
  readonly fetchStatus: FetchStatus;
}

export interface SynthesisResult {
  readonly answerText: string;
  readonly confidence: number;
  readonly sourcesUsed: readonly string[];
  /** Metered cost reported by the model call, when the deployment bills it. */
  readonly cost?: number;
}

/** Terminal artifact returned to callers. Field names are the wire names. */
export interface PipelineResponse {
  readonly query: string;
  readonly answer: string;
  readonly sources: readonly string[];
  readonly confidence: number;
  /** Seconds. */
  readonly processing_time: number;
  readonly cached: boolean;
  /** USD. */
  readonly cost_estimate: number;
  /** ISO-8601. */
  readonly timestamp: string;
  /** True when the answer was built without synthesis. */
  readonly degraded: boolean;
}

export interface CostRecord {
  readonly provider: string;
  readonly amount: number;
  readonly timestamp: number;
  readonly requestFingerprint: string;
}

export type CircuitStatus = 'closed' | 'open' | 'half_open';

export interface CircuitState {
  readonly dependency: string;
  readonly status: CircuitStatus;
  readonly failureCount: number;
  readonly lastFailureAt: number | null;
  readonly openedUntil: number | null;
}

export type StageName = 'enhance' | 'search' | 'fetch' | 'synthesize';

/**
 * Explicit stage outcome consumed by the orchestrator's sequencing logic.
 */
export type StageResult<T> =
  | { readonly status: 'success'; readonly value: T }
  | { readonly status: 'degraded'; readonly value: T; readonly reason: string }
  | { readonly status: 'failed'; readonly error: Error };

export function success<T>(value: T): StageResult<T> {
  return { status: 'success', value };
}

export function degraded<T>(value: T, reason: string): StageResult<T> {
  return { status: 'degraded', value, reason };
}

export function failed<T>(error: Error): StageResult<T> {
  return { status: 'failed', error };
}

/** Source that was dropped during a run, kept for diagnostics. */
export interface DroppedSource {
  readonly url: string;
  readonly reason: string;
}

export interface RunDiagnostics {
  readonly fingerprint: string;
  readonly enhancedQueries: readonly string[];
  readonly failedProviders: readonly string[];
  readonly droppedSources: readonly DroppedSource[];
  readonly degradedReason?: string;
}

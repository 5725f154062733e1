// Contracts of the external services the pipeline drives
import type { CostRecord, FetchedSource, PipelineResponse, SearchHit, SynthesisResult } from './core';

export interface QueryEnhancer {
  readonly name: string;
  /** Search-ready query strings, original first. */
  enhance(query: string, signal: AbortSignal): Promise<string[]>;
}

export interface SearchProvider {
  readonly name: string;
  /** USD per call. */
  readonly costPerCall: number;
  search(query: string, limit: number, signal: AbortSignal): Promise<SearchHit[]>;
}

export interface ContentFetcher {
  readonly name: string;
  /** USD per fetched URL. */
  readonly costPerRequest: number;
  fetch(url: string, signal: AbortSignal, title?: string): Promise<FetchedSource>;
}

export interface AnswerSynthesizer {
  readonly name: string;
  estimateCost(query: string, sources: readonly FetchedSource[]): number;
  synthesize(query: string, sources: readonly FetchedSource[], signal: AbortSignal): Promise<SynthesisResult>;
}

/** Write-only sink for finalized responses and cost records. Must not throw into the caller. */
export interface AuditSink {
  appendResponse(fingerprint: string, response: PipelineResponse): void;
  appendCost(record: CostRecord): void;
  close(): Promise<void>;
}

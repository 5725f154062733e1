// Per-run bookkeeping shared by the stages of one pipeline run
import type { CostRecord, DroppedSource, RunDiagnostics } from '@/types/core';
import { errorMessage, PipelineError } from '@/core/errors';

export interface AbsorbedFailure {
  readonly dependency: string;
  readonly code: string;
  readonly message: string;
}

export class RunContext {
  readonly costRecords: CostRecord[] = [];
  readonly failedProviders = new Set<string>();
  readonly droppedSources: DroppedSource[] = [];
  readonly absorbed: AbsorbedFailure[] = [];
  enhancedQueries: readonly string[] = [];
  degradedReason: string | undefined;

  constructor(
    readonly fingerprint: string,
    /** Aborted when the run's deadline elapses. */
    readonly signal: AbortSignal,
  ) {}

  absorb(dependency: string, err: unknown): void {
    this.absorbed.push({
      dependency,
      code: err instanceof PipelineError ? err.code : 'unknown',
      message: errorMessage(err),
    });
  }

  /** Sum of the cost records attributed to this run. */
  totalCost(): number {
    let total = 0;
    for (const r of this.costRecords) total += r.amount;
    return Math.round(total * 1e6) / 1e6;
  }

  diagnostics(): RunDiagnostics {
    return {
      fingerprint: this.fingerprint,
      enhancedQueries: this.enhancedQueries,
      failedProviders: Array.from(this.failedProviders),
      droppedSources: this.droppedSources,
      degradedReason: this.degradedReason,
    };
  }
}

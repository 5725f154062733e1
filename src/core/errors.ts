// Typed failures of the answer pipeline

export type ErrorCode =
  | 'validation_error'
  | 'dependency_unavailable'
  | 'dependency_failure'
  | 'no_usable_sources'
  | 'pipeline_timeout';

export type FailureKind =
  | 'rate_limit'
  | 'timeout'
  | 'not_found'
  | 'blocked'
  | 'model_unavailable'
  | 'error';

export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends PipelineError {
  readonly code = 'validation_error' as const;

  constructor(
    message: string,
    readonly issues: ReadonlyArray<{ path: string; message: string }> = [],
  ) {
    super(message);
  }
}

/** Breaker open or budget denied: the collaborator was never called. */
export class DependencyUnavailableError extends PipelineError {
  readonly code = 'dependency_unavailable' as const;

  constructor(
    readonly dependency: string,
    readonly reason: 'circuit_open' | 'budget_denied',
    detail?: string,
  ) {
    super(`${dependency} unavailable (${reason})${detail ? `: ${detail}` : ''}`);
  }
}

/** The collaborator was called and failed or timed out. */
export class DependencyFailureError extends PipelineError {
  readonly code = 'dependency_failure' as const;

  constructor(
    readonly dependency: string,
    readonly kind: FailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${dependency} failed (${kind}): ${message}`, options);
  }
}

export class NoUsableSourcesError extends PipelineError {
  readonly code = 'no_usable_sources' as const;

  constructor(
    readonly stage: 'search' | 'fetch',
    detail: string,
  ) {
    super(`no usable sources after ${stage}: ${detail}`);
  }
}

export class PipelineTimeoutError extends PipelineError {
  readonly code = 'pipeline_timeout' as const;

  constructor(readonly timeoutMs: number) {
    super(`request exceeded ${timeoutMs}ms before any usable result`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** HTTP status for errors that reach the API surface. */
export function httpStatusFor(err: unknown): number {
  if (!(err instanceof PipelineError)) return 500;
  switch (err.code) {
    case 'validation_error':
      return 400;
    case 'no_usable_sources':
      return 502;
    case 'pipeline_timeout':
      return 504;
    case 'dependency_unavailable':
      return 503;
    case 'dependency_failure':
      return 502;
  }
}

// Per-dependency circuit breakers and their registry
import { DependencyFailureError, DependencyUnavailableError, errorMessage } from '@/core/errors';
import type { CircuitState, CircuitStatus } from '@/types/core';
import { logger } from '@/services/logger';

export interface CircuitBreakerConfig {
  /** Failures inside the window that open the circuit. */
  failureThreshold: number;
  /** Sliding window for counting failures while closed (ms). */
  failureWindowMs: number;
  /** First open period (ms). */
  openDurationMs: number;
  /** Multiplier applied to the open period after each failed trial. */
  backoffMultiplier: number;
  maxOpenDurationMs: number;
}

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  failureWindowMs: 60_000,
  openDurationMs: 30_000,
  backoffMultiplier: 2,
  maxOpenDurationMs: 300_000,
};

export interface ExecuteOptions {
  /** Per-call deadline; elapsing counts as a dependency failure. */
  timeoutMs?: number;
  /** Caller-side cancellation; does not count against the dependency. */
  signal?: AbortSignal;
}

class CallTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
  }
}

export class CircuitBreaker {
  private status: CircuitStatus = 'closed';
  /** Timestamps of counted failures while closed, oldest first. */
  private failures: number[] = [];
  private lastFailureAt: number | null = null;
  private openedUntil: number | null = null;
  /** Consecutive failed half-open trials; drives the open-period backoff. */
  private reopenCount = 0;
  private trialInFlight = false;
  /** Bumped on every state change; a call only reports back into the state it was admitted under. */
  private generation = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(
    readonly dependency: string,
    config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...config };
  }

  /**
   * Runs `fn` under breaker protection. Throws DependencyUnavailableError
   * without calling `fn` while open (or while a half-open trial is running).
   */
  async execute<T>(fn: (signal: AbortSignal) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    this.admit();
    const isTrial = this.status === 'half_open';
    if (isTrial) this.trialInFlight = true;
    const admittedIn = this.generation;

    const controller = new AbortController();
    const callerSignal = options.signal;
    let timer: NodeJS.Timeout | undefined;
    let onCallerAbort: (() => void) | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      if (options.timeoutMs !== undefined) {
        const err = new CallTimeoutError(options.timeoutMs);
        timer = setTimeout(() => {
          reject(err);
          controller.abort(err);
        }, options.timeoutMs);
      }
      if (callerSignal) {
        onCallerAbort = () => {
          const reason = abortReason(callerSignal);
          reject(reason);
          controller.abort(reason);
        };
        if (callerSignal.aborted) onCallerAbort();
        else callerSignal.addEventListener('abort', onCallerAbort, { once: true });
      }
    });

    try {
      const result = await Promise.race([invoke(fn, controller.signal), interrupted]);
      if (admittedIn === this.generation) this.onSuccess();
      return result;
    } catch (err) {
      const timedOut = controller.signal.reason instanceof CallTimeoutError;
      if (callerSignal?.aborted && !timedOut) {
        // caller went away; the dependency did nothing wrong
        if (isTrial && admittedIn === this.generation) this.trialInFlight = false;
        throw err;
      }
      if (admittedIn === this.generation) this.onFailure();
      throw toDependencyFailure(this.dependency, timedOut ? controller.signal.reason : err);
    } finally {
      if (timer) clearTimeout(timer);
      if (callerSignal && onCallerAbort) callerSignal.removeEventListener('abort', onCallerAbort);
    }
  }

  /** Would a call be admitted right now? Does not reserve the half-open trial. */
  isCallPermitted(): boolean {
    this.refresh();
    if (this.status === 'open') return false;
    if (this.status === 'half_open') return !this.trialInFlight;
    return true;
  }

  snapshot(): CircuitState {
    this.refresh();
    return {
      dependency: this.dependency,
      status: this.status,
      failureCount: this.failures.length,
      lastFailureAt: this.lastFailureAt,
      openedUntil: this.openedUntil,
    };
  }

  reset(): void {
    this.transition('closed');
    this.failures = [];
    this.lastFailureAt = null;
    this.reopenCount = 0;
  }

  private admit(): void {
    this.refresh();
    if (this.status === 'open') {
      throw new DependencyUnavailableError(this.dependency, 'circuit_open');
    }
    if (this.status === 'half_open' && this.trialInFlight) {
      throw new DependencyUnavailableError(this.dependency, 'circuit_open', 'trial call in progress');
    }
  }

  /** Time-driven transitions: open → half_open, stale failures out of the window. */
  private refresh(): void {
    const now = this.now();
    if (this.status === 'open' && this.openedUntil !== null && now >= this.openedUntil) {
      this.transition('half_open');
      this.trialInFlight = false;
    }
    if (this.status === 'closed') {
      const cutoff = now - this.config.failureWindowMs;
      while (this.failures.length > 0 && this.failures[0] <= cutoff) {
        this.failures.shift();
      }
    }
  }

  private onSuccess(): void {
    if (this.status === 'half_open') {
      this.trialInFlight = false;
      this.failures = [];
      this.reopenCount = 0;
      this.transition('closed');
      return;
    }
    // one success forgives one failure, so isolated errors do not flap the circuit
    this.failures.shift();
  }

  private onFailure(): void {
    const now = this.now();
    this.lastFailureAt = now;

    if (this.status === 'half_open') {
      this.trialInFlight = false;
      this.reopenCount += 1;
      this.open(now);
      return;
    }
    this.failures.push(now);
    if (this.failures.length >= this.config.failureThreshold) {
      this.open(now);
    }
  }

  private open(now: number): void {
    const { openDurationMs, backoffMultiplier, maxOpenDurationMs } = this.config;
    const duration = Math.min(openDurationMs * Math.pow(backoffMultiplier, this.reopenCount), maxOpenDurationMs);
    this.openedUntil = now + duration;
    this.transition('open');
    logger.warn('breaker:open', {
      dependency: this.dependency,
      failures: this.failures.length,
      openForMs: duration,
    });
  }

  private transition(next: CircuitStatus): void {
    if (next === this.status) return;
    const prev = this.status;
    this.status = next;
    this.generation += 1;
    if (next === 'closed') {
      this.openedUntil = null;
      this.failures = [];
    }
    logger.info('breaker:transition', { dependency: this.dependency, from: prev, to: next });
  }
}

function invoke<T>(fn: (signal: AbortSignal) => Promise<T>, signal: AbortSignal): Promise<T> {
  try {
    return fn(signal);
  } catch (err) {
    return Promise.reject(err);
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('aborted');
}

function toDependencyFailure(dependency: string, err: unknown): Error {
  if (err instanceof DependencyFailureError || err instanceof DependencyUnavailableError) return err;
  if (err instanceof CallTimeoutError) {
    return new DependencyFailureError(dependency, 'timeout', err.message, { cause: err });
  }
  return new DependencyFailureError(dependency, 'error', errorMessage(err), { cause: err });
}

/**
 * One breaker per dependency name. Each breaker owns its own state, so
 * unrelated dependencies never contend.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly defaults: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now,
    private readonly overrides: Record<string, Partial<CircuitBreakerConfig>> = {},
  ) {}

  get(dependency: string): CircuitBreaker {
    let breaker = this.breakers.get(dependency);
    if (!breaker) {
      breaker = new CircuitBreaker(dependency, { ...this.defaults, ...this.overrides[dependency] }, this.now);
      this.breakers.set(dependency, breaker);
    }
    return breaker;
  }

  snapshots(): CircuitState[] {
    return Array.from(this.breakers.values(), (b) => b.snapshot());
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) breaker.reset();
  }
}

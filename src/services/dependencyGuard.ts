// Breaker + budget gate around every collaborator call
import { DependencyUnavailableError } from '@/core/errors';
import type { CircuitBreakerRegistry } from '@/stability/circuitBreaker';
import type { CostTracker } from '@/stability/costTracker';
import type { RunContext } from './runContext';

export interface GuardedCall<T> {
  dependency: string;
  /** USD held against the budgets while the call runs. */
  estimatedCost: number;
  timeoutMs: number;
  /** Billed amount once the call succeeded; defaults to the estimate. */
  actualCost?: (value: T) => number;
}

export class DependencyGuard {
  constructor(
    readonly breakers: CircuitBreakerRegistry,
    readonly costs: CostTracker,
  ) {}

  /**
   * Short-circuits on an open breaker or a denied reservation without calling
   * `fn`. A completed metered call is recorded against the run's fingerprint;
   * a failed one releases its reservation.
   */
  async call<T>(ctx: RunContext, request: GuardedCall<T>, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    ctx.signal.throwIfAborted();
    const breaker = this.breakers.get(request.dependency);
    if (!breaker.isCallPermitted()) {
      throw new DependencyUnavailableError(request.dependency, 'circuit_open');
    }

    const reserved = this.costs.reserve(request.dependency, request.estimatedCost);
    if (!reserved.allowed) {
      throw new DependencyUnavailableError(request.dependency, 'budget_denied', reserved.reason);
    }

    let value: T;
    try {
      value = await breaker.execute(fn, { timeoutMs: request.timeoutMs, signal: ctx.signal });
    } catch (err) {
      this.costs.release(reserved.reservation);
      throw err;
    }

    const actual = request.actualCost ? request.actualCost(value) : request.estimatedCost;
    if (actual > 0) {
      ctx.costRecords.push(this.costs.record(reserved.reservation, actual, ctx.fingerprint));
    } else {
      this.costs.release(reserved.reservation);
    }
    return value;
  }
}

// Metered-call ledger and budget gate
//
// Ledger is append-only; daily and monthly totals are derived from it on demand.
// reserve() and record() never await, so on a single event loop the check and the
// bookkeeping for a provider cannot interleave with another request's.
import { randomUUID } from 'crypto';
import type { CostRecord } from '@/types/core';
import { logger } from '@/services/logger';

export interface Budget {
  daily?: number;
  monthly?: number;
}

export interface CostTrackerConfig {
  /** Applies to the sum over all providers. */
  global: Budget;
  /** Keyed by provider name. */
  providers: Record<string, Budget>;
  /** Share of a budget at which a warning is logged once per window. */
  alertThreshold: number;
  /** Interval of the boundary sweep that prunes records older than the current month (ms). */
  sweepIntervalMs: number;
}

export interface Reservation {
  readonly id: string;
  readonly provider: string;
  readonly estimated: number;
}

export type ReserveResult =
  | { readonly allowed: true; readonly reservation: Reservation }
  | { readonly allowed: false; readonly reason: string };

export interface SpendTotals {
  daily: number;
  monthly: number;
}

export interface CostStats {
  global: SpendTotals & { dailyBudget?: number; monthlyBudget?: number };
  providers: Record<string, SpendTotals & { calls: number }>;
  pendingReservations: number;
  deniedReservations: number;
}

type Window = 'daily' | 'monthly';

function dayStart(ts: number): number {
  const d = new Date(ts);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

function monthStart(ts: number): number {
  const d = new Date(ts);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1);
}

function windowKey(window: Window, ts: number): string {
  const d = new Date(ts);
  const month = `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, '0')}`;
  return window === 'monthly' ? month : `${month}-${String(d.getUTCDate()).padStart(2, '0')}`;
}

export class CostTracker {
  private readonly ledger: CostRecord[] = [];
  private readonly pending = new Map<string, Reservation>();
  private readonly alerted = new Set<string>();
  private deniedCount = 0;
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly config: CostTrackerConfig;

  constructor(
    config: Partial<CostTrackerConfig> = {},
    private readonly now: () => number = Date.now,
    private readonly onRecord?: (record: CostRecord) => void,
  ) {
    this.config = {
      global: config.global ?? {},
      providers: config.providers ?? {},
      alertThreshold: config.alertThreshold ?? 0.8,
      sweepIntervalMs: config.sweepIntervalMs ?? 60 * 60 * 1000,
    };
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.prune(), this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Holds `estimated` against every applicable budget. Denied when recorded spend
   * plus outstanding reservations plus the estimate would exceed any of them.
   */
  reserve(provider: string, estimated: number): ReserveResult {
    const ts = this.now();
    const denial = this.checkBudgets(provider, Math.max(0, estimated), ts);
    if (denial) {
      this.deniedCount += 1;
      logger.warn('cost:reserve_denied', { provider, estimated, reason: denial });
      return { allowed: false, reason: denial };
    }
    const reservation: Reservation = { id: randomUUID(), provider, estimated: Math.max(0, estimated) };
    this.pending.set(reservation.id, reservation);
    return { allowed: true, reservation };
  }

  /** Commits the actual cost of a completed call and drops its reservation. */
  record(reservation: Reservation, actual: number, requestFingerprint: string): CostRecord {
    this.pending.delete(reservation.id);
    const record: CostRecord = {
      provider: reservation.provider,
      amount: Math.max(0, actual),
      timestamp: this.now(),
      requestFingerprint,
    };
    this.ledger.push(record);
    this.checkAlerts(record.provider, record.timestamp);
    if (this.onRecord) {
      try {
        this.onRecord(record);
      } catch (err) {
        logger.warn('cost:on_record_failed', { error: err instanceof Error ? err.message : String(err) });
      }
    }
    return record;
  }

  /** The call failed before anything was billed. */
  release(reservation: Reservation): void {
    this.pending.delete(reservation.id);
  }

  /** Recorded spend for a provider (or all providers when omitted) in the current window. */
  spent(window: Window, provider?: string): number {
    const ts = this.now();
    const since = window === 'daily' ? dayStart(ts) : monthStart(ts);
    let total = 0;
    for (const r of this.ledger) {
      if (r.timestamp < since) continue;
      if (provider !== undefined && r.provider !== provider) continue;
      total += r.amount;
    }
    return total;
  }

  /** Records attributed to a request fingerprint, in insertion order. */
  recordsFor(requestFingerprint: string): CostRecord[] {
    return this.ledger.filter((r) => r.requestFingerprint === requestFingerprint);
  }

  /** Drops records from before the current month; totals for open windows are unaffected. */
  prune(): number {
    const cutoff = monthStart(this.now());
    const before = this.ledger.length;
    let keep = 0;
    for (const r of this.ledger) {
      if (r.timestamp >= cutoff) this.ledger[keep++] = r;
    }
    this.ledger.length = keep;
    const ts = this.now();
    const live = [windowKey('daily', ts), windowKey('monthly', ts)];
    for (const key of this.alerted) {
      if (!live.some((w) => key.endsWith(`:${w}`))) this.alerted.delete(key);
    }
    const removed = before - keep;
    if (removed > 0) logger.info('cost:pruned', { removed, remaining: keep });
    return removed;
  }

  stats(): CostStats {
    const providers: CostStats['providers'] = {};
    const ts = this.now();
    const today = dayStart(ts);
    const month = monthStart(ts);
    for (const r of this.ledger) {
      if (r.timestamp < month) continue;
      let p = providers[r.provider];
      if (!p) {
        p = { daily: 0, monthly: 0, calls: 0 };
        providers[r.provider] = p;
      }
      p.monthly += r.amount;
      p.calls += 1;
      if (r.timestamp >= today) p.daily += r.amount;
    }
    return {
      global: {
        daily: this.spent('daily'),
        monthly: this.spent('monthly'),
        dailyBudget: this.config.global.daily,
        monthlyBudget: this.config.global.monthly,
      },
      providers,
      pendingReservations: this.pending.size,
      deniedReservations: this.deniedCount,
    };
  }

  private held(provider?: string): number {
    let total = 0;
    for (const r of this.pending.values()) {
      if (provider === undefined || r.provider === provider) total += r.estimated;
    }
    return total;
  }

  private checkBudgets(provider: string, estimated: number, ts: number): string | null {
    const scopes: Array<{ label: string; budget: Budget; provider?: string }> = [
      { label: 'global', budget: this.config.global },
    ];
    const providerBudget = this.config.providers[provider];
    if (providerBudget) scopes.push({ label: provider, budget: providerBudget, provider });

    for (const scope of scopes) {
      for (const window of ['daily', 'monthly'] as const) {
        const limit = scope.budget[window];
        if (limit === undefined) continue;
        const committed = this.spent(window, scope.provider) + this.held(scope.provider);
        // a zero-cost call never trips a budget that is not already exhausted
        if (committed >= limit || committed + estimated > limit) {
          return `${scope.label} ${window} budget ${limit} reached (${committed.toFixed(4)} committed) at ${windowKey(window, ts)}`;
        }
      }
    }
    return null;
  }

  private checkAlerts(provider: string, ts: number): void {
    const scopes: Array<{ label: string; budget: Budget; provider?: string }> = [
      { label: 'global', budget: this.config.global },
    ];
    const providerBudget = this.config.providers[provider];
    if (providerBudget) scopes.push({ label: provider, budget: providerBudget, provider });

    for (const scope of scopes) {
      for (const window of ['daily', 'monthly'] as const) {
        const limit = scope.budget[window];
        if (limit === undefined || limit <= 0) continue;
        const key = `${scope.label}:${windowKey(window, ts)}`;
        if (this.alerted.has(key)) continue;
        const spent = this.spent(window, scope.provider);
        if (spent >= limit * this.config.alertThreshold) {
          this.alerted.add(key);
          logger.warn('cost:budget_alert', { scope: scope.label, window, spent, limit });
        }
      }
    }
  }
}

// One shared computation per key
import { errorMessage } from '@/core/errors';

export class SingleFlight<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  /**
   * Joins the in-flight computation for `key` or starts one. The entry is
   * registered before `work` first yields and removed once it settles.
   * A caller's signal detaches that caller only; the computation keeps going.
   */
  do(key: string, work: () => Promise<T>, signal?: AbortSignal): { promise: Promise<T>; shared: boolean } {
    let promise = this.inflight.get(key);
    const shared = promise !== undefined;
    if (!promise) {
      const started = Promise.resolve().then(work);
      promise = started;
      this.inflight.set(key, started);
      started.then(
        () => this.settle(key, started),
        () => this.settle(key, started),
      );
    }
    return { promise: signal ? detachable(promise, signal) : promise, shared };
  }

  get size(): number {
    return this.inflight.size;
  }

  private settle(key: string, promise: Promise<T>): void {
    if (this.inflight.get(key) === promise) this.inflight.delete(key);
  }
}

export class CallerAbortedError extends Error {
  constructor(reason: unknown) {
    super(`request aborted: ${errorMessage(reason ?? 'aborted')}`);
    this.name = 'CallerAbortedError';
  }
}

function detachable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new CallerAbortedError(signal.reason));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CallerAbortedError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

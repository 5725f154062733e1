import { describe, it, expect, vi } from 'vitest';
import { CallerAbortedError, SingleFlight } from '@/services/singleFlight';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('SingleFlight', () => {
  it('runs the work once for concurrent callers of one key', async () => {
    const flight = new SingleFlight<string>();
    const gate = deferred<string>();
    const work = vi.fn(() => gate.promise);

    const first = flight.do('k', work);
    const second = flight.do('k', work);
    expect(first.shared).toBe(false);
    expect(second.shared).toBe(true);
    expect(flight.size).toBe(1);

    gate.resolve('answer');
    await expect(Promise.all([first.promise, second.promise])).resolves.toEqual(['answer', 'answer']);
    expect(work).toHaveBeenCalledTimes(1);
    expect(flight.size).toBe(0);
  });

  it('starts a new computation after the previous one settled', async () => {
    const flight = new SingleFlight<number>();
    let calls = 0;
    const work = async () => ++calls;

    await flight.do('k', work).promise;
    const next = flight.do('k', work);
    expect(next.shared).toBe(false);
    await expect(next.promise).resolves.toBe(2);
  });

  it('shares a rejection with every joined caller and then forgets the key', async () => {
    const flight = new SingleFlight<string>();
    const gate = deferred<string>();
    const first = flight.do('k', () => gate.promise);
    const second = flight.do('k', () => gate.promise);

    gate.reject(new Error('boom'));
    await expect(first.promise).rejects.toThrow('boom');
    await expect(second.promise).rejects.toThrow('boom');
    expect(flight.size).toBe(0);
  });

  it('detaches only the caller whose signal aborts', async () => {
    const flight = new SingleFlight<string>();
    const gate = deferred<string>();
    const controller = new AbortController();

    const leaving = flight.do('k', () => gate.promise, controller.signal);
    const staying = flight.do('k', () => gate.promise);

    controller.abort();
    await expect(leaving.promise).rejects.toBeInstanceOf(CallerAbortedError);

    gate.resolve('answer');
    await expect(staying.promise).resolves.toBe('answer');
  });

  it('rejects immediately for an already aborted signal', async () => {
    const flight = new SingleFlight<string>();
    const controller = new AbortController();
    controller.abort();
    const { promise } = flight.do('k', async () => 'answer', controller.signal);
    await expect(promise).rejects.toBeInstanceOf(CallerAbortedError);
  });
});

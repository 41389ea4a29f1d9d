import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { sleep } from './sleep.js';

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the duration', async () => {
    const done = vi.fn();
    const promise = sleep(1000).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await promise;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const promise = sleep(60_000, controller.signal);

    controller.abort();
    await promise;

    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await sleep(60_000, controller.signal);
    expect(vi.getTimerCount()).toBe(0);
  });
});

import { describe, it, expect, vi } from 'vitest';
import { linearBackoff, RequestPacer, sleep } from '../src/core/rateLimit.js';

describe('linearBackoff', () => {
  it('grows with the attempt number', () => {
    expect([1, 2, 3].map(attempt => linearBackoff(600, attempt))).toEqual([600, 1200, 1800]);
  });
});

describe('RequestPacer', () => {
  it('waits out the rest of the interval between requests', async () => {
    let clock = 1000;
    const sleeper = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const pacer = new RequestPacer(300, sleeper, () => clock);

    await pacer.wait();
    expect(sleeper).not.toHaveBeenCalled();

    clock = 1100;
    await pacer.wait();
    expect(sleeper).toHaveBeenCalledWith(200, undefined);

    clock = 2000;
    await pacer.wait();
    expect(sleeper).toHaveBeenCalledTimes(1);
    expect(pacer.getState()).toEqual({ waits: 1, intervalMs: 300 });
  });
});

describe('sleep', () => {
  it('resolves immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});

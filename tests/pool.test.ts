import { describe, it, expect } from 'vitest';
import { runPool } from '../src/pool';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function trackConcurrency() {
  let inFlight = 0;
  let peak = 0;
  return {
    get peak() {
      return peak;
    },
    async run<T>(fn: () => Promise<T>): Promise<T> {
      inFlight++;
      peak = Math.max(peak, inFlight);
      try {
        return await fn();
      } finally {
        inFlight--;
      }
    },
  };
}

describe('runPool', () => {
  it('never runs more than the limit at once', async () => {
    const tracker = trackConcurrency();
    const items = [1, 2, 3, 4, 5, 6, 7];

    const report = await runPool(items, 3, (item) => tracker.run(() => sleep(5 + (item % 3) * 5)));

    expect(tracker.peak).toBe(3);
    expect(report).toEqual({ dispatched: 7, cancelled: false });
  });

  it('runs everything at once when the limit exceeds the item count', async () => {
    const tracker = trackConcurrency();

    await runPool(['a', 'b'], 10, () => tracker.run(() => sleep(5)));

    expect(tracker.peak).toBe(2);
  });

  it('serializes with a limit of one', async () => {
    const tracker = trackConcurrency();
    const seen: string[] = [];

    await runPool(['a', 'b', 'c', 'd', 'e'], 1, (item) =>
      tracker.run(async () => {
        await sleep(1);
        seen.push(item);
      }),
    );

    expect(tracker.peak).toBe(1);
    expect(seen).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('reports results in completion order with their input index', async () => {
    const settled: Array<[string, number]> = [];
    const delays: Record<string, number> = { fast: 0, medium: 15, slow: 30 };

    await runPool(
      ['slow', 'medium', 'fast'],
      3,
      async (item) => {
        await sleep(delays[item] ?? 0);
        return item;
      },
      { onSettled: (result, index) => settled.push([result, index]) },
    );

    expect(settled).toEqual([
      ['fast', 2],
      ['medium', 1],
      ['slow', 0],
    ]);
  });

  it('stops dispatching once aborted and lets in-flight work finish', async () => {
    const controller = new AbortController();
    const finished: number[] = [];

    const report = await runPool(
      [0, 1, 2, 3, 4],
      2,
      async (item) => {
        await sleep(5);
        return item;
      },
      {
        signal: controller.signal,
        onSettled: (item) => {
          finished.push(item);
          controller.abort();
        },
      },
    );

    expect(report).toEqual({ dispatched: 2, cancelled: true });
    expect(finished.sort()).toEqual([0, 1]);
  });

  it('dispatches nothing when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    const report = await runPool([1, 2], 2, async () => calls++, { signal: controller.signal });

    expect(calls).toBe(0);
    expect(report).toEqual({ dispatched: 0, cancelled: true });
  });

  it('rethrows the first worker error after in-flight work drains', async () => {
    const finished: number[] = [];

    const run = runPool([0, 1, 2, 3], 2, async (item) => {
      if (item === 0) throw new Error('boom');
      await sleep(10);
      finished.push(item);
    });

    await expect(run).rejects.toThrow('boom');
    expect(finished).toEqual([1]);
  });

  it('resolves immediately for an empty list', async () => {
    await expect(runPool([], 4, async () => undefined)).resolves.toEqual({
      dispatched: 0,
      cancelled: false,
    });
  });

  it('rejects a limit below one', async () => {
    await expect(runPool([1], 0, async () => undefined)).rejects.toThrow(RangeError);
  });
});

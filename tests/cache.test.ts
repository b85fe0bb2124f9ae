import { beforeEach, describe, it, expect, vi } from 'vitest';
import { MemoryResultCache, batchCacheKey, runCachedBatch } from '../src/cache';
import { probeCertificate } from '../src/probers/tls';
import type { BatchResult } from '../src/types';
import { MS_PER_DAY } from '../src/utils';

vi.mock('../src/probers/tls', () => ({
  probeCertificate: vi.fn(),
}));

const probeMock = vi.mocked(probeCertificate);

const NOW = new Date('2026-01-01T00:00:00Z');
const clock = () => NOW;

function fakeResult(total: number): BatchResult {
  return {
    outcomes: [],
    summary: { total, ok: total, warning: 0, error: 0 },
    buckets: [],
    port: 443,
    warnDays: 15,
    workers: 10,
    startedAt: NOW,
    completedAt: NOW,
    cancelled: false,
  };
}

describe('batchCacheKey', () => {
  const settings = { port: 443, warnDays: 15, workers: 10 };

  it('ignores host order, case, blanks and surrounding whitespace', () => {
    expect(batchCacheKey({ hosts: ['b.test', ' a.test', ''], ...settings })).toBe(
      batchCacheKey({ hosts: 'A.test\nb.test\n', ...settings }),
    );
  });

  it('distinguishes settings', () => {
    const base = batchCacheKey({ hosts: ['a.test'], ...settings });

    expect(batchCacheKey({ hosts: ['a.test'], ...settings, port: 8443 })).not.toBe(base);
    expect(batchCacheKey({ hosts: ['a.test'], ...settings, warnDays: 30 })).not.toBe(base);
    expect(batchCacheKey({ hosts: ['a.test'], ...settings, workers: 2 })).not.toBe(base);
  });

  it('encodes sorted hosts and settings', () => {
    expect(batchCacheKey({ hosts: ['b.test', 'a.test'], ...settings })).toBe(
      '{"hosts":["a.test","b.test"],"port":443,"warnDays":15,"workers":10}',
    );
  });
});

describe('MemoryResultCache', () => {
  it('stores, deletes and clears entries', () => {
    const cache = new MemoryResultCache();
    const result = fakeResult(1);

    cache.set('one', result);
    cache.set('two', result);
    expect(cache.get('one')).toBe(result);
    expect(cache.size).toBe(2);

    expect(cache.delete('one')).toBe(true);
    expect(cache.get('one')).toBeUndefined();

    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('expires entries older than maxAgeMs', () => {
    let now = 1_000;
    const cache = new MemoryResultCache({ maxAgeMs: 500, now: () => now });
    cache.set('key', fakeResult(1));

    now = 1_500;
    expect(cache.get('key')).toBeDefined();

    now = 1_501;
    expect(cache.get('key')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('drops every expired entry when storing a new one', () => {
    let now = 0;
    const cache = new MemoryResultCache({ maxAgeMs: 10, now: () => now });
    for (let i = 0; i < 500; i++) {
      cache.set(`key-${i}`, fakeResult(1));
    }

    now = 1_000_000;
    cache.set('fresh', fakeResult(1));

    expect(cache.size).toBe(1);
    expect(cache.get('fresh')).toBeDefined();
  });

  it('evicts the oldest entry beyond maxEntries', () => {
    const cache = new MemoryResultCache({ maxEntries: 2 });

    cache.set('a', fakeResult(1));
    cache.set('b', fakeResult(1));
    cache.set('a', fakeResult(1));
    cache.set('c', fakeResult(1));

    expect(cache.size).toBe(2);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBeDefined();
    expect(cache.get('c')).toBeDefined();
  });

  it('rejects a maxEntries below 1', () => {
    expect(() => new MemoryResultCache({ maxEntries: 0 })).toThrow(RangeError);
  });
});

describe('runCachedBatch', () => {
  beforeEach(() => {
    probeMock.mockReset();
    probeMock.mockResolvedValue(new Date(NOW.getTime() + 100 * MS_PER_DAY));
  });

  it('runs once and serves repeats from the cache', async () => {
    const cache = new MemoryResultCache();

    const first = await runCachedBatch(cache, ['a.test', 'b.test'], { now: clock });
    const second = await runCachedBatch(cache, ['b.test', 'a.test'], { now: clock });

    expect(first.cached).toBe(false);
    expect(second.cached).toBe(true);
    expect(second.result.summary).toEqual(first.result.summary);
    expect(probeMock).toHaveBeenCalledTimes(2);
  });

  it('returns hits in the order and spelling of the new request', async () => {
    const cache = new MemoryResultCache();

    await runCachedBatch(cache, ['A.Example.test', 'b.test'], { now: clock });
    const hit = await runCachedBatch(cache, ['B.test', 'a.example.test'], { now: clock });

    expect(hit.cached).toBe(true);
    expect(hit.result.outcomes.map((outcome) => outcome.host)).toEqual(['B.test', 'a.example.test']);
  });

  it('does not let one caller change what the next one receives', async () => {
    const cache = new MemoryResultCache();
    const freshClock = () => new Date(NOW.getTime());

    const first = await runCachedBatch(cache, ['a.test'], { now: freshClock });
    first.result.outcomes[0]?.expiry?.setTime(0);
    first.result.startedAt.setTime(0);

    const hit = await runCachedBatch(cache, ['a.test'], { now: freshClock });
    hit.result.outcomes[0]?.expiry?.setTime(0);
    const again = await runCachedBatch(cache, ['a.test'], { now: freshClock });

    expect(again.cached).toBe(true);
    expect(again.result.outcomes[0]?.expiry?.toISOString()).toBe('2026-04-11T00:00:00.000Z');
    expect(again.result.startedAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
  });

  it('misses when the settings differ', async () => {
    const cache = new MemoryResultCache();

    await runCachedBatch(cache, ['a.test'], { now: clock });
    const other = await runCachedBatch(cache, ['a.test'], { now: clock, warnDays: 30 });

    expect(other.cached).toBe(false);
    expect(probeMock).toHaveBeenCalledTimes(2);
  });

  it('bypasses and replaces the entry on refresh', async () => {
    const cache = new MemoryResultCache();

    const first = await runCachedBatch(cache, ['a.test'], { now: clock });
    const refreshed = await runCachedBatch(cache, ['a.test'], { now: clock, refresh: true });
    const after = await runCachedBatch(cache, ['a.test'], { now: clock });

    expect(refreshed.cached).toBe(false);
    expect(refreshed.result).not.toBe(first.result);
    expect(after.cached).toBe(true);
    expect(probeMock).toHaveBeenCalledTimes(2);
  });

  it('does not store a cancelled batch', async () => {
    const cache = new MemoryResultCache();
    const controller = new AbortController();

    const partial = await runCachedBatch(cache, ['a.test', 'b.test'], {
      now: clock,
      maxWorkers: 1,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    });

    expect(partial.result.cancelled).toBe(true);
    expect(cache.size).toBe(0);
  });
});

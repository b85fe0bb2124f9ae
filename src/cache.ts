import { resolveBatchSettings, runBatch, type BatchOptions } from './batch';
import { createLogger } from './log';
import type { BatchResult, ProbeOutcome } from './types';
import { normalizeHosts } from './utils';

const log = createLogger('Cache');

export interface BatchCacheKeyInput {
  hosts: readonly string[] | string;
  port: number;
  warnDays: number;
  workers: number;
}

/**
 * Key a batch by its normalized, sorted host list and settings, so the same
 * hosts in a different order hit the same entry.
 */
export function batchCacheKey(input: BatchCacheKeyInput): string {
  const hosts = normalizeHosts(input.hosts)
    .map((host) => host.toLowerCase())
    .sort();
  return JSON.stringify({ hosts, port: input.port, warnDays: input.warnDays, workers: input.workers });
}

export interface ResultCache {
  get(key: string): BatchResult | undefined;
  set(key: string, result: BatchResult): void;
  delete(key: string): boolean;
  clear(): void;
}

export interface MemoryResultCacheOptions {
  /** Entries older than this are treated as missing; unset keeps them until cleared */
  maxAgeMs?: number | undefined;
  /** Oldest entries are evicted beyond this count; unset means no limit */
  maxEntries?: number | undefined;
  now?: (() => number) | undefined;
}

export class MemoryResultCache implements ResultCache {
  private readonly entries = new Map<string, { result: BatchResult; storedAt: number }>();
  private readonly maxAgeMs: number | undefined;
  private readonly maxEntries: number | undefined;
  private readonly now: () => number;

  constructor(options: MemoryResultCacheOptions = {}) {
    if (options.maxEntries !== undefined && options.maxEntries < 1) {
      throw new RangeError(`maxEntries must be at least 1, got ${options.maxEntries}`);
    }
    this.maxAgeMs = options.maxAgeMs;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): BatchResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry.storedAt, this.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.result;
  }

  set(key: string, result: BatchResult): void {
    const now = this.now();
    this.prune(now);

    // Re-inserting moves the key to the end of the eviction order
    this.entries.delete(key);
    this.entries.set(key, { result, storedAt: now });

    if (this.maxEntries === undefined) return;
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(oldest);
      log.debug('Evicted', { size: this.entries.size });
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(storedAt: number, now: number): boolean {
    return this.maxAgeMs !== undefined && now - storedAt > this.maxAgeMs;
  }

  private prune(now: number): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry.storedAt, now)) {
        this.entries.delete(key);
      }
    }
  }
}

export interface CachedBatchOptions extends BatchOptions {
  /** Skip the lookup and overwrite whatever is stored */
  refresh?: boolean | undefined;
}

export interface CachedBatchResult {
  result: BatchResult;
  cached: boolean;
}

/**
 * Give the caller its own copy of a stored result: fresh Date instances, and
 * outcomes in the caller's order and spelling (the key ignores both).
 */
function copyForCaller(result: BatchResult, hosts: readonly string[]): BatchResult {
  const position = new Map(hosts.map((host, index): [string, number] => [host.toLowerCase(), index]));
  const rank = (host: string) => position.get(host.toLowerCase()) ?? hosts.length;

  const outcomes = [...result.outcomes]
    .sort((a, b) => rank(a.host) - rank(b.host))
    .map((outcome): ProbeOutcome => {
      const host = hosts[rank(outcome.host)] ?? outcome.host;
      return Object.freeze(
        outcome.status === 'ERROR'
          ? { ...outcome, host }
          : { ...outcome, host, expiry: new Date(outcome.expiry.getTime()) },
      );
    });

  return Object.freeze({
    ...result,
    outcomes: Object.freeze(outcomes),
    summary: { ...result.summary },
    buckets: Object.freeze(result.buckets.map((bucket) => ({ ...bucket }))),
    startedAt: new Date(result.startedAt.getTime()),
    completedAt: new Date(result.completedAt.getTime()),
  });
}

/**
 * Serve a batch from `cache` when possible, otherwise run it and store the
 * result. Partial (cancelled) results are never stored. The cache holds its
 * own copy, so callers may not affect each other through a shared result.
 */
export async function runCachedBatch(
  cache: ResultCache,
  hosts: readonly string[] | string,
  options: CachedBatchOptions = {},
): Promise<CachedBatchResult> {
  const { refresh = false, ...batchOptions } = options;
  const settings = resolveBatchSettings(batchOptions);
  const requested = normalizeHosts(hosts);
  const key = batchCacheKey({
    hosts: requested,
    port: settings.port,
    warnDays: settings.warnDays,
    workers: settings.maxWorkers,
  });

  if (!refresh) {
    const hit = cache.get(key);
    if (hit) {
      log.debug('Hit', { hosts: hit.summary.total });
      return { result: copyForCaller(hit, requested), cached: true };
    }
  }

  const result = await runBatch(requested, batchOptions);
  if (!result.cancelled) {
    cache.set(key, copyForCaller(result, requested));
  }
  return { result, cached: false };
}

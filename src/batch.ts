import { z } from 'zod';
import { checkHost } from './checkers/host';
import { InvalidBatchError, getErrorMessage } from './errors';
import { createLogger } from './log';
import { runPool } from './pool';
import type { ProbeOptions } from './probers/tls';
import { buildHistogram, summarize } from './report';
import type { BatchResult, Clock, ProbeOutcome, ProgressListener } from './types';
import {
  DEFAULT_PROBE_TIMEOUT,
  DEFAULT_TLS_PORT,
  DEFAULT_WARN_DAYS,
  DEFAULT_WORKERS,
  formatZodError,
  normalizeHosts,
} from './utils';

const log = createLogger('Batch');

export interface BatchOptions extends ProbeOptions {
  /** Port shared by every host in the batch (default 443) */
  port?: number | undefined;
  /** Certificates with this many days left or fewer are WARNING (default 15) */
  warnDays?: number | undefined;
  /** Upper bound on concurrent probes (default 10) */
  maxWorkers?: number | undefined;
  /** Per-probe timeout in ms (default 5000) */
  timeout?: number | undefined;
  now?: Clock | undefined;
  onProgress?: ProgressListener | undefined;
  signal?: AbortSignal | undefined;
}

export const BatchSettingsSchema = z.object({
  port: z
    .number()
    .int('port must be an integer')
    .min(1, 'port must be between 1 and 65535')
    .max(65535, 'port must be between 1 and 65535'),
  warnDays: z.number().int('warnDays must be an integer').nonnegative('warnDays must be non-negative'),
  maxWorkers: z.number().int('maxWorkers must be an integer').positive('maxWorkers must be positive'),
  timeout: z.number().positive('timeout must be a positive number'),
});

export type BatchSettings = z.infer<typeof BatchSettingsSchema>;

export function resolveBatchSettings(options: BatchOptions): BatchSettings {
  const parsed = BatchSettingsSchema.safeParse({
    port: options.port ?? DEFAULT_TLS_PORT,
    warnDays: options.warnDays ?? DEFAULT_WARN_DAYS,
    maxWorkers: options.maxWorkers ?? DEFAULT_WORKERS,
    timeout: options.timeout ?? DEFAULT_PROBE_TIMEOUT,
  });
  if (!parsed.success) {
    throw new InvalidBatchError(formatZodError(parsed.error));
  }
  return parsed.data;
}

/**
 * Check every host's certificate with a bounded number of concurrent probes.
 *
 * Outcomes are reported through `onProgress` in completion order and returned
 * in input order. A failing host becomes an ERROR outcome and never aborts the
 * batch; aborting `signal` stops dispatch and returns the partial result.
 */
export async function runBatch(
  hosts: readonly string[] | string,
  options: BatchOptions = {},
): Promise<BatchResult> {
  const targets = normalizeHosts(hosts);
  if (targets.length === 0) {
    throw new InvalidBatchError('At least one hostname is required');
  }

  const { port, warnDays, maxWorkers, timeout } = resolveBatchSettings(options);
  const { now: clock = () => new Date(), onProgress, signal, ca } = options;

  const startedAt = clock();
  const total = targets.length;
  const completed: Array<{ index: number; outcome: ProbeOutcome }> = [];

  log.info('Starting batch', { hosts: total, port, warnDays, workers: maxWorkers });

  const report = await runPool(
    targets,
    maxWorkers,
    (host) => checkHost({ host, port }, { warnDays, timeout, now: startedAt, ca }),
    {
      signal,
      onSettled: (outcome, index) => {
        completed.push({ index, outcome });
        if (!onProgress) return;

        try {
          onProgress({
            completed: completed.length,
            total,
            fraction: completed.length / total,
            outcome,
          });
        } catch (error) {
          log.warn('Progress listener failed', { error: getErrorMessage(error) });
        }
      },
    },
  );

  const outcomes = completed
    .sort((a, b) => a.index - b.index)
    .map(({ outcome }) => Object.freeze(outcome));

  const result: BatchResult = {
    outcomes: Object.freeze(outcomes),
    summary: summarize(outcomes),
    buckets: Object.freeze(buildHistogram(outcomes)),
    port,
    warnDays,
    workers: maxWorkers,
    startedAt,
    completedAt: clock(),
    cancelled: report.cancelled,
  };

  log.info('Batch finished', { ...result.summary, cancelled: result.cancelled });
  return Object.freeze(result);
}

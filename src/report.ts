import type { BatchSummary, BucketCount, BucketLabel, CertificateOutcome, ProbeOutcome } from './types';
import { MS_PER_DAY } from './utils';

/** Display order of the expiry histogram; every bucket is always reported */
export const BUCKET_LABELS: readonly BucketLabel[] = [
  'Expired',
  '0-7 days',
  '8-30 days',
  '31-90 days',
  '91-365 days',
  '>365 days',
];

/**
 * Whole days from now until expiry, floored toward negative infinity.
 * A certificate that expired an hour ago reports -1, not 0.
 */
export function computeDaysLeft(expiry: Date, now: Date): number {
  return Math.floor((expiry.getTime() - now.getTime()) / MS_PER_DAY);
}

export function classify(daysLeft: number, warnDays: number): CertificateOutcome['status'] {
  return daysLeft <= warnDays ? 'WARNING' : 'OK';
}

export function bucketFor(daysLeft: number): BucketLabel {
  if (daysLeft <= 0) return 'Expired';
  if (daysLeft <= 7) return '0-7 days';
  if (daysLeft <= 30) return '8-30 days';
  if (daysLeft <= 90) return '31-90 days';
  if (daysLeft <= 365) return '91-365 days';
  return '>365 days';
}

export function summarize(outcomes: readonly ProbeOutcome[]): BatchSummary {
  const summary: BatchSummary = { total: outcomes.length, ok: 0, warning: 0, error: 0 };
  for (const outcome of outcomes) {
    if (outcome.status === 'OK') summary.ok++;
    else if (outcome.status === 'WARNING') summary.warning++;
    else summary.error++;
  }
  return summary;
}

/**
 * Count outcomes per expiry bucket. ERROR outcomes have no expiry and are left
 * out, so the counts sum to the number of certificates actually read.
 */
export function buildHistogram(outcomes: readonly ProbeOutcome[]): BucketCount[] {
  const counts = new Map<BucketLabel, number>(
    BUCKET_LABELS.map((label): [BucketLabel, number] => [label, 0]),
  );

  for (const outcome of outcomes) {
    if (outcome.status === 'ERROR') continue;
    const label = bucketFor(outcome.daysLeft);
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  return BUCKET_LABELS.map((label) => ({ label, count: counts.get(label) ?? 0 }));
}

import type {
  BatchResult,
  ProbeOutcome,
  SerializedBatchResult,
  SerializedOutcome,
} from './types';

export const EXPIRY_PLACEHOLDER = '-';

export const EXPORT_COLUMNS = ['host', 'port', 'Expiry', 'Days Left', 'status', 'error'] as const;

export interface ExportRow {
  host: string;
  port: number;
  Expiry: string;
  'Days Left': number | null;
  status: ProbeOutcome['status'];
  error: string;
}

export type ExportFormat = 'csv' | 'json';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC, or the placeholder when there is no expiry
 */
export function formatExpiry(expiry: Date | undefined): string {
  if (!expiry) return EXPIRY_PLACEHOLDER;

  const date = `${expiry.getUTCFullYear()}-${pad(expiry.getUTCMonth() + 1)}-${pad(expiry.getUTCDate())}`;
  const time = `${pad(expiry.getUTCHours())}:${pad(expiry.getUTCMinutes())}:${pad(expiry.getUTCSeconds())}`;
  return `${date} ${time}`;
}

export function toRows(result: BatchResult): ExportRow[] {
  return result.outcomes.map((outcome) => ({
    host: outcome.host,
    port: outcome.port,
    Expiry: formatExpiry(outcome.expiry),
    'Days Left': outcome.daysLeft ?? null,
    status: outcome.status,
    error: outcome.error,
  }));
}

function escapeCsvField(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(result: BatchResult): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const row of toRows(result)) {
    lines.push(EXPORT_COLUMNS.map((column) => escapeCsvField(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function toJson(result: BatchResult): string {
  return JSON.stringify(toRows(result));
}

export function exportResult(result: BatchResult, format: ExportFormat): string {
  return format === 'csv' ? toCsv(result) : toJson(result);
}

export function serializeOutcome(outcome: ProbeOutcome): SerializedOutcome {
  if (outcome.status === 'ERROR') {
    return {
      host: outcome.host,
      port: outcome.port,
      expiry: null,
      daysLeft: null,
      status: outcome.status,
      error: outcome.error,
      errorKind: outcome.errorKind,
    };
  }
  return {
    host: outcome.host,
    port: outcome.port,
    expiry: outcome.expiry.toISOString(),
    daysLeft: outcome.daysLeft,
    status: outcome.status,
    error: outcome.error,
  };
}

export function serializeBatchResult(result: BatchResult): SerializedBatchResult {
  return {
    outcomes: result.outcomes.map(serializeOutcome),
    summary: { ...result.summary },
    buckets: result.buckets.map((bucket) => ({ ...bucket })),
    port: result.port,
    warnDays: result.warnDays,
    workers: result.workers,
    startedAt: result.startedAt.toISOString(),
    completedAt: result.completedAt.toISOString(),
    cancelled: result.cancelled,
  };
}

import type { ZodError } from 'zod';
import { CertificateParseError } from './errors';
import type { CertificateOutcome, FailedOutcome, ProbeErrorKind, ProbeTarget } from './types';

export const DEFAULT_TLS_PORT = 443;
export const DEFAULT_WARN_DAYS = 15;
export const DEFAULT_WORKERS = 10;
export const DEFAULT_PROBE_TIMEOUT = 5000;
export const MAX_HOSTS_PER_BATCH = 1000;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// OpenSSL prints ASN1 times as "Mar  4 09:30:00 2027 GMT" (day space-padded)
const CERT_DATE_PATTERN = /^([A-Z][a-z]{2}) +(\d{1,2}) (\d{2}):(\d{2}):(\d{2})(?:\.\d+)? (\d{4}) GMT$/;

/**
 * Parse the textual "not after" value of a peer certificate into an absolute instant
 */
export function parseCertificateDate(text: string): Date {
  const match = CERT_DATE_PATTERN.exec(text.trim());
  if (!match) {
    throw new CertificateParseError(`Unrecognized certificate date: "${text}"`);
  }

  const [, monthName, dayText, hourText, minuteText, secondText, yearText] = match;
  const month = MONTHS.indexOf(monthName ?? '');
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);
  const year = Number(yearText);

  if (month < 0 || hour > 23 || minute > 59 || second > 59) {
    throw new CertificateParseError(`Unrecognized certificate date: "${text}"`);
  }

  // Date.UTC maps years 0-99 onto 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hour, minute, second, 0);
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    throw new CertificateParseError(`Unrecognized certificate date: "${text}"`);
  }
  return date;
}

/**
 * Trim entries, drop blanks and drop case-insensitive duplicates (first one wins).
 * Accepts a list or newline-separated text.
 */
export function normalizeHosts(input: readonly string[] | string): string[] {
  const raw = typeof input === 'string' ? input.split(/\r?\n/) : input;
  const seen = new Set<string>();
  const hosts: string[] = [];

  for (const entry of raw) {
    const host = entry.trim();
    if (!host) continue;

    const key = host.toLowerCase();
    if (seen.has(key)) continue;

    seen.add(key);
    hosts.push(host);
  }

  return hosts;
}

export function success(
  target: ProbeTarget,
  expiry: Date,
  daysLeft: number,
  status: CertificateOutcome['status'],
): CertificateOutcome {
  return { host: target.host, port: target.port, expiry, daysLeft, status, error: '' };
}

export function failure(target: ProbeTarget, error: string, errorKind: ProbeErrorKind): FailedOutcome {
  return { host: target.host, port: target.port, status: 'ERROR', error, errorKind };
}

/** "path: message" for the first issue, the way request errors are reported */
export function formatZodError(error: ZodError, fallback = 'Invalid request body'): string {
  const firstIssue = error.issues[0];
  const path = firstIssue?.path.join('.') || '';
  const message = firstIssue?.message ?? fallback;
  return path ? `${path}: ${message}` : message;
}

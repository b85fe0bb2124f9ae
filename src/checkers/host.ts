import { getErrorKind, getErrorMessage } from '../errors';
import { createLogger } from '../log';
import { probeCertificate, type ProbeOptions } from '../probers/tls';
import { classify, computeDaysLeft } from '../report';
import type { ProbeOutcome, ProbeTarget } from '../types';
import { DEFAULT_PROBE_TIMEOUT, failure, success } from '../utils';

const log = createLogger('Checker');

export interface HostCheckOptions extends ProbeOptions {
  warnDays: number;
  /** Probe timeout in ms */
  timeout?: number;
  /** Instant the remaining validity is measured from */
  now: Date;
}

/**
 * Probe one target and classify it. Never rejects: every failure becomes an ERROR outcome.
 */
export async function checkHost(target: ProbeTarget, options: HostCheckOptions): Promise<ProbeOutcome> {
  const { warnDays, now, timeout = DEFAULT_PROBE_TIMEOUT, ...probeOptions } = options;

  try {
    const expiry = await probeCertificate(target.host, target.port, timeout, probeOptions);
    const daysLeft = computeDaysLeft(expiry, now);
    const status = classify(daysLeft, warnDays);

    log.info('Checked', { host: target.host, port: target.port, daysLeft, status });
    return success(target, expiry, daysLeft, status);
  } catch (error) {
    const errorKind = getErrorKind(error);
    const message = getErrorMessage(error) || errorKind;

    log.info('Failed', { host: target.host, port: target.port, errorKind, error: message });
    return failure(target, message, errorKind);
  }
}

import { beforeEach, describe, it, expect, vi } from 'vitest';
import { checkHost } from '../../src/checkers/host';
import { CertificateParseError, ConnectionError, HandshakeError } from '../../src/errors';
import { probeCertificate } from '../../src/probers/tls';
import { MS_PER_DAY } from '../../src/utils';

vi.mock('../../src/probers/tls', () => ({
  probeCertificate: vi.fn(),
}));

const probeMock = vi.mocked(probeCertificate);

const NOW = new Date('2026-01-01T00:00:00Z');
const target = { host: 'example.test', port: 443 };

describe('checkHost', () => {
  beforeEach(() => {
    probeMock.mockReset();
  });

  it('classifies a far-off expiry as OK', async () => {
    const expiry = new Date(NOW.getTime() + 200 * MS_PER_DAY);
    probeMock.mockResolvedValue(expiry);

    const outcome = await checkHost(target, { warnDays: 15, now: NOW });

    expect(outcome).toEqual({
      host: 'example.test',
      port: 443,
      expiry,
      daysLeft: 200,
      status: 'OK',
      error: '',
    });
  });

  it('warns inside the threshold, boundary included', async () => {
    probeMock.mockResolvedValue(new Date(NOW.getTime() + 15 * MS_PER_DAY));

    const outcome = await checkHost(target, { warnDays: 15, now: NOW });

    expect(outcome.status).toBe('WARNING');
    expect(outcome.daysLeft).toBe(15);
  });

  it('warns for an already expired certificate', async () => {
    probeMock.mockResolvedValue(new Date(NOW.getTime() - 36 * 60 * 60 * 1000));

    const outcome = await checkHost(target, { warnDays: 15, now: NOW });

    expect(outcome.status).toBe('WARNING');
    expect(outcome.daysLeft).toBe(-2);
  });

  it('passes the target and timeout to the prober', async () => {
    probeMock.mockResolvedValue(NOW);

    await checkHost({ host: 'example.test', port: 8443 }, { warnDays: 15, now: NOW, timeout: 1234 });

    expect(probeMock).toHaveBeenCalledTimes(1);
    expect(probeMock.mock.calls[0]?.slice(0, 3)).toEqual(['example.test', 8443, 1234]);
  });

  it('defaults the timeout to five seconds', async () => {
    probeMock.mockResolvedValue(NOW);

    await checkHost(target, { warnDays: 15, now: NOW });

    expect(probeMock.mock.calls[0]?.[2]).toBe(5000);
  });

  it.each([
    [new ConnectionError('connect ECONNREFUSED 127.0.0.1:443', 'example.test', 443), 'ConnectionError'],
    [new HandshakeError('certificate has expired', 'example.test', 443), 'HandshakeError'],
    [new CertificateParseError('No certificate received', 'example.test', 443), 'CertificateParseError'],
  ])('turns %s into an ERROR outcome', async (error, errorKind) => {
    probeMock.mockRejectedValue(error);

    const outcome = await checkHost(target, { warnDays: 15, now: NOW });

    expect(outcome).toEqual({
      host: 'example.test',
      port: 443,
      status: 'ERROR',
      error: error.message,
      errorKind,
    });
    expect(outcome.expiry).toBeUndefined();
    expect(outcome.daysLeft).toBeUndefined();
  });

  it('never leaves the error message empty', async () => {
    probeMock.mockRejectedValue(new Error(''));

    const outcome = await checkHost(target, { warnDays: 15, now: NOW });

    expect(outcome).toMatchObject({ status: 'ERROR', error: 'Error', errorKind: 'Error' });
  });

  it('handles non-Error rejections', async () => {
    probeMock.mockRejectedValue('socket hang up');

    const outcome = await checkHost(target, { warnDays: 15, now: NOW });

    expect(outcome).toMatchObject({ status: 'ERROR', error: 'socket hang up', errorKind: 'Error' });
  });
});

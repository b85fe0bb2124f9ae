import { isIP } from 'node:net';
import { connect, type ConnectionOptions } from 'node:tls';
import {
  CertificateParseError,
  ConnectionError,
  HandshakeError,
  ProbeError,
  getErrorMessage,
} from '../errors';
import { createLogger } from '../log';
import { DEFAULT_PROBE_TIMEOUT, parseCertificateDate } from '../utils';

const log = createLogger('Prober');

export interface ProbeOptions {
  /**
   * Trust anchors used instead of the platform default store.
   * Left unset in production; tests use it to trust an in-process server.
   */
  ca?: ConnectionOptions['ca'];
}

type Settlement = { expiry: Date } | { error: ProbeError };

/**
 * Open a TLS connection to host:port and return the peer certificate's expiry.
 *
 * The timeout bounds TCP connect, TLS handshake and certificate read together.
 * Rejects with ConnectionError before the TCP connection is up, HandshakeError
 * after it, and CertificateParseError when the certificate has no usable expiry.
 */
export async function probeCertificate(
  host: string,
  port: number,
  timeout: number = DEFAULT_PROBE_TIMEOUT,
  options: ProbeOptions = {},
): Promise<Date> {
  const startTime = performance.now();

  const expiry = await new Promise<Date>((resolve, reject) => {
    let tcpConnected = false;
    let settled = false;

    const socket = connect({
      host,
      port,
      // SNI must be a hostname, never an IP literal
      servername: isIP(host) ? undefined : host,
      rejectUnauthorized: true,
      ca: options.ca,
    });

    const settle = (result: Settlement) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);

      if ('error' in result) {
        socket.destroy();
        reject(result.error);
      } else {
        socket.end();
        resolve(result.expiry);
      }
    };

    const timer = setTimeout(() => {
      const error = tcpConnected
        ? new HandshakeError(`TLS handshake timed out after ${timeout}ms`, host, port)
        : new ConnectionError(`Connection timed out after ${timeout}ms`, host, port);
      settle({ error });
    }, timeout);

    socket.once('connect', () => {
      tcpConnected = true;
    });

    socket.once('secureConnect', () => {
      try {
        const cert = socket.getPeerCertificate();

        if (!cert || Object.keys(cert).length === 0) {
          settle({ error: new CertificateParseError('No certificate received', host, port) });
          return;
        }

        if (!cert.valid_to) {
          settle({
            error: new CertificateParseError('Certificate missing valid_to field', host, port),
          });
          return;
        }

        settle({ expiry: parseCertificateDate(cert.valid_to) });
      } catch (err) {
        settle({
          error: new CertificateParseError(getErrorMessage(err), host, port, { cause: err }),
        });
      }
    });

    socket.on('error', (err) => {
      const message = getErrorMessage(err);
      const error = tcpConnected
        ? new HandshakeError(message, host, port, { cause: err })
        : new ConnectionError(message, host, port, { cause: err });
      settle({ error });
    });

    socket.once('close', () => {
      const error = tcpConnected
        ? new HandshakeError('Connection closed during TLS handshake', host, port)
        : new ConnectionError('Connection closed before it was established', host, port);
      settle({ error });
    });
  });

  const latency = Math.round(performance.now() - startTime);
  log.debug('Certificate read', { host, port, expiry: expiry.toISOString(), latency });

  return expiry;
}

import type { ProbeErrorKind } from './types';

/**
 * Base class for failures of a single certificate probe.
 * Always host-local: a batch records it and moves on.
 */
export class ProbeError extends Error {
  readonly host: string;
  readonly port: number;

  constructor(message: string, host: string, port: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProbeError';
    this.host = host;
    this.port = port;
  }
}

/** TCP connect failed or timed out before the socket was established */
export class ConnectionError extends ProbeError {
  constructor(message: string, host: string, port: number, options?: ErrorOptions) {
    super(message, host, port, options);
    this.name = 'ConnectionError';
  }
}

/** TLS negotiation or certificate validation failed */
export class HandshakeError extends ProbeError {
  constructor(message: string, host: string, port: number, options?: ErrorOptions) {
    super(message, host, port, options);
    this.name = 'HandshakeError';
  }
}

export class CertificateParseError extends ProbeError {
  constructor(message: string, host = '', port = 0, options?: ErrorOptions) {
    super(message, host, port, options);
    this.name = 'CertificateParseError';
  }
}

/** Batch-level input rejected before anything is dispatched */
export class InvalidBatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBatchError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function getErrorKind(error: unknown): ProbeErrorKind {
  if (error instanceof ConnectionError) return 'ConnectionError';
  if (error instanceof HandshakeError) return 'HandshakeError';
  if (error instanceof CertificateParseError) return 'CertificateParseError';
  return 'Error';
}

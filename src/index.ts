export { createService, type ServiceConfig } from './app';
export {
  BatchSettingsSchema,
  resolveBatchSettings,
  runBatch,
  type BatchOptions,
  type BatchSettings,
} from './batch';
export {
  MemoryResultCache,
  batchCacheKey,
  runCachedBatch,
  type BatchCacheKeyInput,
  type CachedBatchOptions,
  type CachedBatchResult,
  type MemoryResultCacheOptions,
  type ResultCache,
} from './cache';
export { checkHost, type HostCheckOptions } from './checkers/host';
export { ConfigError, loadConfig, type AppConfig, type BatchDefaults } from './config';
export {
  CertificateParseError,
  ConnectionError,
  HandshakeError,
  InvalidBatchError,
  ProbeError,
  getErrorMessage,
} from './errors';
export {
  EXPORT_COLUMNS,
  exportResult,
  formatExpiry,
  serializeBatchResult,
  serializeOutcome,
  toCsv,
  toJson,
  toRows,
  type ExportFormat,
  type ExportRow,
} from './export';
export { createLogger, setLogLevel, type LogLevel, type Logger } from './log';
export { runPool, type PoolOptions, type PoolReport } from './pool';
export { probeCertificate, type ProbeOptions } from './probers/tls';
export { BUCKET_LABELS, bucketFor, buildHistogram, classify, computeDaysLeft, summarize } from './report';
export type * from './types';
export { normalizeHosts, parseCertificateDate } from './utils';

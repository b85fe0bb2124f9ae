import { z } from 'zod';
import type { LogLevel } from './log';
import {
  DEFAULT_PROBE_TIMEOUT,
  DEFAULT_TLS_PORT,
  DEFAULT_WARN_DAYS,
  DEFAULT_WORKERS,
  formatZodError,
} from './utils';

const DEFAULT_HTTP_PORT = 3000;
const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;
const DEFAULT_CACHE_MAX_ENTRIES = 100;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_HTTP_PORT),
  CHECKER_AUTH_TOKEN: optionalString,
  CHECKER_DEFAULT_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_TLS_PORT),
  CHECKER_WARN_DAYS: z.coerce.number().int().nonnegative().default(DEFAULT_WARN_DAYS),
  CHECKER_WORKERS: z.coerce.number().int().positive().default(DEFAULT_WORKERS),
  CHECKER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PROBE_TIMEOUT),
  CHECKER_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(DEFAULT_CACHE_TTL_MS),
  CHECKER_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(DEFAULT_CACHE_MAX_ENTRIES),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface BatchDefaults {
  port: number;
  warnDays: number;
  workers: number;
  timeout: number;
}

export interface AppConfig {
  httpPort: number;
  authToken: string | undefined;
  defaults: BatchDefaults;
  /** 0 disables the result cache */
  cacheTtlMs: number;
  cacheMaxEntries: number;
  logLevel: LogLevel;
}

export const DEFAULT_BATCH_DEFAULTS: BatchDefaults = {
  port: DEFAULT_TLS_PORT,
  warnDays: DEFAULT_WARN_DAYS,
  workers: DEFAULT_WORKERS,
  timeout: DEFAULT_PROBE_TIMEOUT,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read service settings from environment variables. Throws ConfigError naming
 * the first invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }

  const data = parsed.data;
  return {
    httpPort: data.PORT,
    authToken: data.CHECKER_AUTH_TOKEN,
    defaults: {
      port: data.CHECKER_DEFAULT_PORT,
      warnDays: data.CHECKER_WARN_DAYS,
      workers: data.CHECKER_WORKERS,
      timeout: data.CHECKER_TIMEOUT_MS,
    },
    cacheTtlMs: data.CHECKER_CACHE_TTL_MS,
    cacheMaxEntries: data.CHECKER_CACHE_MAX_ENTRIES,
    logLevel: data.LOG_LEVEL,
  };
}

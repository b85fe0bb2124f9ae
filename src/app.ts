import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { resolveBatchSettings, runBatch, type BatchOptions } from './batch';
import { runCachedBatch, type ResultCache } from './cache';
import { checkHost } from './checkers/host';
import { DEFAULT_BATCH_DEFAULTS, type BatchDefaults } from './config';
import { InvalidBatchError, getErrorMessage } from './errors';
import { exportResult, serializeBatchResult, serializeOutcome, type ExportFormat } from './export';
import { createLogger } from './log';
import type { BatchResult } from './types';
import { MAX_HOSTS_PER_BATCH, formatZodError, normalizeHosts } from './utils';

const log = createLogger('Service');

export interface ServiceConfig {
  /** Bearer token required on every endpoint except / and /health */
  authToken?: string | undefined;
  /** Fallbacks for settings a request leaves out */
  defaults?: Partial<BatchDefaults> | undefined;
  /** Result cache for /batch and /batch/export; no caching when unset */
  cache?: ResultCache | undefined;
}

const PUBLIC_PATHS = new Set(['/', '/health']);

function timingSafeEqual(a: string, b: string): boolean {
  const aBytes = new TextEncoder().encode(a);
  const bBytes = new TextEncoder().encode(b);
  const maxLen = Math.max(aBytes.length, bBytes.length);

  let diff = aBytes.length ^ bBytes.length;
  for (let i = 0; i < maxLen; i++) {
    diff |= (aBytes[i] ?? 0) ^ (bBytes[i] ?? 0);
  }
  return diff === 0;
}

const settingsShape = {
  port: z.number().int('port must be an integer').min(1).max(65535).optional(),
  warnDays: z.number().int('warnDays must be an integer').nonnegative().optional(),
  timeout: z.number().positive('timeout must be a positive number').optional(),
};

const CheckRequestSchema = z.object({
  host: z.string().trim().min(1, 'host is required'),
  ...settingsShape,
});

const BatchRequestSchema = z.object({
  hosts: z.union([z.array(z.string()), z.string()], {
    errorMap: () => ({ message: 'hosts must be a list of hostnames or newline-separated text' }),
  }),
  workers: z.number().int('workers must be an integer').positive().optional(),
  ...settingsShape,
});

type BatchRequest = z.infer<typeof BatchRequestSchema>;

const FormatSchema = z.enum(['csv', 'json']).default('csv');

const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  json: 'application/json',
};

interface PreparedBatch {
  hosts: string[];
  options: BatchOptions;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Parsed<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return { ok: false, error: 'Invalid JSON body' };
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    return { ok: false, error: formatZodError(result.error) };
  }
  return { ok: true, value: result.data };
}

function handleError(c: Context, error: unknown): Response {
  const message = getErrorMessage(error);
  if (error instanceof InvalidBatchError) {
    return c.json({ error: message }, 400);
  }
  log.error('Error', { error: message });
  return c.json({ error: message }, 500);
}

export function createService(config: ServiceConfig = {}) {
  const app = new Hono();
  const defaults: BatchDefaults = { ...DEFAULT_BATCH_DEFAULTS, ...config.defaults };
  const { cache } = config;

  const toBatchOptions = (request: BatchRequest): BatchOptions => ({
    port: request.port ?? defaults.port,
    warnDays: request.warnDays ?? defaults.warnDays,
    maxWorkers: request.workers ?? defaults.workers,
    timeout: request.timeout ?? defaults.timeout,
  });

  /** Normalize the host list and reject what runBatch would reject, before any work starts */
  const prepareBatch = (request: BatchRequest): PreparedBatch => {
    const hosts = normalizeHosts(request.hosts);
    if (hosts.length === 0) {
      throw new InvalidBatchError('At least one hostname is required');
    }
    if (hosts.length > MAX_HOSTS_PER_BATCH) {
      throw new InvalidBatchError(`At most ${MAX_HOSTS_PER_BATCH} hosts per batch, got ${hosts.length}`);
    }

    const options = toBatchOptions(request);
    resolveBatchSettings(options);
    return { hosts, options };
  };

  const tryPrepareBatch = (request: BatchRequest): Parsed<PreparedBatch> => {
    try {
      return { ok: true, value: prepareBatch(request) };
    } catch (error) {
      if (error instanceof InvalidBatchError) {
        return { ok: false, error: error.message };
      }
      throw error;
    }
  };

  const execute = async (
    request: BatchRequest,
    refresh: boolean,
  ): Promise<{ result: BatchResult; cached: boolean }> => {
    const { hosts, options } = prepareBatch(request);
    log.info('Batch requested', { hosts: hosts.length, refresh });

    if (!cache) {
      return { result: await runBatch(hosts, options), cached: false };
    }
    return runCachedBatch(cache, hosts, { ...options, refresh });
  };

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: Date.now() });
  });

  app.get('/', (c) => {
    return c.json({
      endpoints: {
        'DELETE /cache': 'Drop cached batch results',
        'GET /': 'This info page',
        'GET /health': 'Health check',
        'POST /batch': 'Check certificate expiry for a list of hosts',
        'POST /batch/export': 'Same as /batch, as a CSV or JSON table (?format=csv|json)',
        'POST /batch/stream': 'Same as /batch, with progress as server-sent events',
        'POST /check': 'Check certificate expiry for one host',
      },
      name: 'TLS Expiry Checker',
      version: '1.0.0',
    });
  });

  if (config.authToken) {
    const expectedAuth = `Bearer ${config.authToken}`;

    app.use('*', async (c, next) => {
      if (PUBLIC_PATHS.has(c.req.path)) {
        return next();
      }
      const auth = c.req.header('Authorization') ?? '';
      if (!timingSafeEqual(auth, expectedAuth)) {
        log.info('Unauthorized request', { path: c.req.path });
        return c.json({ error: 'Unauthorized' }, 401);
      }
      return next();
    });
  }

  app.post('/check', async (c) => {
    try {
      const parsed = await readBody(c, CheckRequestSchema);
      if (!parsed.ok) {
        return c.json({ error: parsed.error }, 400);
      }

      const { host, port = defaults.port, warnDays = defaults.warnDays, timeout = defaults.timeout } =
        parsed.value;
      const outcome = await checkHost({ host, port }, { warnDays, timeout, now: new Date() });
      return c.json(serializeOutcome(outcome));
    } catch (error) {
      return handleError(c, error);
    }
  });

  app.post('/batch', async (c) => {
    try {
      const parsed = await readBody(c, BatchRequestSchema);
      if (!parsed.ok) {
        return c.json({ error: parsed.error }, 400);
      }

      const { result, cached } = await execute(parsed.value, c.req.query('refresh') === '1');
      return c.json({ ...serializeBatchResult(result), cached });
    } catch (error) {
      return handleError(c, error);
    }
  });

  app.post('/batch/export', async (c) => {
    try {
      const format = FormatSchema.safeParse(c.req.query('format'));
      if (!format.success) {
        return c.json({ error: 'format must be csv or json' }, 400);
      }

      const parsed = await readBody(c, BatchRequestSchema);
      if (!parsed.ok) {
        return c.json({ error: parsed.error }, 400);
      }

      const { result } = await execute(parsed.value, c.req.query('refresh') === '1');
      return c.body(exportResult(result, format.data), 200, {
        'Content-Disposition': `attachment; filename="ssl_expiry.${format.data}"`,
        'Content-Type': EXPORT_CONTENT_TYPES[format.data],
      });
    } catch (error) {
      return handleError(c, error);
    }
  });

  app.post('/batch/stream', async (c) => {
    const parsed = await readBody(c, BatchRequestSchema);
    if (!parsed.ok) {
      return c.json({ error: parsed.error }, 400);
    }

    const prepared = tryPrepareBatch(parsed.value);
    if (!prepared.ok) {
      return c.json({ error: prepared.error }, 400);
    }
    const { hosts, options } = prepared.value;

    return streamSSE(
      c,
      async (stream) => {
        const controller = new AbortController();
        stream.onAbort(() => {
          log.info('Client disconnected, cancelling batch');
          controller.abort();
        });

        let writes = Promise.resolve();
        const result = await runBatch(hosts, {
          ...options,
          signal: controller.signal,
          onProgress: ({ completed, total, fraction, outcome }) => {
            const data = JSON.stringify({ completed, total, fraction, outcome: serializeOutcome(outcome) });
            writes = writes.then(() => stream.writeSSE({ event: 'progress', data }));
          },
        });

        await writes;
        await stream.writeSSE({ event: 'result', data: JSON.stringify(serializeBatchResult(result)) });
      },
      async (error, stream) => {
        const message = getErrorMessage(error);
        log.error('Stream failed', { error: message });
        await stream.writeSSE({ event: 'error', data: JSON.stringify({ error: message }) });
      },
    );
  });

  app.delete('/cache', (c) => {
    cache?.clear();
    return c.json({ cleared: cache !== undefined });
  });

  return app;
}

import { serve } from '@hono/node-server';
import { createService } from '../app';
import { MemoryResultCache } from '../cache';
import { loadConfig } from '../config';
import { createLogger, setLogLevel } from '../log';

const log = createLogger('Service');

const config = loadConfig();
setLogLevel(config.logLevel);

const cache =
  config.cacheTtlMs > 0
    ? new MemoryResultCache({ maxAgeMs: config.cacheTtlMs, maxEntries: config.cacheMaxEntries })
    : undefined;

const app = createService({ authToken: config.authToken, cache, defaults: config.defaults });

log.info('Starting', {
  port: config.httpPort,
  auth: config.authToken ? 'enabled' : 'disabled',
  cache: cache ? `${config.cacheTtlMs}ms` : 'disabled',
  ...config.defaults,
});

serve({
  fetch: app.fetch,
  port: config.httpPort,
});

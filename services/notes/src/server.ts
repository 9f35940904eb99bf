import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from 'fastify';
import { config } from './config';
import type { KeyValueStore } from './contracts/kvStore';
import { checkStoreLiveness } from './health';
import { NoteStore } from './notes/noteStore';
import { RateLimiter } from './ratelimit/rateLimiter';
import { registerErrorHandler } from './routes/errors';
import { registerNoteRoutes } from './routes/notes';
import { registerStatusRoutes } from './routes/status';
import { withStoreTimeout } from './timeout';
import type { NoteLimits } from './types';

export interface ServiceSettings {
  version: string;
  limits: NoteLimits;
  allowFiles: boolean;
  bodyLimitBytes: number;
  rateLimit: {
    createPerMinute: number;
    readPerMinute: number;
    clientIpHeader: string;
  };
  storeTimeoutMs: number;
}

export function settingsFromConfig(): ServiceSettings {
  return {
    version: config.version,
    limits: { ...config.notes },
    allowFiles: config.allowFiles,
    bodyLimitBytes: config.bodyLimitBytes,
    rateLimit: { ...config.rateLimit },
    storeTimeoutMs: config.store.timeoutMs,
  };
}

export interface BuildAppOptions {
  kv: KeyValueStore;
  settings?: ServiceSettings;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp({ kv, settings = settingsFromConfig(), logger = false }: BuildAppOptions) {
  const { limits } = settings;
  const app = Fastify({
    logger,
    bodyLimit: settings.bodyLimitBytes,
  });

  registerErrorHandler(app);

  await registerStatusRoutes(app, {
    kv,
    version: settings.version,
    limits,
    allowFiles: settings.allowFiles,
    storeTimeoutMs: settings.storeTimeoutMs,
  });
  await registerNoteRoutes(app, {
    notes: new NoteStore(kv, limits),
    limiter: new RateLimiter(kv),
    rateLimit: settings.rateLimit,
    storeTimeoutMs: settings.storeTimeoutMs,
  });

  return app;
}

/**
 * Opens the store and proves it with a write-then-read round trip before the server
 * starts listening. Connection errors after startup go to `log`.
 */
export async function connectStore(kv: KeyValueStore, log: FastifyBaseLogger, timeoutMs: number) {
  await withStoreTimeout(
    kv.connect((err) => log.warn({ err }, 'store connection error')),
    timeoutMs,
  );
  await withStoreTimeout(checkStoreLiveness(kv), timeoutMs);
}

import type { FastifyInstance } from 'fastify';
import type { KeyValueStore } from '../contracts/kvStore';
import { checkStoreLiveness } from '../health';
import { withStoreTimeout } from '../timeout';
import type { NoteLimits } from '../types';

export interface StatusRouteOptions {
  kv: KeyValueStore;
  version: string;
  limits: NoteLimits;
  allowFiles: boolean;
  storeTimeoutMs: number;
}

export async function registerStatusRoutes(app: FastifyInstance, opts: StatusRouteOptions) {
  const { kv, version, limits, allowFiles, storeTimeoutMs } = opts;

  // Limits the frontend needs to render the create form
  app.get('/api/status', async () => ({
    version,
    max_size: limits.sizeLimitBytes,
    max_meta: limits.metaLimitBytes,
    max_views: limits.maxViews,
    max_expiration: limits.maxExpirationMinutes,
    allow_advanced: limits.allowAdvanced,
    allow_files: allowFiles,
  }));

  app.get('/api/live', async (req, reply) => {
    try {
      await withStoreTimeout(checkStoreLiveness(kv), storeTimeoutMs);
      return reply.send({ ok: true });
    } catch (err) {
      req.log.warn({ err }, 'health check failed');
      return reply.code(503).send({ error: 'StoreUnavailable', message: 'store unreachable' });
    }
  });
}

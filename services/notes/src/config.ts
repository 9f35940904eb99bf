import 'dotenv/config';
import { MAX_NOTE_ID_LENGTH } from './notes/ids';

function intEnv(name: string, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  if (value < min || value > max) {
    throw new Error(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function boolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw.toLowerCase() === 'true';
}

export function defaultBodyLimit(sizeLimitBytes: number, metaLimitBytes: number): number {
  return 2 * (sizeLimitBytes + metaLimitBytes) + 64 * 1024;
}

export type StoreBackend = 'redis' | 'memory';

function storeBackend(): StoreBackend {
  const raw = (process.env.STORE_BACKEND || 'redis').toLowerCase();
  if (raw !== 'redis' && raw !== 'memory') {
    throw new Error(`STORE_BACKEND must be "redis" or "memory", got "${raw}"`);
  }
  return raw;
}

const sizeLimitBytes = intEnv('SIZE_LIMIT_BYTES', 80 * 1024 * 1024); // 80 MiB
const metaLimitBytes = intEnv('META_LIMIT_BYTES', 4 * 1024);

export const config = {
  port: intEnv('PORT', 8080, 0, 65535),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  version: process.env.APP_VERSION || '1.0.0',
  store: {
    backend: storeBackend(),
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
    timeoutMs: intEnv('STORE_TIMEOUT_MS', 5000, 1),
  },
  notes: {
    sizeLimitBytes,
    metaLimitBytes,
    maxViews: intEnv('MAX_VIEWS', 100),
    maxExpirationMinutes: intEnv('MAX_EXPIRATION', 360),
    idLength: intEnv('ID_LENGTH', 32, 1, MAX_NOTE_ID_LENGTH),
    allowAdvanced: boolEnv('ALLOW_ADVANCED', true),
  },
  allowFiles: boolEnv('ALLOW_FILES', true),
  // whole request bodies are buffered; room for escaped quotes and backslashes plus JSON framing
  bodyLimitBytes: intEnv('BODY_LIMIT_BYTES', defaultBodyLimit(sizeLimitBytes, metaLimitBytes), 1),
  rateLimit: {
    createPerMinute: intEnv('RATE_LIMIT_CREATE', 20),
    readPerMinute: intEnv('RATE_LIMIT_READ', 60),
    clientIpHeader: (process.env.CLIENT_IP_HEADER || 'cf-connecting-ip').toLowerCase(),
  },
};

export type AppConfig = typeof config;

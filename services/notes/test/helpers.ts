import { MemoryKeyValueStore } from '../src/storage/memoryKvStore';
import type { ServiceSettings } from '../src/server';
import type { NoteLimits } from '../src/types';

export function testLimits(overrides: Partial<NoteLimits> = {}): NoteLimits {
  return {
    sizeLimitBytes: 64,
    metaLimitBytes: 16,
    maxViews: 5,
    maxExpirationMinutes: 10,
    idLength: 32,
    allowAdvanced: true,
    ...overrides,
  };
}

export function testSettings(overrides: Partial<ServiceSettings> = {}): ServiceSettings {
  return {
    version: '9.9.9-test',
    limits: testLimits(),
    allowFiles: false,
    rateLimit: { createPerMinute: 3, readPerMinute: 5, clientIpHeader: 'cf-connecting-ip' },
    storeTimeoutMs: 1000,
    bodyLimitBytes: 4096,
    ...overrides,
  };
}

/** Memory store driven by a hand-advanced clock. */
export function clockedStore(start = 1_700_000_000_000) {
  let now = start;
  const kv = new MemoryKeyValueStore(() => now);
  return {
    kv,
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

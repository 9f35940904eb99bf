import type { FastifyBaseLogger } from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ConnectionErrorListener } from '../src/contracts/kvStore';
import { checkStoreLiveness } from '../src/health';
import { connectStore } from '../src/server';
import { MemoryKeyValueStore } from '../src/storage/memoryKvStore';
import { withStoreTimeout } from '../src/timeout';

class StaleStore extends MemoryKeyValueStore {
  async get(): Promise<string | null> {
    return '0';
  }
}

describe('checkStoreLiveness', () => {
  it('passes after a write-then-read round trip', async () => {
    const kv = new MemoryKeyValueStore();
    await expect(checkStoreLiveness(kv)).resolves.toBeUndefined();
    expect(await kv.get('healthcheck:probe')).toBe('1');
    expect(await kv.ttl('healthcheck:probe')).toBe(5);
  });

  it('fails when the value read back differs', async () => {
    await expect(checkStoreLiveness(new StaleStore())).rejects.toMatchObject({
      code: 'StoreUnavailable',
      message: 'store round-trip mismatch',
    });
  });
});

class RefusingStore extends MemoryKeyValueStore {
  async connect(onConnectionError: ConnectionErrorListener): Promise<void> {
    const err = new Error('connect ECONNREFUSED 127.0.0.1:6379');
    onConnectionError(err);
    throw err;
  }
}

class WriteOnlyDownStore extends MemoryKeyValueStore {
  async set(): Promise<void> {
    throw new Error('READONLY You can\'t write against a read only replica.');
  }
}

function fakeLogger() {
  const warn = vi.fn();
  return { warn, log: { warn } as unknown as FastifyBaseLogger };
}

describe('connectStore', () => {
  it('resolves once the store answers a round trip', async () => {
    const { warn, log } = fakeLogger();
    const kv = new MemoryKeyValueStore();
    await expect(connectStore(kv, log, 100)).resolves.toBeUndefined();
    expect(await kv.get('healthcheck:probe')).toBe('1');
    expect(warn).not.toHaveBeenCalled();
  });

  it('routes connection errors to the logger and fails', async () => {
    const { warn, log } = fakeLogger();
    await expect(connectStore(new RefusingStore(), log, 100)).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:6379');
    expect(warn).toHaveBeenCalledWith(
      { err: expect.objectContaining({ message: 'connect ECONNREFUSED 127.0.0.1:6379' }) },
      'store connection error',
    );
  });

  it('fails with StoreUnavailable when the store connects but cannot write', async () => {
    const { log } = fakeLogger();
    await expect(connectStore(new WriteOnlyDownStore(), log, 100)).rejects.toMatchObject({
      code: 'StoreUnavailable',
    });
  });
});

describe('withStoreTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes through results that arrive in time', async () => {
    await expect(withStoreTimeout(Promise.resolve('done'), 50)).resolves.toBe('done');
  });

  it('passes through store errors unchanged', async () => {
    const err = new Error('boom');
    await expect(withStoreTimeout(Promise.reject(err), 50)).rejects.toBe(err);
  });

  it('fails with StoreUnavailable when the call outlives the timeout', async () => {
    vi.useFakeTimers();
    const pending = withStoreTimeout(new Promise<string>(() => undefined), 50);
    const assertion = expect(pending).rejects.toMatchObject({
      code: 'StoreUnavailable',
      message: 'store call timed out after 50ms',
    });

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });
});

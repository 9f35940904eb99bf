import type Redis from 'ioredis';
import { type Mock, describe, expect, it, vi } from 'vitest';
import { CONSUME_NOTE_SCRIPT } from '../src/redis/scripts';
import { RedisKeyValueStore } from '../src/storage/redisKvStore';

type ExecReply = [Error | null, unknown][] | null;
type Chained = (...args: unknown[]) => FakePipeline;

interface FakePipeline {
  zremrangebyscore: Mock<Chained>;
  zadd: Mock<Chained>;
  zcard: Mock<Chained>;
  pexpire: Mock<Chained>;
  exec: Mock<() => Promise<ExecReply>>;
}

/** Records the commands the store issues; replies are scripted per test. */
function fakeRedis(execReply: ExecReply = [[null, 0], [null, 1], [null, 1], [null, 1]]) {
  const pipeline: FakePipeline = {
    zremrangebyscore: vi.fn<Chained>(() => pipeline),
    zadd: vi.fn<Chained>(() => pipeline),
    zcard: vi.fn<Chained>(() => pipeline),
    pexpire: vi.fn<Chained>(() => pipeline),
    exec: vi.fn(async () => execReply),
  };
  const client = {
    get: vi.fn(async (_key: string): Promise<string | null> => null),
    set: vi.fn(async () => 'OK'),
    del: vi.fn(async () => 1),
    expire: vi.fn(async () => 1),
    ttl: vi.fn(async () => -2),
    eval: vi.fn(async (): Promise<unknown> => null),
    multi: vi.fn(() => pipeline),
    quit: vi.fn(async () => 'OK'),
    on: vi.fn(),
    connect: vi.fn(async () => undefined),
    status: 'wait',
  };
  const store = new RedisKeyValueStore(client as unknown as Redis);
  return { client, pipeline, store };
}

describe('RedisKeyValueStore', () => {
  it('attaches the connection error listener before connecting', async () => {
    const { client, store } = fakeRedis();
    const onError = vi.fn();
    await store.connect(onError);

    expect(client.on).toHaveBeenCalledWith('error', onError);
    expect(client.connect).toHaveBeenCalledTimes(1);
    expect(client.on.mock.invocationCallOrder[0]).toBeLessThan(client.connect.mock.invocationCallOrder[0]);
  });

  it('does not reconnect a connection that is already open', async () => {
    const { client, store } = fakeRedis();
    client.status = 'ready';
    await store.connect(vi.fn());
    expect(client.connect).not.toHaveBeenCalled();
  });

  it('writes value and TTL in a single SET', async () => {
    const { client, store } = fakeRedis();
    await store.set('note:a', '{}', 120);
    expect(client.set).toHaveBeenCalledWith('note:a', '{}', 'EX', 120);

    await store.set('note:b', '{}');
    expect(client.set).toHaveBeenLastCalledWith('note:b', '{}');
    expect(client.expire).not.toHaveBeenCalled();
  });

  it('maps TTL replies', async () => {
    const { client, store } = fakeRedis();
    expect(await store.ttl('missing')).toBeNull();
    client.ttl.mockResolvedValueOnce(-1);
    expect(await store.ttl('forever')).toBe(-1);
    client.ttl.mockResolvedValueOnce(42);
    expect(await store.ttl('some')).toBe(42);
  });

  it('runs the consume script against the note key', async () => {
    const { client, store } = fakeRedis();
    client.eval.mockResolvedValueOnce('{"contents":"c","meta":"m","views":0,"created":1}');

    const res = await store.consumeNote('note:a');
    expect(client.eval).toHaveBeenCalledWith(CONSUME_NOTE_SCRIPT, 1, 'note:a');
    expect(res).toBe('{"contents":"c","meta":"m","views":0,"created":1}');

    expect(await store.consumeNote('note:gone')).toBeNull();
  });

  it('rejects unexpected script replies', async () => {
    const { client, store } = fakeRedis();
    client.eval.mockResolvedValueOnce(7);
    await expect(store.consumeNote('note:a')).rejects.toThrow('unexpected consume script reply: number');
  });

  it('keeps the TTL and guards on a numeric view counter in the consume script', () => {
    expect(CONSUME_NOTE_SCRIPT).toContain("redis.call('SET', key, cjson.encode(data), 'KEEPTTL')");
    expect(CONSUME_NOTE_SCRIPT).toContain("type(data.views) == 'number'");
    expect(CONSUME_NOTE_SCRIPT).toContain("redis.call('DEL', key)");
  });

  it('updates the sliding window in one MULTI and returns the ZCARD count', async () => {
    const { client, pipeline, store } = fakeRedis([[null, 2], [null, 1], [null, 3], [null, 1]]);

    const count = await store.slidingWindowHit('rl:read:ip', 100_000, 60_000, 61_000);

    expect(count).toBe(3);
    expect(client.multi).toHaveBeenCalledTimes(1);
    expect(pipeline.zremrangebyscore).toHaveBeenCalledWith('rl:read:ip', 0, 40_000);
    expect(pipeline.zadd).toHaveBeenCalledWith('rl:read:ip', 100_000, expect.stringMatching(/^100000:[0-9a-f]{12}$/));
    expect(pipeline.zcard).toHaveBeenCalledWith('rl:read:ip');
    expect(pipeline.pexpire).toHaveBeenCalledWith('rl:read:ip', 61_000);
    expect(pipeline.exec).toHaveBeenCalledTimes(1);
  });

  it('fails when the window transaction does not complete', async () => {
    const aborted = fakeRedis(null);
    await expect(aborted.store.slidingWindowHit('k', 1, 60_000, 61_000)).rejects.toThrow(
      'sliding window transaction aborted',
    );

    const failed = fakeRedis([[null, 0], [null, 1], [new Error('OOM'), null], [null, 1]]);
    await expect(failed.store.slidingWindowHit('k', 1, 60_000, 61_000)).rejects.toThrow('OOM');
  });

  it('reports deletes and closes the connection', async () => {
    const { client, store } = fakeRedis();
    expect(await store.del('k')).toBe(true);
    client.del.mockResolvedValueOnce(0);
    expect(await store.del('k')).toBe(false);

    await store.close();
    expect(client.quit).toHaveBeenCalledTimes(1);
  });
});

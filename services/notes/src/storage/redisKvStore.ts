import { randomBytes } from 'crypto';
import type Redis from 'ioredis';
import type { ConnectionErrorListener, KeyValueStore } from '../contracts/kvStore';
import { CONSUME_NOTE_SCRIPT } from '../redis/scripts';

/**
 * `KeyValueStore` on top of an ioredis connection. The connection is owned by the caller
 * and handed in, so tests and the server can each decide how it is created.
 */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(private readonly redis: Redis) {}

  async connect(onConnectionError: ConnectionErrorListener) {
    this.redis.on('error', onConnectionError);
    if (this.redis.status === 'wait') {
      await this.redis.connect();
    }
  }

  async get(key: string) {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number) {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.redis.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.redis.set(key, value);
    }
  }

  async del(key: string) {
    const removed = await this.redis.del(key);
    return removed > 0;
  }

  async expire(key: string, ttlSeconds: number) {
    const res = await this.redis.expire(key, ttlSeconds);
    return res === 1;
  }

  async ttl(key: string) {
    const ttl = await this.redis.ttl(key);
    if (ttl === -2) return null; // missing
    return ttl;
  }

  async consumeNote(key: string) {
    const res = await this.redis.eval(CONSUME_NOTE_SCRIPT, 1, key);
    if (res === null || res === undefined) return null;
    if (typeof res === 'string') return res;
    if (Buffer.isBuffer(res)) return res.toString('utf8');
    throw new Error(`unexpected consume script reply: ${typeof res}`);
  }

  async slidingWindowHit(key: string, nowMs: number, windowMs: number, expireMs: number) {
    // unique member so concurrent hits in the same millisecond are all counted
    const member = `${nowMs}:${randomBytes(6).toString('hex')}`;
    const results = await this.redis
      .multi()
      .zremrangebyscore(key, 0, nowMs - windowMs)
      .zadd(key, nowMs, member)
      .zcard(key)
      .pexpire(key, expireMs)
      .exec();

    if (!results) {
      throw new Error('sliding window transaction aborted');
    }
    const [err, count] = results[2] ?? [new Error('missing ZCARD reply'), null];
    if (err) throw err;
    if (typeof count !== 'number') {
      throw new Error(`unexpected ZCARD reply: ${String(count)}`);
    }
    return count;
  }

  async close() {
    await this.redis.quit();
  }
}

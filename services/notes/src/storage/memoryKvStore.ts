import type { ConnectionErrorListener, KeyValueStore } from '../contracts/kvStore';

type Entry =
  | { kind: 'string'; value: string; expiresAt?: number }
  | { kind: 'zset'; members: Map<string, number>; expiresAt?: number };

type ZsetEntry = Extract<Entry, { kind: 'zset' }>;

/**
 * In-process `KeyValueStore` with lazy TTL expiry, for tests and single-instance development.
 *
 * Every method does its work synchronously before the returned promise settles, so each
 * call is indivisible relative to other callers in the same process, matching what the
 * Redis script and transaction give across processes.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, Entry>();
  private seq = 0;

  constructor(private readonly now: () => number = () => Date.now()) {}

  // nothing to open, and nothing that can drop
  async connect(_onConnectionError: ConnectionErrorListener) {}

  async get(key: string) {
    const entry = this.live(key);
    if (!entry) return null;
    if (entry.kind !== 'string') throw new Error('WRONGTYPE operation against a sorted set');
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number) {
    const expiresAt = ttlSeconds && ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : undefined;
    this.entries.set(key, { kind: 'string', value, expiresAt });
  }

  async del(key: string) {
    const existed = this.live(key) !== undefined;
    this.entries.delete(key);
    return existed;
  }

  async expire(key: string, ttlSeconds: number) {
    const entry = this.live(key);
    if (!entry) return false;
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return true;
    }
    entry.expiresAt = this.now() + ttlSeconds * 1000;
    return true;
  }

  async ttl(key: string) {
    const entry = this.live(key);
    if (!entry) return null;
    if (entry.expiresAt === undefined) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async consumeNote(key: string) {
    const entry = this.live(key);
    if (!entry) return null;
    if (entry.kind !== 'string') throw new Error('WRONGTYPE operation against a sorted set');

    const data: unknown = JSON.parse(entry.value);
    if (!isRecord(data)) throw new Error('note record is not a JSON object');

    if (typeof data.views === 'number') {
      if (data.views <= 1) {
        this.entries.delete(key);
        data.views = 0;
      } else {
        data.views = data.views - 1;
        // rewrite in place; expiresAt is left as it was
        entry.value = JSON.stringify(data);
      }
    }
    return JSON.stringify(data);
  }

  async slidingWindowHit(key: string, nowMs: number, windowMs: number, expireMs: number) {
    const existing = this.live(key);
    let entry: ZsetEntry;
    if (!existing) {
      entry = { kind: 'zset', members: new Map<string, number>() };
      this.entries.set(key, entry);
    } else if (existing.kind === 'zset') {
      entry = existing;
    } else {
      throw new Error('WRONGTYPE operation against a string');
    }

    const cutoff = nowMs - windowMs;
    for (const [member, score] of entry.members) {
      if (score <= cutoff) entry.members.delete(member);
    }
    this.seq += 1;
    entry.members.set(`${nowMs}:${this.seq}`, nowMs);
    entry.expiresAt = this.now() + expireMs;
    return entry.members.size;
  }

  async close() {
    this.entries.clear();
  }

  /** Number of live keys; used by tests to assert nothing lingers. */
  size(): number {
    for (const key of [...this.entries.keys()]) this.live(key);
    return this.entries.size;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

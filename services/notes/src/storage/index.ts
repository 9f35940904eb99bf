import type { KeyValueStore } from '../contracts/kvStore';
import type { StoreBackend } from '../config';
import { createRedis } from '../redis/client';
import { MemoryKeyValueStore } from './memoryKvStore';
import { RedisKeyValueStore } from './redisKvStore';

export function createKeyValueStore(backend: StoreBackend, redisUrl: string): KeyValueStore {
  switch (backend) {
    case 'redis':
      return new RedisKeyValueStore(createRedis(redisUrl));
    case 'memory':
      return new MemoryKeyValueStore();
    default:
      throw new Error(`Unsupported store backend: ${String(backend)}`);
  }
}

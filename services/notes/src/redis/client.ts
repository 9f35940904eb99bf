import Redis from 'ioredis';

export function createRedis(url: string): Redis {
  return new Redis(url, {
    // the store connects explicitly once its error listener is attached
    lazyConnect: true,
    // failures surface to the caller; retry policy belongs to whoever called us
    maxRetriesPerRequest: 0,
    enableOfflineQueue: false,
    enableReadyCheck: true,
  });
}

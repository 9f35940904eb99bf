import type { KeyValueStore } from '../contracts/kvStore';
import { toStoreError } from '../errors';
import type { RateLimitAction } from '../types';

const WINDOW_MS = 60_000;
// idle windows linger a little past the window, then the store drops them
const EXPIRE_MS = WINDOW_MS + 1_000;

export const UNKNOWN_CLIENT = 'unknown';

const rateKey = (action: RateLimitAction, identity: string) => `rl:${action}:${identity}`;

/**
 * Sliding-window admission gate per (action, client). The trim/insert/count/expire
 * step is a single store-side operation, so concurrent instances share one budget.
 */
export class RateLimiter {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly now: () => number = () => Date.now(),
  ) {}

  async allow(identity: string, action: RateLimitAction, limitPerMinute: number): Promise<boolean> {
    let count: number;
    try {
      count = await this.kv.slidingWindowHit(rateKey(action, identity), this.now(), WINDOW_MS, EXPIRE_MS);
    } catch (err) {
      throw toStoreError(err);
    }
    return count <= limitPerMinute;
  }
}

type HeaderValue = string | string[] | undefined;

/**
 * Trusted proxy header first, then the socket peer. Clients we cannot attribute share
 * the `unknown` bucket.
 */
export function clientIdentity(
  headers: Record<string, HeaderValue>,
  peerAddress: string | undefined,
  trustedHeader: string,
): string {
  const raw = headers[trustedHeader.toLowerCase()];
  const forwarded = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  if (forwarded) return forwarded;
  if (peerAddress) return peerAddress;
  return UNKNOWN_CLIENT;
}

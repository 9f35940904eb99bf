/**
 * Primitive operations the note core needs from its backing store.
 * Any backend that can honour these (including the two atomic primitives) is usable.
 */
export type ConnectionErrorListener = (err: Error) => void;

export interface KeyValueStore {
  /**
   * Opens the connection. `onConnectionError` receives errors raised by the connection
   * outside of any command (drops, reconnect failures). Resolves once commands can be sent.
   */
  connect(onConnectionError: ConnectionErrorListener): Promise<void>;

  get(key: string): Promise<string | null>;
  /** Writes `value`; with `ttlSeconds` the value and its TTL land in one operation. */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<boolean>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  /** Remaining TTL in seconds, -1 when the key has none, null when it is missing. */
  ttl(key: string): Promise<number | null>;

  /**
   * Atomic decrement-or-delete of a JSON note record. Returns the record as it stands
   * after the mutation (views decremented, or 0 when the key was deleted), or null when
   * the key is absent. Records without a numeric `views` field are returned untouched.
   */
  consumeNote(key: string): Promise<string | null>;

  /**
   * Atomic sliding-window hit: drops entries at or before `nowMs - windowMs`, records one
   * entry at `nowMs`, refreshes the key expiry and returns the number of entries in the window.
   */
  slidingWindowHit(key: string, nowMs: number, windowMs: number, expireMs: number): Promise<number>;

  close(): Promise<void>;
}

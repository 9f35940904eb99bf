import type { KeyValueStore } from './contracts/kvStore';
import { NoteError, toStoreError } from './errors';

const PROBE_KEY = 'healthcheck:probe';
const PROBE_TTL_S = 5;

/** Write-then-read round trip; a bare PING would not prove the store accepts writes. */
export async function checkStoreLiveness(kv: KeyValueStore): Promise<void> {
  let value: string | null;
  try {
    await kv.set(PROBE_KEY, '1', PROBE_TTL_S);
    value = await kv.get(PROBE_KEY);
  } catch (err) {
    throw toStoreError(err);
  }
  if (value !== '1') {
    throw new NoteError('StoreUnavailable', 'store round-trip mismatch');
  }
}

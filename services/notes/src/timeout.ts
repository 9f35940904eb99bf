import { NoteError } from './errors';

/**
 * Races `work` against a timer. On expiry the caller sees `StoreUnavailable`; the
 * store operation itself is not cancelled (an atomic script either completes or fails).
 */
export async function withStoreTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new NoteError('StoreUnavailable', `store call timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

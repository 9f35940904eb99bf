export type NoteErrorCode =
  | 'PayloadTooLarge'
  | 'InvalidContents'
  | 'InvalidMeta'
  | 'InvalidPolicy'
  | 'NotFound'
  | 'RateLimited'
  | 'StoreUnavailable';

/**
 * Error raised by the note core. Carries a transport-agnostic code; the HTTP layer
 * decides how each code is surfaced.
 *
 * `NotFound` covers never-issued, expired and already-consumed notes alike.
 */
export class NoteError extends Error {
  readonly code: NoteErrorCode;

  constructor(code: NoteErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NoteError';
    this.code = code;
  }
}

export function isNoteError(err: unknown): err is NoteError {
  return err instanceof NoteError;
}

/** Wraps anything thrown by the backing store as `StoreUnavailable`, passing NoteErrors through. */
export function toStoreError(err: unknown): NoteError {
  if (err instanceof NoteError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new NoteError('StoreUnavailable', `store unavailable: ${detail}`, { cause: err });
}

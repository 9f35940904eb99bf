import { randomBytes } from 'crypto';
import type { NoteId } from '../types';

export const MAX_NOTE_ID_LENGTH = 128;

const NOTE_ID_PATTERN = new RegExp(`^[A-Za-z0-9_-]{1,${MAX_NOTE_ID_LENGTH}}$`);

const noteKey = (id: NoteId) => `note:${id}`;

/** Fresh URL-safe id drawn from the base64url alphabet, `length` characters long. */
export function generateNoteId(length: number): NoteId {
  assertNoteIdLength(length);
  // 4 base64 chars per 3 bytes
  const bytes = Math.ceil((length * 3) / 4);
  return randomBytes(bytes).toString('base64url').slice(0, length);
}

/** Ids longer than the lookup pattern accepts would be stored but never readable. */
export function assertNoteIdLength(length: number): void {
  if (!Number.isInteger(length) || length < 1 || length > MAX_NOTE_ID_LENGTH) {
    throw new RangeError(`note id length must be an integer between 1 and ${MAX_NOTE_ID_LENGTH}, got ${length}`);
  }
}

export function isWellFormedNoteId(id: string): boolean {
  return NOTE_ID_PATTERN.test(id);
}

export { noteKey };

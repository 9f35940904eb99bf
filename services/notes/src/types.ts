export type NoteId = string;

/** Persisted shape under `note:{id}`. `views` is omitted, never null, on time-limited notes. */
export interface NoteRecord {
  contents: string;
  meta: string;
  views?: number;
  created: number; // seconds since epoch
}

export interface CreateNoteArgs {
  contents: string;
  meta: string;
  views?: number | null;
  expirationMinutes?: number | null;
}

export interface NotePreview {
  meta: string;
}

export interface ConsumedNote {
  contents: string;
  meta: string;
  // null for time-limited notes
  remainingViews: number | null;
}

export interface NoteLimits {
  sizeLimitBytes: number;
  metaLimitBytes: number;
  maxViews: number;
  maxExpirationMinutes: number;
  idLength: number;
  allowAdvanced: boolean;
}

export type RateLimitAction = 'create' | 'read';

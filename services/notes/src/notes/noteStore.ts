import { z } from 'zod';
import type { KeyValueStore } from '../contracts/kvStore';
import { NoteError, toStoreError } from '../errors';
import type { ConsumedNote, CreateNoteArgs, NoteId, NoteLimits, NotePreview, NoteRecord } from '../types';
import { assertNoteIdLength, generateNoteId, isWellFormedNoteId, noteKey } from './ids';

const noteRecordSchema = z.object({
  contents: z.string(),
  meta: z.string(),
  views: z.number().int().optional(),
  created: z.number(),
});

const byteLength = (s: string) => Buffer.byteLength(s, 'utf8');

// In unicode mode a paired surrogate is one code point, so this only matches lone halves.
const LONE_SURROGATE = /\p{Surrogate}/u;

/** True when `s` encodes to UTF-8 without replacement characters. */
export function isWellFormedText(s: string): boolean {
  return !LONE_SURROGATE.test(s);
}

interface ResolvedPolicy {
  views?: number;
  ttlSeconds?: number;
}

/**
 * Owns the note lifecycle: create, metadata-only preview and the consuming read.
 *
 * A note is either view-limited (`views` set; the counter drives deletion) or purely
 * time-limited (no counter; the store TTL drives deletion and every read before then
 * succeeds). When both are requested the expiration still rides along as the key TTL.
 */
export class NoteStore {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly limits: NoteLimits,
  ) {
    assertNoteIdLength(limits.idLength);
  }

  async create(args: CreateNoteArgs): Promise<NoteId> {
    const { contents, meta } = args;
    if (!isWellFormedText(contents)) {
      throw new NoteError('InvalidContents', 'contents must be well-formed unicode text');
    }
    if (byteLength(contents) > this.limits.sizeLimitBytes) {
      throw new NoteError('PayloadTooLarge', `contents exceed ${this.limits.sizeLimitBytes} bytes`);
    }
    if (!isWellFormedText(meta)) {
      throw new NoteError('InvalidMeta', 'meta must be well-formed unicode text');
    }
    if (byteLength(meta) > this.limits.metaLimitBytes) {
      throw new NoteError('InvalidMeta', `meta exceeds ${this.limits.metaLimitBytes} bytes`);
    }

    const policy = this.resolvePolicy(args.views ?? undefined, args.expirationMinutes ?? undefined);

    const id = generateNoteId(this.limits.idLength);
    const record: NoteRecord = {
      contents,
      meta,
      views: policy.views,
      created: Math.floor(Date.now() / 1000),
    };

    try {
      await this.kv.set(noteKey(id), JSON.stringify(record), policy.ttlSeconds);
    } catch (err) {
      throw toStoreError(err);
    }
    return id;
  }

  async preview(id: NoteId): Promise<NotePreview> {
    if (!isWellFormedNoteId(id)) throw notFound();

    let raw: string | null;
    try {
      raw = await this.kv.get(noteKey(id));
    } catch (err) {
      throw toStoreError(err);
    }
    if (raw === null) throw notFound();

    return { meta: decodeRecord(raw).meta };
  }

  async consume(id: NoteId): Promise<ConsumedNote> {
    if (!isWellFormedNoteId(id)) throw notFound();

    let raw: string | null;
    try {
      raw = await this.kv.consumeNote(noteKey(id));
    } catch (err) {
      throw toStoreError(err);
    }
    if (raw === null) throw notFound();

    const record = decodeRecord(raw);
    return {
      contents: record.contents,
      meta: record.meta,
      remainingViews: record.views ?? null,
    };
  }

  private resolvePolicy(views: number | undefined, expirationMinutes: number | undefined): ResolvedPolicy {
    if (views === undefined && expirationMinutes === undefined) {
      throw new NoteError('InvalidPolicy', 'at least views or expiration must be set');
    }

    if (!this.limits.allowAdvanced) {
      return { views: 1 };
    }

    const { maxViews, maxExpirationMinutes } = this.limits;
    const ttlSeconds =
      expirationMinutes !== undefined && isIntInRange(expirationMinutes, 1, maxExpirationMinutes)
        ? expirationMinutes * 60
        : undefined;

    if (views !== undefined) {
      if (!isIntInRange(views, 1, maxViews)) {
        throw new NoteError('InvalidPolicy', `views must be between 1 and ${maxViews}`);
      }
      // views decide deletion; a usable expiration is kept as an upper bound on the key
      return { views, ttlSeconds };
    }

    if (ttlSeconds === undefined) {
      throw new NoteError('InvalidPolicy', `expiration must be between 1 and ${maxExpirationMinutes} minutes`);
    }
    return { ttlSeconds };
  }
}

function isIntInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

function notFound(): NoteError {
  return new NoteError('NotFound', 'note not found');
}

function decodeRecord(raw: string): NoteRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new NoteError('StoreUnavailable', 'stored note is not valid JSON', { cause: err });
  }
  const result = noteRecordSchema.safeParse(parsed);
  if (!result.success) {
    throw new NoteError('StoreUnavailable', 'stored note has an unexpected shape', { cause: result.error });
  }
  return result.data;
}

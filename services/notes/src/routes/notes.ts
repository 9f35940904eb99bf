import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { NoteError } from '../errors';
import { type NoteStore, isWellFormedText } from '../notes/noteStore';
import { clientIdentity, type RateLimiter } from '../ratelimit/rateLimiter';
import { withStoreTimeout } from '../timeout';
import type { RateLimitAction } from '../types';
import { badRequest } from './errors';

// ---------- Schemas ----------
// Shape only; size and policy limits are enforced by the note store.
const wellFormed = z.string().refine(isWellFormedText, 'must be well-formed unicode text');

const createSchema = z.object({
  contents: wellFormed,
  meta: wellFormed,
  views: z.number().nullable().optional(),
  expiration: z.number().nullable().optional(), // minutes
});

const idParamsSchema = z.object({
  id: z.string().min(1),
});

export interface NoteRouteOptions {
  notes: NoteStore;
  limiter: RateLimiter;
  rateLimit: {
    createPerMinute: number;
    readPerMinute: number;
    clientIpHeader: string;
  };
  storeTimeoutMs: number;
}

// ---------- Routes ----------
export async function registerNoteRoutes(app: FastifyInstance, opts: NoteRouteOptions) {
  const { notes, limiter, rateLimit, storeTimeoutMs } = opts;

  const identify = (req: FastifyRequest) =>
    clientIdentity(req.headers, req.socket.remoteAddress, rateLimit.clientIpHeader);

  async function admit(req: FastifyRequest, ip: string, action: RateLimitAction) {
    const limit = action === 'create' ? rateLimit.createPerMinute : rateLimit.readPerMinute;
    const allowed = await withStoreTimeout(limiter.allow(ip, action, limit), storeTimeoutMs);
    if (!allowed) {
      req.log.warn({ action: `rate_limit_${action}`, ip }, 'rate limit exceeded');
      throw new NoteError('RateLimited', 'too many requests, slow down');
    }
  }

  // Create
  app.post('/api/notes', async (req, reply) => {
    const ip = identify(req);
    await admit(req, ip, 'create');

    const parsed = createSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { contents, meta, views, expiration } = parsed.data;
    const id = await withStoreTimeout(
      notes.create({ contents, meta, views, expirationMinutes: expiration }),
      storeTimeoutMs,
    );

    req.log.info({ action: 'create', note_id: id, ip, views, expiration }, 'note created');
    return reply.send({ id });
  });

  // Preview: meta only, no view spent
  app.get('/api/notes/:id', async (req, reply) => {
    const ip = identify(req);
    await admit(req, ip, 'read');

    const parsed = idParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);
    const { id } = parsed.data;

    try {
      const preview = await withStoreTimeout(notes.preview(id), storeTimeoutMs);
      req.log.info({ action: 'preview', note_id: id, ip }, 'note previewed');
      return reply.send({ meta: preview.meta });
    } catch (err) {
      if (err instanceof NoteError && err.code === 'NotFound') {
        req.log.info({ action: 'preview_not_found', note_id: id, ip }, 'note not found');
      }
      throw err;
    }
  });

  // Consume: read and spend a view (or delete)
  app.delete('/api/notes/:id', async (req, reply) => {
    const ip = identify(req);
    await admit(req, ip, 'read');

    const parsed = idParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);
    const { id } = parsed.data;

    try {
      const note = await withStoreTimeout(notes.consume(id), storeTimeoutMs);
      req.log.info(
        { action: 'consume', note_id: id, ip, remaining_views: note.remainingViews ?? 'time-based' },
        'note consumed',
      );
      return reply.send({ contents: note.contents, meta: note.meta });
    } catch (err) {
      if (err instanceof NoteError && err.code === 'NotFound') {
        req.log.info({ action: 'consume_not_found', note_id: id, ip }, 'note not found');
      }
      throw err;
    }
  });
}

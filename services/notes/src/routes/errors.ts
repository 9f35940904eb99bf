import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import type { z } from 'zod';
import { isNoteError, type NoteErrorCode } from '../errors';

const STATUS_BY_CODE: Record<NoteErrorCode, number> = {
  PayloadTooLarge: 413,
  InvalidContents: 400,
  InvalidMeta: 400,
  InvalidPolicy: 400,
  NotFound: 404,
  RateLimited: 429,
  StoreUnavailable: 503,
};

export function statusForCode(code: NoteErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((err: FastifyError | Error, req, reply) => {
    if (isNoteError(err)) {
      if (err.code === 'StoreUnavailable') {
        req.log.error({ err }, 'store unavailable');
      }
      return reply.code(statusForCode(err.code)).send({ error: err.code, message: err.message });
    }

    // fastify's own errors (body too large, malformed JSON) carry their status
    const statusCode = 'statusCode' in err && typeof err.statusCode === 'number' ? err.statusCode : 500;
    if (statusCode >= 500) {
      req.log.error({ err }, 'request failed');
      return reply.code(500).send({ error: 'InternalError', message: 'internal server error' });
    }
    const error = statusCode === 413 ? 'PayloadTooLarge' : 'BadRequest';
    return reply.code(statusCode).send({ error, message: err.message });
  });
}

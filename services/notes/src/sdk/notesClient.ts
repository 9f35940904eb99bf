const DEFAULT_BASE_URL = 'http://localhost:8080';

type FetchImpl = typeof fetch;

interface ClientOptions {
  baseUrl?: string;
  fetch?: FetchImpl;
}

export interface CreateNoteInput {
  contents: string;
  meta: string;
  views?: number;
  /** minutes */
  expiration?: number;
}

export interface ServiceStatus {
  version: string;
  max_size: number;
  max_meta: number;
  max_views: number;
  max_expiration: number;
  allow_advanced: boolean;
  allow_files: boolean;
}

export class NotesClientError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'NotesClientError';
  }
}

export interface NotesClient {
  create(input: CreateNoteInput): Promise<string>;
  preview(id: string): Promise<{ meta: string }>;
  consume(id: string): Promise<{ contents: string; meta: string }>;
  status(): Promise<ServiceStatus>;
  live(): Promise<boolean>;
}

export function createNotesClient(options: ClientOptions = {}): NotesClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const fetchImpl = options.fetch ?? globalThis.fetch;
  if (!fetchImpl) {
    throw new Error('createNotesClient: fetch is not available; pass options.fetch');
  }

  async function call(method: string, path: string, body?: unknown): Promise<unknown> {
    const res = await fetchImpl(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const payload = await readJson(res);
    if (!res.ok) {
      const { code, message } = describeError(payload, res);
      throw new NotesClientError(res.status, code, message);
    }
    return payload;
  }

  const noteUrl = (id: string) => `/api/notes/${encodeURIComponent(id)}`;

  return {
    async create(input) {
      const payload = await call('POST', '/api/notes', input);
      return stringField(payload, 'id');
    },
    async preview(id) {
      const payload = await call('GET', noteUrl(id));
      return { meta: stringField(payload, 'meta') };
    },
    async consume(id) {
      const payload = await call('DELETE', noteUrl(id));
      return { contents: stringField(payload, 'contents'), meta: stringField(payload, 'meta') };
    },
    async status() {
      const payload = await call('GET', '/api/status');
      if (!isObject(payload)) throw new Error('status response malformed');
      return {
        version: stringField(payload, 'version'),
        max_size: numberField(payload, 'max_size'),
        max_meta: numberField(payload, 'max_meta'),
        max_views: numberField(payload, 'max_views'),
        max_expiration: numberField(payload, 'max_expiration'),
        allow_advanced: payload.allow_advanced === true,
        allow_files: payload.allow_files === true,
      };
    },
    async live() {
      try {
        await call('GET', '/api/live');
        return true;
      } catch (err) {
        if (err instanceof NotesClientError && err.status === 503) return false;
        throw err;
      }
    },
  };
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeError(payload: unknown, res: Response): { code: string; message: string } {
  if (isObject(payload) && typeof payload.error === 'string') {
    const message = typeof payload.message === 'string' ? payload.message : payload.error;
    return { code: payload.error, message };
  }
  return { code: `HTTP_${res.status}`, message: `${res.status} ${res.statusText}`.trim() };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(payload: unknown, field: string): string {
  const value = isObject(payload) ? payload[field] : undefined;
  if (typeof value === 'string') return value;
  throw new Error(`response missing string field "${field}"`);
}

function numberField(payload: Record<string, unknown>, field: string): number {
  const value = payload[field];
  if (typeof value !== 'number') throw new Error(`response missing number field "${field}"`);
  return value;
}

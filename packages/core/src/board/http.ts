import type { z } from 'zod';
import { NetworkError, ServerError, errorMessage } from '../errors.js';
import { ErrorBodySchema } from '../wire/schemas.js';

/** The slice of the global `fetch` the transport relies on */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpTransportOptions {
  baseUrl: string;
  fetch?: FetchLike;
  /** Abort after this many ms; unset leaves the platform default in place */
  timeoutMs?: number;
}

export interface RequestOptions {
  query?: URLSearchParams;
  body?: unknown;
}

/**
 * JSON-over-HTTP requests against the task API. Resolves with the parsed body
 * or throws a NetworkError (transport failure, timeout) or ServerError
 * (non-2xx status, or a body that doesn't match the schema).
 */
export class HttpTransport {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number | undefined;

  constructor(opts: HttpTransportOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = opts.timeoutMs;
  }

  async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    opts: RequestOptions = {},
  ): Promise<z.output<S>> {
    const qs = opts.query?.toString();
    const url = `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;

    const init: RequestInit = { method, headers: { Accept: 'application/json' } };
    if (opts.body !== undefined) {
      init.headers = { Accept: 'application/json', 'Content-Type': 'application/json' };
      init.body = JSON.stringify(opts.body);
    }
    if (this.timeoutMs !== undefined) {
      init.signal = AbortSignal.timeout(this.timeoutMs);
    }

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(url, init);
      text = await res.text();
    } catch (err) {
      throw new NetworkError(`${method} ${path} failed: ${errorMessage(err)}`, { cause: err });
    }

    let json: unknown = null;
    if (text.length > 0) {
      try {
        json = JSON.parse(text);
      } catch {
        json = text;
      }
    }

    if (!res.ok) {
      const parsed = ErrorBodySchema.safeParse(json);
      const detail = parsed.success ? parsed.data.error : `HTTP ${res.status}`;
      throw new ServerError(detail, res.status, parsed.success ? parsed.data.missing_ids ?? [] : []);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ServerError(`Unexpected response from ${method} ${path}`, res.status);
    }
    return parsed.data;
  }
}

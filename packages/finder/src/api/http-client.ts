import { Agent, fetch, type Dispatcher, type Headers, type Response } from 'undici';
import { HttpError, MalformedResponseError } from '../types.js';
import type { AppConfig } from '../types.js';
import { parseRetryAfter } from './middleware/retry.js';

export interface HttpResponse {
  readonly status: number;
  readonly headers: Headers;
  readonly body: unknown;
}

export interface RequestOptions {
  readonly headers?: Record<string, string>;
  // Cancels the request alongside the client's own timeout
  readonly signal?: AbortSignal;
}

export interface HttpClient {
  readonly post: (url: string, body: unknown, options?: RequestOptions) => Promise<HttpResponse>;
  readonly close: () => Promise<void>;
}

export type HttpClientConfig = Pick<AppConfig, 'requestTimeoutMs' | 'tlsRejectUnauthorized' | 'userAgent'>;

export function createHttpClient(config: HttpClientConfig, dispatcher?: Dispatcher): HttpClient {
  const pool: Dispatcher = dispatcher ?? new Agent({
    keepAliveTimeout: 30_000,
    keepAliveMaxTimeout: 60_000,
    connections: 2,
    connect: { rejectUnauthorized: config.tlsRejectUnauthorized },
  });

  async function readBody(response: Response, url: string): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('application/json')) {
      return response.text();
    }
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new MalformedResponseError(`Reply from ${url} is not valid JSON`, 'root');
    }
  }

  async function request(
    method: string,
    url: string,
    body: unknown,
    options: RequestOptions,
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);
    const { signal } = options;
    const cancel = (): void => controller.abort();
    if (signal?.aborted === true) controller.abort();
    signal?.addEventListener('abort', cancel, { once: true });

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'Accept-Encoding': 'gzip, deflate',
      'Content-Type': 'application/json',
      'User-Agent': config.userAgent,
      ...options.headers,
    };

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
        dispatcher: pool,
      });

      if (!response.ok) {
        // Drain so the connection goes back to the pool
        await response.text();
        throw new HttpError(
          `HTTP ${response.status} ${method} ${url}`,
          response.status,
          method,
          url,
          parseRetryAfter(response.headers.get('retry-after')),
        );
      }

      return {
        status: response.status,
        headers: response.headers,
        body: await readBody(response, url),
      };
    } catch (err) {
      if (err instanceof HttpError || err instanceof MalformedResponseError) throw err;
      if (signal?.aborted === true) {
        throw new HttpError('Request aborted', 0, method, url);
      }
      if (err instanceof Error && err.name === 'AbortError') {
        throw new HttpError(`Request timeout after ${config.requestTimeoutMs}ms`, 0, method, url);
      }
      throw new HttpError(
        `Network error: ${err instanceof Error ? err.message : String(err)}`,
        0,
        method,
        url,
      );
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', cancel);
    }
  }

  return {
    post: (url, body, options = {}) => request('POST', url, body, options),
    close: () => pool.close(),
  };
}

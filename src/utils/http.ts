import { URL } from 'node:url';
import { sleep as defaultSleep } from './concurrency.js';
import { HttpError } from './errors.js';
import type { FetchResult } from '../types.js';

export type HttpMethod = 'GET' | 'POST';

interface RequestOptions {
  method?: HttpMethod;
  body?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/** The part of a fetch `Response` the client reads. */
export interface ResponseLike {
  status: number;
  url: string;
  headers: Headers;
  text(): Promise<string>;
}

export type FetchFn = (
  url: string,
  init: { method: HttpMethod; body?: string; headers: Record<string, string>; redirect: 'manual'; signal: AbortSignal },
) => Promise<ResponseLike>;

export interface HttpClientOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  retries?: number;
  backoffBaseMs?: number;
  retryStatuses?: readonly number[];
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

export const RETRYABLE_STATUSES: readonly number[] = [429, 500, 502, 503, 504];

function normalizeHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

function mergeHeaders(...headersList: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const headers of headersList) {
    if (!headers) {
      continue;
    }
    for (const [key, value] of Object.entries(headers)) {
      merged[key.toLowerCase()] = value;
    }
  }
  return merged;
}

/**
 * Anonymous cookie store for a single upstream. Cookies are keyed by name only;
 * attributes (path, expiry) are ignored for the lifetime of a session.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  store(setCookieHeaders: string[]): void {
    for (const header of setCookieHeaders) {
      const pair = header.split(';', 1)[0]?.trim() ?? '';
      const eq = pair.indexOf('=');
      if (eq <= 0) {
        continue;
      }
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  header(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return [...this.cookies.entries()].map(([name, value]) => `${name}=${value}`).join('; ');
  }

  get size(): number {
    return this.cookies.size;
  }
}

export class HttpClient {
  readonly cookies = new CookieJar();
  private readonly defaultHeaders: Record<string, string>;
  private readonly defaultTimeoutMs: number;
  private readonly retries: number;
  private readonly backoffBaseMs: number;
  private readonly retryStatuses: ReadonlySet<number>;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: HttpClientOptions = {}) {
    this.defaultHeaders = mergeHeaders(options.headers);
    this.defaultTimeoutMs = options.timeoutMs ?? 30000;
    this.retries = options.retries ?? 5;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.retryStatuses = new Set(options.retryStatuses ?? RETRYABLE_STATUSES);
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Retries retryable statuses and network failures with exponential backoff
   * (1s, 2s, 4s, ...). When the retries run out on a retryable status the last
   * response is returned; when they run out on a network failure an
   * {@link HttpError} without status is thrown.
   */
  async request(rawUrl: string, options: RequestOptions = {}): Promise<FetchResult> {
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt += 1) {
      try {
        const result = await this.requestWithRedirects(rawUrl, options);
        if (this.retryStatuses.has(result.status) && attempt < this.retries) {
          await this.sleep(this.backoffBaseMs * 2 ** attempt);
          continue;
        }
        return result;
      } catch (error) {
        lastError = error;
        if (attempt >= this.retries) {
          break;
        }
        await this.sleep(this.backoffBaseMs * 2 ** attempt);
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new HttpError(`Request failed for ${rawUrl}: ${reason}`, rawUrl, undefined, { cause: lastError });
  }

  private async requestWithRedirects(rawUrl: string, options: RequestOptions): Promise<FetchResult> {
    const maxRedirects = 8;
    let currentUrl = rawUrl;
    let method: HttpMethod = options.method ?? 'GET';
    let body = options.body;

    for (let hop = 0; hop <= maxRedirects; hop += 1) {
      const response = await this.performFetch(currentUrl, method, body, options);

      const location = response.headers.location;
      if (location && response.status >= 300 && response.status < 400) {
        currentUrl = new URL(location, currentUrl).toString();
        if (response.status === 303 || ((response.status === 301 || response.status === 302) && method === 'POST')) {
          method = 'GET';
          body = undefined;
        }
        continue;
      }

      return response;
    }

    throw new Error(`Too many redirects for ${rawUrl}`);
  }

  private async performFetch(
    url: string,
    method: HttpMethod,
    body: string | undefined,
    options: RequestOptions,
  ): Promise<FetchResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const cookieHeader = this.cookies.header();
      const response = await this.fetchFn(url, {
        method,
        body,
        redirect: 'manual',
        signal: controller.signal,
        headers: mergeHeaders(this.defaultHeaders, options.headers, cookieHeader ? { cookie: cookieHeader } : undefined),
      });

      this.cookies.store(response.headers.getSetCookie());

      const headers = normalizeHeaders(response.headers);
      const contentType = headers['content-type'] ?? '';
      const text = await response.text();

      return {
        status: response.status,
        url: response.url || url,
        headers,
        body: text,
        contentType,
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}

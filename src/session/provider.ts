import type { Config } from '../config.js';
import { ConnectionError, HttpError } from '../utils/errors.js';
import { HttpClient } from '../utils/http.js';
import type { FetchFn } from '../utils/http.js';
import type { HarvestLogger } from '../utils/logger.js';
import { MemoryLogger } from '../utils/logger.js';

export const SESSION_MAX_AGE_MS = 30 * 60 * 1000;

const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/142.0.0.0 Safari/537.36';

export function buildSessionHeaders(jobOffersUrl: string): Record<string, string> {
  return {
    accept: '*/*',
    'content-type': 'application/json',
    origin: new URL(jobOffersUrl).origin,
    referer: jobOffersUrl,
    'user-agent': BROWSER_USER_AGENT,
  };
}

export class Session {
  constructor(
    readonly client: HttpClient,
    readonly createdAt: number,
    readonly degraded = false,
  ) {}

  isExpired(now: number, maxAgeMs = SESSION_MAX_AGE_MS): boolean {
    return now - this.createdAt >= maxAgeMs;
  }
}

export interface SessionProviderOptions {
  config: Pick<Config, 'jobOffersUrl' | 'sessionMaxAgeMs' | 'requestTimeoutMs' | 'httpRetries'>;
  logger?: HarvestLogger;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Hands out one anonymous session at a time and replaces it once it is older
 * than the configured max age. Callers that arrive while a session is being
 * created wait for that same session.
 */
export class SessionProvider {
  private current: Session | null = null;
  private pending: Promise<Session> | null = null;
  private readonly logger: HarvestLogger;
  private readonly now: () => number;

  constructor(private readonly options: SessionProviderOptions) {
    this.logger = options.logger ?? new MemoryLogger();
    this.now = options.now ?? Date.now;
  }

  async getSession(): Promise<Session> {
    if (this.current && !this.current.isExpired(this.now(), this.options.config.sessionMaxAgeMs)) {
      return this.current;
    }
    if (!this.pending) {
      this.pending = this.createSession().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async createSession(): Promise<Session> {
    const { config } = this.options;
    const client = new HttpClient({
      headers: buildSessionHeaders(config.jobOffersUrl),
      timeoutMs: config.requestTimeoutMs,
      retries: config.httpRetries,
      fetchFn: this.options.fetchFn,
      sleep: this.options.sleep,
    });

    let degraded = false;
    try {
      await this.bootstrapCookies(client);
      await this.logger.info(`Session started with ${client.cookies.size} cookie(s)`);
    } catch (error) {
      if (!(error instanceof ConnectionError)) {
        throw error;
      }
      degraded = true;
      await this.logger.warn(`${error.message}; continuing without session cookies`);
    }

    const session = new Session(client, this.now(), degraded);
    this.current = session;
    return session;
  }

  private async bootstrapCookies(client: HttpClient): Promise<void> {
    const url = this.options.config.jobOffersUrl;
    let status: number;
    try {
      const response = await client.request(url, { method: 'GET' });
      status = response.status;
    } catch (error) {
      const reason = error instanceof HttpError ? error.message : String(error);
      throw new ConnectionError(`Cookie bootstrap failed: ${reason}`, { cause: error });
    }
    if (status >= 400) {
      throw new ConnectionError(`Cookie bootstrap failed: ${url} answered ${status}`);
    }
  }
}

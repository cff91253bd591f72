import fetch, { type RequestInit } from 'node-fetch';
import type { PageSource } from './base';
import type { InputEntry } from '../types/company';
import type { Config } from '../config';
import { FetchError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * The parts of a fetch response the source reads
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init: RequestInit) => Promise<HttpResponse>;

export interface HttpSourceDependencies {
  fetch?: HttpFetch;
  wait?: Sleep;
}

type HttpSourceConfig = Pick<
  Config,
  'politeDelayMs' | 'maxRetries' | 'retryBackoffMs' | 'requestTimeoutMs' | 'userAgent'
>;

type AttemptResult =
  | { ok: true; html: string }
  | { ok: false; transient: boolean; reason: string; status?: number; retryAfterMs?: number };

const MAX_BACKOFF_MS = 30_000;

/**
 * 429 and 5xx are worth another attempt; other statuses are final
 */
export function isTransientStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

/**
 * Parses Retry-After given in seconds or as an HTTP date
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(header);
  if (Number.isFinite(at)) return Math.max(0, at - now);
  return null;
}

/**
 * Live page adapter
 * Serialized fetches with a polite delay between them and bounded retries
 */
export class HttpPageSource implements PageSource {
  readonly kind = 'url' as const;
  private fetchCount = 0;
  private readonly fetchPage: HttpFetch;
  private readonly wait: Sleep;

  constructor(
    private config: HttpSourceConfig,
    deps: HttpSourceDependencies = {}
  ) {
    this.fetchPage = deps.fetch ?? fetch;
    this.wait = deps.wait ?? sleep;
  }

  async load(entry: InputEntry): Promise<string> {
    const url = entry.location;

    if (this.fetchCount > 0 && this.config.politeDelayMs > 0) {
      await this.wait(this.config.politeDelayMs);
    }
    this.fetchCount++;

    const maxAttempts = this.config.maxRetries + 1;
    let last: Extract<AttemptResult, { ok: false }> = { ok: false, transient: true, reason: 'not attempted' };

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      logger.debug(`Fetching page`, { url, attempt: attempt + 1 });
      const result = await this.attempt(url);

      if (result.ok) {
        logger.debug(`Fetched page`, { url, bytes: result.html.length });
        return result.html;
      }

      last = result;
      if (!result.transient) {
        throw new FetchError(`HTTP fetch failed for ${url}: ${result.reason}`, url, result.status, attempt + 1);
      }

      if (attempt < maxAttempts - 1) {
        const delay = Math.max(this.backoff(attempt), result.retryAfterMs ?? 0);
        logger.warn(`Transient fetch failure, retrying`, {
          url,
          reason: result.reason,
          attempt: attempt + 1,
          delayMs: delay,
        });
        await this.wait(delay);
      }
    }

    throw new FetchError(
      `HTTP fetch failed for ${url} after ${maxAttempts} attempt(s): ${last.reason}`,
      url,
      last.status,
      maxAttempts
    );
  }

  private backoff(attempt: number): number {
    return Math.min(MAX_BACKOFF_MS, this.config.retryBackoffMs * Math.pow(2, attempt));
  }

  private async attempt(url: string): Promise<AttemptResult> {
    try {
      const response = await this.fetchPage(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          'Accept-Language': 'en-US,en;q=0.9',
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        timeout: this.config.requestTimeoutMs,
        redirect: 'follow',
      });

      if (!response.ok) {
        return {
          ok: false,
          transient: isTransientStatus(response.status),
          reason: `HTTP ${response.status}`,
          status: response.status,
          retryAfterMs: response.status === 429
            ? parseRetryAfter(response.headers.get('retry-after')) ?? undefined
            : undefined,
        };
      }

      return { ok: true, html: await response.text() };
    } catch (error) {
      // node-fetch rejects malformed URLs with a TypeError before any I/O
      return { ok: false, transient: !(error instanceof TypeError), reason: errorMessage(error) };
    }
  }
}

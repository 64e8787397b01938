import fetch, { RequestInit, Response } from 'node-fetch';
import { gunzipSync } from 'zlib';
import { FetchError, errorMessage } from './errors';
import { FetchResult } from './types';
import { Logger, createLogger } from '../log';

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

// Backoff between attempts: BACKOFF_BASE_MS * 2^attempt (1s, 2s, 4s, ...)
export const BACKOFF_BASE_MS = 1000;

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface FetcherOptions {
  headers?: Record<string, string>;
  http?: HttpFetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelayMs(attempt: number): number {
  return BACKOFF_BASE_MS * 2 ** attempt;
}

/**
 * Gunzips the body when it is gzip framed; anything else is read as UTF-8.
 */
export function decodeBody(body: Buffer, logger?: Logger): string {
  try {
    return gunzipSync(body).toString('utf8');
  } catch (e) {
    logger?.debug('body is not gzip framed, reading as text:', errorMessage(e));
    return body.toString('utf8');
  }
}

export class XmltvFetcher {
  private headers: Record<string, string>;
  private http: HttpFetch;
  private sleep: (ms: number) => Promise<void>;
  private log: Logger;

  constructor(opts: FetcherOptions = {}) {
    this.headers = { 'User-Agent': DEFAULT_USER_AGENT, ...opts.headers };
    this.http = opts.http || fetch;
    this.sleep = opts.sleep || defaultSleep;
    this.log = opts.logger || createLogger('FETCH');
  }

  /**
   * GETs `url` at most `maxRetries` times. Never throws: an exhausted
   * retry budget comes back as `{ ok: false }`.
   */
  public async fetch(url: string, maxRetries: number, timeoutSeconds: number): Promise<FetchResult> {
    const attemptsAllowed = Math.max(1, Math.floor(maxRetries));
    let lastError: unknown;
    for (let attempt = 0; attempt < attemptsAllowed; attempt++) {
      this.log.info(`GET ${url} (attempt ${attempt + 1}/${attemptsAllowed})`);
      try {
        const res = await this.http(url, { headers: this.headers, timeout: timeoutSeconds * 1000 });
        if (!res.ok) throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
        const body = Buffer.from(await res.arrayBuffer());
        return { ok: true, text: decodeBody(body, this.log), attempts: attempt + 1 };
      } catch (e) {
        lastError = e;
        this.log.warn(`attempt ${attempt + 1} for ${url} failed: ${errorMessage(e)}`);
      }
      if (attempt + 1 < attemptsAllowed) await this.sleep(backoffDelayMs(attempt));
    }
    const error = new FetchError(
      url,
      attemptsAllowed,
      `EPG fetch failed after ${attemptsAllowed} attempts: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
    return { ok: false, error, attempts: attemptsAllowed };
  }
}

// src/core/feed/fetcher.ts
import { ArchiverError, ErrorCode, describeError, type RecoverableError } from '../errors.js';
import { DEFAULT_TIMEOUT, USER_AGENT } from '../config/constants.js';
import type { FeedItem } from '../types/index.js';
import { parseFeedPage } from './schema.js';

export type FetchLike = typeof fetch;

export type FetchResult =
  | { ok: true; items: FeedItem[] }
  | { ok: false; error: RecoverableError };

/** Anything that can hand out newest-first pages of a feed. */
export interface FeedSource {
  fetchPage(endpoint: string, cursor: string | undefined, limit: number): Promise<FetchResult>;
}

export interface FeedFetcherOptions {
  baseUrl: string;
  accessToken: string;
  timeoutMs?: number;
  userAgent?: string;
  fetch?: FetchLike;
}

/**
 * Authenticated reads of paginated timeline endpoints.
 * Never throws: every transport, status or decoding problem comes back as `ok: false`.
 */
export class FeedFetcher implements FeedSource {
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: FeedFetcherOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.fetchImpl = options.fetch ?? fetch;
  }

  buildUrl(endpoint: string, cursor: string | undefined, limit: number): string {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    url.searchParams.set('limit', String(limit));
    if (cursor) {
      url.searchParams.set('max_id', cursor);
    }
    return url.toString();
  }

  async fetchPage(endpoint: string, cursor: string | undefined, limit: number): Promise<FetchResult> {
    const url = this.buildUrl(endpoint, cursor, limit);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          'Authorization': `Bearer ${this.accessToken}`,
          'Accept': 'application/json',
          'User-Agent': this.userAgent,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return { ok: false, error: this.transportError(url, error) };
    }

    if (!response.ok) {
      const code = response.status === 429 ? ErrorCode.RATE_LIMITED : ErrorCode.HTTP_ERROR;
      return {
        ok: false,
        error: new ArchiverError(code, `HTTP ${response.status} from ${url}`, {
          context: { url, status: response.status },
          suggestion: response.status === 401 || response.status === 403
            ? 'Check that the access token is valid and has the read scope'
            : undefined,
        }),
      };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      return { ok: false, error: this.decodeError(url, `Invalid JSON: ${describeError(error)}`, error) };
    }

    try {
      return { ok: true, items: parseFeedPage(payload) };
    } catch (error) {
      return { ok: false, error: this.decodeError(url, `Unexpected payload: ${describeError(error)}`, error) };
    }
  }

  private transportError(url: string, error: unknown): RecoverableError {
    const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
    if (timedOut) {
      return new ArchiverError(ErrorCode.TIMEOUT, `Request to ${url} timed out after ${this.timeoutMs}ms`, {
        cause: error,
        context: { url },
      });
    }
    return new ArchiverError(ErrorCode.NETWORK_ERROR, `Request to ${url} failed: ${describeError(error)}`, {
      cause: error,
      context: { url },
    });
  }

  private decodeError(url: string, message: string, cause: unknown): RecoverableError {
    return new ArchiverError(ErrorCode.DECODE_FAILED, `${message} (${url})`, {
      cause,
      context: { url },
    });
  }
}

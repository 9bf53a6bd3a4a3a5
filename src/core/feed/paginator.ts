// src/core/feed/paginator.ts
import {
  DEFAULT_BOUNDARY,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_DELAY_MS,
  DEFAULT_PAGE_SIZE,
  FEED_ENDPOINTS,
} from '../config/constants.js';
import { getBoundaryId, type LedgerReader } from '../ledger/index.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { BoundaryStrategy, Category, FeedItem } from '../types/index.js';
import { sleep } from '../utils.js';
import type { FeedSource } from './fetcher.js';

export type StopReason = 'boundary' | 'end_of_feed' | 'fetch_failed' | 'page_limit';

export interface PaginationResult {
  category: Category;
  /** New items, oldest first */
  items: FeedItem[];
  pagesFetched: number;
  boundaryId?: string;
  boundaryReached: boolean;
  stopReason: StopReason;
  warnings: string[];
}

export interface PaginatorOptions {
  pageSize?: number;
  maxPages?: number;
  pageDelayMs?: number;
  boundary?: BoundaryStrategy;
  endpoints?: Record<Category, string>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Walks a newest-first feed until it meets the last archived item,
 * the end of the feed, a failed fetch, or the page cap.
 */
export class BoundaryPaginator {
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly pageDelayMs: number;
  private readonly boundary: BoundaryStrategy;
  private readonly endpoints: Record<Category, string>;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: FeedSource,
    private readonly ledger: LedgerReader,
    options: PaginatorOptions = {}
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    this.boundary = options.boundary ?? DEFAULT_BOUNDARY;
    this.endpoints = options.endpoints ?? FEED_ENDPOINTS;
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep ?? sleep;
  }

  async collect(category: Category): Promise<PaginationResult> {
    const endpoint = this.endpoints[category];
    const boundaryId = await getBoundaryId(this.ledger, category, this.boundary);

    this.logger.info(`starting pagination for ${category}, last archived id: ${boundaryId ?? 'none'}`);

    const collected: FeedItem[] = [];
    const seen = new Set<string>();
    const warnings: string[] = [];
    let cursor: string | undefined;
    let pagesFetched = 0;
    let boundaryReached = false;
    let stopReason: StopReason = 'page_limit';

    while (pagesFetched < this.maxPages) {
      const result = await this.source.fetchPage(endpoint, cursor, this.pageSize);

      if (!result.ok) {
        this.logger.error(`API request failed for ${category}, stopping pagination`, result.error, {
          code: result.error.code,
        });
        stopReason = 'fetch_failed';
        break;
      }

      const page = result.items;
      if (page.length === 0) {
        this.logger.info('no more posts returned from API, stopping pagination');
        stopReason = 'end_of_feed';
        break;
      }

      pagesFetched++;
      this.logger.debug(`processing page ${pagesFetched} with ${page.length} posts`);

      for (const item of page) {
        if (boundaryId !== undefined && item.id === boundaryId) {
          this.logger.info(`reached previously archived ${category} ${item.id}, stopping`);
          boundaryReached = true;
          break;
        }

        if (seen.has(item.id)) continue;
        seen.add(item.id);

        if (!(await this.ledger.exists(item.id, category))) {
          collected.push(item);
        }
      }

      if (boundaryReached) {
        stopReason = 'boundary';
        break;
      }

      if (page.length < this.pageSize) {
        this.logger.info(`received partial page (${page.length} posts), reached end of available posts`);
        stopReason = 'end_of_feed';
        break;
      }

      cursor = page[page.length - 1].id;

      if (pagesFetched < this.maxPages && this.pageDelayMs > 0) {
        await this.sleep(this.pageDelayMs);
      }
    }

    if (stopReason === 'page_limit') {
      const warning = `reached maximum pagination limit (${this.maxPages} pages) for ${category}`;
      this.logger.warn(warning);
      warnings.push(warning);
    }

    this.logger.info(`pagination complete: processed ${pagesFetched} pages, found ${collected.length} new posts`);

    return {
      category,
      items: collected.reverse(),
      pagesFetched,
      boundaryId,
      boundaryReached,
      stopReason,
      warnings,
    };
  }
}

// src/core/orchestrator.ts
import { ItemArchiver } from './archiver.js';
import type { ArchiverConfig } from './config/env.js';
import { CATEGORY_LABELS } from './config/constants.js';
import { ensureArchiveLayout, type ArchiveLayout } from './config/layout.js';
import { describeError, isFatalError } from './errors.js';
import { MediaDownloader } from './export/media.js';
import { FeedFetcher, type FetchLike } from './feed/fetcher.js';
import { BoundaryPaginator, type StopReason } from './feed/paginator.js';
import { ArchiveLedger } from './ledger/index.js';
import { createSilentLogger, type Logger } from './logging/logger.js';
import { CATEGORIES, type Category } from './types/index.js';

export interface CategorySummary {
  category: Category;
  /** New items found by pagination */
  discovered: number;
  archived: number;
  skipped: number;
  failed: number;
  mediaFallbacks: number;
  pagesFetched: number;
  stopReason: StopReason;
  warnings: string[];
  failures: Array<{ itemId: string; error: string }>;
}

export interface SyncSummary {
  categories: CategorySummary[];
  totalArchived: number;
  totalFailed: number;
  duration: number;
}

/**
 * Runs pagination and archiving for each category, one after the other.
 * Per-item failures are counted and skipped; fatal errors propagate.
 */
export class SyncOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly paginator: BoundaryPaginator,
    private readonly archiver: ItemArchiver,
    logger?: Logger
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  async run(categories: readonly Category[] = CATEGORIES): Promise<SyncSummary> {
    const startTime = Date.now();
    this.logger.info('starting mastodon archival process');

    const summaries: CategorySummary[] = [];
    for (const category of categories) {
      summaries.push(await this.syncCategory(category));
    }

    const totalArchived = summaries.reduce((sum, summary) => sum + summary.archived, 0);
    const totalFailed = summaries.reduce((sum, summary) => sum + summary.failed, 0);

    if (totalArchived > 0) {
      this.logger.info(`archive complete: ${totalArchived} new posts archived`);
    } else {
      this.logger.info('no new posts to archive');
    }

    const summary: SyncSummary = {
      categories: summaries,
      totalArchived,
      totalFailed,
      duration: Date.now() - startTime,
    };
    this.logger.info(formatSummary(summary));
    return summary;
  }

  async syncCategory(category: Category): Promise<CategorySummary> {
    const label = CATEGORY_LABELS[category];
    this.logger.info(`checking for new ${label}...`);

    const batch = await this.paginator.collect(category);
    const summary: CategorySummary = {
      category,
      discovered: batch.items.length,
      archived: 0,
      skipped: 0,
      failed: 0,
      mediaFallbacks: 0,
      pagesFetched: batch.pagesFetched,
      stopReason: batch.stopReason,
      warnings: [...batch.warnings],
      failures: [],
    };

    for (const item of batch.items) {
      try {
        const result = await this.archiver.archive(item, category);
        switch (result.status) {
          case 'archived':
            summary.archived++;
            summary.mediaFallbacks += result.mediaFailures.length;
            break;
          case 'skipped':
            summary.skipped++;
            break;
          case 'failed':
            summary.failed++;
            summary.failures.push({ itemId: item.id, error: result.error.message });
            break;
        }
      } catch (error) {
        if (isFatalError(error)) {
          throw error;
        }
        this.logger.error(`unexpected failure archiving ${category} post ${item.id}`, error);
        summary.failed++;
        summary.failures.push({ itemId: item.id, error: describeError(error) });
      }
    }

    this.logger.info(`archived ${summary.archived} new ${label}`);
    return summary;
  }
}

export function formatSummary(summary: SyncSummary): string {
  const parts = summary.categories.map(
    c => `${CATEGORY_LABELS[c.category]}: ${c.archived} archived, ${c.skipped} skipped, ${c.failed} failed`
  );
  return `Summary: ${parts.join('; ')} (${(summary.duration / 1000).toFixed(1)}s)`;
}

export interface SyncEngine {
  orchestrator: SyncOrchestrator;
  ledger: ArchiveLedger;
  layout: ArchiveLayout;
}

/**
 * Wires ledger, fetcher, downloader, paginator and archiver from configuration.
 * Loading the ledger here means an unreadable ledger aborts before any fetch.
 */
export async function createSyncEngine(
  config: ArchiverConfig,
  logger: Logger,
  options: { fetch?: FetchLike; sleep?: (ms: number) => Promise<void> } = {}
): Promise<SyncEngine> {
  const layout = await ensureArchiveLayout(config.archiveDir);

  const ledger = new ArchiveLedger(layout.ledgerPath);
  await ledger.load();

  const fetcher = new FeedFetcher({
    baseUrl: config.baseUrl,
    accessToken: config.accessToken,
    timeoutMs: config.requestTimeoutMs,
    fetch: options.fetch,
  });

  const paginator = new BoundaryPaginator(fetcher, ledger, {
    pageSize: config.pageSize,
    maxPages: config.maxPages,
    pageDelayMs: config.pageDelayMs,
    boundary: config.boundary,
    logger,
    sleep: options.sleep,
  });

  const downloader = new MediaDownloader({
    mediaDir: layout.mediaDir,
    fetch: options.fetch,
    timeoutMs: config.requestTimeoutMs,
    logger,
    sleep: options.sleep,
  });

  const archiver = new ItemArchiver({
    postsDir: layout.postsDir,
    ledger,
    downloader,
    logger,
  });

  return {
    orchestrator: new SyncOrchestrator(paginator, archiver, logger),
    ledger,
    layout,
  };
}

// src/core/archiver.ts
import { ArchiverError, ErrorCode, describeError, isRecoverableError, type RecoverableError } from './errors.js';
import { buildArchivedPost, writePostRecord, type ArchivedMedia } from './export/json.js';
import type { MediaDownloader } from './export/media.js';
import { generateMediaFilename } from './export/path.js';
import type { Ledger } from './ledger/index.js';
import { createSilentLogger, type Logger } from './logging/logger.js';
import type { ArchivedPost, Category, FeedItem } from './types/index.js';

/**
 * Detailed record of a media attachment that could not be downloaded.
 */
export interface MediaFailure {
  url: string;
  filename: string;
  reason: string;
  attempts: number;
}

export type ArchiveResult =
  | {
      status: 'archived';
      post: ArchivedPost;
      postPath: string;
      mediaFailures: MediaFailure[];
    }
  | { status: 'skipped'; reason: 'already_archived' }
  | { status: 'failed'; error: RecoverableError };

export interface ItemArchiverOptions {
  postsDir: string;
  ledger: Ledger;
  downloader: MediaDownloader;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Persists one feed item: media first, then the JSON record, then the ledger row.
 * The ledger is only written once the record is on disk.
 */
export class ItemArchiver {
  private readonly postsDir: string;
  private readonly ledger: Ledger;
  private readonly downloader: MediaDownloader;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ItemArchiverOptions) {
    this.postsDir = options.postsDir;
    this.ledger = options.ledger;
    this.downloader = options.downloader;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  async archive(item: FeedItem, category: Category): Promise<ArchiveResult> {
    // Also catches duplicates within one batch when pages overlap
    if (await this.ledger.exists(item.id, category)) {
      return { status: 'skipped', reason: 'already_archived' };
    }

    this.logger.info(`archiving ${category} post ${item.id}`);

    const { media, failures } = await this.archiveMedia(item);
    const post = buildArchivedPost(item, category, this.now().toISOString(), media);

    let postPath: string;
    try {
      postPath = await writePostRecord(this.postsDir, post);
    } catch (error) {
      const failure = new ArchiverError(ErrorCode.RECORD_WRITE_FAILED, `failed to save post ${item.id}: ${describeError(error)}`, {
        cause: error,
        context: { itemId: item.id, category },
      });
      this.logger.error(`failed to save post ${item.id}`, error);
      return { status: 'failed', error: failure };
    }

    try {
      await this.ledger.commit({
        itemId: item.id,
        category,
        sourceUrl: item.url,
        authorHandle: item.author.handle,
        createdAt: item.createdAt,
      });
    } catch (error) {
      if (!isRecoverableError(error)) {
        throw error;
      }
      this.logger.error(`failed to record ${category} post ${item.id} in ledger`, error);
      return { status: 'failed', error };
    }

    this.logger.info(`successfully archived ${category} post ${item.id}`);
    return { status: 'archived', post, postPath, mediaFailures: failures };
  }

  private async archiveMedia(item: FeedItem): Promise<{ media: ArchivedMedia; failures: MediaFailure[] }> {
    // Boosts carry their media on the reblogged post
    const source = item.reblog ?? item;
    const media: ArchivedMedia = { attachments: [], files: [] };
    const failures: MediaFailure[] = [];

    for (const [index, attachment] of source.mediaAttachments.entries()) {
      const url = attachment.url;
      if (!url) continue;

      const filename = generateMediaFilename(item.id, url, index);
      const result = await this.downloader.download(url, filename);

      media.attachments.push(attachment);
      media.files.push({
        originalUrl: url,
        localPath: result.localPath,
        type: attachment.type,
        description: attachment.description ?? '',
        status: result.status,
      });

      if (result.status === 'fallback') {
        failures.push({
          url,
          filename,
          reason: result.error?.reason ?? 'Unknown error',
          attempts: result.attempts,
        });
      }
    }

    return { media, failures };
  }
}

// src/core/export/media.ts
import * as fs from 'fs/promises';
import { createWriteStream } from 'fs';
import { join } from 'path';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  DEFAULT_TIMEOUT,
  MEDIA_DOWNLOAD_ATTEMPTS,
  MEDIA_RETRY_BASE_DELAY_MS,
  USER_AGENT,
} from '../config/constants.js';
import { describeError } from '../errors.js';
import type { FetchLike } from '../feed/fetcher.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { sleep } from '../utils.js';
import { getMediaReference } from './path.js';

/**
 * Result of a media download attempt.
 *
 * @example
 * // Downloaded, or already on disk from an earlier run
 * { status: 'downloaded', localPath: 'media/1093_5d41402a.png', reused: false, attempts: 1 }
 *
 * @example
 * // Failed download (falls back to original URL)
 * { status: 'fallback', localPath: 'https://files.example/a.png', reused: false, attempts: 3, error: { reason: 'HTTP 404' } }
 */
export interface MediaDownloadResult {
  status: 'downloaded' | 'fallback';
  /** Archive-relative path on success, original URL on failure */
  localPath: string;
  /** True when the file already existed and no request was made */
  reused: boolean;
  attempts: number;
  error?: {
    reason: string;
  };
}

export interface MediaDownloaderOptions {
  mediaDir: string;
  fetch?: FetchLike;
  /** Longest wait for the response or for the next chunk of the body */
  timeoutMs?: number;
  attempts?: number;
  retryBaseDelayMs?: number;
  userAgent?: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export class MediaDownloader {
  private readonly mediaDir: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly attempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: MediaDownloaderOptions) {
    this.mediaDir = options.mediaDir;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.attempts = Math.max(1, options.attempts ?? MEDIA_DOWNLOAD_ATTEMPTS);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? MEDIA_RETRY_BASE_DELAY_MS;
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep ?? sleep;
  }

  async download(url: string, filename: string): Promise<MediaDownloadResult> {
    const filepath = join(this.mediaDir, filename);
    const localPath = getMediaReference(filename);

    if (await this.fileExists(filepath)) {
      this.logger.debug(`media already present: ${filename}`);
      return { status: 'downloaded', localPath, reused: true, attempts: 0 };
    }

    let lastError = 'Unknown error';
    for (let attempt = 0; attempt < this.attempts; attempt++) {
      try {
        await this.fetchToFile(url, filepath);
        this.logger.info(`downloaded media: ${filename}`);
        return { status: 'downloaded', localPath, reused: false, attempts: attempt + 1 };
      } catch (error) {
        lastError = describeError(error);
      }

      // Exponential backoff (1s, 2s, ...)
      if (attempt < this.attempts - 1) {
        await this.sleep(this.retryBaseDelayMs * Math.pow(2, attempt));
      }
    }

    this.logger.warn(`failed to download media ${url}: ${lastError}`);
    return {
      status: 'fallback',
      localPath: url,
      reused: false,
      attempts: this.attempts,
      error: { reason: lastError },
    };
  }

  private async fetchToFile(url: string, filepath: string): Promise<void> {
    const partPath = `${filepath}.part`;
    await fs.mkdir(this.mediaDir, { recursive: true });

    // Restarted on every chunk: bounds idle time, not the whole transfer
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    const restartTimeout = () => {
      clearTimeout(timeoutId);
      timeoutId = setTimeout(
        () => controller.abort(new Error(`No data received for ${this.timeoutMs}ms`)),
        this.timeoutMs
      );
    };

    restartTimeout();
    try {
      const response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
      });
      if (!response.ok) {
        await response.body?.cancel();
        throw new Error(`HTTP ${response.status}`);
      }
      if (!response.body) {
        throw new Error('Empty response body');
      }

      const progress = new Transform({
        transform(chunk, _encoding, callback) {
          restartTimeout();
          callback(null, chunk);
        },
      });

      try {
        await pipeline(Readable.fromWeb(response.body), progress, createWriteStream(partPath));
        await fs.rename(partPath, filepath);
      } catch (error) {
        await fs.rm(partPath, { force: true });
        throw error;
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async fileExists(filepath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filepath);
      return stats.isFile();
    } catch {
      return false;
    }
  }
}

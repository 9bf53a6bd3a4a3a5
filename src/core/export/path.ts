// src/core/export/path.ts
import * as path from 'path';
import { createHash } from 'node:crypto';
import { DEFAULT_MEDIA_EXTENSION } from '../config/constants.js';

export function getMediaExtension(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return DEFAULT_MEDIA_EXTENSION;
  }

  const ext = path.posix.extname(pathname).toLowerCase();
  return /^\.[a-z0-9]{1,8}$/.test(ext) ? ext : DEFAULT_MEDIA_EXTENSION;
}

/**
 * Deterministic media file name: `<itemId>_<md5(url)[:8]>[_<index>]<ext>`.
 * The first attachment carries no index suffix.
 */
export function generateMediaFilename(itemId: string, url: string, index: number): string {
  const urlHash = createHash('md5').update(url).digest('hex').substring(0, 8);
  const ext = getMediaExtension(url);
  return index > 0 ? `${itemId}_${urlHash}_${index}${ext}` : `${itemId}_${urlHash}${ext}`;
}

/** Archive-relative reference stored in post records. */
export function getMediaReference(filename: string): string {
  return `media/${filename}`;
}

export function getPostPath(postsDir: string, itemId: string): string {
  return path.join(postsDir, `${itemId}.json`);
}

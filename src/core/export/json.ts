// src/core/export/json.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  ArchivedPost,
  Category,
  FeedItem,
  MediaAttachment,
  MediaFile,
  ReblogSummary,
} from '../types/index.js';
import { htmlToText } from './content.js';
import { getPostPath } from './path.js';

export interface ArchivedMedia {
  attachments: MediaAttachment[];
  files: MediaFile[];
}

export function buildArchivedPost(
  item: FeedItem,
  category: Category,
  archivedAt: string,
  media: ArchivedMedia
): ArchivedPost {
  const post: ArchivedPost = {
    id: item.id,
    category,
    archivedAt,
    url: item.url,
    uri: item.uri,
    createdAt: item.createdAt,
    author: item.author,
    content: item.content,
    contentText: htmlToText(item.content),
    spoilerText: item.spoilerText,
    visibility: item.visibility,
    language: item.language,
    repliesCount: item.repliesCount,
    reblogsCount: item.reblogsCount,
    favouritesCount: item.favouritesCount,
    mediaAttachments: media.attachments,
    mediaFiles: media.files,
  };

  if (item.reblog) {
    const reblog: ReblogSummary = {
      id: item.reblog.id,
      url: item.reblog.url,
      author: item.reblog.author,
      content: item.reblog.content,
      createdAt: item.reblog.createdAt,
    };
    post.reblog = reblog;
  }

  return post;
}

export function formatPostJson(post: ArchivedPost): string {
  return `${JSON.stringify(post, null, 2)}\n`;
}

/**
 * Writes `<postsDir>/<id>.json` through a temporary file, replacing any
 * record left by an interrupted earlier run.
 */
export async function writePostRecord(postsDir: string, post: ArchivedPost): Promise<string> {
  const postPath = getPostPath(postsDir, post.id);
  const tempPath = `${postPath}.tmp`;

  await fs.mkdir(path.dirname(postPath), { recursive: true });
  try {
    await fs.writeFile(tempPath, formatPostJson(post), 'utf-8');
    await fs.rename(tempPath, postPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  return postPath;
}

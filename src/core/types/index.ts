// src/core/types/index.ts
export type Category = 'favorite' | 'bookmark';

export const CATEGORIES: readonly Category[] = ['favorite', 'bookmark'];

export type BoundaryStrategy = 'highest-id' | 'last-archived';

export interface FeedAuthor {
  id: string;
  username: string;
  /** Fully qualified handle (`user@domain` for remote accounts) */
  handle: string;
  displayName: string;
  profileUrl: string;
}

export interface MediaAttachment {
  id: string;
  type: string;
  url: string | null;
  previewUrl: string | null;
  description: string | null;
}

export interface FeedItemBase {
  id: string;
  url: string;
  uri: string;
  createdAt: string;
  author: FeedAuthor;
  content: string;
  spoilerText: string;
  visibility: string;
  language: string | null;
  repliesCount: number;
  reblogsCount: number;
  favouritesCount: number;
  mediaAttachments: MediaAttachment[];
}

export interface FeedItem extends FeedItemBase {
  reblog: FeedItemBase | null;
}

export type MediaFileStatus = 'downloaded' | 'fallback';

export interface MediaFile {
  originalUrl: string;
  /** Archive-relative path on success, original URL on fallback */
  localPath: string;
  type: string;
  description: string;
  status: MediaFileStatus;
}

export interface ReblogSummary {
  id: string;
  url: string;
  author: FeedAuthor;
  content: string;
  createdAt: string;
}

export interface ArchivedPost extends FeedItemBase {
  category: Category;
  archivedAt: string;
  contentText: string;
  reblog?: ReblogSummary;
  mediaFiles: MediaFile[];
}

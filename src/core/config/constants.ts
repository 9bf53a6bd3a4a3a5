// src/core/config/constants.ts
import type { BoundaryStrategy, Category } from '../types/index.js';

export const DEFAULT_ARCHIVE_DIR = '/archive';
export const DEFAULT_PAGE_SIZE = 40; // server-side maximum for favourites/bookmarks
export const DEFAULT_MAX_PAGES = 100;
export const DEFAULT_PAGE_DELAY_MS = 500;
export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_BOUNDARY: BoundaryStrategy = 'highest-id';

export const MEDIA_DOWNLOAD_ATTEMPTS = 3;
export const MEDIA_RETRY_BASE_DELAY_MS = 1000;
export const DEFAULT_MEDIA_EXTENSION = '.jpg';

export const USER_AGENT = 'mastodon-archiver/0.1';

export const FEED_ENDPOINTS: Record<Category, string> = {
  favorite: '/api/v1/favourites',
  bookmark: '/api/v1/bookmarks',
};

export const CATEGORY_LABELS: Record<Category, string> = {
  favorite: 'favorites',
  bookmark: 'bookmarks',
};

// src/core/__tests__/fixtures.ts
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ArchiverError, ErrorCode } from '../errors.js';
import type { FeedSource, FetchLike, FetchResult } from '../feed/fetcher.js';
import type { Ledger, LedgerEntry } from '../ledger/index.js';
import type { Category, FeedItem, FeedItemBase, MediaAttachment } from '../types/index.js';
import { compareIds } from '../utils.js';

export interface WireAttachment {
  id: string;
  type: string;
  url: string | null;
  preview_url?: string | null;
  description?: string | null;
}

export interface WireStatus {
  id: string;
  url: string | null;
  uri: string;
  created_at: string;
  account: { id: string; username: string; acct: string; display_name: string; url: string };
  content: string;
  spoiler_text: string;
  visibility: string;
  language: string | null;
  replies_count: number;
  reblogs_count: number;
  favourites_count: number;
  media_attachments: WireAttachment[];
  reblog: WireStatus | null;
}

/** Status JSON as the server sends it. */
export function makeWireStatus(id: string, overrides: Partial<WireStatus> = {}): WireStatus {
  return {
    id,
    url: `https://social.example/@alice/${id}`,
    uri: `https://social.example/users/alice/statuses/${id}`,
    created_at: '2026-01-10T12:00:00.000Z',
    account: {
      id: '7',
      username: 'alice',
      acct: 'alice',
      display_name: 'Alice',
      url: 'https://social.example/@alice',
    },
    content: `<p>post ${id}</p>`,
    spoiler_text: '',
    visibility: 'public',
    language: 'en',
    replies_count: 0,
    reblogs_count: 0,
    favourites_count: 1,
    media_attachments: [],
    reblog: null,
    ...overrides,
  };
}

export function makeAttachment(url: string | null, overrides: Partial<MediaAttachment> = {}): MediaAttachment {
  return {
    id: 'm1',
    type: 'image',
    url,
    previewUrl: null,
    description: null,
    ...overrides,
  };
}

export function makeItemBase(id: string, overrides: Partial<FeedItemBase> = {}): FeedItemBase {
  return {
    id,
    url: `https://social.example/@alice/${id}`,
    uri: `https://social.example/users/alice/statuses/${id}`,
    createdAt: '2026-01-10T12:00:00.000Z',
    author: {
      id: '7',
      username: 'alice',
      handle: 'alice',
      displayName: 'Alice',
      profileUrl: 'https://social.example/@alice',
    },
    content: `<p>post ${id}</p>`,
    spoilerText: '',
    visibility: 'public',
    language: 'en',
    repliesCount: 0,
    reblogsCount: 0,
    favouritesCount: 1,
    mediaAttachments: [],
    ...overrides,
  };
}

export function makeItem(id: string, overrides: Partial<FeedItem> = {}): FeedItem {
  return { ...makeItemBase(id), reblog: null, ...overrides };
}

/** Newest-first ids from `from` down to `to`, e.g. idRange(10, 1). */
export function idRange(from: number, to: number): string[] {
  const ids: string[] = [];
  for (let id = from; id >= to; id--) {
    ids.push(String(id));
  }
  return ids;
}

export interface FeedCall {
  endpoint: string;
  cursor: string | undefined;
  limit: number;
}

/** In-memory feed paging with `max_id` semantics over a newest-first list. */
export class FakeFeed implements FeedSource {
  readonly calls: FeedCall[] = [];
  private readonly failures = new Set<number>();

  constructor(private items: FeedItem[]) {}

  setItems(items: FeedItem[]): void {
    this.items = items;
  }

  /** Make the nth call (1-based) fail. */
  failOnCall(call: number): void {
    this.failures.add(call);
  }

  async fetchPage(endpoint: string, cursor: string | undefined, limit: number): Promise<FetchResult> {
    this.calls.push({ endpoint, cursor, limit });
    if (this.failures.has(this.calls.length)) {
      return { ok: false, error: new ArchiverError(ErrorCode.HTTP_ERROR, 'HTTP 502') };
    }

    const start = cursor === undefined ? 0 : this.items.findIndex(item => item.id === cursor) + 1;
    return { ok: true, items: this.items.slice(start, start + limit) };
  }
}

/** Feed that always returns a full page of fresh ids. */
export class EndlessFeed implements FeedSource {
  calls = 0;
  private nextId = 1_000_000;

  async fetchPage(_endpoint: string, _cursor: string | undefined, limit: number): Promise<FetchResult> {
    this.calls++;
    const items: FeedItem[] = [];
    for (let i = 0; i < limit; i++) {
      items.push(makeItem(String(this.nextId--)));
    }
    return { ok: true, items };
  }
}

/**
 * Ledger kept in memory. Commit order stands in for commit time, so
 * `mostRecentId` is the id committed last.
 */
export class MemoryLedger implements Ledger {
  readonly entries: LedgerEntry[] = [];

  /** Commit bare ids in the given order. */
  seed(category: Category, ids: string[]): this {
    for (const itemId of ids) {
      this.entries.push({ itemId, category, sourceUrl: '', authorHandle: 'alice', createdAt: '' });
    }
    return this;
  }

  async exists(itemId: string, category: Category): Promise<boolean> {
    return this.entries.some(entry => entry.itemId === itemId && entry.category === category);
  }

  async mostRecentId(category: Category): Promise<string | undefined> {
    const own = this.entries.filter(entry => entry.category === category);
    return own.length > 0 ? own[own.length - 1].itemId : undefined;
  }

  async highestId(category: Category): Promise<string | undefined> {
    let highest: string | undefined;
    for (const entry of this.entries) {
      if (entry.category === category && (highest === undefined || compareIds(entry.itemId, highest) > 0)) {
        highest = entry.itemId;
      }
    }
    return highest;
  }

  async commit(entry: LedgerEntry): Promise<boolean> {
    if (await this.exists(entry.itemId, entry.category)) {
      return false;
    }
    this.entries.push(entry);
    return true;
  }

  ids(category: Category): string[] {
    return this.entries.filter(entry => entry.category === category).map(entry => entry.itemId);
  }
}

export interface FakeServerState {
  favourites: WireStatus[];
  bookmarks: WireStatus[];
  /** Media URL to body, or to an HTTP status for failures */
  media: Record<string, string | number>;
}

export interface FakeServer {
  fetch: FetchLike;
  state: FakeServerState;
  requests: string[];
}

/**
 * Stand-in for the remote server behind `fetch`: the favourites and bookmarks
 * endpoints (honouring `limit` and `max_id`) plus static media files.
 */
export function createFakeServer(initial: Partial<FakeServerState> = {}): FakeServer {
  const state: FakeServerState = {
    favourites: initial.favourites ?? [],
    bookmarks: initial.bookmarks ?? [],
    media: initial.media ?? {},
  };
  const requests: string[] = [];

  const fakeFetch: FetchLike = async input => {
    const href = input instanceof Request ? input.url : String(input);
    requests.push(href);

    const media = state.media[href];
    if (media !== undefined) {
      return typeof media === 'number'
        ? new Response(null, { status: media })
        : new Response(media, { status: 200 });
    }

    const url = new URL(href);
    const feeds: Record<string, WireStatus[]> = {
      '/api/v1/favourites': state.favourites,
      '/api/v1/bookmarks': state.bookmarks,
    };
    const feed = feeds[url.pathname];
    if (!feed) {
      return new Response('not found', { status: 404 });
    }

    const limit = Number(url.searchParams.get('limit') ?? '20');
    const maxId = url.searchParams.get('max_id');
    const start = maxId === null ? 0 : feed.findIndex(status => status.id === maxId) + 1;
    return new Response(JSON.stringify(feed.slice(start, start + limit)), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  return { fetch: fakeFetch, state, requests };
}

export async function makeTempDir(prefix = 'archiver-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const noSleep = async (): Promise<void> => undefined;

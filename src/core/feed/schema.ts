// src/core/feed/schema.ts
import { z } from 'zod';
import type { FeedItem, FeedItemBase, MediaAttachment } from '../types/index.js';

// ids become file names, so nothing that could escape the posts directory
const idSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, 'Invalid item id');

const optionalText = z.string().nullish().transform(value => value ?? null);
const counter = z.number().int().nonnegative().nullish().transform(value => value ?? 0);

const accountSchema = z.object({
  id: z.string(),
  username: z.string(),
  acct: z.string(),
  display_name: z.string().nullish(),
  url: z.string().nullish(),
});

const attachmentSchema = z.object({
  id: z.string().nullish(),
  type: z.string().nullish(),
  url: optionalText,
  preview_url: optionalText,
  description: optionalText,
});

const statusShape = {
  id: idSchema,
  url: z.string().nullish(),
  uri: z.string().nullish(),
  created_at: z.string().nullish(),
  account: accountSchema,
  content: z.string().nullish(),
  spoiler_text: z.string().nullish(),
  visibility: z.string().nullish(),
  language: optionalText,
  replies_count: counter,
  reblogs_count: counter,
  favourites_count: counter,
  media_attachments: z.array(attachmentSchema).nullish(),
};

const baseStatusSchema = z.object(statusShape);

type RawStatus = z.infer<typeof baseStatusSchema>;
type RawAttachment = z.infer<typeof attachmentSchema>;

function toAttachment(raw: RawAttachment): MediaAttachment {
  return {
    id: raw.id ?? '',
    type: raw.type ?? 'unknown',
    url: raw.url,
    previewUrl: raw.preview_url,
    description: raw.description,
  };
}

function toFeedItemBase(raw: RawStatus): FeedItemBase {
  return {
    id: raw.id,
    url: raw.url ?? '',
    uri: raw.uri ?? '',
    createdAt: raw.created_at ?? '',
    author: {
      id: raw.account.id,
      username: raw.account.username,
      handle: raw.account.acct,
      displayName: raw.account.display_name ?? '',
      profileUrl: raw.account.url ?? '',
    },
    content: raw.content ?? '',
    spoilerText: raw.spoiler_text ?? '',
    visibility: raw.visibility ?? 'public',
    language: raw.language,
    repliesCount: raw.replies_count,
    reblogsCount: raw.reblogs_count,
    favouritesCount: raw.favourites_count,
    mediaAttachments: (raw.media_attachments ?? []).map(toAttachment),
  };
}

export const feedItemSchema = z
  .object({ ...statusShape, reblog: baseStatusSchema.nullish() })
  .transform((raw): FeedItem => ({
    ...toFeedItemBase(raw),
    reblog: raw.reblog ? toFeedItemBase(raw.reblog) : null,
  }));

/** A page of the favourites/bookmarks API: a JSON array, newest first. */
export const feedPageSchema = z.array(feedItemSchema);

export function parseFeedPage(payload: unknown): FeedItem[] {
  return feedPageSchema.parse(payload);
}

import { z } from 'zod';

const lenientText = z.string().nullable().optional().catch(undefined);
const lenientNumber = z.number().optional().catch(undefined);

// Archive items are inconsistent; a bad field is dropped, not the item
export const rawSubmissionSchema = z.object({
  id: z.union([z.string(), z.number()]).optional().catch(undefined),
  subreddit: lenientText,
  created_utc: z.union([z.number(), z.string()]).optional().catch(undefined),
  title: lenientText,
  selftext: lenientText,
  score: lenientNumber,
  num_comments: lenientNumber,
  permalink: lenientText,
  full_link: lenientText,
});

export type RawSubmission = z.infer<typeof rawSubmissionSchema>;

export const archiveResponseSchema = z.object({
  data: z.array(z.unknown()).default([]),
});

export function parseArchiveItems(payload: unknown): RawSubmission[] | null {
  const envelope = archiveResponseSchema.safeParse(payload);
  if (!envelope.success) return null;

  const items: RawSubmission[] = [];
  for (const entry of envelope.data.data) {
    const item = rawSubmissionSchema.safeParse(entry);
    if (item.success) items.push(item.data);
  }
  return items;
}

export interface Post {
  readonly id: string;
  /** Canonical `r/<name>` form. */
  readonly subreddit: string;
  readonly created_utc: number;
  readonly title: string;
  readonly selftext: string;
  readonly url: string;
  readonly upvotes: number;
  readonly num_comments: number;
  /** Which pass produced the post, e.g. `pullpush_sub/base`. */
  readonly source: string;
  readonly fetched_at: string;
}

export function cleanText(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/[\r\n]/g, ' ').replace(/\s+/g, ' ').trim();
}

/** Second-precision UTC timestamp, e.g. `2024-05-01T10:00:00Z`. */
export function nowIso(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function communityName(value: string | null | undefined): string | null {
  const name = (value ?? '').trim().split('/').filter(Boolean).pop();
  return name ? name : null;
}

export function canonicalCommunity(value: string | null | undefined): string | null {
  const name = communityName(value);
  return name ? `r/${name}` : null;
}

/** Integer creation time, or null when absent or unparseable. */
export function createdUtcOf(item: RawSubmission): number | null {
  if (item.created_utc === undefined || item.created_utc === '') return null;
  const value = Number(item.created_utc);
  if (!Number.isFinite(value) || value <= 0) return null;
  return Math.trunc(value);
}

export function permalinkFor(item: RawSubmission, id: string, community: string | null): string {
  const permalink = item.permalink?.trim();
  if (permalink) {
    return permalink.startsWith('http') ? permalink : `https://www.reddit.com${permalink.startsWith('/') ? '' : '/'}${permalink}`;
  }
  if (item.full_link) return item.full_link;
  const name = communityName(community);
  return name
    ? `https://www.reddit.com/r/${name}/comments/${id}/`
    : `https://www.reddit.com/comments/${id}/`;
}

export function toPost(
  item: RawSubmission,
  source: string,
  fallbackCommunity?: string,
  fetchedAt: string = nowIso(),
): Post | null {
  if (item.id === undefined || item.id === '') return null;
  const id = String(item.id);
  const community = canonicalCommunity(item.subreddit) ?? canonicalCommunity(fallbackCommunity);

  return Object.freeze({
    id,
    subreddit: community ?? 'r/unknown',
    created_utc: createdUtcOf(item) ?? 0,
    title: cleanText(item.title),
    selftext: cleanText(item.selftext),
    url: permalinkFor(item, id, community),
    upvotes: item.score ?? 0,
    num_comments: item.num_comments ?? 0,
    source,
    fetched_at: fetchedAt,
  });
}

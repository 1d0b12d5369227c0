import fs from 'fs';
import { z } from 'zod';
import { logger } from './logger.js';
import { shellSplit } from '../pipeline/normalizer.js';
import { canonicalCommunity } from '../scrapers/posts.js';

const communityEntrySchema = z.union([
  z.string(),
  z.object({ name: z.string().optional(), subreddit: z.string().optional() }),
]);

const textList = z.array(z.unknown())
  .default([])
  .transform(items => items.map(item => (typeof item === 'string' || typeof item === 'number' ? String(item) : '')));

export const seedFileSchema = z.object({
  subreddits: z.array(communityEntrySchema).default([]),
  keywords: textList,
  filters: z.object({
    must_include: textList,
    should_include: textList,
    exclude: textList,
  }).nullish().transform(val => val ?? { must_include: [], should_include: [], exclude: [] }),
  timeframe_months: z.number().int().positive().nullish(),
  min_upvotes: z.number().int().nonnegative().nullish(),
});

export type CommunityEntry = z.infer<typeof communityEntrySchema>;

/** Planning output the engine consumes: community list, keyword groups, window. */
export interface Seed {
  subreddits: string[];
  keywords: string[];
  must: string[];
  should: string[];
  exclude: string[];
  months?: number;
  minUpvotes?: number;
}

export function emptySeed(): Seed {
  return { subreddits: [], keywords: [], must: [], should: [], exclude: [] };
}

/** Trimmed, blank-free, first spelling wins on case-insensitive duplicates. */
export function dedupeTerms(terms: Iterable<string>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const term of terms) {
    const text = term.trim();
    if (!text) continue;
    const key = text.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(text);
  }
  return out;
}

function parseJsonList(raw: string, label: string): string[] | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Ignoring malformed ${label}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
  if (!Array.isArray(payload)) {
    logger.warn(`Ignoring ${label}: expected a JSON array`);
    return null;
  }
  return payload.map(item => (typeof item === 'string' || typeof item === 'number' ? String(item) : ''));
}

/**
 * Keyword list from a JSON array, a comma-separated list or a shell-quoted
 * string (`"yapay zeka" güvenlik`).
 */
export function parseKeywordList(raw: string | null | undefined, label = 'keyword list'): string[] {
  const text = (raw ?? '').trim();
  if (!text) return [];

  if (text.startsWith('[')) {
    return dedupeTerms(parseJsonList(text, label) ?? []);
  }
  if (text.includes(',') && !/["']/.test(text)) {
    return dedupeTerms(text.split(','));
  }
  return dedupeTerms(shellSplit(text) ?? text.replace(/,/g, ' ').split(/\s+/));
}

export function normalizeCommunities(entries: Iterable<CommunityEntry>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const raw = typeof entry === 'string' ? entry : entry.name ?? entry.subreddit;
    const community = canonicalCommunity(raw);
    if (!community) continue;
    const key = community.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(community);
  }
  return out;
}

export function seedFromObject(payload: unknown, label = 'seed'): Seed | null {
  const result = seedFileSchema.safeParse(payload);
  if (!result.success) {
    logger.warn(`Ignoring invalid ${label}: ${result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    return null;
  }
  const data = result.data;
  return {
    subreddits: normalizeCommunities(data.subreddits),
    keywords: dedupeTerms(data.keywords),
    must: dedupeTerms(data.filters.must_include),
    should: dedupeTerms(data.filters.should_include),
    exclude: dedupeTerms(data.filters.exclude),
    months: data.timeframe_months ?? undefined,
    minUpvotes: data.min_upvotes ?? undefined,
  };
}

export function loadSeedFile(filePath: string): Seed | null {
  if (!fs.existsSync(filePath)) {
    logger.warn(`Seed file not found: ${filePath}`);
    return null;
  }
  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger.warn(`Ignoring malformed seed file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
  return seedFromObject(payload, `seed file ${filePath}`);
}

export interface SeedEnv {
  subs?: string;
  keywordsJson?: string;
  excludeKeywordsJson?: string;
  months?: number;
  minUpvotes?: number;
}

/** Seed written as SEED_* environment values; null when none are set. */
export function seedFromEnv(env: SeedEnv): Seed | null {
  const subreddits = normalizeCommunities((env.subs ?? '').split(/[\s,]+/));
  const keywords = parseKeywordList(env.keywordsJson, 'SEED_KEYWORDS_JSON');
  const exclude = parseKeywordList(env.excludeKeywordsJson, 'SEED_EXCLUDE_KEYWORDS_JSON');

  if (subreddits.length === 0 && keywords.length === 0 && exclude.length === 0
    && env.months === undefined && env.minUpvotes === undefined) {
    return null;
  }
  return {
    subreddits,
    keywords,
    must: [],
    should: [],
    exclude,
    months: env.months,
    minUpvotes: env.minUpvotes,
  };
}

/** Seed keywords, then must, should and the user's own keywords. */
export function mergeSeed(seed: Seed, userKeywords: string[]): string[] {
  return dedupeTerms([...seed.keywords, ...seed.must, ...seed.should, ...userKeywords]);
}

import { logger } from './logger.js';
import { casefold, defaultLexicon, foldAscii, type Lexicon } from '../pipeline/lexicon.js';
import type { Post } from '../scrapers/posts.js';

export type FilterMode = 'any' | 'all';

export interface FilterSpec {
  must: string[];
  should: string[];
  exclude: string[];
  mode: FilterMode;
}

export type FilterOutcome = 'unfiltered' | 'strict' | 'lenient' | 'abandoned';

export interface FilterReport {
  input: number;
  deduped: number;
  excluded: number;
  strictKept: number;
  /** Null when the lenient pass did not run. */
  lenientKept: number | null;
  outcome: FilterOutcome;
}

export interface FinalizeOptions {
  minStrictResults?: number;
  lexicon?: Pick<Lexicon, 'foldMap'>;
}

export interface FinalizeResult {
  posts: Post[];
  report: FilterReport;
}

/** One term as its alternatives: the casefolded form and its ASCII fold. */
type TermGroup = readonly string[];

export const DEFAULT_MIN_STRICT_RESULTS = 15;

export function emptyFilterSpec(mode: FilterMode = 'any'): FilterSpec {
  return { must: [], should: [], exclude: [], mode };
}

function haystackOf(post: Post): string {
  return casefold(`${post.title} ${post.selftext}`);
}

export function termGroups(terms: string[], lexicon: Pick<Lexicon, 'foldMap'>): TermGroup[] {
  const groups: TermGroup[] = [];
  const seen = new Set<string>();
  for (const term of terms) {
    const lowered = casefold(term.trim());
    if (!lowered || seen.has(lowered)) continue;
    seen.add(lowered);
    groups.push(Array.from(new Set([lowered, foldAscii(lowered, lexicon)])));
  }
  return groups;
}

/** Every word of every term, each as its own group; the lenient pass matches these in the same mode. */
export function lenientGroups(terms: string[], lexicon: Pick<Lexicon, 'foldMap'>): TermGroup[] {
  const words = terms.flatMap(term => term.split(/\s+/)).filter(word => word.length >= 2);
  return termGroups(words, lexicon);
}

function groupMatches(haystack: string, group: TermGroup): boolean {
  return group.some(alternative => haystack.includes(alternative));
}

export function matchesAny(haystack: string, groups: TermGroup[]): boolean {
  return groups.some(group => groupMatches(haystack, group));
}

export function matchesSpec(
  haystack: string,
  must: TermGroup[],
  should: TermGroup[],
  mode: FilterMode,
): boolean {
  if (mode === 'any') return matchesAny(haystack, [...must, ...should]);

  if (must.length === 0) {
    return should.every(group => groupMatches(haystack, group));
  }
  if (!must.every(group => groupMatches(haystack, group))) return false;
  return should.length === 0 || matchesAny(haystack, should);
}

export function dedupeById(posts: Iterable<Post>): Post[] {
  const seen = new Set<string>();
  const out: Post[] = [];
  for (const post of posts) {
    if (seen.has(post.id)) continue;
    seen.add(post.id);
    out.push(post);
  }
  return out;
}

/**
 * Dedupes, drops excluded posts and keeps the on-topic ones. Never turns a
 * non-empty corpus into an empty one: an exclusion or include pass that
 * would remove everything is abandoned instead.
 */
export function finalize(
  posts: Iterable<Post>,
  spec: FilterSpec,
  options: FinalizeOptions = {},
): FinalizeResult {
  const minStrictResults = options.minStrictResults ?? DEFAULT_MIN_STRICT_RESULTS;
  const lexicon = options.lexicon ?? defaultLexicon();

  const input = Array.from(posts);
  const deduped = dedupeById(input);
  const report: FilterReport = {
    input: input.length,
    deduped: deduped.length,
    excluded: 0,
    strictKept: deduped.length,
    lenientKept: null,
    outcome: 'unfiltered',
  };

  let kept = deduped;
  const excludeGroups = termGroups(spec.exclude, lexicon);
  if (excludeGroups.length > 0 && kept.length > 0) {
    const remaining = kept.filter(post => !matchesAny(haystackOf(post), excludeGroups));
    if (remaining.length === 0) {
      logger.warn(`Exclude keywords would remove all ${kept.length} posts; ignoring exclusion`);
    } else {
      report.excluded = kept.length - remaining.length;
      if (report.excluded > 0) {
        logger.info(`Filter: removed ${report.excluded} posts based on exclude keywords`);
      }
      kept = remaining;
    }
  }

  const must = termGroups(spec.must, lexicon);
  const should = termGroups(spec.should, lexicon);
  if ((must.length === 0 && should.length === 0) || kept.length === 0) {
    report.strictKept = kept.length;
    return { posts: kept, report };
  }

  const strict = kept.filter(post => matchesSpec(haystackOf(post), must, should, spec.mode));
  report.strictKept = strict.length;
  logger.info(`Filter: ${spec.mode} keyword pass kept ${strict.length}/${kept.length} posts`);
  if (strict.length >= minStrictResults) {
    report.outcome = 'strict';
    return { posts: strict, report };
  }

  const lenientMust = lenientGroups(spec.must, lexicon);
  const lenientShould = lenientGroups(spec.should, lexicon);
  const lenient = kept.filter(post => matchesSpec(haystackOf(post), lenientMust, lenientShould, spec.mode));
  report.lenientKept = lenient.length;
  if (lenient.length > 0) {
    logger.warn(`Filter: strict pass kept only ${strict.length} (< ${minStrictResults}); lenient ${spec.mode} word pass kept ${lenient.length}`);
    report.outcome = 'lenient';
    return { posts: lenient, report };
  }
  if (strict.length > 0) {
    report.outcome = 'strict';
    return { posts: strict, report };
  }

  logger.warn(`Filter: keyword filtering would remove all ${kept.length} posts; returning unfiltered set`);
  report.outcome = 'abandoned';
  return { posts: kept, report };
}

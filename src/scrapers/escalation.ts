import { logger } from '../core/logger.js';
import { renderQuery, type Strategy } from '../pipeline/strategies.js';
import { communityName, nowIso, toPost, type Post, type RawSubmission } from './posts.js';
import { monthsAgoUtc, type SubmissionSource } from './retriever.js';

// ============================================================================
// TYPES
// ============================================================================

export type AttemptLabel = 'base' | 'lower-upvotes' | 'older-window' | 'broad';

export interface Attempt {
  label: AttemptLabel;
  months: number;
  minUpvotes: number;
  pageSize: number;
}

export interface AttemptSummary extends Attempt {
  /** Raw items returned by the archive during this attempt. */
  fetched: number;
  /** Items at or above the attempt's upvote threshold. */
  kept: number;
  /** Items not already in the corpus. */
  added: number;
  total: number;
}

export interface AcquireRequest {
  communities: string[];
  strategies: Strategy[];
  baseMonths: number;
  baseMinUpvotes: number;
  perAttemptLimit: number;
  targetVolume: number;
  signal?: AbortSignal;
}

export interface AcquireResult {
  posts: Post[];
  attempts: AttemptSummary[];
}

export interface EscalationOptions {
  now?: () => number;
}

export const LOWER_UPVOTES_FLOOR = 5;
export const BASE_PAGE_SIZE = 100;
export const BROAD_PAGE_SIZE = 250;

// ============================================================================
// LADDER
// ============================================================================

export function buildAttemptLadder(baseMonths: number, baseMinUpvotes: number): Attempt[] {
  const months = Math.max(1, Math.trunc(baseMonths));
  const minUpvotes = Math.max(0, Math.trunc(baseMinUpvotes));

  const ladder: Attempt[] = [{ label: 'base', months, minUpvotes, pageSize: BASE_PAGE_SIZE }];
  if (minUpvotes > LOWER_UPVOTES_FLOOR) {
    ladder.push({ label: 'lower-upvotes', months, minUpvotes: Math.floor(minUpvotes / 2), pageSize: BASE_PAGE_SIZE });
  }
  const previous = ladder[ladder.length - 1].minUpvotes;
  ladder.push({
    label: 'older-window',
    months: Math.max(months * 2, 24),
    minUpvotes: Math.floor(previous / 2),
    pageSize: BASE_PAGE_SIZE,
  });
  ladder.push({ label: 'broad', months: Math.max(months * 3, 36), minUpvotes: 0, pageSize: BROAD_PAGE_SIZE });
  return ladder;
}

// ============================================================================
// CONTROLLER
// ============================================================================

/**
 * Walks the attempt ladder, widening the window and lowering the score
 * threshold until the corpus reaches the target volume or the ladder ends.
 */
export class EscalationController {
  constructor(
    private readonly source: SubmissionSource,
    private readonly options: EscalationOptions = {},
  ) {}

  async acquire(request: AcquireRequest): Promise<AcquireResult> {
    const corpus = new Map<string, Post>();
    const attempts: AttemptSummary[] = [];

    for (const attempt of buildAttemptLadder(request.baseMonths, request.baseMinUpvotes)) {
      if (request.signal?.aborted) {
        logger.warn(`Escalation aborted before attempt ${attempt.label}`);
        break;
      }

      logger.info(`Attempt ${attempt.label}: months=${attempt.months} min_upvotes=${attempt.minUpvotes} size=${attempt.pageSize}`);
      const summary = await this.runAttempt(attempt, request, corpus);
      attempts.push(summary);
      logger.info(`Attempt ${attempt.label}: fetched=${summary.fetched} kept=${summary.kept} added=${summary.added} total=${summary.total}`);

      if (corpus.size >= request.targetVolume) {
        logger.info(`Target volume ${request.targetVolume} reached after ${attempt.label}`);
        break;
      }
    }

    if (corpus.size < request.targetVolume) {
      logger.warn(`Escalation ladder finished below target: ${corpus.size}/${request.targetVolume}`);
    }
    return { posts: Array.from(corpus.values()), attempts };
  }

  private async runAttempt(
    attempt: Attempt,
    request: AcquireRequest,
    corpus: Map<string, Post>,
  ): Promise<AttemptSummary> {
    const after = monthsAgoUtc(attempt.months, this.options.now?.() ?? Date.now());
    const fetchedAt = nowIso();
    const summary: AttemptSummary = { ...attempt, fetched: 0, kept: 0, added: 0, total: corpus.size };

    const merge = (items: RawSubmission[], source: string, fallbackCommunity?: string) => {
      summary.fetched += items.length;
      for (const item of items) {
        if ((item.score ?? 0) < attempt.minUpvotes) continue;
        const post = toPost(item, source, fallbackCommunity, fetchedAt);
        if (!post) continue;
        summary.kept++;
        if (corpus.has(post.id)) continue;
        corpus.set(post.id, post);
        summary.added++;
      }
    };

    for (const community of request.communities) {
      if (request.signal?.aborted) break;
      const name = communityName(community);
      if (!name) continue;
      const items = await this.source.collect(
        { subreddit: name, after, size: attempt.pageSize },
        { limit: request.perAttemptLimit, signal: request.signal },
      );
      logger.debug(`[r/${name}] ${attempt.label}: ${items.length} items`);
      merge(items, `pullpush_sub/${attempt.label}`, `r/${name}`);
    }

    let keywordFetched = 0;
    for (const strategy of request.strategies) {
      if (request.signal?.aborted) break;
      const remaining = request.perAttemptLimit - keywordFetched;
      if (remaining <= 0) {
        logger.debug(`Attempt ${attempt.label}: per-attempt cap reached, skipping remaining strategies`);
        break;
      }
      const items = await this.source.collect(
        { q: renderQuery(strategy), after, size: attempt.pageSize },
        { limit: remaining, signal: request.signal },
      );
      logger.debug(`[${strategy.label}] ${attempt.label}: ${items.length} items`);
      keywordFetched += items.length;
      merge(items, `pullpush_kw/${strategy.label}/${attempt.label}`);
    }

    summary.total = corpus.size;
    return summary;
  }
}

import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { defaultLexicon, normalizeLookup, type Lexicon } from '../pipeline/lexicon.js';
import { KeywordNormalizer } from '../pipeline/normalizer.js';
import { QueryStrategyBuilder, renderQuery, type Strategy } from '../pipeline/strategies.js';
import { canonicalCommunity } from './posts.js';
import { monthsAgoUtc, type SubmissionSource } from './retriever.js';

export interface DiscoveryOptions {
  pages: number;
  pageSize: number;
  maxTerms: number;
  now?: () => number;
}

export function discoveryOptionsFromConfig(): DiscoveryOptions {
  return {
    pages: config.discovery.pages,
    pageSize: config.discovery.pageSize,
    maxTerms: config.discovery.maxTerms,
  };
}

/**
 * Finds the communities where on-topic posts cluster. The first strategy
 * that returns anything wins; later strategies are not merged in.
 */
export class SubredditDiscoverer {
  private readonly normalizer: KeywordNormalizer;
  private readonly strategies: QueryStrategyBuilder;

  constructor(
    private readonly source: SubmissionSource,
    private readonly lexicon: Lexicon = defaultLexicon(),
    private readonly options: DiscoveryOptions = discoveryOptionsFromConfig(),
  ) {
    this.normalizer = new KeywordNormalizer(lexicon);
    this.strategies = new QueryStrategyBuilder(lexicon, this.normalizer);
  }

  async discover(
    prompt: string,
    rawKeywords = '',
    months = 12,
    maxSubs = 8,
    signal?: AbortSignal,
  ): Promise<string[]> {
    const strategies = this.strategies.build(prompt, rawKeywords, this.options.maxTerms);
    if (strategies.length === 0) {
      logger.warn('Discovery: no search terms derivable from prompt/keywords');
    }

    const now = this.options.now?.() ?? Date.now();
    const after = monthsAgoUtc(months, now);

    for (const strategy of strategies) {
      if (signal?.aborted) break;
      const counter = await this.countCommunities(strategy, after, signal);
      if (counter.size > 0) {
        const ranked = this.rank(counter, maxSubs);
        logger.info(`Discovery: ${strategy.label} strategy matched ${counter.size} communities, kept ${ranked.length}`);
        return ranked;
      }
      logger.info(`Discovery: ${strategy.label} strategy returned nothing`);
    }

    const curated = this.curatedFallback(prompt, rawKeywords, maxSubs);
    if (curated.length > 0) {
      logger.warn(`Discovery: falling back to curated communities (${curated.join(' ')})`);
    } else {
      logger.warn('Discovery: no communities found and no curated entry matched');
    }
    return curated;
  }

  async countCommunities(strategy: Strategy, after: number, signal?: AbortSignal): Promise<Map<string, number>> {
    const items = await this.source.collect(
      { q: renderQuery(strategy), after, size: this.options.pageSize },
      { maxPages: this.options.pages, signal },
    );

    // Keyed by lower-cased name; the first spelling seen is the one reported.
    const spellings = new Map<string, string>();
    const counter = new Map<string, number>();
    for (const item of items) {
      const community = canonicalCommunity(item.subreddit);
      if (!community) continue;
      const key = community.toLowerCase();
      const display = spellings.get(key) ?? community;
      spellings.set(key, display);
      counter.set(display, (counter.get(display) ?? 0) + 1);
    }
    return counter;
  }

  /** Most frequent first; ties keep first-seen order. */
  rank(counter: ReadonlyMap<string, number>, maxSubs: number): string[] {
    const ordered = Array.from(counter.entries())
      .sort((a, b) => b[1] - a[1])
      .map(([community]) => community);
    return this.cleanCommunities(ordered, maxSubs);
  }

  /** Canonical `r/<name>`, deny-list removed, case-insensitive dedupe, capped. */
  cleanCommunities(candidates: Iterable<string>, limit: number): string[] {
    const out: string[] = [];
    const seen = new Set<string>();
    for (const candidate of candidates) {
      if (out.length >= limit) break;
      const community = canonicalCommunity(candidate);
      if (!community) continue;
      const key = community.toLowerCase();
      if (this.lexicon.genericCommunities.has(key)) continue;
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(community);
    }
    return out;
  }

  curatedFallback(prompt: string, rawKeywords: string, maxSubs: number): string[] {
    const sequences = [
      normalizeLookup(`${prompt} ${rawKeywords}`, this.lexicon),
      ...this.normalizer.normalize(prompt, rawKeywords).map(term => normalizeLookup(term, this.lexicon)),
    ].map(seq => ` ${seq} `);

    const picked: string[] = [];
    for (const [topic, communities] of this.lexicon.curatedCommunities) {
      if (sequences.some(seq => seq.includes(` ${topic} `))) {
        picked.push(...communities);
      }
    }
    return this.cleanCommunities(picked, maxSubs);
  }
}

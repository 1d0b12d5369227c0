import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { writeCorpus } from '../core/jsonl.js';
import {
  finalize,
  type FilterMode,
  type FilterReport,
  type FilterSpec,
} from '../core/keywordFilter.js';
import { dedupeTerms, emptySeed, mergeSeed, type Seed } from '../core/seed.js';
import type { RunLog } from '../db/queries.js';
import { defaultLexicon, type Lexicon } from '../pipeline/lexicon.js';
import { QueryStrategyBuilder, type Strategy } from '../pipeline/strategies.js';
import { SubredditDiscoverer } from './discovery.js';
import { EscalationController, type AttemptSummary } from './escalation.js';
import type { Post } from './posts.js';
import { ArchiveRetriever, type SubmissionSource } from './retriever.js';
import type { CommunityValidator } from './validator.js';

export interface CollectInput {
  prompt: string;
  /** The user's own keywords, already split. */
  keywords?: string[];
  exclude?: string[];
  /** Explicit communities; skip discovery when non-empty. */
  communities?: string[];
  seed?: Seed | null;
  months?: number;
  minUpvotes?: number;
  limit?: number;
  maxSubs?: number;
  mode?: FilterMode;
  minStrictResults?: number;
  /** Where to write the corpus; omitted means not written. */
  outputPath?: string;
  signal?: AbortSignal;
}

export interface CollectResult {
  runId: number | null;
  posts: Post[];
  communities: string[];
  strategies: Strategy[];
  attempts: AttemptSummary[];
  report: FilterReport | null;
  outputPath: string | null;
  errors: string[];
}

export interface CollectorDeps {
  source?: SubmissionSource;
  lexicon?: Lexicon;
  runLog?: RunLog | null;
  validator?: CommunityValidator | null;
}

/** Joins keywords into one shell-quoted string, multi-word phrases kept together. */
export function joinKeywords(keywords: string[]): string {
  return keywords
    .map(keyword => (/\s/.test(keyword) ? `"${keyword.replace(/(["\\])/g, '\\$1')}"` : keyword))
    .join(' ');
}

/** Must terms from the seed; everything else any keyword source names is optional. */
export function buildFilterSpec(seed: Seed, userKeywords: string[], exclude: string[], mode: FilterMode): FilterSpec {
  const must = dedupeTerms(seed.must);
  const mustKeys = new Set(must.map(term => term.toLowerCase()));
  return {
    must,
    should: mergeSeed(seed, userKeywords).filter(term => !mustKeys.has(term.toLowerCase())),
    exclude: dedupeTerms([...seed.exclude, ...exclude]),
    mode,
  };
}

/**
 * One acquisition run: communities, search strategies, escalation, filtering
 * and output. Failures are logged, recorded and returned, never thrown.
 */
export class CorpusCollector {
  private readonly source: SubmissionSource;
  private readonly lexicon: Lexicon;
  private readonly runLog: RunLog | null;
  private readonly validator: CommunityValidator | null;
  private readonly discoverer: SubredditDiscoverer;
  private readonly strategies: QueryStrategyBuilder;
  private readonly escalation: EscalationController;

  constructor(deps: CollectorDeps = {}) {
    this.source = deps.source ?? new ArchiveRetriever();
    this.lexicon = deps.lexicon ?? defaultLexicon();
    this.runLog = deps.runLog ?? null;
    this.validator = deps.validator ?? null;
    this.discoverer = new SubredditDiscoverer(this.source, this.lexicon);
    this.strategies = new QueryStrategyBuilder(this.lexicon);
    this.escalation = new EscalationController(this.source);
  }

  async resolveCommunities(input: CollectInput, keywordText: string, months: number, maxSubs: number): Promise<string[]> {
    const seed = input.seed ?? emptySeed();
    const given = (input.communities ?? []).length > 0 ? input.communities ?? [] : seed.subreddits;

    let candidates: string[];
    if (given.length > 0) {
      logger.info(`Using ${given.length} provided communities`);
      candidates = given;
    } else {
      candidates = await this.discoverer.discover(input.prompt, keywordText, months, maxSubs, input.signal);
    }

    const validated = this.validator ? await this.validator.validate(candidates, maxSubs, input.signal) : null;
    return validated ?? this.discoverer.cleanCommunities(candidates, maxSubs);
  }

  async run(input: CollectInput): Promise<CollectResult> {
    const errors: string[] = [];
    const seed = input.seed ?? emptySeed();
    const userKeywords = dedupeTerms(input.keywords ?? []);
    const keywords = mergeSeed(seed, userKeywords);
    const keywordText = joinKeywords(keywords);
    const months = Math.max(1, Math.trunc(input.months ?? seed.months ?? config.acquisition.months));
    const minUpvotes = Math.max(0, Math.trunc(input.minUpvotes ?? seed.minUpvotes ?? config.acquisition.minUpvotes));
    const limit = input.limit ?? config.acquisition.limit;
    const maxSubs = input.maxSubs ?? config.acquisition.maxSubs;
    const filterSpec = buildFilterSpec(seed, userKeywords, input.exclude ?? [], input.mode ?? config.filter.mode);

    const result: CollectResult = {
      runId: null,
      posts: [],
      communities: [],
      strategies: [],
      attempts: [],
      report: null,
      outputPath: null,
      errors,
    };

    logger.info(`Starting collection for prompt '${input.prompt}' (months=${months}, min_upvotes=${minUpvotes}, limit=${limit})`);
    if (keywords.length > 0) {
      logger.info(`Keywords: ${keywords.join(', ')}`);
    }
    result.runId = this.runLog?.start(input.prompt) ?? null;

    try {
      result.communities = await this.resolveCommunities(input, keywordText, months, maxSubs);
      logger.info(`Communities: ${result.communities.join(' ') || '(none)'}`);

      result.strategies = this.strategies.build(input.prompt, keywordText, config.discovery.maxTerms);
      if (result.communities.length === 0 && result.strategies.length === 0) {
        logger.warn('Nothing to search: no communities and no search terms');
      }

      const acquired = await this.escalation.acquire({
        communities: result.communities,
        strategies: result.strategies,
        baseMonths: months,
        baseMinUpvotes: minUpvotes,
        perAttemptLimit: limit,
        targetVolume: limit,
        signal: input.signal,
      });
      result.attempts = acquired.attempts;
      if (result.runId !== null) {
        this.runLog?.recordAttempts(result.runId, acquired.attempts);
      }

      const finalized = finalize(acquired.posts, filterSpec, {
        minStrictResults: input.minStrictResults ?? config.filter.minStrictResults,
        lexicon: this.lexicon,
      });
      result.posts = finalized.posts;
      result.report = finalized.report;

      if (input.outputPath) {
        writeCorpus(input.outputPath, result.posts);
        result.outputPath = input.outputPath;
        logger.info(`Saved ${result.posts.length} posts to ${input.outputPath} (from ${acquired.posts.length} collected)`);
      }

      if (result.runId !== null) {
        this.runLog?.finish(result.runId, {
          status: 'success',
          itemsFound: acquired.posts.length,
          itemsKept: result.posts.length,
          filterOutcome: finalized.report.outcome,
          outputPath: input.outputPath,
        });
      }
      logger.info(`Collection complete: ${acquired.posts.length} found, ${result.posts.length} kept (${finalized.report.outcome})`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      errors.push(errorMessage);
      if (result.runId !== null) {
        this.runLog?.finish(result.runId, {
          status: 'failed',
          itemsFound: result.attempts.reduce((sum, attempt) => Math.max(sum, attempt.total), 0),
          itemsKept: result.posts.length,
          error: errorMessage,
        });
      }
      logger.error(`Collection failed: ${errorMessage}`);
    }

    return result;
  }
}

export { config, configSchema, type AppConfig } from './config.js';
export { logger } from './core/logger.js';
export { RequestPacer, linearBackoff, sleep, type Sleeper } from './core/rateLimit.js';
export {
  finalize,
  dedupeById,
  emptyFilterSpec,
  matchesSpec,
  DEFAULT_MIN_STRICT_RESULTS,
  type FilterMode,
  type FilterOutcome,
  type FilterReport,
  type FilterSpec,
  type FinalizeOptions,
  type FinalizeResult,
} from './core/keywordFilter.js';
export {
  parseKeywordList,
  normalizeCommunities,
  loadSeedFile,
  seedFromEnv,
  seedFromObject,
  mergeSeed,
  type Seed,
} from './core/seed.js';
export { writeCorpus, readCorpus } from './core/jsonl.js';
export { openDatabase } from './db/schema.js';
export { RunLog, type RunRecord, type AttemptRecord, type RunCompletion } from './db/queries.js';
export {
  casefold,
  compileLexicon,
  defaultLexicon,
  loadLexicon,
  normalizeLookup,
  type Lexicon,
  type LexiconData,
} from './pipeline/lexicon.js';
export { KeywordNormalizer, shellSplit, type NormalizedKeywords, type Token } from './pipeline/normalizer.js';
export { QueryStrategyBuilder, renderQuery, type Strategy, type StrategyLabel } from './pipeline/strategies.js';
export { toPost, canonicalCommunity, type Post, type RawSubmission } from './scrapers/posts.js';
export {
  ArchiveRetriever,
  monthsAgoUtc,
  type FetchOutcome,
  type PageOptions,
  type SearchQuery,
  type SubmissionSource,
} from './scrapers/retriever.js';
export { SubredditDiscoverer } from './scrapers/discovery.js';
export {
  EscalationController,
  buildAttemptLadder,
  type Attempt,
  type AttemptSummary,
  type AcquireRequest,
  type AcquireResult,
} from './scrapers/escalation.js';
export { CommunityValidator } from './scrapers/validator.js';
export { ArchiveDiagnostics, writeDiagnostics, type DiagnosticsReport } from './scrapers/diagnostics.js';
export { CorpusCollector, type CollectInput, type CollectResult } from './scrapers/collector.js';

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const rootPath = path.join(__dirname, '..');

// Helper for CSV
const csv = (defaultValue: string = '') =>
  z.string()
   .default(defaultValue)
   .transform(val => val ? val.split(',').map(s => s.trim()).filter(Boolean) : []);

// Helper for Boolean
const bool = (defaultValue: 'true' | 'false') =>
  z.enum(['true', 'false'])
   .default(defaultValue)
   .transform(val => val === 'true');

// Helper for numeric env values
const num = (defaultValue: string) =>
  z.string()
   .default(defaultValue)
   .transform(Number)
   .pipe(z.number().finite().nonnegative());

const optionalNum = z.string()
  .optional()
  .transform(val => (val && val.trim() ? Number(val) : undefined))
  .pipe(z.number().finite().nonnegative().optional());

const optionalText = z.string()
  .optional()
  .transform(val => (val && val.trim() ? val.trim() : undefined));

const resolvePath = (fallback: string) =>
  z.string()
   .default(fallback)
   .transform(val => path.isAbsolute(val) ? val : path.join(rootPath, val));

// Configuration Schema
export const configSchema = z.object({
  // Archive endpoint
  archive: z.object({
    baseUrl: z.string().url().default('https://api.pullpush.io/reddit/search/submission/'),
    timeoutMs: num('30000'),
    maxRetries: num('3').pipe(z.number().int().min(1)),
    retryBaseDelayMs: num('600'),
    pageDelayMs: num('300'),
  }),

  // Discovery
  discovery: z.object({
    pages: num('8'),
    pageSize: num('100'),
    maxTerms: num('16'),
  }),

  // Acquisition defaults
  acquisition: z.object({
    months: num('12').pipe(z.number().int().min(1)),
    minUpvotes: num('20').pipe(z.number().int()),
    limit: num('2000').pipe(z.number().int().min(1)),
    maxSubs: num('8').pipe(z.number().int().min(1)),
  }),

  // Filtering
  filter: z.object({
    minStrictResults: num('15'),
    mode: z.enum(['any', 'all']).default('any'),
  }),

  // Inputs handed over by planning collaborators
  inputs: z.object({
    keywords: optionalText,
    keywordsJson: optionalText,
    excludeKeywordsJson: optionalText,
    subs: csv(''),
    seedFile: optionalText,
  }),

  // Seed values written by the planning step
  seed: z.object({
    subs: optionalText,
    keywordsJson: optionalText,
    excludeKeywordsJson: optionalText,
    months: optionalNum,
    minUpvotes: optionalNum,
  }),

  // Optional community validation
  reddit: z.object({
    clientId: optionalText,
    clientSecret: optionalText,
    userAgent: z.string().default('topic-corpus-engine/0.1'),
    minSubscribers: num('10000'),
  }),

  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logFiles: bool('true'),

  // Paths
  paths: z.object({
    root: z.string().default(rootPath),
    data: z.string().default(path.join(rootPath, 'data')),
    logs: z.string().default(path.join(rootPath, 'logs')),
    lexicon: resolvePath(path.join('data', 'lexicon.json')),
    output: resolvePath(path.join('data', 'corpus.jsonl')),
    diagnostics: resolvePath(path.join('data', 'diagnostics.json')),
    database: resolvePath(path.join('data', 'corpus.db')),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export function readRawConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    archive: {
      baseUrl: env.ARCHIVE_BASE_URL,
      timeoutMs: env.REQUEST_TIMEOUT_MS,
      maxRetries: env.RETRY_MAX,
      retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
      pageDelayMs: env.PAGE_DELAY_MS,
    },

    discovery: {
      pages: env.DISCOVERY_PAGES,
      pageSize: env.DISCOVERY_PAGE_SIZE,
      maxTerms: env.MAX_TERMS,
    },

    acquisition: {
      months: env.MONTHS,
      minUpvotes: env.MIN_UPVOTES,
      limit: env.LIMIT,
      maxSubs: env.MAX_SUBS,
    },

    filter: {
      minStrictResults: env.MIN_STRICT_RESULTS,
      mode: env.FILTER_MODE,
    },

    inputs: {
      keywords: env.KEYWORDS,
      keywordsJson: env.KEYWORDS_JSON,
      excludeKeywordsJson: env.EXCLUDE_KEYWORDS_JSON,
      subs: env.SUBS,
      seedFile: env.SEED_FILE,
    },

    seed: {
      subs: env.SEED_SUBS,
      keywordsJson: env.SEED_KEYWORDS_JSON,
      excludeKeywordsJson: env.SEED_EXCLUDE_KEYWORDS_JSON,
      months: env.SEED_MONTHS,
      minUpvotes: env.SEED_MIN_UPVOTES,
    },

    reddit: {
      clientId: env.REDDIT_CLIENT_ID,
      clientSecret: env.REDDIT_CLIENT_SECRET,
      userAgent: env.REDDIT_USER_AGENT,
      minSubscribers: env.MIN_SUBSCRIBERS,
    },

    logLevel: env.LOG_LEVEL,
    logFiles: env.LOG_FILES,

    paths: {
      lexicon: env.LEXICON_PATH,
      output: env.OUTPUT_PATH,
      diagnostics: env.DIAGNOSTICS_PATH,
      database: env.DATABASE_PATH,
    },
  };
}

const parsed = configSchema.safeParse(readRawConfig(process.env));

if (!parsed.success) {
  console.error('❌ Invalid Configuration:', JSON.stringify(parsed.error.format(), null, 2));
  process.exit(1);
}

export const config: AppConfig = parsed.data;

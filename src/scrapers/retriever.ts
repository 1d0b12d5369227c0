import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { linearBackoff, RequestPacer, sleep, type Sleeper } from '../core/rateLimit.js';
import { createdUtcOf, parseArchiveItems, type RawSubmission } from './posts.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SearchQuery {
  /** OR-joined terms; absent for community-scoped queries. */
  q?: string;
  /** Community name without the `r/` prefix. */
  subreddit?: string;
  after?: number;
  before?: number;
  size: number;
}

export type FetchFailure = {
  kind: 'network' | 'http' | 'malformed';
  message: string;
  status?: number;
};

export type FetchOutcome = { kind: 'ok'; items: RawSubmission[] } | FetchFailure;

export interface PageOptions {
  /** Stop once this many items have been yielded. */
  limit?: number;
  maxPages?: number;
  signal?: AbortSignal;
}

/** What the discovery and escalation stages need from a retriever. */
export interface SubmissionSource {
  collect(query: SearchQuery, options?: PageOptions): Promise<RawSubmission[]>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RetrieverOptions {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  pageDelayMs: number;
  userAgent: string;
  sleeper?: Sleeper;
  fetchImpl?: FetchLike;
}

type RetryState =
  | { phase: 'request'; attempt: number }
  | { phase: 'backoff'; attempt: number; delayMs: number; last: FetchFailure }
  | { phase: 'done'; items: RawSubmission[] }
  | { phase: 'exhausted'; attempt: number; last: FetchFailure };

interface RetrieverStats {
  requests: number;
  failures: number;
  exhausted: number;
  pages: number;
}

export function retrieverOptionsFromConfig(): RetrieverOptions {
  return {
    baseUrl: config.archive.baseUrl,
    timeoutMs: config.archive.timeoutMs,
    maxRetries: config.archive.maxRetries,
    retryBaseDelayMs: config.archive.retryBaseDelayMs,
    pageDelayMs: config.archive.pageDelayMs,
    userAgent: config.reddit.userAgent,
  };
}

/** Epoch seconds `months` × 30 days before `now`. */
export function monthsAgoUtc(months: number, now: number = Date.now()): number {
  return Math.floor((now - months * 30 * 24 * 60 * 60 * 1000) / 1000);
}

function describeQuery(query: SearchQuery): string {
  if (query.subreddit) return `r/${query.subreddit}`;
  const q = query.q ?? '';
  return `q='${q.length > 80 ? `${q.slice(0, 80)}…` : q}'`;
}

// ============================================================================
// RETRIEVER
// ============================================================================

/**
 * Paginated, retried GET against the PullPush submission search.
 * Never throws: exhausted retries degrade to an empty page.
 */
export class ArchiveRetriever implements SubmissionSource {
  private readonly sleeper: Sleeper;
  private readonly fetchImpl: FetchLike;
  private readonly pacer: RequestPacer;
  private stats: RetrieverStats = { requests: 0, failures: 0, exhausted: 0, pages: 0 };

  constructor(private readonly options: RetrieverOptions = retrieverOptionsFromConfig()) {
    this.sleeper = options.sleeper ?? sleep;
    // resolved per call so a stubbed global fetch is picked up
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.pacer = new RequestPacer(options.pageDelayMs, this.sleeper);
  }

  buildUrl(query: SearchQuery): string {
    const url = new URL(this.options.baseUrl);
    if (query.q) url.searchParams.set('q', query.q);
    if (query.subreddit) url.searchParams.set('subreddit', query.subreddit);
    if (query.after !== undefined) url.searchParams.set('after', String(Math.trunc(query.after)));
    if (query.before !== undefined) url.searchParams.set('before', String(Math.trunc(query.before)));
    url.searchParams.set('size', String(query.size));
    url.searchParams.set('sort', 'desc');
    url.searchParams.set('sort_type', 'created_utc');
    return url.toString();
  }

  /** One request, classified. */
  async fetchPage(query: SearchQuery, signal?: AbortSignal): Promise<FetchOutcome> {
    const url = this.buildUrl(query);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    this.stats.requests++;

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept': 'application/json',
        },
        signal: controller.signal,
      });
      body = await response.text();
    } catch (error) {
      const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      return { kind: 'network', message };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!response.ok) {
      const preview = body.slice(0, 200).replace(/\s+/g, ' ').trim();
      return {
        kind: 'http',
        status: response.status,
        message: `HTTP ${response.status}${preview ? `: ${preview}` : ''}`,
      };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      return { kind: 'malformed', message: `Invalid JSON response: ${error instanceof Error ? error.message : String(error)}` };
    }

    const items = parseArchiveItems(payload);
    if (!items) {
      return { kind: 'malformed', message: 'Response has no data array' };
    }
    return { kind: 'ok', items };
  }

  /** One page with retries; an empty list once retries are exhausted. */
  async fetch(query: SearchQuery, signal?: AbortSignal): Promise<RawSubmission[]> {
    let state: RetryState = { phase: 'request', attempt: 1 };

    for (;;) {
      switch (state.phase) {
        case 'request': {
          if (signal?.aborted) return [];
          const outcome = await this.fetchPage(query, signal);
          if (outcome.kind === 'ok') {
            state = { phase: 'done', items: outcome.items };
          } else {
            this.stats.failures++;
            state = state.attempt >= this.options.maxRetries
              ? { phase: 'exhausted', attempt: state.attempt, last: outcome }
              : {
                  phase: 'backoff',
                  attempt: state.attempt,
                  delayMs: linearBackoff(this.options.retryBaseDelayMs, state.attempt),
                  last: outcome,
                };
          }
          break;
        }

        case 'backoff':
          logger.debug(`Archive ${state.last.kind} error for ${describeQuery(query)} (attempt ${state.attempt}/${this.options.maxRetries}), retrying in ${state.delayMs}ms: ${state.last.message}`);
          await this.sleeper(state.delayMs, signal);
          state = { phase: 'request', attempt: state.attempt + 1 };
          break;

        case 'done':
          return state.items;

        case 'exhausted':
          this.stats.exhausted++;
          logger.warn(`Archive request failed after ${state.attempt} attempts for ${describeQuery(query)}: ${state.last.message}`);
          return [];
      }
    }
  }

  /**
   * Pages through results newest-first, moving `before` to the last item's
   * creation time. Ends on an empty page, a missing or stalled cursor, the item
   * limit, the page limit or an aborted signal.
   */
  async *pages(query: SearchQuery, options: PageOptions = {}): AsyncGenerator<RawSubmission[]> {
    const { limit = Number.POSITIVE_INFINITY, maxPages = Number.POSITIVE_INFINITY, signal } = options;
    let params: SearchQuery = { ...query };
    let fetched = 0;
    let pageNum = 0;

    while (pageNum < maxPages && fetched < limit) {
      if (signal?.aborted) {
        logger.info(`Pagination aborted for ${describeQuery(query)} after ${pageNum} pages`);
        return;
      }

      await this.pacer.wait(signal);
      const items = await this.fetch(params, signal);
      if (items.length === 0) return;

      pageNum++;
      this.stats.pages++;
      const remaining = limit - fetched;
      const batch = items.length > remaining ? items.slice(0, remaining) : items;
      fetched += batch.length;
      logger.debug(`[${describeQuery(query)}] batch=${items.length} fetched=${fetched}`);
      yield batch;

      if (fetched >= limit) return;
      const cursor = createdUtcOf(items[items.length - 1]);
      if (cursor === null) return;
      if (params.before !== undefined && cursor >= params.before) {
        logger.warn(`[${describeQuery(query)}] cursor did not move past ${params.before}; stopping`);
        return;
      }
      params = { ...params, before: cursor };
    }
  }

  async collect(query: SearchQuery, options: PageOptions = {}): Promise<RawSubmission[]> {
    const out: RawSubmission[] = [];
    for await (const batch of this.pages(query, options)) {
      out.push(...batch);
    }
    return out;
  }

  getStats(): RetrieverStats {
    return { ...this.stats };
  }
}

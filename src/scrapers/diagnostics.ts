import fs from 'fs';
import path from 'path';
import { logger } from '../core/logger.js';
import { defaultLexicon, type Lexicon } from '../pipeline/lexicon.js';
import { QueryStrategyBuilder, renderQuery } from '../pipeline/strategies.js';
import { communityName } from './posts.js';
import { ArchiveRetriever, monthsAgoUtc, type SearchQuery } from './retriever.js';

export const PROBE_SIZE = 25;

export interface DiagnosticCheck {
  label: string;
  url: string;
  status: number | null;
  ok: boolean;
  elapsedMs: number;
  items: number | null;
  bodyPreview: string;
}

export interface DiagnosticsReport {
  status: 'healthy' | 'degraded';
  generatedAt: string;
  checks: DiagnosticCheck[];
}

export interface DiagnoseRequest {
  prompt: string;
  keywords?: string;
  communities?: string[];
  months?: number;
  maxSubs?: number;
}

/**
 * Probes the archive with the same queries a collection run would issue,
 * one request each and no retries.
 */
export class ArchiveDiagnostics {
  private readonly strategies: QueryStrategyBuilder;

  constructor(
    private readonly retriever: ArchiveRetriever = new ArchiveRetriever(),
    lexicon: Lexicon = defaultLexicon(),
    private readonly now: () => number = Date.now,
  ) {
    this.strategies = new QueryStrategyBuilder(lexicon);
  }

  async diagnose(request: DiagnoseRequest): Promise<DiagnosticsReport> {
    const months = request.months ?? 12;
    const maxSubs = request.maxSubs ?? 8;
    const after = monthsAgoUtc(months, this.now());
    const checks: DiagnosticCheck[] = [];

    const strategies = this.strategies.build(request.prompt, request.keywords ?? '', maxSubs * 2);
    if (strategies.length === 0) {
      checks.push({
        label: 'search_query',
        url: '',
        status: null,
        ok: false,
        elapsedMs: 0,
        items: null,
        bodyPreview: 'No search terms derivable from prompt/keywords',
      });
    }
    for (const strategy of strategies) {
      const check = await this.probe(`search:${strategy.label}`, { q: renderQuery(strategy), after, size: PROBE_SIZE });
      checks.push(check);
      if (check.ok && check.items) break;
    }

    const communities = (request.communities ?? []).slice(0, Math.max(maxSubs, 5));
    for (const community of communities) {
      const name = communityName(community);
      if (!name) continue;
      checks.push(await this.probe(`subreddit:${name}`, { subreddit: name, after, size: PROBE_SIZE }));
    }

    // earlier search probes may fail as long as the last one answered
    const searches = checks.filter(check => !check.label.startsWith('subreddit:'));
    const lastSearch = searches[searches.length - 1];
    const healthy = (lastSearch === undefined || lastSearch.ok)
      && checks.filter(check => check.label.startsWith('subreddit:')).every(check => check.ok);
    const status = healthy ? 'healthy' : 'degraded';
    logger.info(`Diagnostics: ${status} (${checks.filter(check => check.ok).length}/${checks.length} checks ok)`);
    return { status, generatedAt: new Date(this.now()).toISOString(), checks };
  }

  private async probe(label: string, query: SearchQuery): Promise<DiagnosticCheck> {
    const url = this.retriever.buildUrl(query);
    const started = this.now();
    const outcome = await this.retriever.fetchPage(query);
    const elapsedMs = this.now() - started;

    if (outcome.kind === 'ok') {
      return { label, url, status: 200, ok: true, elapsedMs, items: outcome.items.length, bodyPreview: '' };
    }
    logger.warn(`Diagnostics: ${label} failed: ${outcome.message}`);
    return {
      label,
      url,
      status: outcome.status ?? null,
      ok: false,
      elapsedMs,
      items: null,
      bodyPreview: outcome.message.slice(0, 200),
    };
  }
}

export function writeDiagnostics(filePath: string, report: DiagnosticsReport): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
}

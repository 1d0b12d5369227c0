import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi } from 'vitest';
import { ArchiveDiagnostics, writeDiagnostics } from '../src/scrapers/diagnostics.js';
import { ArchiveRetriever } from '../src/scrapers/retriever.js';

const NOW = 1700000000000;

function makeDiagnostics(handler: (url: URL) => Response) {
  const fetchImpl = vi.fn(async (input: string, _init?: RequestInit) => handler(new URL(input)));
  const retriever = new ArchiveRetriever({
    baseUrl: 'https://archive.test/search/',
    timeoutMs: 1000,
    maxRetries: 3,
    retryBaseDelayMs: 0,
    pageDelayMs: 0,
    userAgent: 'test-agent',
    fetchImpl,
  });
  return { diagnostics: new ArchiveDiagnostics(retriever, undefined, () => NOW), fetchImpl };
}

const okPage = (count: number) => new Response(JSON.stringify({ data: Array.from({ length: count }, (_, i) => ({ id: `p${i}` })) }));

describe('ArchiveDiagnostics', () => {
  it('reports a failing community probe as degraded', async () => {
    const { diagnostics, fetchImpl } = makeDiagnostics((url) =>
      url.searchParams.has('subreddit') ? new Response('down', { status: 500 }) : okPage(2));

    const report = await diagnostics.diagnose({ prompt: 'güvenlik', communities: ['r/netsec'] });

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(report.status).toBe('degraded');
    expect(report.generatedAt).toBe('2023-11-14T22:13:20.000Z');
    expect(report.checks.map(({ url: _url, ...rest }) => rest)).toEqual([
      { label: 'search:primary', status: 200, ok: true, elapsedMs: 0, items: 2, bodyPreview: '' },
      { label: 'subreddit:netsec', status: 500, ok: false, elapsedMs: 0, items: null, bodyPreview: 'HTTP 500: down' },
    ]);
    expect(new URL(report.checks[1].url).searchParams.get('size')).toBe('25');
  });

  it('tries the next strategy when a probe returns nothing', async () => {
    const { diagnostics } = makeDiagnostics((url) =>
      url.searchParams.get('q') === 'guvenlik' ? okPage(1) : okPage(0));

    const report = await diagnostics.diagnose({ prompt: 'güvenlik' });

    expect(report.checks.map(check => [check.label, check.items])).toEqual([
      ['search:primary', 0],
      ['search:basic', 1],
    ]);
    expect(report.status).toBe('healthy');
  });

  it('is degraded when no search terms can be derived', async () => {
    const { diagnostics, fetchImpl } = makeDiagnostics(() => okPage(1));

    const report = await diagnostics.diagnose({ prompt: '  ' });

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(report.status).toBe('degraded');
    expect(report.checks[0].label).toBe('search_query');
  });

  it('writes the report as JSON', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'diagnostics-test-'));
    try {
      const file = path.join(dir, 'out', 'diagnostics.json');
      writeDiagnostics(file, { status: 'healthy', generatedAt: '2023-11-14T22:13:20.000Z', checks: [] });
      expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
        status: 'healthy',
        generatedAt: '2023-11-14T22:13:20.000Z',
        checks: [],
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

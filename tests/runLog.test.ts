import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../src/db/schema.js';
import { RunLog } from '../src/db/queries.js';

describe('RunLog', () => {
  let db: Database.Database;
  let runLog: RunLog;

  beforeEach(() => {
    db = openDatabase(':memory:');
    runLog = new RunLog(db);
  });

  afterEach(() => {
    db.close();
  });

  it('records a run from start to finish', () => {
    const runId = runLog.start('yapay zeka', '2024-05-01T10:00:00.000Z');
    runLog.recordAttempts(runId, [
      { label: 'base', months: 12, minUpvotes: 20, pageSize: 100, fetched: 10, kept: 10, added: 10, total: 10 },
      { label: 'lower-upvotes', months: 12, minUpvotes: 10, pageSize: 100, fetched: 55, kept: 55, added: 45, total: 55 },
    ]);
    runLog.finish(runId, {
      status: 'success',
      itemsFound: 55,
      itemsKept: 40,
      filterOutcome: 'strict',
      outputPath: 'data/corpus.jsonl',
    }, '2024-05-01T10:05:00.000Z');

    expect(runLog.recent()).toEqual([{
      id: runId,
      prompt: 'yapay zeka',
      status: 'success',
      items_found: 55,
      items_kept: 40,
      filter_outcome: 'strict',
      output_path: 'data/corpus.jsonl',
      error: null,
      started_at: '2024-05-01T10:00:00.000Z',
      completed_at: '2024-05-01T10:05:00.000Z',
    }]);
    expect(runLog.attempts(runId).map(a => [a.label, a.min_upvotes, a.added, a.total])).toEqual([
      ['base', 20, 10, 10],
      ['lower-upvotes', 10, 45, 55],
    ]);
  });

  it('keeps the failure message', () => {
    const runId = runLog.start('güvenlik');
    runLog.finish(runId, { status: 'failed', itemsFound: 0, itemsKept: 0, error: 'boom' });

    const [run] = runLog.recent(1);
    expect(run.status).toBe('failed');
    expect(run.error).toBe('boom');
    expect(run.filter_outcome).toBeNull();
  });

  it('lists the newest runs first', () => {
    const first = runLog.start('one');
    const second = runLog.start('two');
    expect(runLog.recent(5).map(run => run.id)).toEqual([second, first]);
  });
});

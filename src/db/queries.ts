import type Database from 'better-sqlite3';
import type { FilterOutcome } from '../core/keywordFilter.js';
import type { AttemptSummary } from '../scrapers/escalation.js';

export type RunStatus = 'running' | 'success' | 'failed';

export interface RunRecord {
  id: number;
  prompt: string;
  status: RunStatus;
  items_found: number;
  items_kept: number;
  filter_outcome: FilterOutcome | null;
  output_path: string | null;
  error: string | null;
  started_at: string;
  completed_at: string | null;
}

export interface AttemptRecord {
  id: number;
  run_id: number;
  label: string;
  months: number;
  min_upvotes: number;
  fetched: number;
  added: number;
  total: number;
}

export interface RunCompletion {
  status: Exclude<RunStatus, 'running'>;
  itemsFound: number;
  itemsKept: number;
  filterOutcome?: FilterOutcome;
  outputPath?: string;
  error?: string;
}

interface FinishParams {
  id: number;
  status: string;
  items_found: number;
  items_kept: number;
  filter_outcome: string | null;
  output_path: string | null;
  error: string | null;
  completed_at: string;
}

type AttemptParams = Omit<AttemptRecord, 'id'>;

/** Run and attempt bookkeeping over prepared statements. */
export class RunLog {
  private readonly insertRunStmt: Database.Statement<[string, string]>;
  private readonly finishRunStmt: Database.Statement<FinishParams>;
  private readonly insertAttemptStmt: Database.Statement<AttemptParams>;
  private readonly recentStmt: Database.Statement<[number], RunRecord>;
  private readonly attemptsStmt: Database.Statement<[number], AttemptRecord>;

  constructor(private readonly db: Database.Database) {
    this.insertRunStmt = db.prepare<[string, string]>(`
      INSERT INTO acquisition_runs (prompt, status, started_at)
      VALUES (?, 'running', ?)
    `);
    this.finishRunStmt = db.prepare<FinishParams>(`
      UPDATE acquisition_runs
      SET status = @status, items_found = @items_found, items_kept = @items_kept,
        filter_outcome = @filter_outcome, output_path = @output_path, error = @error,
        completed_at = @completed_at
      WHERE id = @id
    `);
    this.insertAttemptStmt = db.prepare<AttemptParams>(`
      INSERT INTO run_attempts (run_id, label, months, min_upvotes, fetched, added, total)
      VALUES (@run_id, @label, @months, @min_upvotes, @fetched, @added, @total)
    `);
    this.recentStmt = db.prepare<[number], RunRecord>(`
      SELECT id, prompt, status, items_found, items_kept, filter_outcome, output_path, error, started_at, completed_at
      FROM acquisition_runs
      ORDER BY id DESC
      LIMIT ?
    `);
    this.attemptsStmt = db.prepare<[number], AttemptRecord>(`
      SELECT id, run_id, label, months, min_upvotes, fetched, added, total
      FROM run_attempts
      WHERE run_id = ?
      ORDER BY id
    `);
  }

  start(prompt: string, startedAt: string = new Date().toISOString()): number {
    const result = this.insertRunStmt.run(prompt, startedAt);
    return Number(result.lastInsertRowid);
  }

  recordAttempts(runId: number, attempts: readonly AttemptSummary[]): void {
    const insertAll = this.db.transaction((items: readonly AttemptSummary[]) => {
      for (const attempt of items) {
        this.recordAttempt(runId, attempt);
      }
    });
    insertAll(attempts);
  }

  recordAttempt(runId: number, attempt: AttemptSummary): void {
    this.insertAttemptStmt.run({
      run_id: runId,
      label: attempt.label,
      months: attempt.months,
      min_upvotes: attempt.minUpvotes,
      fetched: attempt.fetched,
      added: attempt.added,
      total: attempt.total,
    });
  }

  finish(runId: number, completion: RunCompletion, completedAt: string = new Date().toISOString()): void {
    this.finishRunStmt.run({
      id: runId,
      status: completion.status,
      items_found: completion.itemsFound,
      items_kept: completion.itemsKept,
      filter_outcome: completion.filterOutcome ?? null,
      output_path: completion.outputPath ?? null,
      error: completion.error ?? null,
      completed_at: completedAt,
    });
  }

  recent(limit = 10): RunRecord[] {
    return this.recentStmt.all(limit);
  }

  attempts(runId: number): AttemptRecord[] {
    return this.attemptsStmt.all(runId);
  }
}

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const schema = `
-- One row per collection run
CREATE TABLE IF NOT EXISTS acquisition_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  prompt TEXT NOT NULL,
  status TEXT NOT NULL,
  items_found INTEGER DEFAULT 0,
  items_kept INTEGER DEFAULT 0,
  filter_outcome TEXT,
  output_path TEXT,
  error TEXT,
  started_at TEXT NOT NULL,
  completed_at TEXT
);

-- Escalation attempts within a run
CREATE TABLE IF NOT EXISTS run_attempts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id INTEGER NOT NULL REFERENCES acquisition_runs(id),
  label TEXT NOT NULL,
  months INTEGER NOT NULL,
  min_upvotes INTEGER NOT NULL,
  fetched INTEGER DEFAULT 0,
  added INTEGER DEFAULT 0,
  total INTEGER DEFAULT 0,
  recorded_at TEXT DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_runs_started ON acquisition_runs(started_at);
CREATE INDEX IF NOT EXISTS idx_attempts_run ON run_attempts(run_id);
`;

/** Opens (creating if needed) the run database; `:memory:` for an in-process one. */
export function openDatabase(filePath: string): Database.Database {
  if (filePath !== ':memory:') {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }
  const db = new Database(filePath);

  // Enable WAL mode for better concurrent access
  if (filePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(schema);
  return db;
}

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';

export const SCORING_DB = Symbol('SCORING_DB');

export type ScoringDb = Database.Database;

const RERANK_CACHE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS rerank_cache (
    item_id TEXT NOT NULL,
    scoring_version TEXT NOT NULL,
    run_id TEXT,
    model TEXT,
    model_score REAL,
    model_rank INTEGER,
    model_reason TEXT,
    model_why TEXT,
    model_findings TEXT,
    created_at TEXT NOT NULL,
    PRIMARY KEY (item_id, scoring_version)
  );
  CREATE INDEX IF NOT EXISTS idx_rerank_cache_version
    ON rerank_cache (scoring_version);
`;

export function ensureScoringSchema(db: ScoringDb): void {
  db.exec(RERANK_CACHE_SCHEMA);
}

export function openScoringDb(dbPath: string): ScoringDb {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  ensureScoringSchema(db);
  return db;
}

export function tableColumns(db: ScoringDb, table: string): Set<string> {
  const rows: unknown[] = db.prepare(`PRAGMA table_info(${table})`).all();
  const columns = new Set<string>();
  for (const row of rows) {
    if (row && typeof row === 'object' && 'name' in row) {
      const { name } = row;
      if (typeof name === 'string') {
        columns.add(name);
      }
    }
  }
  return columns;
}

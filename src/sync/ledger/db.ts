import Database from "better-sqlite3";
import path from "path";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sync_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  identity TEXT NOT NULL UNIQUE,
  external_id TEXT,
  data_hash TEXT,
  sync_status TEXT NOT NULL,
  error_message TEXT,
  last_synced_at TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_status ON sync_records(sync_status);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  year INTEGER NOT NULL,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  mode TEXT NOT NULL,
  dry_run INTEGER NOT NULL DEFAULT 0,
  counts_json TEXT NOT NULL,
  status TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS conflict_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL,
  category TEXT NOT NULL,
  identity TEXT,
  message TEXT NOT NULL,
  snapshot_json TEXT NOT NULL,
  recorded_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_conflict_run ON conflict_records(run_id, category);
`;

let _db: Database.Database | null = null;

function resolveLedgerPath(): string {
  const configured = process.env.SYNC_LEDGER_PATH;
  if (configured === ":memory:") return configured;
  return configured
    ? path.resolve(configured)
    : path.resolve(process.cwd(), "sync_ledger.db");
}

export function getDatabase(): Database.Database {
  if (!_db) {
    const dbPath = resolveLedgerPath();
    _db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      _db.pragma("journal_mode = WAL");
    }
    _db.exec(SCHEMA);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

import { z } from "zod";
import { rawDbEventSchema, rawExternalEventSchema } from "@/sync/types/api";
import type { ConflictRecord, SyncCounts } from "@/sync/types";
import { getDatabase } from "./db";
import type { RunMode, SyncRecord, SyncRunRecord, SyncStatus } from "./types";

// --- Sync Records ---

export function findRecord(identity: string): SyncRecord | undefined {
  const db = getDatabase();
  const row = db
    .prepare("SELECT * FROM sync_records WHERE identity = ?")
    .get(identity) as RawSyncRow | undefined;
  return row ? toSyncRecord(row) : undefined;
}

export function upsertRecord(
  identity: string,
  syncStatus: SyncStatus,
  dataHash?: string | null,
  externalId?: string | null,
  errorMessage?: string | null,
): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO sync_records (identity, external_id, data_hash, sync_status, error_message, last_synced_at, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(identity) DO UPDATE SET
      external_id = COALESCE(excluded.external_id, sync_records.external_id),
      data_hash = COALESCE(excluded.data_hash, sync_records.data_hash),
      sync_status = excluded.sync_status,
      error_message = excluded.error_message,
      last_synced_at = excluded.last_synced_at,
      updated_at = excluded.updated_at
  `).run(identity, externalId ?? null, dataHash ?? null, syncStatus, errorMessage ?? null, now, now, now);
}

export function markSynced(identity: string, dataHash: string, externalId?: string): void {
  upsertRecord(identity, "synced", dataHash, externalId);
}

export function markFailed(identity: string, error: string, externalId?: string): void {
  upsertRecord(identity, "failed", null, externalId, error);
}

export function markSkipped(identity: string, reason: string, externalId?: string): void {
  upsertRecord(identity, "skipped", null, externalId, reason);
}

// --- Sync Runs ---

export function createRun(runId: string, year: number, mode: RunMode, dryRun: boolean): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO sync_runs (run_id, year, started_at, mode, dry_run, counts_json, status)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(runId, year, now, mode, dryRun ? 1 : 0, "{}", "running");
}

export function completeRun(runId: string, counts: SyncCounts, status: "completed" | "failed"): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    UPDATE sync_runs
    SET completed_at = ?, counts_json = ?, status = ?
    WHERE run_id = ?
  `).run(now, JSON.stringify(counts), status, runId);
}

export function findRun(runId: string): SyncRunRecord | undefined {
  const db = getDatabase();
  const row = db
    .prepare("SELECT * FROM sync_runs WHERE run_id = ?")
    .get(runId) as RawRunRow | undefined;
  return row ? toRunRecord(row) : undefined;
}

// --- Conflict Records ---

export function saveConflicts(runId: string, records: readonly ConflictRecord[]): void {
  const db = getDatabase();
  const insert = db.prepare(`
    INSERT INTO conflict_records (run_id, category, identity, message, snapshot_json, recorded_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const insertAll = db.transaction((batch: readonly ConflictRecord[]) => {
    for (const record of batch) {
      insert.run(runId, record.category, record.identity ?? null, record.message, JSON.stringify(record.snapshot), record.timestamp);
    }
  });
  insertAll(records);
}

export function listConflicts(runId: string): ConflictRecord[] {
  const db = getDatabase();
  const rows = db
    .prepare("SELECT * FROM conflict_records WHERE run_id = ? ORDER BY id")
    .all(runId) as RawConflictRow[];
  return rows.map(toConflictRecord);
}

// --- Internal helpers ---

const conflictCategorySchema = z.enum([
  "MissingCategory",
  "BaseDataConflict",
  "Conflict",
  "DataDiscrepancy",
  "OrphanedEvent",
  "OutOfSync",
]);

const snapshotSchema = z.discriminatedUnion("origin", [
  z.object({ origin: z.literal("database"), fields: rawDbEventSchema }),
  z.object({ origin: z.literal("external"), fields: rawExternalEventSchema }),
]);

const countsSchema = z.record(z.string(), z.number());

interface RawSyncRow {
  id: number;
  identity: string;
  external_id: string | null;
  data_hash: string | null;
  sync_status: string;
  error_message: string | null;
  last_synced_at: string;
  created_at: string;
  updated_at: string;
}

interface RawRunRow {
  id: number;
  run_id: string;
  year: number;
  started_at: string;
  completed_at: string | null;
  mode: string;
  dry_run: number;
  counts_json: string;
  status: string;
}

interface RawConflictRow {
  id: number;
  run_id: string;
  category: string;
  identity: string | null;
  message: string;
  snapshot_json: string;
  recorded_at: string;
}

function toSyncRecord(row: RawSyncRow): SyncRecord {
  return {
    id: row.id,
    identity: row.identity,
    externalId: row.external_id,
    dataHash: row.data_hash,
    syncStatus: row.sync_status as SyncStatus,
    errorMessage: row.error_message,
    lastSyncedAt: row.last_synced_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toRunRecord(row: RawRunRow): SyncRunRecord {
  return {
    id: row.id,
    runId: row.run_id,
    year: row.year,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    mode: row.mode as RunMode,
    dryRun: row.dry_run === 1,
    counts: countsSchema.parse(JSON.parse(row.counts_json)),
    status: row.status as SyncRunRecord["status"],
  };
}

function toConflictRecord(row: RawConflictRow): ConflictRecord {
  return {
    category: conflictCategorySchema.parse(row.category),
    ...(row.identity !== null ? { identity: row.identity } : {}),
    snapshot: snapshotSchema.parse(JSON.parse(row.snapshot_json)),
    message: row.message,
    timestamp: row.recorded_at,
  };
}

export type SyncStatus = "synced" | "failed" | "skipped";

export type RunMode = "interactive" | "automated";

export interface SyncRecord {
  id: number;
  identity: string;
  externalId: string | null;
  dataHash: string | null;
  syncStatus: SyncStatus;
  errorMessage: string | null;
  lastSyncedAt: string;
  createdAt: string;
  updatedAt: string;
}

export interface SyncRunRecord {
  id: number;
  runId: string;
  year: number;
  startedAt: string;
  completedAt: string | null;
  mode: RunMode;
  dryRun: boolean;
  counts: Record<string, number>;
  status: "running" | "completed" | "failed";
}

import type { RawDbEvent, RawExternalEvent } from "./api";

export type { RawDbEvent, RawExternalEvent, WhitelistEntry, DropdownValues } from "./api";

export type CategoryKind = "employee" | "project" | "activity";

export const CATEGORY_KINDS: readonly CategoryKind[] = ["employee", "project", "activity"];

export type EventSource = "database" | "external";

export type RawEvent =
  | { origin: "database"; record: RawDbEvent }
  | { origin: "external"; record: RawExternalEvent };

export interface CanonicalEvent {
  identity?: string;
  /** The external system's own record id; only set on external-origin events. */
  externalId?: string;
  subject: string;
  description: string;
  start: string;
  end: string;
  hours: number;
  employee: string;
  project: string;
  activity: string;
  invoiced: boolean;
  source: EventSource;
  lastModified?: string;
}

export type ConflictCategory =
  | "MissingCategory"
  | "BaseDataConflict"
  | "Conflict"
  | "DataDiscrepancy"
  | "OrphanedEvent"
  | "OutOfSync";

export type EventSnapshot =
  | { origin: "database"; fields: RawDbEvent }
  | { origin: "external"; fields: RawExternalEvent };

export interface ConflictRecord {
  readonly category: ConflictCategory;
  readonly identity?: string;
  readonly snapshot: EventSnapshot;
  readonly message: string;
  readonly timestamp: string;
}

export type SyncAction = "created" | "updated" | "unchanged" | "skipped" | "failed";

export interface SyncResult {
  identity: string;
  action: SyncAction;
  /** Set on created/updated results issued in dry-run mode. */
  planned?: boolean;
  externalId?: string;
  category?: ConflictCategory;
  changedFields?: string[];
  error?: string;
  timestamp: string;
}

export interface SyncCounts {
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
  failed: number;
  conflicts: number;
  discrepancies: number;
}

export interface SyncRunSummary {
  runId: string;
  year: number;
  dryRun: boolean;
  /** False when verification was skipped or could not re-fetch the external state. */
  verified: boolean;
  startedAt: string;
  completedAt: string;
  results: SyncResult[];
  conflicts: ConflictRecord[];
  counts: SyncCounts;
}

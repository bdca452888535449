import type {
  CanonicalEvent,
  CategoryKind,
  ConflictRecord,
  DropdownValues,
  RawDbEvent,
  RawExternalEvent,
  WhitelistEntry,
} from "@/sync/types";

// Boundaries of the reconciliation core. Retries, timeouts and browser
// sessions belong to the implementations, not to the engine.

export interface DatabaseEventSource {
  fetchDatabaseEvents(year: number): Promise<RawDbEvent[]>;
}

export interface ExternalEventWriter {
  /** Returns the id the external system assigned. Fails with ExternalWriteError. */
  insertExternalEvent(event: CanonicalEvent): Promise<string>;
  /** Must refuse invoiced targets. Fails with ExternalWriteError. */
  updateExternalEvent(externalId: string, event: CanonicalEvent): Promise<void>;
}

export interface ExternalEventSystem extends ExternalEventWriter {
  fetchExternalEvents(year: number): Promise<RawExternalEvent[]>;
  fetchDropdownValues(kind: CategoryKind): Promise<DropdownValues>;
}

export interface WhitelistSource {
  getWhitelist(): Promise<WhitelistEntry[]>;
}

export interface ConflictReporter {
  reportConflicts(runId: string, records: readonly ConflictRecord[]): Promise<void>;
}

export interface SyncCollaborators {
  database: DatabaseEventSource;
  external: ExternalEventSystem;
  whitelist: WhitelistSource;
  reporter: ConflictReporter;
}

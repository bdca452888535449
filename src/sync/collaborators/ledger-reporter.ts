import { saveConflicts } from "@/sync/ledger/repository";
import { createChildLogger } from "@/sync/logger";
import type { ConflictRecord } from "@/sync/types";
import type { ConflictReporter } from "./types";

const log = createChildLogger("conflict-report");

/**
 * Writes every conflict to the log and, when the ledger is enabled, keeps
 * them in `conflict_records` for the notification job downstream.
 */
export class LedgerConflictReporter implements ConflictReporter {
  constructor(private readonly options: { useLedger: boolean }) {}

  async reportConflicts(runId: string, records: readonly ConflictRecord[]): Promise<void> {
    for (const record of records) {
      log.warn(record.message, {
        runId,
        category: record.category,
        identity: record.identity,
        snapshot: record.snapshot.fields,
      });
    }
    if (this.options.useLedger && records.length > 0) {
      saveConflicts(runId, records);
    }
    log.info("Conflicts reported", { runId, total: records.length });
  }
}

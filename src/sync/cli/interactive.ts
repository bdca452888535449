import * as p from "@clack/prompts";
import { fetchSyncInputs, planSync, runSync } from "@/sync";
import type { SyncInputs } from "@/sync";
import type { SyncCollaborators } from "@/sync/collaborators/types";
import type { SyncEnv } from "@/sync/config/env";
import { closeDatabase } from "@/sync/ledger/db";
import type { ConflictCategory, SyncRunSummary } from "@/sync/types";
import { createFileCollaborators } from "./options";
import type { CliOptions } from "./options";

const CATEGORY_LABELS: Record<ConflictCategory, string> = {
  MissingCategory: "Missing project/activity",
  BaseDataConflict: "Unknown employee/project/activity",
  Conflict: "Invoiced, not changed",
  DataDiscrepancy: "Data discrepancies",
  OrphanedEvent: "Orphaned in bookkeeping",
  OutOfSync: "Out of sync (no event id)",
};

export function formatConflictLines(summary: SyncRunSummary): string[] {
  const byCategory = new Map<ConflictCategory, number>();
  for (const conflict of summary.conflicts) {
    byCategory.set(conflict.category, (byCategory.get(conflict.category) ?? 0) + 1);
  }
  return [...byCategory.entries()].map(([category, count]) => `${CATEGORY_LABELS[category]}: ${count}`);
}

export function formatPlanLine(summary: SyncRunSummary): string {
  const { created, updated, unchanged, skipped } = summary.counts;
  const parts: string[] = [];
  if (created > 0) parts.push(`${created} new`);
  if (updated > 0) parts.push(`${updated} updated`);
  if (unchanged > 0) parts.push(`${unchanged} unchanged`);
  if (skipped > 0) parts.push(`${skipped} skipped`);
  return parts.length > 0 ? `Events: ${parts.join(", ")}` : "Events: none";
}

export async function runInteractiveSync(options: CliOptions, env: SyncEnv): Promise<void> {
  p.intro(`Hours Sync — ${options.year}`);

  let collaborators: SyncCollaborators;
  try {
    collaborators = createFileCollaborators(env);
  } catch (error) {
    p.log.error(error instanceof Error ? error.message : String(error));
    p.outro(`Put the exports in ${env.SYNC_DATA_DIR} and try again.`);
    return;
  }

  const timeZones = { reference: env.SYNC_TIMEZONE, database: env.SYNC_DATABASE_TIMEZONE };
  const fetchSpinner = p.spinner();
  fetchSpinner.start("Comparing the database with the bookkeeping...");

  let inputs: SyncInputs;
  let plan: SyncRunSummary;
  try {
    inputs = await fetchSyncInputs(collaborators, options.year);
    plan = await planSync(inputs, { timeZones });
    fetchSpinner.stop("Comparison done.");
  } catch (error) {
    fetchSpinner.stop("Failed to fetch events.");
    p.log.error(error instanceof Error ? error.message : String(error));
    p.outro("Sync could not start. Check your exports and settings and try again.");
    return;
  }

  const writes = plan.counts.created + plan.counts.updated;
  if (writes === 0 && plan.conflicts.length === 0) {
    p.log.success("Everything is up to date!");
    p.outro("Nothing to sync.");
    return;
  }

  p.log.info(formatPlanLine(plan));
  for (const line of formatConflictLines(plan)) {
    p.log.message(`  ${line}`);
  }

  if (options.dryRun) {
    p.log.warn("Dry run: nothing will be written to the bookkeeping.");
  }

  const confirmed = await p.confirm({
    message: options.dryRun
      ? "Record this dry run and report the conflicts?"
      : `Write ${writes} change${writes === 1 ? "" : "s"} and report the conflicts?`,
  });

  if (p.isCancel(confirmed) || !confirmed) {
    p.outro("Sync cancelled.");
    return;
  }

  const syncSpinner = p.spinner();
  syncSpinner.start("Syncing...");

  try {
    const summary = await runSync(inputs, collaborators, {
      dryRun: options.dryRun,
      mode: "interactive",
      useLedger: true,
      verify: env.SYNC_VERIFY,
      timeZones,
    });
    syncSpinner.stop("Sync finished.");

    const { created, updated, failed, discrepancies } = summary.counts;
    if (failed > 0) {
      p.log.warn(`${created + updated} written, ${failed} failed. Check the log for details.`);
    } else if (created + updated > 0) {
      p.log.success(`${created + updated} events written.`);
    } else {
      p.log.info("No events were written.");
    }
    if (discrepancies > 0) {
      p.log.warn(`${discrepancies} discrepancies found, see the conflict report.`);
    }
  } catch (error) {
    syncSpinner.stop("Sync failed.");
    p.log.error(error instanceof Error ? error.message : String(error));
  } finally {
    closeDatabase();
  }

  p.outro("Done!");
}

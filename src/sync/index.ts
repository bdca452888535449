import { randomUUID } from "crypto";
import { BaseDataResolver } from "@/sync/basedata/resolver";
import type { ExternalEventWriter, SyncCollaborators } from "@/sync/collaborators/types";
import { createRunContext } from "@/sync/engine/context";
import type { RunContext, TimeZones } from "@/sync/engine/context";
import { reconcile } from "@/sync/engine/reconcile";
import type { ReconcileOutcome } from "@/sync/engine/reconcile";
import { PrerequisiteError, errorMessage } from "@/sync/errors";
import { hashEvent } from "@/sync/ledger/hash";
import { completeRun, createRun, markFailed, markSkipped, markSynced } from "@/sync/ledger/repository";
import type { RunMode } from "@/sync/ledger/types";
import { createChildLogger } from "@/sync/logger";
import type { ConflictRecord, RawDbEvent, RawExternalEvent, SyncResult, SyncRunSummary, WhitelistEntry } from "@/sync/types";
import { verify } from "@/sync/verify/verifier";

const log = createChildLogger("sync-engine");

export interface SyncOptions {
  dryRun?: boolean;
  mode?: RunMode;
  useLedger?: boolean;
  verify?: boolean;
  timeZones?: Partial<TimeZones>;
  now?: () => Date;
}

/** Everything classification depends on, fetched once before the first pass. */
export interface SyncInputs {
  year: number;
  databaseEvents: RawDbEvent[];
  externalEvents: RawExternalEvent[];
  resolver: BaseDataResolver;
  whitelist: WhitelistEntry[];
}

async function prerequisite<T>(
  name: PrerequisiteError["prerequisite"],
  fetch: () => Promise<T>,
): Promise<T> {
  try {
    return await fetch();
  } catch (error) {
    log.error("Prerequisite fetch failed", { prerequisite: name, error: errorMessage(error) });
    throw new PrerequisiteError(name, { cause: error });
  }
}

/** Fetch database events, external events, dropdowns and whitelist. Any failure aborts the run. */
export async function fetchSyncInputs(collaborators: SyncCollaborators, year: number): Promise<SyncInputs> {
  log.info("Fetching sync inputs...", { year });

  const [databaseEvents, externalEvents, resolver, whitelist] = await Promise.all([
    prerequisite("databaseEvents", () => collaborators.database.fetchDatabaseEvents(year)),
    prerequisite("externalEvents", () => collaborators.external.fetchExternalEvents(year)),
    prerequisite("dropdowns", () => BaseDataResolver.load((kind) => collaborators.external.fetchDropdownValues(kind))),
    prerequisite("whitelist", () => collaborators.whitelist.getWhitelist()),
  ]);

  log.info("Sync inputs fetched", {
    year,
    databaseEvents: databaseEvents.length,
    externalEvents: externalEvents.length,
    whitelist: whitelist.length,
  });

  return { year, databaseEvents, externalEvents, resolver, whitelist };
}

function contextFor(inputs: SyncInputs, options: SyncOptions | undefined, dryRun: boolean): RunContext {
  return createRunContext({
    year: inputs.year,
    resolver: inputs.resolver,
    whitelist: inputs.whitelist,
    timeZones: options?.timeZones,
    dryRun,
    now: options?.now,
  });
}

const refusingWriter: ExternalEventWriter = {
  insertExternalEvent: () => Promise.reject(new Error("Planning run attempted an insert")),
  updateExternalEvent: () => Promise.reject(new Error("Planning run attempted an update")),
};

/** Classify everything without writing or reporting; used to preview a run. */
export async function planSync(inputs: SyncInputs, options?: SyncOptions): Promise<SyncRunSummary> {
  const ctx = contextFor(inputs, options, true);
  const startedAt = ctx.now().toISOString();
  const outcome = await reconcile(inputs.databaseEvents, inputs.externalEvents, refusingWriter, ctx);
  return buildSummary(randomUUID(), inputs.year, true, startedAt, outcome.results, ctx.conflicts.entries(), ctx);
}

/** Reconcile, verify, report and record one year. */
export async function runSync(
  inputs: SyncInputs,
  collaborators: SyncCollaborators,
  options?: SyncOptions,
): Promise<SyncRunSummary> {
  const runId = randomUUID();
  const dryRun = options?.dryRun ?? false;
  const mode = options?.mode ?? "automated";
  const useLedger = options?.useLedger ?? false;
  const shouldVerify = options?.verify ?? true;
  const ctx = contextFor(inputs, options, dryRun);
  const startedAt = ctx.now().toISOString();

  log.info("Starting sync run", { runId, year: inputs.year, dryRun, mode });

  if (useLedger) {
    createRun(runId, inputs.year, mode, dryRun);
  }

  try {
    const outcome = await reconcile(inputs.databaseEvents, inputs.externalEvents, collaborators.external, ctx);

    let verified = false;
    if (dryRun) {
      log.info("Dry run, skipping verification");
    } else if (shouldVerify) {
      try {
        await verify(outcome.expected, () => collaborators.external.fetchExternalEvents(inputs.year), ctx);
        verified = true;
      } catch (error) {
        // The writes already happened; report what is known and flag the run as unverified.
        log.error("Verification could not re-fetch external events", { runId, error: errorMessage(error) });
      }
    }

    const conflicts = ctx.conflicts.entries();
    await collaborators.reporter.reportConflicts(runId, conflicts);

    if (useLedger && !dryRun) {
      recordOutcome(outcome);
    }

    const summary = { ...buildSummary(runId, inputs.year, dryRun, startedAt, outcome.results, conflicts, ctx), verified };
    log.info("Sync run complete", { runId, counts: summary.counts });
    if (useLedger) completeRun(runId, summary.counts, "completed");
    return summary;
  } catch (error) {
    log.error("Sync run failed", { runId, error: errorMessage(error) });
    if (useLedger) {
      completeRun(runId, buildSummary(runId, inputs.year, dryRun, startedAt, [], ctx.conflicts.entries(), ctx).counts, "failed");
    }
    throw error;
  }
}

function recordOutcome(outcome: ReconcileOutcome): void {
  const hashes = new Map<string, string>();
  for (const { event } of outcome.expected) {
    if (event.identity !== undefined) hashes.set(event.identity, hashEvent(event));
  }

  const recorded = new Set<string>();
  for (const result of outcome.results) {
    // Repeated database ids keep the status of their first occurrence.
    if (!result.identity || recorded.has(result.identity)) continue;
    recorded.add(result.identity);
    const hash = hashes.get(result.identity);
    if (result.action === "failed") {
      markFailed(result.identity, result.error ?? "Unknown error", result.externalId);
    } else if (result.action === "skipped") {
      markSkipped(result.identity, result.category ?? "skipped", result.externalId);
    } else if (hash !== undefined) {
      markSynced(result.identity, hash, result.externalId);
    }
  }
}

function buildSummary(
  runId: string,
  year: number,
  dryRun: boolean,
  startedAt: string,
  results: SyncResult[],
  conflicts: readonly ConflictRecord[],
  ctx: RunContext,
): SyncRunSummary {
  return {
    runId,
    year,
    dryRun,
    startedAt,
    completedAt: ctx.now().toISOString(),
    verified: false,
    results,
    conflicts: [...conflicts],
    counts: {
      created: results.filter((r) => r.action === "created").length,
      updated: results.filter((r) => r.action === "updated").length,
      unchanged: results.filter((r) => r.action === "unchanged").length,
      skipped: results.filter((r) => r.action === "skipped").length,
      failed: results.filter((r) => r.action === "failed").length,
      conflicts: conflicts.length,
      discrepancies: conflicts.filter((c) => c.category === "DataDiscrepancy").length,
    },
  };
}

import { afterEach, describe, expect, it, vi } from "vitest";
import { LedgerConflictReporter } from "@/sync/collaborators/ledger-reporter";
import { SnapshotExternalSystem } from "@/sync/collaborators/snapshot-system";
import type { SyncCollaborators } from "@/sync/collaborators/types";
import { PrerequisiteError } from "@/sync/errors";
import { closeDatabase, getDatabase } from "@/sync/ledger/db";
import { findRecord, findRun, listConflicts } from "@/sync/ledger/repository";
import { DROPDOWNS, E1, E2, E3, FIXED_NOW, makeDbEvent, makeExternalEvent } from "@/sync/testing/fixtures";
import type { CanonicalEvent, ConflictRecord, RawDbEvent, RawExternalEvent } from "@/sync/types";
import { fetchSyncInputs, planSync, runSync } from "./index";

function createCollaborators(dbEvents: RawDbEvent[], externalEvents: RawExternalEvent[]) {
  const external = new SnapshotExternalSystem(
    { events: externalEvents, dropdowns: DROPDOWNS },
    { generateId: () => "ext-generated" },
  );
  const reportConflicts = vi.fn(async (_runId: string, _records: readonly ConflictRecord[]) => undefined);
  const collaborators: SyncCollaborators = {
    database: { fetchDatabaseEvents: async () => dbEvents },
    external,
    whitelist: { getWhitelist: async () => [] },
    reporter: { reportConflicts },
  };
  return { collaborators, external, reportConflicts };
}

const options = { now: () => FIXED_NOW };

afterEach(() => {
  closeDatabase();
});

describe("fetchSyncInputs", () => {
  it("collects every prerequisite", async () => {
    const { collaborators } = createCollaborators([makeDbEvent()], [makeExternalEvent()]);
    const inputs = await fetchSyncInputs(collaborators, 2024);

    expect(inputs.year).toBe(2024);
    expect(inputs.databaseEvents).toHaveLength(1);
    expect(inputs.externalEvents).toHaveLength(1);
    expect(inputs.resolver.resolve("project", "Acme")).toBe("prj-acme");
    expect(inputs.whitelist).toEqual([]);
  });

  it("aborts when a prerequisite cannot be fetched", async () => {
    const { collaborators } = createCollaborators([], []);
    collaborators.whitelist = { getWhitelist: () => Promise.reject(new Error("share unreachable")) };

    const attempt = fetchSyncInputs(collaborators, 2024);
    await expect(attempt).rejects.toBeInstanceOf(PrerequisiteError);
    await expect(attempt).rejects.toThrow("Failed to fetch whitelist: share unreachable");
  });
});

describe("runSync", () => {
  it("reconciles, verifies and reports one year", async () => {
    const { collaborators, external, reportConflicts } = createCollaborators(
      [makeDbEvent(), makeDbEvent({ event_id: E2 }), makeDbEvent({ event_id: E3, project: null })],
      [makeExternalEvent({ subject: "Old subject" }), makeExternalEvent({ id: "ext-9", description: "By hand" })],
    );
    const inputs = await fetchSyncInputs(collaborators, 2024);

    const summary = await runSync(inputs, collaborators, options);

    expect(summary.verified).toBe(true);
    expect(summary.dryRun).toBe(false);
    expect(summary.counts).toEqual({
      created: 1,
      updated: 1,
      unchanged: 0,
      skipped: 1,
      failed: 0,
      conflicts: 2,
      discrepancies: 0,
    });
    expect(summary.conflicts.map((c) => c.category)).toEqual(["MissingCategory", "OutOfSync"]);
    expect(reportConflicts).toHaveBeenCalledWith(summary.runId, summary.conflicts);
    expect(external.snapshot().events.map((e) => e.id)).toEqual(["ext-1", "ext-9", "ext-generated"]);
  });

  it("catches writes that did not land during verification", async () => {
    const { collaborators, external } = createCollaborators([makeDbEvent()], []);
    // Reports success but never stores the event.
    vi.spyOn(external, "insertExternalEvent").mockImplementation(async (_event: CanonicalEvent) => "ext-lost");
    const inputs = await fetchSyncInputs(collaborators, 2024);

    const summary = await runSync(inputs, collaborators, options);

    expect(summary.counts.created).toBe(1);
    expect(summary.counts.discrepancies).toBe(1);
    expect(summary.conflicts[0].message).toBe(`Event ${E1} is missing from the external system after sync`);
  });

  it("flags the run unverified when the re-fetch fails", async () => {
    const { collaborators, external } = createCollaborators([makeDbEvent()], []);
    const inputs = await fetchSyncInputs(collaborators, 2024);
    vi.spyOn(external, "fetchExternalEvents").mockRejectedValue(new Error("session expired"));

    const summary = await runSync(inputs, collaborators, options);

    expect(summary.verified).toBe(false);
    expect(summary.counts.created).toBe(1);
  });

  it("writes nothing in dry-run mode", async () => {
    const { collaborators, external, reportConflicts } = createCollaborators([makeDbEvent()], []);
    const inputs = await fetchSyncInputs(collaborators, 2024);

    const summary = await runSync(inputs, collaborators, { ...options, dryRun: true });

    expect(summary.dryRun).toBe(true);
    expect(summary.verified).toBe(false);
    expect(summary.results[0]).toMatchObject({ identity: E1, action: "created", planned: true });
    expect(external.snapshot().events).toEqual([]);
    expect(reportConflicts).toHaveBeenCalledTimes(1);
  });

  it("records the run, events and conflicts in the ledger", async () => {
    process.env.SYNC_LEDGER_PATH = ":memory:";
    const { collaborators } = createCollaborators(
      [makeDbEvent(), makeDbEvent({ event_id: E3, activity: "" })],
      [],
    );
    collaborators.reporter = new LedgerConflictReporter({ useLedger: true });
    const inputs = await fetchSyncInputs(collaborators, 2024);

    const summary = await runSync(inputs, collaborators, { ...options, useLedger: true, mode: "interactive" });

    expect(findRun(summary.runId)).toMatchObject({ status: "completed", mode: "interactive", year: 2024 });
    expect(findRecord(E1)).toMatchObject({ syncStatus: "synced", externalId: "ext-generated" });
    expect(findRecord(E3)).toMatchObject({ syncStatus: "skipped", errorMessage: "MissingCategory" });
    expect(listConflicts(summary.runId)).toEqual([
      expect.objectContaining({
        category: "MissingCategory",
        identity: E3,
        message: `Event ${E3} has no activity category`,
        timestamp: "2024-12-31T12:00:00.000Z",
      }),
    ]);
  });

  it("marks the ledger run failed when reporting throws", async () => {
    process.env.SYNC_LEDGER_PATH = ":memory:";
    const { collaborators, reportConflicts } = createCollaborators([makeDbEvent()], []);
    reportConflicts.mockRejectedValue(new Error("mail server down"));
    const inputs = await fetchSyncInputs(collaborators, 2024);

    await expect(runSync(inputs, collaborators, { ...options, useLedger: true })).rejects.toThrow("mail server down");

    const runId: unknown = getDatabase().prepare("SELECT run_id FROM sync_runs").pluck().get();
    expect(typeof runId === "string" ? findRun(runId)?.status : undefined).toBe("failed");
  });
});

describe("planSync", () => {
  it("classifies without touching the external system", async () => {
    const { collaborators, external, reportConflicts } = createCollaborators(
      [makeDbEvent(), makeDbEvent({ event_id: E2 })],
      [makeExternalEvent()],
    );
    const inputs = await fetchSyncInputs(collaborators, 2024);

    const plan = await planSync(inputs, options);

    expect(plan.dryRun).toBe(true);
    expect(plan.results.map((r) => r.action)).toEqual(["unchanged", "created"]);
    expect(external.snapshot().events).toHaveLength(1);
    expect(reportConflicts).not.toHaveBeenCalled();
  });
});

import { describe, expect, it, vi } from "vitest";
import { ExternalWriteError } from "@/sync/errors";
import { normalizeDatabaseEvent } from "@/sync/normalize/normalizer";
import { DROPDOWNS, E1, makeContext, makeDbEvent, makeExternalEvent } from "@/sync/testing/fixtures";
import type { ExternalSnapshot } from "@/sync/types/api";
import { SnapshotExternalSystem } from "./snapshot-system";

const canonical = normalizeDatabaseEvent(makeDbEvent({ subject: "Planning" }), makeContext());

function createSystem(events = [makeExternalEvent()], persist?: (snapshot: ExternalSnapshot) => void) {
  return new SnapshotExternalSystem({ events, dropdowns: DROPDOWNS }, { persist, generateId: () => "ext-generated" });
}

describe("SnapshotExternalSystem", () => {
  it("returns only events that start in the requested year", async () => {
    const system = createSystem([
      makeExternalEvent(),
      makeExternalEvent({ id: "ext-old", start: "2023-12-01T09:00:00+01:00" }),
    ]);
    expect((await system.fetchExternalEvents(2024)).map((e) => e.id)).toEqual(["ext-1"]);
    expect((await system.fetchExternalEvents(2023)).map((e) => e.id)).toEqual(["ext-old"]);
  });

  it("serves dropdown values per kind", async () => {
    expect(await createSystem().fetchDropdownValues("project")).toEqual({ Acme: "prj-acme", Globex: "prj-globex" });
  });

  it("stores inserted events under a generated id", async () => {
    const system = createSystem([]);
    const externalId = await system.insertExternalEvent(canonical);

    expect(externalId).toBe("ext-generated");
    expect(system.snapshot().events).toEqual([
      expect.objectContaining({ id: "ext-generated", subject: "Planning", project: "prj-acme", hours: 4, invoiced: false }),
    ]);
  });

  it("replaces the content of an updated event", async () => {
    const system = createSystem();
    await system.updateExternalEvent("ext-1", canonical);
    expect(system.snapshot().events[0]).toMatchObject({ id: "ext-1", subject: "Planning" });
  });

  it("refuses to update invoiced or unknown records", async () => {
    const system = createSystem([makeExternalEvent({ invoiced: true })]);
    await expect(system.updateExternalEvent("ext-1", canonical)).rejects.toThrow(
      "External record ext-1 is invoiced and cannot be changed",
    );
    await expect(system.updateExternalEvent("ext-404", canonical)).rejects.toBeInstanceOf(ExternalWriteError);
    expect(system.snapshot().events[0].subject).toBe("Sprint review");
  });

  it("persists after every write", async () => {
    const persist = vi.fn((_snapshot: ExternalSnapshot) => undefined);
    const system = createSystem([], persist);

    await system.insertExternalEvent(canonical);

    expect(persist).toHaveBeenCalledTimes(1);
    expect(persist.mock.calls[0][0].events).toHaveLength(1);
  });

  it("wraps persistence failures in ExternalWriteError", async () => {
    const system = createSystem([], () => {
      throw new Error("disk full");
    });
    await expect(system.insertExternalEvent(canonical)).rejects.toThrow("Failed to persist external snapshot after insert");
  });

  it("does not expose its internal state", async () => {
    const system = createSystem();
    const [fetched] = await system.fetchExternalEvents(2024);
    fetched.description = `Tampered\n[event_id: ${E1}]`;
    expect(system.snapshot().events[0].description).toBe(`Reviewed sprint\n[event_id: ${E1}]`);
  });
});

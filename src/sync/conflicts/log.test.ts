import { describe, expect, it } from "vitest";
import { E1, FIXED_NOW, makeDbEvent, makeExternalEvent } from "@/sync/testing/fixtures";
import { ConflictLog } from "./log";

describe("ConflictLog", () => {
  it("stamps records with the injected clock", () => {
    const log = new ConflictLog(() => FIXED_NOW);
    const record = log.add("MissingCategory", { origin: "database", fields: makeDbEvent() }, "No project", E1);

    expect(record).toMatchObject({
      category: "MissingCategory",
      identity: E1,
      message: "No project",
      timestamp: "2024-12-31T12:00:00.000Z",
    });
  });

  it("omits the identity when none is given", () => {
    const log = new ConflictLog(() => FIXED_NOW);
    const record = log.add("OutOfSync", { origin: "external", fields: makeExternalEvent() }, "Unknown record");
    expect("identity" in record).toBe(false);
  });

  it("freezes records and their snapshots", () => {
    const log = new ConflictLog(() => FIXED_NOW);
    const fields = makeDbEvent();
    const record = log.add("DataDiscrepancy", { origin: "database", fields }, "Broken");

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.snapshot)).toBe(true);
    expect(Object.isFrozen(record.snapshot.fields)).toBe(true);

    fields.subject = "Changed afterwards";
    expect(record.snapshot.fields.subject).toBe("Sprint review");
  });

  it("groups and counts by category", () => {
    const log = new ConflictLog(() => FIXED_NOW);
    const snapshot = { origin: "external", fields: makeExternalEvent() } as const;
    log.add("OutOfSync", snapshot, "first");
    log.add("OrphanedEvent", snapshot, "second", E1);
    log.add("OutOfSync", snapshot, "third");

    expect(log.size).toBe(3);
    expect(log.byCategory("OutOfSync").map((r) => r.message)).toEqual(["first", "third"]);
    expect(log.counts()).toEqual({ OutOfSync: 2, OrphanedEvent: 1 });
  });

  it("returns a copy from entries", () => {
    const log = new ConflictLog(() => FIXED_NOW);
    log.add("Conflict", { origin: "external", fields: makeExternalEvent() }, "Invoiced", E1);
    const entries = log.entries();
    log.add("Conflict", { origin: "external", fields: makeExternalEvent() }, "Invoiced again", E1);
    expect(entries).toHaveLength(1);
  });
});

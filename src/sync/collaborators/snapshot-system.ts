import { randomUUID } from "crypto";
import fs from "fs";
import { ExternalWriteError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { externalSnapshotSchema } from "@/sync/types/api";
import type { ExternalSnapshot } from "@/sync/types/api";
import type { CanonicalEvent, CategoryKind, DropdownValues, RawExternalEvent } from "@/sync/types";
import type { ExternalEventSystem } from "./types";

const log = createChildLogger("snapshot-system");

export interface SnapshotSystemOptions {
  /** Called with the full snapshot after every successful write. */
  persist?: (snapshot: ExternalSnapshot) => void;
  generateId?: () => string;
}

function toRawExternalEvent(externalId: string, event: CanonicalEvent, invoiced: boolean): RawExternalEvent {
  return {
    id: externalId,
    employee: event.employee,
    project: event.project,
    activity: event.activity,
    subject: event.subject,
    description: event.description,
    start: event.start,
    end: event.end,
    hours: event.hours,
    invoiced,
    last_modified: new Date().toISOString(),
  };
}

/**
 * External system backed by an exported snapshot of its hour registrations and
 * dropdowns. Stands in for the browser-driven system when running against
 * files, and as the in-process system in tests.
 */
export class SnapshotExternalSystem implements ExternalEventSystem {
  private readonly events: RawExternalEvent[];
  private readonly dropdowns: ExternalSnapshot["dropdowns"];
  private readonly persist?: (snapshot: ExternalSnapshot) => void;
  private readonly generateId: () => string;

  constructor(snapshot: ExternalSnapshot, options: SnapshotSystemOptions = {}) {
    this.events = snapshot.events.map((e) => ({ ...e }));
    this.dropdowns = snapshot.dropdowns;
    this.persist = options.persist;
    this.generateId = options.generateId ?? randomUUID;
  }

  static fromFile(filePath: string): SnapshotExternalSystem {
    const parsed = externalSnapshotSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    if (!parsed.success) {
      throw new Error(`Invalid external snapshot ${filePath}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    log.info("External snapshot loaded", { file: filePath, events: parsed.data.events.length });
    return new SnapshotExternalSystem(parsed.data, {
      persist: (snapshot) => fs.writeFileSync(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf-8"),
    });
  }

  async fetchExternalEvents(year: number): Promise<RawExternalEvent[]> {
    return this.events
      .filter((e) => !e.start || e.start.startsWith(`${year}-`))
      .map((e) => ({ ...e }));
  }

  async fetchDropdownValues(kind: CategoryKind): Promise<DropdownValues> {
    return { ...this.dropdowns[kind] };
  }

  async insertExternalEvent(event: CanonicalEvent): Promise<string> {
    const externalId = this.generateId();
    this.events.push(toRawExternalEvent(externalId, event, false));
    this.save("insert", externalId);
    return externalId;
  }

  async updateExternalEvent(externalId: string, event: CanonicalEvent): Promise<void> {
    const position = this.events.findIndex((e) => e.id === externalId);
    if (position === -1) {
      throw new ExternalWriteError("update", `External record ${externalId} does not exist`, externalId);
    }
    if (this.events[position].invoiced) {
      throw new ExternalWriteError("update", `External record ${externalId} is invoiced and cannot be changed`, externalId);
    }
    this.events[position] = toRawExternalEvent(externalId, event, false);
    this.save("update", externalId);
  }

  snapshot(): ExternalSnapshot {
    return { events: this.events.map((e) => ({ ...e })), dropdowns: this.dropdowns };
  }

  private save(operation: "insert" | "update", externalId: string): void {
    if (!this.persist) return;
    try {
      this.persist(this.snapshot());
    } catch (error) {
      throw new ExternalWriteError(operation, `Failed to persist external snapshot after ${operation}`, externalId, { cause: error });
    }
  }
}

import type { ConflictCategory, ConflictRecord, EventSnapshot } from "@/sync/types";

function freezeSnapshot(snapshot: EventSnapshot): EventSnapshot {
  const copy: EventSnapshot =
    snapshot.origin === "database"
      ? { origin: "database", fields: Object.freeze({ ...snapshot.fields }) }
      : { origin: "external", fields: Object.freeze({ ...snapshot.fields }) };
  return Object.freeze(copy);
}

/** Append-only record of every issue found during one run. */
export class ConflictLog {
  private readonly records: ConflictRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  add(category: ConflictCategory, snapshot: EventSnapshot, message: string, identity?: string): ConflictRecord {
    const record: ConflictRecord = Object.freeze({
      category,
      ...(identity !== undefined ? { identity } : {}),
      snapshot: freezeSnapshot(snapshot),
      message,
      timestamp: this.now().toISOString(),
    });
    this.records.push(record);
    return record;
  }

  entries(): readonly ConflictRecord[] {
    return [...this.records];
  }

  byCategory(category: ConflictCategory): ConflictRecord[] {
    return this.records.filter((r) => r.category === category);
  }

  counts(): Partial<Record<ConflictCategory, number>> {
    const counts: Partial<Record<ConflictCategory, number>> = {};
    for (const record of this.records) {
      counts[record.category] = (counts[record.category] ?? 0) + 1;
    }
    return counts;
  }

  get size(): number {
    return this.records.length;
  }
}

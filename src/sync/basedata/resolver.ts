import { BaseDataConflictError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { CATEGORY_KINDS } from "@/sync/types";
import type { CategoryKind, DropdownValues } from "@/sync/types";

const log = createChildLogger("base-data");

export type DropdownSnapshot = Record<CategoryKind, DropdownValues>;

function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Maps database-side employee/project/activity names onto the external
 * system's dropdown ids. Built from one snapshot per run and never refreshed,
 * so both reconciliation passes classify against the same base data.
 */
export class BaseDataResolver {
  private readonly mappings: ReadonlyMap<CategoryKind, ReadonlyMap<string, string>>;

  constructor(snapshot: DropdownSnapshot) {
    const mappings = new Map<CategoryKind, ReadonlyMap<string, string>>();
    for (const kind of CATEGORY_KINDS) {
      const mapping = new Map<string, string>();
      for (const [rawValue, externalId] of Object.entries(snapshot[kind])) {
        const key = normalizeKey(rawValue);
        if (key === "") continue;
        const existing = mapping.get(key);
        if (existing !== undefined && existing !== externalId) {
          log.warn("Dropdown values collide after case normalization; keeping the first", {
            kind,
            rawValue,
            kept: existing,
            ignored: externalId,
          });
          continue;
        }
        mapping.set(key, externalId);
      }
      mappings.set(kind, mapping);
    }
    this.mappings = mappings;
  }

  /** Fetch all three dropdowns once. Any failure propagates to the caller. */
  static async load(
    fetchDropdownValues: (kind: CategoryKind) => Promise<DropdownValues>,
  ): Promise<BaseDataResolver> {
    const [employee, project, activity] = await Promise.all(
      CATEGORY_KINDS.map((kind) => fetchDropdownValues(kind)),
    );
    log.info("Base data loaded", {
      employees: Object.keys(employee).length,
      projects: Object.keys(project).length,
      activities: Object.keys(activity).length,
    });
    return new BaseDataResolver({ employee, project, activity });
  }

  resolve(kind: CategoryKind, rawValue: string): string {
    const externalId = this.tryResolve(kind, rawValue);
    if (externalId === undefined) {
      throw new BaseDataConflictError(kind, rawValue);
    }
    return externalId;
  }

  tryResolve(kind: CategoryKind, rawValue: string): string | undefined {
    return this.mappings.get(kind)?.get(normalizeKey(rawValue));
  }

  size(kind: CategoryKind): number {
    return this.mappings.get(kind)?.size ?? 0;
  }
}

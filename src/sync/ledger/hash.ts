import { createHash } from "crypto";
import { comparableView } from "@/sync/engine/compare";
import type { CanonicalEvent } from "@/sync/types";

/**
 * Hash the business content of an event. Only the compared fields take part
 * and keys are sorted, so the hash is stable regardless of property order.
 */
export function hashEvent(event: CanonicalEvent): string {
  const sorted = stableSortKeys({ ...comparableView(event) });
  return createHash("sha256").update(JSON.stringify(sorted)).digest("hex");
}

function stableSortKeys(obj: Record<string, unknown>): Record<string, unknown> {
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(obj).sort()) {
    const val = obj[key];
    sorted[key] = val ?? null;
  }
  return sorted;
}

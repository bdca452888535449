import { ConflictLog } from "@/sync/conflicts/log";
import { diffEvents } from "@/sync/engine/compare";
import type { ComparableField } from "@/sync/engine/compare";
import type { RunContext } from "@/sync/engine/context";
import { indexExternalEvents } from "@/sync/engine/reconcile";
import type { ExpectedEvent } from "@/sync/engine/reconcile";
import { createChildLogger } from "@/sync/logger";
import type { RawExternalEvent } from "@/sync/types";

const log = createChildLogger("verifier");

export interface Discrepancy {
  identity: string;
  externalId?: string;
  /** Empty when the event is missing, or its external record cannot be read. */
  fields: ComparableField[];
  message: string;
}

/**
 * Re-fetch the external system after the writes and confirm every expected
 * database event is present with identical content. Mismatches land in the
 * run's conflict log as DataDiscrepancy.
 */
export async function verify(
  expected: readonly ExpectedEvent[],
  fetchExternal: () => Promise<RawExternalEvent[]>,
  ctx: RunContext,
): Promise<Discrepancy[]> {
  const refetched = await fetchExternal();

  // Read problems in the re-fetched snapshot were already reported by the
  // reconciliation pass; index into a scratch log so they are not doubled.
  const scratch: RunContext = { ...ctx, conflicts: new ConflictLog(ctx.now) };
  const index = indexExternalEvents(refetched, scratch);

  const discrepancies: Discrepancy[] = [];
  for (const { event, raw } of expected) {
    if (event.identity === undefined) continue;
    const identity = event.identity;
    const actual = index.byIdentity.get(identity);

    let discrepancy: Discrepancy | undefined;
    if (!actual) {
      discrepancy = { identity, fields: [], message: `Event ${identity} is missing from the external system after sync` };
    } else if (!actual.event) {
      discrepancy = {
        identity,
        externalId: actual.raw.id,
        fields: [],
        message: `Event ${identity} cannot be read back from external record ${actual.raw.id} after sync`,
      };
    } else {
      const fields = diffEvents(event, actual.event);
      if (fields.length > 0) {
        discrepancy = {
          identity,
          externalId: actual.raw.id,
          fields,
          message: `Event ${identity} still differs after sync in ${fields.join(", ")}`,
        };
      }
    }

    if (discrepancy) {
      discrepancies.push(discrepancy);
      ctx.conflicts.add(
        "DataDiscrepancy",
        actual ? { origin: "external", fields: actual.raw } : { origin: "database", fields: raw },
        discrepancy.message,
        identity,
      );
    }
  }

  log.info("Verification finished", { checked: expected.length, discrepancies: discrepancies.length });
  return discrepancies;
}

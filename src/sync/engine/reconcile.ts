import type { ExternalEventWriter } from "@/sync/collaborators/types";
import { BaseDataConflictError, NormalizationError, errorMessage } from "@/sync/errors";
import { embedIdentity, extractIdentity } from "@/sync/identity/codec";
import { createChildLogger } from "@/sync/logger";
import {
  normalizeDatabaseEvent,
  normalizeExternalEvent,
  normalizeIdentity,
  normalizeText,
} from "@/sync/normalize/normalizer";
import type {
  CanonicalEvent,
  ConflictCategory,
  EventSnapshot,
  RawDbEvent,
  RawExternalEvent,
  SyncResult,
} from "@/sync/types";
import { diffEvents } from "./compare";
import type { RunContext } from "./context";
import { isWhitelisted, isWhitelistedId } from "./whitelist";

const log = createChildLogger("reconcile");

export interface ExternalEntry {
  /** Read from the marker line, whether or not the rest of the record normalized. */
  identity?: string;
  /** Unset when the record cannot be normalized. */
  event?: CanonicalEvent;
  raw: RawExternalEvent;
}

export interface ExternalIndex {
  /** Every external record in fetch order, duplicates excluded. */
  entries: ExternalEntry[];
  byIdentity: Map<string, ExternalEntry>;
}

/** A database event the external system should mirror once the writes land. */
export interface ExpectedEvent {
  event: CanonicalEvent;
  raw: RawDbEvent;
}

export interface ReconcileOutcome {
  results: SyncResult[];
  expected: ExpectedEvent[];
  mutations: number;
}

const fromDatabase = (fields: RawDbEvent): EventSnapshot => ({ origin: "database", fields });
const fromExternal = (fields: RawExternalEvent): EventSnapshot => ({ origin: "external", fields });

/**
 * Normalize the external snapshot and index it by identity. Records that fail
 * normalization are logged and kept under their marker identity, so nothing
 * is inserted next to them. Records repeating an identity are logged and left out.
 */
export function indexExternalEvents(rawEvents: readonly RawExternalEvent[], ctx: RunContext): ExternalIndex {
  const entries: ExternalEntry[] = [];
  const byIdentity = new Map<string, ExternalEntry>();

  for (const raw of rawEvents) {
    const identity = extractIdentity(normalizeText(raw.description));
    let event: CanonicalEvent | undefined;
    try {
      event = normalizeExternalEvent(raw, ctx);
    } catch (error) {
      if (!(error instanceof NormalizationError)) throw error;
      ctx.conflicts.add(
        "DataDiscrepancy",
        fromExternal(raw),
        `External record ${raw.id} cannot be read: ${error.message}`,
        identity,
      );
    }

    if (identity !== undefined) {
      const first = byIdentity.get(identity);
      if (first) {
        ctx.conflicts.add(
          "DataDiscrepancy",
          fromExternal(raw),
          `External record ${raw.id} repeats event id ${identity} already carried by record ${first.raw.id}`,
          identity,
        );
        continue;
      }
    }

    const entry: ExternalEntry = {
      ...(identity !== undefined ? { identity } : {}),
      ...(event !== undefined ? { event } : {}),
      raw,
    };
    entries.push(entry);
    if (identity !== undefined) byIdentity.set(identity, entry);
  }

  return { entries, byIdentity };
}

/**
 * Walk the database events (authoritative), then the external events (orphan
 * detection). Inserts and updates are the only writes; nothing is deleted.
 */
export async function reconcile(
  dbEvents: readonly RawDbEvent[],
  externalEvents: readonly RawExternalEvent[],
  writer: ExternalEventWriter,
  ctx: RunContext,
): Promise<ReconcileOutcome> {
  const index = indexExternalEvents(externalEvents, ctx);
  const outcome: ReconcileOutcome = { results: [], expected: [], mutations: 0 };
  const knownIdentities = new Set<string>();

  log.info("Reconciling database events", {
    year: ctx.year,
    database: dbEvents.length,
    external: index.entries.length,
    dryRun: ctx.dryRun,
  });

  for (const raw of dbEvents) {
    outcome.results.push(await reconcileDatabaseEvent(raw, index, knownIdentities, writer, ctx, outcome));
  }

  // Runs only after the database pass: every database identity, including
  // events inserted above, must be known before anything is called orphaned.
  for (const { identity, event, raw } of index.entries) {
    if (identity !== undefined) {
      if (!knownIdentities.has(identity)) {
        ctx.conflicts.add(
          "OrphanedEvent",
          fromExternal(raw),
          `External record ${raw.id} carries event id ${identity}, which does not exist in the database`,
          identity,
        );
      }
    } else if (event ? isWhitelisted(event, ctx.whitelist) : isWhitelistedId(raw.id, ctx.whitelist)) {
      log.debug("Unidentified external record is whitelisted", { externalId: raw.id });
    } else {
      ctx.conflicts.add("OutOfSync", fromExternal(raw), `External record ${raw.id} has no event id and is not whitelisted`);
    }
  }

  log.info("Reconciliation finished", {
    mutations: outcome.mutations,
    conflicts: ctx.conflicts.counts(),
  });
  return outcome;
}

async function reconcileDatabaseEvent(
  raw: RawDbEvent,
  index: ExternalIndex,
  knownIdentities: Set<string>,
  writer: ExternalEventWriter,
  ctx: RunContext,
  outcome: ReconcileOutcome,
): Promise<SyncResult> {
  const timestamp = ctx.now().toISOString();
  const skip = (
    identity: string,
    category: ConflictCategory,
    message: string,
    options: { externalId?: string; snapshot?: EventSnapshot } = {},
  ): SyncResult => {
    const { externalId, snapshot = fromDatabase(raw) } = options;
    ctx.conflicts.add(category, snapshot, message, identity || undefined);
    return {
      identity,
      action: "skipped",
      category,
      ...(externalId !== undefined ? { externalId } : {}),
      timestamp,
    };
  };

  let identity: string;
  try {
    identity = normalizeIdentity(raw.event_id);
  } catch (error) {
    if (!(error instanceof NormalizationError)) throw error;
    return skip(raw.event_id ?? "", "DataDiscrepancy", `Database event cannot be identified: ${error.message}`);
  }

  if (knownIdentities.has(identity)) {
    return skip(identity, "DataDiscrepancy", `Event id ${identity} occurs more than once in the database`);
  }
  knownIdentities.add(identity);

  const missing = (["project", "activity"] as const).filter((field) => !raw[field]?.trim());
  if (missing.length > 0) {
    return skip(identity, "MissingCategory", `Event ${identity} has no ${missing.join(" or ")} category`);
  }

  const counterpart = index.byIdentity.get(identity);
  const externalId = counterpart?.raw.id;

  if (counterpart?.raw.invoiced) {
    return skip(identity, "Conflict", `Event ${identity} is invoiced in the external system; database changes are not applied`, {
      externalId,
      snapshot: fromExternal(counterpart.raw),
    });
  }

  const current = counterpart?.event;
  if (counterpart && !current) {
    return skip(
      identity,
      "DataDiscrepancy",
      `Event ${identity} has an unreadable external record ${counterpart.raw.id}; database changes are not applied`,
      { externalId, snapshot: fromExternal(counterpart.raw) },
    );
  }

  let event: CanonicalEvent;
  try {
    event = normalizeDatabaseEvent(raw, ctx);
  } catch (error) {
    if (error instanceof BaseDataConflictError) {
      const blocked = counterpart ? "update" : "insertion";
      return skip(identity, "BaseDataConflict", `Event ${identity}: ${error.message}; ${blocked} blocked`, { externalId });
    }
    if (error instanceof NormalizationError) {
      return skip(identity, "DataDiscrepancy", `Event ${identity} cannot be read: ${error.message}`, { externalId });
    }
    throw error;
  }

  outcome.expected.push({ event, raw });
  const payload: CanonicalEvent = { ...event, description: embedIdentity(event.description, identity) };

  if (current && externalId !== undefined) {
    const changedFields = diffEvents(event, current);
    if (changedFields.length === 0) {
      return { identity, action: "unchanged", externalId, timestamp };
    }

    if (ctx.dryRun) {
      log.info("Would update event", { identity, externalId, changedFields });
      return { identity, action: "updated", planned: true, externalId, changedFields, timestamp };
    }
    try {
      await writer.updateExternalEvent(externalId, { ...payload, externalId });
      outcome.mutations++;
      log.info("Event updated", { identity, externalId, changedFields });
      return { identity, action: "updated", externalId, changedFields, timestamp };
    } catch (error) {
      const message = errorMessage(error);
      log.error("Event update failed", { identity, externalId, error: message });
      return { identity, action: "failed", externalId, changedFields, error: message, timestamp };
    }
  }

  if (ctx.dryRun) {
    log.info("Would insert event", { identity });
    return { identity, action: "created", planned: true, timestamp };
  }
  try {
    const insertedId = await writer.insertExternalEvent(payload);
    outcome.mutations++;
    log.info("Event inserted", { identity, externalId: insertedId });
    return { identity, action: "created", externalId: insertedId, timestamp };
  } catch (error) {
    const message = errorMessage(error);
    log.error("Event insert failed", { identity, error: message });
    return { identity, action: "failed", error: message, timestamp };
  }
}

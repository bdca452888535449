import type { BaseDataResolver } from "@/sync/basedata/resolver";
import type { TimeZones } from "@/sync/engine/context";
import { NormalizationError } from "@/sync/errors";
import { extractIdentity, isValidIdentity } from "@/sync/identity/codec";
import type { CanonicalEvent, RawDbEvent, RawEvent, RawExternalEvent } from "@/sync/types";
import { formatInZone, parseTimestamp, quarterHours } from "./time";

export interface NormalizeContext {
  timeZones: TimeZones;
  resolver: BaseDataResolver;
}

/** CRLF/CR to LF, trailing whitespace per line dropped, outer blank lines trimmed. */
export function normalizeText(value: string | null | undefined): string {
  if (!value) return "";
  return value
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/\s+$/, ""))
    .join("\n")
    .replace(/^\n+|\n+$/g, "");
}

function required(value: string | null | undefined, field: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new NormalizationError(field, `Required field "${field}" is missing`);
  }
  return trimmed;
}

/** Normalize a raw identity to lowercase; throws when it is not a GUID. */
export function normalizeIdentity(value: string | null | undefined): string {
  const identity = required(value, "event_id").toLowerCase();
  if (!isValidIdentity(identity)) {
    throw new NormalizationError("event_id", `"${identity}" is not a valid event id`);
  }
  return identity;
}

interface Period {
  start: string;
  end: string;
  hours: number;
}

function normalizePeriod(
  fields: { start: string | null | undefined; end: string | null | undefined; hours: number | null | undefined },
  names: { start: string; end: string },
  sourceZone: string,
  referenceZone: string,
): Period {
  const startText = required(fields.start, names.start);
  const endText = required(fields.end, names.end);
  const start = parseTimestamp(startText, sourceZone);
  if (start === undefined) {
    throw new NormalizationError(names.start, `Cannot parse ${names.start} "${startText}"`);
  }
  const end = parseTimestamp(endText, sourceZone);
  if (end === undefined) {
    throw new NormalizationError(names.end, `Cannot parse ${names.end} "${endText}"`);
  }
  if (end < start) {
    throw new NormalizationError(names.end, `${names.end} "${endText}" is before ${names.start} "${startText}"`);
  }

  let hours: number;
  if (fields.hours === null || fields.hours === undefined) {
    hours = quarterHours(start, end);
  } else if (!Number.isFinite(fields.hours) || fields.hours < 0) {
    throw new NormalizationError("hours", `Invalid hours value ${fields.hours}`);
  } else {
    hours = fields.hours;
  }

  return {
    start: formatInZone(start, referenceZone),
    end: formatInZone(end, referenceZone),
    hours,
  };
}

/**
 * Database records carry names; the resolver turns them into dropdown ids.
 * Throws NormalizationError or BaseDataConflictError.
 */
export function normalizeDatabaseEvent(raw: RawDbEvent, ctx: NormalizeContext): CanonicalEvent {
  const identity = normalizeIdentity(raw.event_id);
  const period = normalizePeriod(
    { start: raw.start_date, end: raw.end_date, hours: raw.hours },
    { start: "start_date", end: "end_date" },
    ctx.timeZones.database,
    ctx.timeZones.reference,
  );

  const employee = ctx.resolver.resolve("employee", required(raw.user_name, "user_name"));
  const project = ctx.resolver.resolve("project", required(raw.project, "project"));
  const activity = ctx.resolver.resolve("activity", required(raw.activity, "activity"));

  return {
    identity,
    subject: normalizeText(raw.subject),
    description: normalizeText(raw.description),
    ...period,
    employee,
    project,
    activity,
    invoiced: false,
    source: "database",
    ...(raw.last_modified ? { lastModified: raw.last_modified } : {}),
  };
}

/** External records already hold dropdown ids; the identity comes from the description marker. */
export function normalizeExternalEvent(raw: RawExternalEvent, ctx: Pick<NormalizeContext, "timeZones">): CanonicalEvent {
  const externalId = required(raw.id, "id");
  const description = normalizeText(raw.description);
  const period = normalizePeriod(
    { start: raw.start, end: raw.end, hours: raw.hours },
    { start: "start", end: "end" },
    ctx.timeZones.reference,
    ctx.timeZones.reference,
  );
  const identity = extractIdentity(description);

  return {
    ...(identity !== undefined ? { identity } : {}),
    externalId,
    subject: normalizeText(raw.subject),
    description,
    ...period,
    employee: required(raw.employee, "employee"),
    project: required(raw.project, "project"),
    activity: required(raw.activity, "activity"),
    invoiced: raw.invoiced,
    source: "external",
    ...(raw.last_modified ? { lastModified: raw.last_modified } : {}),
  };
}

export function normalize(raw: RawEvent, ctx: NormalizeContext): CanonicalEvent {
  switch (raw.origin) {
    case "database":
      return normalizeDatabaseEvent(raw.record, ctx);
    case "external":
      return normalizeExternalEvent(raw.record, ctx);
  }
}

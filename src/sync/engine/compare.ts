import { stripIdentity } from "@/sync/identity/codec";
import type { CanonicalEvent } from "@/sync/types";

export const COMPARABLE_FIELDS = [
  "subject",
  "start",
  "end",
  "hours",
  "description",
  "employee",
  "project",
  "activity",
] as const;

export type ComparableField = (typeof COMPARABLE_FIELDS)[number];

export type ComparableEvent = Pick<CanonicalEvent, ComparableField>;

/** Business content of an event; the system-injected marker line is not part of it. */
export function comparableView(event: CanonicalEvent): ComparableEvent {
  return {
    subject: event.subject,
    start: event.start,
    end: event.end,
    hours: event.hours,
    description: stripIdentity(event.description),
    employee: event.employee,
    project: event.project,
    activity: event.activity,
  };
}

/** Fields whose values differ; empty when the events are identical. */
export function diffEvents(expected: CanonicalEvent, actual: CanonicalEvent): ComparableField[] {
  const a = comparableView(expected);
  const b = comparableView(actual);
  return COMPARABLE_FIELDS.filter((field) => a[field] !== b[field]);
}

import { calendarDate } from "@/sync/normalize/time";
import type { CanonicalEvent, WhitelistEntry } from "@/sync/types";

export function matchesWhitelistEntry(event: CanonicalEvent, entry: WhitelistEntry): boolean {
  if (entry.externalId !== undefined) {
    return entry.externalId === event.externalId;
  }
  return (
    entry.date === calendarDate(event.start) &&
    entry.employee === event.employee &&
    entry.project === event.project &&
    entry.activity === event.activity &&
    entry.hours === event.hours
  );
}

export function isWhitelisted(event: CanonicalEvent, whitelist: readonly WhitelistEntry[]): boolean {
  return whitelist.some((entry) => matchesWhitelistEntry(event, entry));
}

/** For records whose fields cannot be read, only entries naming the external id apply. */
export function isWhitelistedId(externalId: string, whitelist: readonly WhitelistEntry[]): boolean {
  return whitelist.some((entry) => entry.externalId === externalId);
}

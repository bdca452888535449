// Time-zone arithmetic on top of Intl, so that timestamps from both sources
// render identically in the reference zone.

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function wallClockIn(instant: number, timeZone: string): WallClock {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(instant))) {
    if (part.type !== "literal") parts[part.type] = Number(part.value);
  }
  return {
    year: parts.year,
    month: parts.month,
    day: parts.day,
    hour: parts.hour,
    minute: parts.minute,
    second: parts.second,
  };
}

function wallClockToUtc(clock: WallClock): number {
  return Date.UTC(clock.year, clock.month - 1, clock.day, clock.hour, clock.minute, clock.second);
}

/** Offset of `timeZone` from UTC at the given instant, in minutes. */
export function zoneOffsetMinutes(instant: number, timeZone: string): number {
  const wholeSeconds = Math.floor(instant / 1000) * 1000;
  return (wallClockToUtc(wallClockIn(wholeSeconds, timeZone)) - wholeSeconds) / 60_000;
}

function wallClockToInstant(clock: WallClock, millis: number, timeZone: string): number {
  const asUtc = wallClockToUtc(clock) + millis;
  const firstGuess = asUtc - zoneOffsetMinutes(asUtc, timeZone) * 60_000;
  const offset = zoneOffsetMinutes(firstGuess, timeZone);
  return asUtc - offset * 60_000;
}

/**
 * Parse an ISO-like timestamp into epoch milliseconds. A timestamp without an
 * offset is a wall-clock time in `assumedZone`. Returns undefined when the
 * text is not a valid timestamp.
 */
export function parseTimestamp(text: string, assumedZone: string): number | undefined {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const [, y, mo, d, h, mi, s, fraction, offset] = match;
  const clock: WallClock = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: Number(h),
    minute: Number(mi),
    second: s ? Number(s) : 0,
  };
  const millis = fraction ? Number(fraction.padEnd(3, "0").slice(0, 3)) : 0;

  // Reject rollovers such as 2024-02-30 or 25:00.
  const probe = new Date(wallClockToUtc(clock));
  if (
    probe.getUTCFullYear() !== clock.year ||
    probe.getUTCMonth() !== clock.month - 1 ||
    probe.getUTCDate() !== clock.day ||
    probe.getUTCHours() !== clock.hour ||
    probe.getUTCMinutes() !== clock.minute
  ) {
    return undefined;
  }

  if (!offset) {
    return wallClockToInstant(clock, millis, assumedZone);
  }
  if (offset.toUpperCase() === "Z") {
    return wallClockToUtc(clock) + millis;
  }
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const offsetMinutes = sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
  return wallClockToUtc(clock) + millis - offsetMinutes * 60_000;
}

const pad = (value: number, width = 2) => String(Math.abs(value)).padStart(width, "0");

/** Render an instant as `YYYY-MM-DDTHH:mm:ss±hh:mm` in the given zone (whole seconds). */
export function formatInZone(instant: number, timeZone: string): string {
  const clock = wallClockIn(instant, timeZone);
  const offset = zoneOffsetMinutes(instant, timeZone);
  const sign = offset < 0 ? "-" : "+";
  return (
    `${pad(clock.year, 4)}-${pad(clock.month)}-${pad(clock.day)}` +
    `T${pad(clock.hour)}:${pad(clock.minute)}:${pad(clock.second)}` +
    `${sign}${pad(Math.trunc(offset / 60))}:${pad(offset % 60)}`
  );
}

/** Calendar date (`YYYY-MM-DD`) of a rendered timestamp. */
export function calendarDate(rendered: string): string {
  return rendered.slice(0, 10);
}

/** Duration in hours, rounded to the nearest quarter hour. */
export function quarterHours(start: number, end: number): number {
  const minutes = (end - start) / 60_000;
  return Math.round((minutes / 60) * 4) / 4;
}

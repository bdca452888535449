import { NormalizationError } from "@/sync/errors";

const IDENTITY_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const MARKER_PATTERN = /^\[event_id: ([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})\]$/;
// Anything that looks like an attempt at a marker, well-formed or not.
const MARKER_PREFIX = /^\[\s*event_id\s*:/i;

export function isValidIdentity(value: string): boolean {
  return IDENTITY_PATTERN.test(value);
}

export function formatMarker(identity: string): string {
  return `[event_id: ${identity}]`;
}

function splitLines(description: string): string[] {
  const lines = description.replace(/\r\n?/g, "\n").split("\n");
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Read the identity from the final non-blank line of a description.
 * A malformed marker is reported the same as a missing one.
 */
export function extractIdentity(description: string): string | undefined {
  const lines = splitLines(description);
  if (lines.length === 0) return undefined;
  const match = MARKER_PATTERN.exec(lines[lines.length - 1].trim());
  return match ? match[1] : undefined;
}

/** Description content without the trailing marker line, if there is one. */
export function stripIdentity(description: string): string {
  const lines = splitLines(description);
  if (lines.length > 0 && MARKER_PREFIX.test(lines[lines.length - 1].trim())) {
    lines.pop();
  }
  return splitLines(lines.join("\n")).join("\n");
}

export function embedIdentity(description: string, identity: string): string {
  if (!isValidIdentity(identity)) {
    throw new NormalizationError("identity", `Cannot embed invalid identity "${identity}"`);
  }
  const content = stripIdentity(description);
  const marker = formatMarker(identity);
  return content === "" ? marker : `${content}\n${marker}`;
}

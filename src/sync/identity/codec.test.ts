import { describe, expect, it } from "vitest";
import { NormalizationError } from "@/sync/errors";
import { E1, E2 } from "@/sync/testing/fixtures";
import { embedIdentity, extractIdentity, formatMarker, isValidIdentity, stripIdentity } from "./codec";

describe("identity codec", () => {
  it("formats the marker line", () => {
    expect(formatMarker(E1)).toBe(`[event_id: ${E1}]`);
  });

  it("accepts only lowercase GUIDs", () => {
    expect(isValidIdentity(E1)).toBe(true);
    expect(isValidIdentity(E1.toUpperCase())).toBe(false);
    expect(isValidIdentity("not-a-guid")).toBe(false);
  });

  describe("extractIdentity", () => {
    it("reads the marker from the last line", () => {
      expect(extractIdentity(`Worked on release\n[event_id: ${E1}]`)).toBe(E1);
    });

    it("ignores trailing blank lines and CRLF endings", () => {
      expect(extractIdentity(`Worked on release\r\n[event_id: ${E1}]\r\n\r\n`)).toBe(E1);
    });

    it("returns undefined when the marker is not on the last line", () => {
      expect(extractIdentity(`[event_id: ${E1}]\nFollow-up notes`)).toBeUndefined();
    });

    it("treats malformed markers as absent", () => {
      expect(extractIdentity("Notes\n[event_id: not-a-guid]")).toBeUndefined();
      expect(extractIdentity(`Notes\n[event_id: ${E1.toUpperCase()}]`)).toBeUndefined();
      expect(extractIdentity(`Notes\n[EVENT_ID: ${E1}]`)).toBeUndefined();
    });

    it("returns undefined for empty text", () => {
      expect(extractIdentity("")).toBeUndefined();
      expect(extractIdentity("\n\n")).toBeUndefined();
    });
  });

  describe("stripIdentity", () => {
    it("removes the marker line", () => {
      expect(stripIdentity(`Worked on release\n[event_id: ${E1}]`)).toBe("Worked on release");
    });

    it("removes malformed marker attempts too", () => {
      expect(stripIdentity("Worked on release\n[event_id: broken]")).toBe("Worked on release");
    });

    it("leaves text without a marker alone", () => {
      expect(stripIdentity("Line one\nLine two")).toBe("Line one\nLine two");
    });

    it("drops blank lines left above the marker", () => {
      expect(stripIdentity(`Worked on release\n\n[event_id: ${E1}]`)).toBe("Worked on release");
    });
  });

  describe("embedIdentity", () => {
    it("appends the marker as the final line", () => {
      expect(embedIdentity("Worked on release", E1)).toBe(`Worked on release\n[event_id: ${E1}]`);
    });

    it("produces only the marker for an empty description", () => {
      expect(embedIdentity("", E1)).toBe(`[event_id: ${E1}]`);
    });

    it("replaces an existing marker instead of stacking a second one", () => {
      expect(embedIdentity(`Worked on release\n[event_id: ${E2}]`, E1)).toBe(`Worked on release\n[event_id: ${E1}]`);
      expect(embedIdentity("Worked on release\n[event_id: broken]", E1)).toBe(`Worked on release\n[event_id: ${E1}]`);
    });

    it("is idempotent", () => {
      const once = embedIdentity("Line one\nLine two", E1);
      expect(embedIdentity(once, E1)).toBe(once);
    });

    it("round-trips through extractIdentity and stripIdentity", () => {
      const embedded = embedIdentity("Planning\nwith the team", E1);
      expect(extractIdentity(embedded)).toBe(E1);
      expect(stripIdentity(embedded)).toBe("Planning\nwith the team");
    });

    it("refuses an invalid identity", () => {
      expect(() => embedIdentity("Notes", "ABC")).toThrow(NormalizationError);
    });
  });
});

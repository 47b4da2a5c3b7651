/**
 * Conference Bot — tests/features/programme/models.test.ts
 * WHAT: Tests for schedule feed validation and flattening.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseSchedule, sessionDay, sessionKey } from "../../../src/features/programme/models.js";
import { loadScheduleFixture } from "../../utils/programmeFixtures.js";

describe("parseSchedule", () => {
  it("drops breaks and sorts sessions across days by start", () => {
    const sessions = parseSchedule(loadScheduleFixture());
    expect(sessions.map((s) => s.code)).toEqual(["CCC333", "AAA111", "BBB222"]);
  });

  it("maps feed fields onto sessions", () => {
    const hello = parseSchedule(loadScheduleFixture()).find((s) => s.code === "AAA111");
    expect(hello).toEqual({
      code: "AAA111",
      slug: "hello-world",
      title: "Hello *World*",
      sessionType: "Talk",
      level: "intermediate",
      track: "Core",
      rooms: ["Forum Hall"],
      start: new Date("2025-07-16T07:30:00Z"),
      startIso: "2025-07-16T09:30:00+02:00",
      durationMinutes: 45,
      speakers: [{ name: "Ada Lovelace", avatarUrl: "https://example.org/ada.png", websiteUrl: null }],
      websiteUrl: "https://example.org/session/hello-world",
      abstract: "Short abstract.",
    });
  });

  it("uses an empty abstract when the feed has none", () => {
    const keynote = parseSchedule(loadScheduleFixture()).find((s) => s.code === "CCC333");
    expect(keynote?.abstract).toBe("");
    expect(keynote?.track).toBeNull();
  });

  it("rejects a feed with a malformed start", () => {
    const raw = {
      days: {
        "2025-07-16": {
          rooms: [],
          events: [{ event_type: "break", title: "Lunch", duration: 60, rooms: [], start: "noon" }],
        },
      },
    };
    expect(() => parseSchedule(raw)).toThrow(ZodError);
  });

  it("rejects a session whose link is not a URL", () => {
    const raw = loadScheduleFixture((text) =>
      text.replace('"https://example.org/session/hello-world"', '"hello-world"')
    );
    expect(() => parseSchedule(raw)).toThrow(ZodError);
  });

  it("drops a speaker link that is not a URL", () => {
    const raw = loadScheduleFixture((text) =>
      text.replace('"https://example.org/speaker/grace"', '"grace dot org"')
    );
    const typed = parseSchedule(raw).find((s) => s.code === "BBB222");
    expect(typed?.speakers).toEqual([{ name: "Grace Hopper", avatarUrl: null, websiteUrl: null }]);
  });

  it("rejects a feed without days", () => {
    expect(() => parseSchedule({ rooms: [] })).toThrow(ZodError);
  });
});

describe("session identity", () => {
  it("combines code and published start", () => {
    expect(sessionKey({ code: "AAA111", startIso: "2025-07-16T09:30:00+02:00" })).toBe(
      "AAA111@2025-07-16T09:30:00+02:00"
    );
  });

  it("reads the venue-local day off the published start", () => {
    // 00:30 local is still the previous day in UTC
    expect(sessionDay({ startIso: "2025-07-17T00:30:00+02:00" })).toBe("2025-07-17");
  });
});

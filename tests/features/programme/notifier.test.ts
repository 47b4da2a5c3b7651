/**
 * Conference Bot — tests/features/programme/notifier.test.ts
 * WHAT: Tests for due-session selection and the notification tick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  NotificationState,
  SessionNotifier,
  selectSessionsToNotify,
  type NotificationChannels,
} from "../../../src/features/programme/notifier.js";
import { LivestreamLinks } from "../../../src/features/programme/livestreams.js";
import type { Clock } from "../../../src/lib/clock.js";
import { logger } from "../../../src/lib/logger.js";
import { makeSession } from "../../utils/programmeFixtures.js";

// 09:30 local == 07:30Z
const hello = makeSession();
const minutesBefore = (minutes: number) => new Date(hello.start.getTime() - minutes * 60_000);

describe("selectSessionsToNotify", () => {
  it("selects a session from lead time until its start", () => {
    const state = new NotificationState();
    expect(selectSessionsToNotify([hello], minutesBefore(5), 5, state)).toEqual([hello]);
    expect(selectSessionsToNotify([hello], minutesBefore(1), 5, state)).toEqual([hello]);
  });

  it("ignores a session too far ahead", () => {
    expect(selectSessionsToNotify([hello], minutesBefore(6), 5, new NotificationState())).toEqual([]);
  });

  it("never selects a session that has started", () => {
    const state = new NotificationState();
    expect(selectSessionsToNotify([hello], hello.start, 5, state)).toEqual([]);
    expect(selectSessionsToNotify([hello], minutesBefore(-10), 5, state)).toEqual([]);
  });

  it("skips sessions held in several rooms", () => {
    const keynote = makeSession({ code: "CCC333", rooms: ["Forum Hall", "South Hall 2A"] });
    expect(selectSessionsToNotify([keynote], minutesBefore(2), 5, new NotificationState())).toEqual([]);
  });

  it("skips sessions already notified", () => {
    const state = new NotificationState();
    state.mark(hello);
    expect(selectSessionsToNotify([hello], minutesBefore(2), 5, state)).toEqual([]);
  });

  it("treats a rescheduled session as new", () => {
    const state = new NotificationState();
    state.mark(hello);
    const moved = makeSession({ startIso: "2025-07-16T09:35:00+02:00" });
    const twoBeforeMoved = new Date(moved.start.getTime() - 2 * 60_000);
    expect(selectSessionsToNotify([moved], twoBeforeMoved, 5, state)).toEqual([moved]);
  });
});

describe("NotificationState", () => {
  it("tracks and resets notified sessions", () => {
    const state = new NotificationState();
    state.mark(hello);
    state.mark(hello);
    expect(state.size).toBe(1);
    state.reset();
    expect(state.has(hello)).toBe(false);
  });
});

describe("SessionNotifier.tick", () => {
  let now: Date;
  let channels: NotificationChannels & {
    postToMain: ReturnType<typeof vi.fn>;
    postToRoom: ReturnType<typeof vi.fn>;
  };
  let state: NotificationState;
  let sessions: ReturnType<typeof makeSession>[];

  const clock: Clock = { now: () => now };

  function createNotifier() {
    return new SessionNotifier({
      clock,
      leadMinutes: 5,
      state,
      sessions: () => sessions,
      livestreams: new LivestreamLinks("/nonexistent/livestreams.json"),
      channels,
    });
  }

  beforeEach(() => {
    now = minutesBefore(3);
    state = new NotificationState();
    sessions = [hello];
    channels = {
      postToMain: vi.fn().mockResolvedValue(undefined),
      postToRoom: vi.fn().mockResolvedValue(true),
    };
  });

  it("posts a heading, the embed in main and the embed in the room channel", async () => {
    const due = await createNotifier().tick();

    expect(due).toEqual([hello]);
    expect(channels.postToMain).toHaveBeenNthCalledWith(1, { content: "# Sessions starting in 5 minutes:" });
    const embedPost = channels.postToMain.mock.calls[1]?.[0];
    expect(embedPost.embeds[0].toJSON().title).toBe("Hello World");
    expect(channels.postToRoom).toHaveBeenCalledWith("Forum Hall", {
      content: "# Starting in 5 minutes @ Forum Hall",
      embeds: [embedPost.embeds[0]],
    });
  });

  it("notifies each session once", async () => {
    const notifier = createNotifier();
    await notifier.tick();
    now = minutesBefore(1);

    await expect(notifier.tick()).resolves.toEqual([]);
    expect(channels.postToMain).toHaveBeenCalledTimes(2);
  });

  it("posts nothing when no session is due", async () => {
    now = minutesBefore(30);
    await expect(createNotifier().tick()).resolves.toEqual([]);
    expect(channels.postToMain).not.toHaveBeenCalled();
  });

  it("sends one heading for several sessions due together", async () => {
    const other = makeSession({ code: "DDD444", rooms: ["South Hall 2A"] });
    sessions = [hello, other];

    await createNotifier().tick();

    // heading + one embed per session
    expect(channels.postToMain).toHaveBeenCalledTimes(3);
    expect(channels.postToRoom.mock.calls.map((c) => c[0])).toEqual(["Forum Hall", "South Hall 2A"]);
  });

  it("warns when the room has no channel", async () => {
    channels.postToRoom.mockResolvedValue(false);
    await createNotifier().tick();
    expect(logger.warn).toHaveBeenCalledWith(
      { room: "Forum Hall", session: "AAA111@2025-07-16T09:30:00+02:00" },
      "[notifier] no channel for room"
    );
  });

  it("does not retry a session whose post failed", async () => {
    channels.postToMain.mockResolvedValueOnce(undefined).mockRejectedValueOnce(new Error("Missing Access"));
    const notifier = createNotifier();

    await expect(notifier.tick()).resolves.toEqual([hello]);
    expect(logger.error).toHaveBeenCalledOnce();
    expect(state.has(hello)).toBe(true);
    await expect(notifier.tick()).resolves.toEqual([]);
  });
  it("still posts the sessions when the heading fails", async () => {
    channels.postToMain.mockRejectedValueOnce(new Error("Service Unavailable"));

    await expect(createNotifier().tick()).resolves.toEqual([hello]);

    expect(channels.postToMain).toHaveBeenCalledTimes(2);
    expect(channels.postToRoom.mock.calls.map((c) => c[0])).toEqual(["Forum Hall"]);
    expect(logger.error).toHaveBeenCalledWith(
      { err: new Error("Service Unavailable"), sessions: ["AAA111@2025-07-16T09:30:00+02:00"] },
      "[notifier] failed to post heading"
    );
  });

  it("posts to the room even when the main channel embed fails", async () => {
    channels.postToMain.mockResolvedValueOnce(undefined).mockRejectedValueOnce(new Error("Missing Access"));

    await createNotifier().tick();

    expect(channels.postToRoom).toHaveBeenCalledOnce();
  });
});

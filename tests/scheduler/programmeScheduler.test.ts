/**
 * Conference Bot — tests/scheduler/programmeScheduler.test.ts
 * WHAT: Tests for the schedule/livestream refresh loop and the notifier tick loop.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  runNotifierTick,
  runScheduleRefresh,
  startProgrammeScheduler,
  stopProgrammeScheduler,
  type ProgrammeSchedulerDeps,
} from "../../src/scheduler/programmeScheduler.js";
import { _clearAllSchedulerHealth, getSchedulerHealth } from "../../src/lib/schedulerHealth.js";
import type { ScheduleCache } from "../../src/features/programme/scheduleCache.js";
import type { LivestreamLinks } from "../../src/features/programme/livestreams.js";
import type { SessionNotifier } from "../../src/features/programme/notifier.js";

function createDeps() {
  const refresh = vi.fn().mockResolvedValue("refreshed");
  const reload = vi.fn().mockResolvedValue(false);
  const tick = vi.fn().mockResolvedValue([]);
  const upsertLivestreamPin = vi.fn().mockResolvedValue("created");
  const deps: ProgrammeSchedulerDeps = {
    schedule: { refresh } as unknown as ScheduleCache,
    livestreams: {
      reload,
      roomLinks: (room: string) =>
        room === "Forum Hall" ? { "2025-07-16": "https://youtube.test/forum-day1" } : undefined,
    } as unknown as LivestreamLinks,
    notifier: { tick } as unknown as SessionNotifier,
    pins: { upsertLivestreamPin, removeLivestreamPin: vi.fn().mockResolvedValue("unchanged") },
    rooms: ["Forum Hall", "South Hall 2A"],
    tickMs: 60_000,
  };
  return { deps, refresh, reload, tick, upsertLivestreamPin };
}

describe("programmeScheduler", () => {
  beforeEach(() => {
    _clearAllSchedulerHealth();
  });

  afterEach(() => {
    stopProgrammeScheduler();
  });

  describe("runScheduleRefresh", () => {
    it("records the refresh and leaves pins alone when links are unchanged", async () => {
      const { deps, upsertLivestreamPin } = createDeps();

      await runScheduleRefresh(deps);

      expect(getSchedulerHealth().get("scheduleRefresh")?.consecutiveFailures).toBe(0);
      expect(upsertLivestreamPin).not.toHaveBeenCalled();
    });

    it("updates pins when the livestream file changed", async () => {
      const { deps, reload, upsertLivestreamPin } = createDeps();
      reload.mockResolvedValue(true);

      await runScheduleRefresh(deps);

      expect(upsertLivestreamPin).toHaveBeenCalledOnce();
      expect(upsertLivestreamPin).toHaveBeenCalledWith(
        "Forum Hall",
        "**Livestream** for Forum Hall\n* 2025-07-16: [YouTube](https://youtube.test/forum-day1)"
      );
    });

    it("counts a fallback as a failed refresh", async () => {
      const { deps, refresh } = createDeps();
      refresh.mockResolvedValue("fallback");

      await runScheduleRefresh(deps);

      expect(getSchedulerHealth().get("scheduleRefresh")?.consecutiveFailures).toBe(1);
    });

    it("still reloads livestreams when the schedule refresh throws", async () => {
      const { deps, refresh, reload } = createDeps();
      refresh.mockRejectedValue(new Error("no schedule"));

      await expect(runScheduleRefresh(deps)).resolves.toBeUndefined();
      expect(reload).toHaveBeenCalledOnce();
      expect(getSchedulerHealth().get("scheduleRefresh")?.totalFailures).toBe(1);
    });
  });

  describe("runNotifierTick", () => {
    it("records a failed tick without rejecting", async () => {
      const { deps, tick } = createDeps();
      tick.mockRejectedValue(new Error("boom"));

      await expect(runNotifierTick(deps.notifier)).resolves.toBeUndefined();
      expect(getSchedulerHealth().get("sessionNotifier")?.consecutiveFailures).toBe(1);
    });

    it("skips a tick while the previous one is still running", async () => {
      const { deps, tick } = createDeps();
      let finish: () => void = () => {};
      tick.mockReturnValueOnce(new Promise<never[]>((resolve) => (finish = () => resolve([]))));

      const first = runNotifierTick(deps.notifier);
      await runNotifierTick(deps.notifier);
      finish();
      await first;

      expect(tick).toHaveBeenCalledTimes(1);
      expect(getSchedulerHealth().get("sessionNotifier")?.totalRuns).toBe(1);
    });
  });

  describe("startProgrammeScheduler", () => {
    it("does nothing while disabled", async () => {
      const { deps, refresh, tick } = createDeps();
      await startProgrammeScheduler(deps);
      expect(refresh).not.toHaveBeenCalled();
      expect(tick).not.toHaveBeenCalled();
    });

    it("runs both loops immediately and then on their intervals", async () => {
      vi.stubEnv("PROGRAMME_SCHEDULER_DISABLED", "0");
      vi.useFakeTimers();
      const { deps, refresh, tick } = createDeps();

      await startProgrammeScheduler(deps);
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(tick).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(60_000);
      expect(tick).toHaveBeenCalledTimes(2);
      expect(refresh).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(4 * 60_000);
      expect(tick).toHaveBeenCalledTimes(6);
      expect(refresh).toHaveBeenCalledTimes(2);

      stopProgrammeScheduler();
      await vi.advanceTimersByTimeAsync(10 * 60_000);
      expect(tick).toHaveBeenCalledTimes(6);
    });
  });
});

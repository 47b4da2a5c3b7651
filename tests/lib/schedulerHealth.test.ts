/**
 * Conference Bot — tests/lib/schedulerHealth.test.ts
 * WHAT: Tests for scheduler run bookkeeping.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: mockLogger,
}));

import { recordSchedulerRun, getSchedulerHealth, _clearAllSchedulerHealth } from "../../src/lib/schedulerHealth.js";

describe("schedulerHealth", () => {
  beforeEach(() => {
    _clearAllSchedulerHealth();
  });

  it("creates an entry on the first run", () => {
    recordSchedulerRun("ticketRefresh", true, 1000);
    expect(getSchedulerHealth().get("ticketRefresh")).toEqual({
      name: "ticketRefresh",
      lastRunAt: 1000,
      lastSuccessAt: 1000,
      lastErrorAt: null,
      consecutiveFailures: 0,
      totalRuns: 1,
      totalFailures: 0,
    });
  });

  it("resets consecutive failures on success", () => {
    recordSchedulerRun("sessionNotifier", false, 1);
    recordSchedulerRun("sessionNotifier", false, 2);
    recordSchedulerRun("sessionNotifier", true, 3);

    const health = getSchedulerHealth().get("sessionNotifier");
    expect(health?.consecutiveFailures).toBe(0);
    expect(health?.totalFailures).toBe(2);
    expect(health?.lastErrorAt).toBe(2);
  });

  it("logs an error from the third consecutive failure on", () => {
    recordSchedulerRun("scheduleRefresh", false);
    recordSchedulerRun("scheduleRefresh", false);
    expect(mockLogger.error).not.toHaveBeenCalled();

    recordSchedulerRun("scheduleRefresh", false);
    expect(mockLogger.error).toHaveBeenCalledWith(
      { scheduler: "scheduleRefresh", consecutiveFailures: 3, totalFailures: 3 },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  });

  it("returns a snapshot that does not leak mutations", () => {
    recordSchedulerRun("ticketRefresh", true, 5);
    const snapshot = getSchedulerHealth();
    const entry = snapshot.get("ticketRefresh");
    if (entry) entry.totalRuns = 99;
    expect(getSchedulerHealth().get("ticketRefresh")?.totalRuns).toBe(1);
  });
});

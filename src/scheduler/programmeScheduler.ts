/**
 * Conference Bot — src/scheduler/programmeScheduler.ts
 * WHAT: Two loops for programme notifications: schedule/livestream refresh and the notifier tick.
 * FLOWS:
 *  - every 5 min → ScheduleCache.refresh() → LivestreamLinks.reload() → changed? update pins
 *  - every tick (60 s, 2 s in fast simulated mode) → SessionNotifier.tick()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { SCHEDULE_REFRESH_INTERVAL_MS } from "../lib/constants.js";
import type { ScheduleCache } from "../features/programme/scheduleCache.js";
import type { SessionNotifier } from "../features/programme/notifier.js";
import {
  updateLivestreamPins,
  type LivestreamLinks,
  type LivestreamPinTarget,
} from "../features/programme/livestreams.js";

export interface ProgrammeSchedulerDeps {
  schedule: ScheduleCache;
  livestreams: LivestreamLinks;
  notifier: SessionNotifier;
  pins: LivestreamPinTarget;
  rooms: readonly string[];
  tickMs: number;
}

let _refreshInterval: NodeJS.Timeout | null = null;
let _tickInterval: NodeJS.Timeout | null = null;
let _tickInFlight = false;

export async function runScheduleRefresh(deps: Pick<ProgrammeSchedulerDeps, "schedule" | "livestreams" | "pins" | "rooms">): Promise<void> {
  try {
    const outcome = await deps.schedule.refresh();
    recordSchedulerRun("scheduleRefresh", outcome === "refreshed");
  } catch (err) {
    recordSchedulerRun("scheduleRefresh", false);
    logger.error({ err }, "[schedule] refresh failed with no cached schedule");
  }

  try {
    if (await deps.livestreams.reload()) {
      await updateLivestreamPins(deps.livestreams, deps.rooms, deps.pins);
    }
  } catch (err) {
    logger.error({ err }, "[livestreams] refresh failed");
  }
}

/** Skips the tick while the previous one is still posting. */
export async function runNotifierTick(notifier: SessionNotifier): Promise<void> {
  if (_tickInFlight) return;
  _tickInFlight = true;
  try {
    await notifier.tick();
    recordSchedulerRun("sessionNotifier", true);
  } catch (err) {
    recordSchedulerRun("sessionNotifier", false);
    logger.error({ err }, "[notifier] tick failed");
  } finally {
    _tickInFlight = false;
  }
}

export async function startProgrammeScheduler(deps: ProgrammeSchedulerDeps): Promise<void> {
  // Opt-out for tests
  if (process.env.PROGRAMME_SCHEDULER_DISABLED === "1") {
    logger.debug("[programme] scheduler disabled via env flag");
    return;
  }
  if (_refreshInterval || _tickInterval) return;

  logger.info(
    { refreshMinutes: SCHEDULE_REFRESH_INTERVAL_MS / 60000, tickMs: deps.tickMs },
    "[programme] scheduler starting"
  );

  await runScheduleRefresh(deps);
  await runNotifierTick(deps.notifier);

  _refreshInterval = setInterval(() => {
    void runScheduleRefresh(deps);
  }, SCHEDULE_REFRESH_INTERVAL_MS);
  _refreshInterval.unref();

  _tickInterval = setInterval(() => {
    void runNotifierTick(deps.notifier);
  }, deps.tickMs);
  _tickInterval.unref();
}

export function stopProgrammeScheduler(): void {
  if (_refreshInterval) {
    clearInterval(_refreshInterval);
    _refreshInterval = null;
  }
  if (_tickInterval) {
    clearInterval(_tickInterval);
    _tickInterval = null;
  }
  logger.info("[programme] scheduler stopped");
}

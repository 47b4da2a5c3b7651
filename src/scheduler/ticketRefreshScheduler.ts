/**
 * Conference Bot — src/scheduler/ticketRefreshScheduler.ts
 * WHAT: Periodic full refresh of the ticket cache.
 * WHY: Tickets bought during the conference should register without a live lookup.
 * FLOWS:
 *  - Every 5 minutes → TicketCache.refresh() → recordSchedulerRun("ticketRefresh")
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { TICKET_REFRESH_INTERVAL_MS } from "../lib/constants.js";
import type { TicketCache } from "../features/registration/ticketCache.js";

const SCHEDULER_NAME = "ticketRefresh";

let _activeInterval: NodeJS.Timeout | null = null;

export async function runTicketRefresh(cache: TicketCache): Promise<void> {
  try {
    const outcome = await cache.refresh();
    // kept/fallback mean the live fetch failed even though lookups still work
    recordSchedulerRun(SCHEDULER_NAME, outcome === "refreshed" || outcome === "skipped");
    logger.debug({ outcome, tickets: cache.size }, "[tickets] scheduled refresh finished");
  } catch (err) {
    recordSchedulerRun(SCHEDULER_NAME, false);
    logger.error({ err }, "[tickets] scheduled refresh failed");
  }
}

/**
 * The initial refresh happens in the ready handler, which awaits it before
 * posting the registration form; this only schedules the repeats.
 */
export function startTicketRefreshScheduler(cache: TicketCache): void {
  // Opt-out for tests
  if (process.env.TICKET_REFRESH_DISABLED === "1") {
    logger.debug("[tickets] refresh scheduler disabled via env flag");
    return;
  }
  if (_activeInterval) return;

  logger.info({ intervalMinutes: TICKET_REFRESH_INTERVAL_MS / 60000 }, "[tickets] refresh scheduler starting");

  const interval = setInterval(() => {
    void runTicketRefresh(cache);
  }, TICKET_REFRESH_INTERVAL_MS);
  interval.unref();
  _activeInterval = interval;
}

export function stopTicketRefreshScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[tickets] refresh scheduler stopped");
  }
}

/**
 * Conference Bot — src/lib/schedulerHealth.ts
 * WHAT: Run/failure bookkeeping for the background loops (ticket refresh,
 *       schedule refresh, session notifier).
 * WHY: /health shows organizers whether a loop has been failing silently
 *      since the morning.
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update state → error log after 3 straight failures
 *  - getSchedulerHealth() → snapshot for /health
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  name: string;
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Failures since the last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

export function recordSchedulerRun(name: string, success: boolean, now: number = Date.now()): void {
  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

/**
 * Copy of every tracked scheduler's state; callers may not mutate the registry.
 */
export function getSchedulerHealth(): Map<string, SchedulerHealth> {
  const snapshot = new Map<string, SchedulerHealth>();
  for (const [name, health] of schedulerHealth) {
    snapshot.set(name, { ...health });
  }
  return snapshot;
}

// Test helper
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}

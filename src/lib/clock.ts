/**
 * Conference Bot — src/lib/clock.ts
 * WHAT: Wall clock and simulated clock behind one interface.
 * WHY: Programme notifications are rehearsed days before the event by
 *      pretending it is already the first conference morning.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * A clock that reads `simulatedStart` at the moment it is created and then
 * advances `multiplier` times faster than real time.
 *
 * `realNow` is injectable so tests can drive it without fake timers.
 */
export function createSimulatedClock(
  simulatedStart: Date,
  multiplier = 1,
  realNow: () => number = Date.now
): Clock {
  const realStart = realNow();
  const simulatedStartMs = simulatedStart.getTime();
  return {
    now: () => new Date(simulatedStartMs + (realNow() - realStart) * multiplier),
  };
}

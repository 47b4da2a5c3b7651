/**
 * Conference Bot — tests/utils/contextFactory.ts
 * WHAT: Factory for CommandContext objects in tests.
 * WHY: Commands receive a structured context; tests need to provide the same shape.
 * USAGE:
 *  const ctx = createTestCommandContext(mockInteraction);
 *  await execute(ctx, deps);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction } from "discord.js";
import type { CommandContext, InstrumentedInteraction } from "../../src/lib/cmdWrap.js";

/**
 * Fixed trace id so assertions on error replies stay deterministic.
 * Pass `phases` to record every step() call.
 */
export function createTestCommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction>(
  interaction: I,
  options: { traceId?: string; phases?: string[] } = {}
): CommandContext<I> {
  const traceId = options.traceId ?? "test-trace-123";
  let currentPhase = "enter";

  return {
    interaction,
    step: (phase: string) => {
      currentPhase = phase;
      options.phases?.push(phase);
    },
    currentPhase: () => currentPhase,
    traceId,
  };
}

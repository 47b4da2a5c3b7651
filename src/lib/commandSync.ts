/**
 * Conference Bot — src/lib/commandSync.ts
 * WHAT: Bulk overwrite of guild slash commands.
 * WHY: Guild commands update instantly; global ones can take an hour.
 *      Used by the ready handler and by scripts/deploy-commands.ts.
 * DOCS:
 *  - Bulk overwrite guild commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { REST, Routes, type RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { logger } from "./logger.js";
import { classifyError } from "./errors.js";
import { DISCORD_COMMAND_SYNC_DELAY_MS } from "./constants.js";

export type SyncResult = {
  guildId: string;
  ok: boolean;
  count?: number;
  error?: string;
};

/** The slice of REST used here; tests pass a fake. */
export type CommandRest = Pick<REST, "put">;

export function createRest(token: string): REST {
  return new REST({ version: "10" }).setToken(token);
}

export async function syncGuildCommands(
  rest: CommandRest,
  appId: string,
  guildIds: readonly string[],
  commands: readonly RESTPostAPIChatInputApplicationCommandsJSONBody[],
  delayMs: number = DISCORD_COMMAND_SYNC_DELAY_MS
): Promise<SyncResult[]> {
  const results: SyncResult[] = [];

  for (const [index, guildId] of guildIds.entries()) {
    try {
      await rest.put(Routes.applicationGuildCommands(appId, guildId), { body: commands });
      results.push({ guildId, ok: true, count: commands.length });
      logger.info({ guildId, count: commands.length }, "[commands] synced");
    } catch (err) {
      const classified = classifyError(err);
      results.push({ guildId, ok: false, error: classified.message });
      logger.warn({ guildId, err, errorKind: classified.kind }, "[commands] sync failed");
    }

    if (index < guildIds.length - 1) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  return results;
}

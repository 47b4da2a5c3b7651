/**
 * Conference Bot — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite guild commands and verify they are live.
 * WHY: Faster iteration on guild-scoped commands than waiting for the bot's ready sync.
 * FLOWS: build commands → guild ids (GUILD_ID or every guild) → REST PUT per guild → verify names
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Node ESM: https://nodejs.org/api/esm.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Side effect: fills process.env before anything reads it
import "dotenv/config";
import { Client, GatewayIntentBits, Routes, type REST } from "discord.js";
import { z } from "zod";
import { buildCommands } from "../src/commands/buildCommands.js";
import { createRest, syncGuildCommands } from "../src/lib/commandSync.js";

const liveCommandsSchema = z.array(z.object({ name: z.string() }).passthrough());

/** Names expected but missing from the guild's live command list. */
export async function missingCommands(
  rest: Pick<REST, "get">,
  appId: string,
  guildId: string,
  expected: readonly string[]
): Promise<string[]> {
  const live = liveCommandsSchema.parse(await rest.get(Routes.applicationGuildCommands(appId, guildId)));
  const names = new Set(live.map((cmd) => cmd.name));
  return expected.filter((name) => !names.has(name));
}

async function listGuildIds(token: string): Promise<string[]> {
  // Only the gateway can enumerate the bot's guilds
  const client = new Client({ intents: [GatewayIntentBits.Guilds] });
  await client.login(token);
  const guilds = await client.guilds.fetch();
  await client.destroy();
  return Array.from(guilds.keys());
}

async function main(): Promise<void> {
  const appId = process.env.CLIENT_ID;
  const token = process.env.DISCORD_TOKEN;
  if (!appId || !token) {
    console.error("Missing credentials:");
    console.error("  CLIENT_ID:", appId ? "SET" : "NOT SET");
    console.error("  DISCORD_TOKEN:", token ? "SET" : "NOT SET");
    process.exit(1);
  }

  const rest = createRest(token);
  const commands = buildCommands();
  const guildIds = process.env.GUILD_ID ? [process.env.GUILD_ID] : await listGuildIds(token);
  console.log(`[sync] syncing ${commands.length} commands to ${guildIds.length} guild(s)`);

  const results = await syncGuildCommands(rest, appId, guildIds, commands);
  let failed = 0;
  for (const result of results) {
    if (!result.ok) {
      failed++;
      console.error(JSON.stringify(result));
      continue;
    }
    const missing = await missingCommands(rest, appId, result.guildId, commands.map((c) => c.name));
    if (missing.length > 0) {
      failed++;
      console.error(JSON.stringify({ guildId: result.guildId, ok: false, missing }));
    } else {
      console.log(JSON.stringify(result));
    }
  }

  console.log(`[sync] summary: total=${guildIds.length}, synced=${guildIds.length - failed}, failed=${failed}`);
  if (failed > 0) process.exit(1);
}

// Only when run directly, not when imported
if (process.argv[1] && import.meta.url === `file://${process.argv[1].replace(/\\/g, "/")}`) {
  main().catch((err) => {
    console.error("[sync] failed:", err);
    process.exit(1);
  });
}

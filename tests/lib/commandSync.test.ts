/**
 * Conference Bot — tests/lib/commandSync.test.ts
 * WHAT: Tests for guild command bulk overwrite and the deploy script's verification.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { syncGuildCommands, type CommandRest } from "../../src/lib/commandSync.js";
import { buildCommands } from "../../src/commands/buildCommands.js";
import { missingCommands } from "../../scripts/deploy-commands.js";
import { createDiscordAPIError } from "../utils/discordMocks.js";

describe("buildCommands", () => {
  it("contains the slash commands only", () => {
    expect(buildCommands().map((c) => c.name)).toEqual(["health", "participants"]);
  });
});

describe("syncGuildCommands", () => {
  it("overwrites commands in every guild", async () => {
    const put = vi.fn().mockResolvedValue([]);
    const rest: CommandRest = { put };
    const commands = buildCommands();

    const results = await syncGuildCommands(rest, "app-1", ["g1", "g2"], commands, 0);

    expect(results).toEqual([
      { guildId: "g1", ok: true, count: 2 },
      { guildId: "g2", ok: true, count: 2 },
    ]);
    expect(put).toHaveBeenNthCalledWith(1, "/applications/app-1/guilds/g1/commands", { body: commands });
  });

  it("reports a failing guild and carries on", async () => {
    const put = vi
      .fn()
      .mockRejectedValueOnce(createDiscordAPIError(50001, "Missing Access", 403))
      .mockResolvedValueOnce([]);

    const results = await syncGuildCommands({ put }, "app-1", ["g1", "g2"], buildCommands(), 0);

    expect(results).toEqual([
      { guildId: "g1", ok: false, error: "Missing Access" },
      { guildId: "g2", ok: true, count: 2 },
    ]);
  });
});

describe("missingCommands", () => {
  it("lists expected commands absent from the live list", async () => {
    const get = vi.fn().mockResolvedValue([{ id: "1", name: "health" }]);

    await expect(missingCommands({ get }, "app-1", "g1", ["health", "participants"])).resolves.toEqual([
      "participants",
    ]);
    expect(get).toHaveBeenCalledWith("/applications/app-1/guilds/g1/commands");
  });
});

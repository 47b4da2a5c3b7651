/**
 * Conference Bot — src/commands/participants.ts
 * WHAT: /participants, member count per role for organizers.
 * FLOWS: organizer role check → fetch members → count → ephemeral report
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit, ensureDeferred, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import {
  collectRoleCounts,
  formatParticipantReport,
  guildMemberDirectory,
  type MemberDirectory,
} from "../features/guildStatistics.js";

export const data = new SlashCommandBuilder()
  .setName("participants")
  .setDescription("Member count per role (organizers only).");

export interface ParticipantsDeps {
  requiredRole: string;
  /** Defaults to the interaction's guild */
  directory?: MemberDirectory;
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>, deps: ParticipantsDeps) {
  const { interaction } = ctx;
  const guild = interaction.guild;
  if (!guild) {
    await replyOrEdit(interaction, { content: "This command only works inside the conference server." });
    return;
  }

  const allowed = await withStep(ctx, "check_role", async () => {
    const member = await guild.members.fetch(interaction.user.id);
    return member.roles.cache.some((role) => role.name === deps.requiredRole);
  });
  if (!allowed) {
    logger.info(
      { userId: interaction.user.id, requiredRole: deps.requiredRole, traceId: ctx.traceId },
      "[participants] refused, missing role"
    );
    await replyOrEdit(interaction, { content: `Only members with the ${deps.requiredRole} role can use this command.` });
    return;
  }

  await withStep(ctx, "defer", () => ensureDeferred(interaction));
  const counts = await withStep(ctx, "count", () => collectRoleCounts(deps.directory ?? guildMemberDirectory(guild)));
  await withStep(ctx, "reply", () =>
    replyOrEdit(interaction, {
      content: formatParticipantReport(interaction.user.id, counts),
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    })
  );
}

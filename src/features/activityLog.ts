/**
 * Conference Bot — src/features/activityLog.ts
 * WHAT: Posts member joins/leaves, voice channel joins/leaves and slash command
 *       usage as embeds to a configured activity channel.
 * WHY: Organizers see server activity during the event without the audit log.
 * FLOWS:
 *  - client event → summarise → *Embed() → ActivityLog.post() → #activity channel
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  Colors,
  EmbedBuilder,
  TimestampStyles,
  time,
  type ChatInputCommandInteraction,
  type Guild,
  type GuildMember,
  type PartialGuildMember,
  type VoiceState,
} from "discord.js";
import { logger } from "../lib/logger.js";
import { findTextChannel } from "../lib/channels.js";
import { MAX_EMBED_FIELD_VALUE } from "../lib/constants.js";

export interface MemberSummary {
  id: string;
  username: string;
  avatarUrl: string;
  accountCreatedAt: Date;
  joinedAt: Date | null;
}

/** Voice channel ids before and after the change; null means not connected. */
export interface VoiceChange {
  userId: string;
  before: string | null;
  after: string | null;
}

export interface CommandUsage {
  userId: string;
  commandName: string;
  channelId: string | null;
  inGuild: boolean;
  /** "name=value" pairs, space separated; empty when the command took none */
  args: string;
}

export function summariseMember(member: GuildMember | PartialGuildMember): MemberSummary {
  return {
    id: member.id,
    username: member.user.username,
    avatarUrl: member.displayAvatarURL(),
    accountCreatedAt: member.user.createdAt,
    joinedAt: member.joinedAt,
  };
}

export function summariseVoiceChange(oldState: VoiceState, newState: VoiceState): VoiceChange {
  return { userId: newState.id, before: oldState.channelId, after: newState.channelId };
}

export function summariseCommand(interaction: ChatInputCommandInteraction): CommandUsage {
  return {
    userId: interaction.user.id,
    commandName: interaction.commandName,
    channelId: interaction.channelId,
    inGuild: interaction.inGuild(),
    args: interaction.options.data.map((opt) => `${opt.name}=${String(opt.value ?? "")}`).join(" "),
  };
}

export function memberJoinedEmbed(member: MemberSummary, now: Date): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("Member Joined")
    .setDescription(`<@${member.id}> (${member.username})`)
    .setColor(Colors.Green)
    .setTimestamp(now)
    .addFields({ name: "Account Created", value: time(member.accountCreatedAt, TimestampStyles.RelativeTime) })
    .setThumbnail(member.avatarUrl)
    .setFooter({ text: `ID: ${member.id}` });
}

export function memberLeftEmbed(member: MemberSummary, now: Date): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("Member Left")
    .setDescription(member.username)
    .setColor(Colors.Red)
    .setTimestamp(now)
    .addFields({
      name: "Joined Server",
      value: member.joinedAt ? time(member.joinedAt, TimestampStyles.RelativeTime) : "Unknown",
    })
    .setThumbnail(member.avatarUrl)
    .setFooter({ text: `ID: ${member.id}` });
}

/** Joins and leaves only; moving between channels and mute toggles are not logged. */
export function voiceChangeEmbed(change: VoiceChange, now: Date): EmbedBuilder | null {
  if (change.before === null && change.after !== null) {
    return new EmbedBuilder()
      .setTitle("Voice Channel Joined")
      .setDescription(`<@${change.userId}> joined <#${change.after}>`)
      .setColor(Colors.Blue)
      .setTimestamp(now)
      .setFooter({ text: `ID: ${change.userId}` });
  }
  if (change.before !== null && change.after === null) {
    return new EmbedBuilder()
      .setTitle("Voice Channel Left")
      .setDescription(`<@${change.userId}> left <#${change.before}>`)
      .setColor(Colors.Orange)
      .setTimestamp(now)
      .setFooter({ text: `ID: ${change.userId}` });
  }
  return null;
}

export function commandUsedEmbed(usage: CommandUsage, now: Date): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle("Command Used")
    .setDescription(`<@${usage.userId}> used \`/${usage.commandName}\``)
    .setColor(Colors.Gold)
    .setTimestamp(now)
    .addFields({ name: "Channel", value: usage.inGuild && usage.channelId ? `<#${usage.channelId}>` : "DM" })
    .setFooter({ text: `User ID: ${usage.userId}` });
  if (usage.args) {
    embed.addFields({ name: "Arguments", value: usage.args.slice(0, MAX_EMBED_FIELD_VALUE) });
  }
  return embed;
}

export class ActivityLog {
  constructor(
    private readonly guild: Guild,
    private readonly channelName: string
  ) {}

  /**
   * Resolves false when the channel is missing or the send fails; a broken
   * activity channel never affects the event that triggered the post.
   */
  async post(embed: EmbedBuilder): Promise<boolean> {
    const channel = findTextChannel(this.guild, this.channelName);
    if (!channel) {
      logger.debug({ channel: this.channelName, guildId: this.guild.id }, "[activity] channel not found");
      return false;
    }
    try {
      await channel.send({ embeds: [embed] });
      return true;
    } catch (err) {
      logger.warn({ err, channelId: channel.id }, "[activity] failed to post activity");
      return false;
    }
  }
}

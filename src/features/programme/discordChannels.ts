/**
 * Conference Bot — src/features/programme/discordChannels.ts
 * WHAT: discord.js adapter for the notifier and the livestream pins.
 * FLOWS:
 *  - postToMain/postToRoom → channel by configured name → send
 *  - upsertLivestreamPin → bot's pinned "Livestream" message → edit | send + pin
 *  - removeLivestreamPin → bot's pinned "Livestream" message → unpin + delete
 *  - purgeRoomChannels → simulated runs only
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, Message, TextChannel } from "discord.js";
import { logger } from "../../lib/logger.js";
import { SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { findTextChannel, purgeChannel } from "../../lib/channels.js";
import type { ProgramNotificationsConfig } from "../../lib/config.js";
import type { NotificationChannels, NotificationMessage } from "./notifier.js";
import { LIVESTREAM_PIN_HEADING, type LivestreamPinTarget, type PinResult } from "./livestreams.js";

type ChannelConfig = Pick<ProgramNotificationsConfig, "mainNotificationChannelName" | "roomsToChannelNames">;

export class GuildProgrammeChannels implements NotificationChannels, LivestreamPinTarget {
  constructor(
    private readonly guild: Guild,
    private readonly config: ChannelConfig
  ) {}

  async postToMain(message: NotificationMessage): Promise<void> {
    const channel = findTextChannel(this.guild, this.config.mainNotificationChannelName);
    if (!channel) {
      throw new Error(`Main notification channel #${this.config.mainNotificationChannelName} not found`);
    }
    await channel.send({ ...message, allowedMentions: SAFE_ALLOWED_MENTIONS });
  }

  async postToRoom(room: string, message: NotificationMessage): Promise<boolean> {
    const channel = this.roomChannel(room);
    if (!channel) return false;
    await channel.send({ ...message, allowedMentions: SAFE_ALLOWED_MENTIONS });
    return true;
  }

  async upsertLivestreamPin(room: string, content: string): Promise<PinResult> {
    const channel = this.roomChannel(room);
    if (!channel) return "no_channel";

    const existing = await this.findLivestreamPin(channel);
    if (existing) {
      if (existing.content === content) return "unchanged";
      await existing.edit({ content, allowedMentions: SAFE_ALLOWED_MENTIONS });
      return "edited";
    }

    const message = await channel.send({ content, allowedMentions: SAFE_ALLOWED_MENTIONS });
    await message.pin();
    return "created";
  }

  async removeLivestreamPin(room: string): Promise<PinResult> {
    const channel = this.roomChannel(room);
    if (!channel) return "no_channel";

    const existing = await this.findLivestreamPin(channel);
    if (!existing) return "unchanged";
    await existing.unpin();
    await existing.delete();
    return "removed";
  }

  async purgeRoomChannels(): Promise<void> {
    for (const room of Object.keys(this.config.roomsToChannelNames)) {
      const channel = this.roomChannel(room);
      if (channel) await purgeChannel(channel);
    }
  }

  private roomChannel(room: string): TextChannel | null {
    const name = this.config.roomsToChannelNames[room];
    if (name === undefined) {
      logger.warn({ room }, "[programme] no channel configured for room");
      return null;
    }
    const channel = findTextChannel(this.guild, name);
    if (!channel) logger.warn({ room, channel: name }, "[programme] room channel not found");
    return channel;
  }

  private async findLivestreamPin(channel: TextChannel): Promise<Message | null> {
    const botId = this.guild.client.user.id;
    const pinned = await channel.messages.fetchPinned();
    return (
      pinned.find((m) => m.author.id === botId && m.content.startsWith(LIVESTREAM_PIN_HEADING)) ?? null
    );
  }
}

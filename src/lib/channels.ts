/**
 * Conference Bot — src/lib/channels.ts
 * WHAT: Channel lookup by name and channel purge.
 * WHY: Every channel the bot writes to is configured by name, not id, so the
 *      same config works on a rehearsal server and the real one.
 * DOCS:
 *  - TextChannel.bulkDelete: https://discord.js.org/#/docs/discord.js/main/class/TextChannel?scrollTo=bulkDelete
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, type Guild, type TextChannel } from "discord.js";
import { logger } from "./logger.js";

/** Discord refuses bulk deletes for messages older than 14 days */
const BULK_DELETE_AGE_LIMIT_MS = 14 * 24 * 60 * 60 * 1000;
const BULK_DELETE_LIMIT = 100;
const MAX_PURGE_ITERATIONS = 50;
const PURGE_ITERATION_DELAY_MS = 1000;

/**
 * The guild's text channel with this exact name, or null. Served from the
 * channel cache, which discord.js fills on login.
 */
export function findTextChannel(guild: Guild, name: string): TextChannel | null {
  const channel = guild.channels.cache.find(
    (c) => c.type === ChannelType.GuildText && c.name === name
  );
  return channel?.type === ChannelType.GuildText ? channel : null;
}

/**
 * Delete every message in the channel. Recent messages go in bulk, older
 * ones one at a time. Returns the number deleted.
 */
export async function purgeChannel(channel: TextChannel): Promise<number> {
  let totalDeleted = 0;

  for (let iteration = 0; iteration < MAX_PURGE_ITERATIONS; iteration++) {
    const messages = await channel.messages.fetch({ limit: BULK_DELETE_LIMIT });
    if (messages.size === 0) break;

    const cutoff = Date.now() - BULK_DELETE_AGE_LIMIT_MS;
    const recent = messages.filter((msg) => msg.createdTimestamp > cutoff);
    const old = messages.filter((msg) => msg.createdTimestamp <= cutoff);

    if (recent.size > 0) {
      const deleted = await channel.bulkDelete(recent, true);
      totalDeleted += deleted.size;
    }
    for (const msg of old.values()) {
      try {
        await msg.delete();
        totalDeleted++;
      } catch (err) {
        logger.warn({ err, messageId: msg.id, channelId: channel.id }, "[channels] failed to delete old message");
      }
    }

    if (messages.size < BULK_DELETE_LIMIT) break;
    await new Promise((resolve) => setTimeout(resolve, PURGE_ITERATION_DELAY_MS));
  }

  logger.info({ channelId: channel.id, channel: channel.name, totalDeleted }, "[channels] purged");
  return totalDeleted;
}

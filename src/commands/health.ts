/**
 * Conference Bot — src/commands/health.ts
 * WHAT: /health, uptime, gateway ping, ticket cache and scheduler status.
 * WHY: Quick "is registration healthy?" check for the desk volunteers on opening day.
 * FLOWS:
 *  - collect metrics → reply with an embed (ephemeral on timeout)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, EmbedBuilder, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { HEALTH_CHECK_TIMEOUT_MS } from "../lib/constants.js";
import { getSchedulerHealth, type SchedulerHealth } from "../lib/schedulerHealth.js";

export const data = new SlashCommandBuilder()
  .setName("health")
  .setDescription("Bot health (uptime, latency, ticket cache, schedulers).");

export interface HealthStats {
  ticketCount: number;
  /** Epoch ms of the last successful ticket refresh */
  ticketsRefreshedAt: number | null;
  registeredUsers: number;
  sessionCount: number;
}

/** At least "0s", never an empty string. */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(" ");
}

export function formatRelativeTime(timestamp: number | null, now: number = Date.now()): string {
  if (timestamp === null) return "never";

  const diffSec = Math.floor((now - timestamp) / 1000);

  if (diffSec < 60) return `${diffSec}s ago`;
  if (diffSec < 3600) return `${Math.floor(diffSec / 60)}m ago`;
  if (diffSec < 86400) return `${Math.floor(diffSec / 3600)}h ago`;
  return `${Math.floor(diffSec / 86400)}d ago`;
}

function formatSchedulerStatus(health: SchedulerHealth): string {
  const status = health.consecutiveFailures === 0 ? "OK" : `WARN (${health.consecutiveFailures} failures)`;
  return `${status} - Last: ${formatRelativeTime(health.lastRunAt)}`;
}

const HEALTH_TIMEOUT_MESSAGE = "Health check timeout";

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>, stats: () => HealthStats) {
  const { interaction } = ctx;

  const healthCheck = (async () => {
    const metrics = await withStep(ctx, "collect_metrics", () => ({
      uptimeSec: Math.floor(process.uptime()),
      ping: Math.round(interaction.client.ws.ping),
      ...stats(),
    }));

    await withStep(ctx, "reply", async () => {
      const embed = new EmbedBuilder()
        .setTitle("Health Check")
        .setColor(0x57f287)
        .addFields(
          { name: "Uptime", value: formatUptime(metrics.uptimeSec), inline: true },
          { name: "WS Ping", value: `${metrics.ping}ms`, inline: true },
          { name: "Registered", value: String(metrics.registeredUsers), inline: true },
          {
            name: "Tickets",
            value: `${metrics.ticketCount} (refreshed ${formatRelativeTime(metrics.ticketsRefreshedAt)})`,
            inline: true,
          },
          { name: "Sessions", value: String(metrics.sessionCount), inline: true }
        )
        .setTimestamp();

      const schedulers = getSchedulerHealth();
      if (schedulers.size > 0) {
        embed.addFields({
          name: "Schedulers",
          value: [...schedulers.values()].map((h) => `**${h.name}**: ${formatSchedulerStatus(h)}`).join("\n"),
          inline: false,
        });
      }

      await replyOrEdit(interaction, { embeds: [embed] });
    });
  })();

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(HEALTH_TIMEOUT_MESSAGE)), HEALTH_CHECK_TIMEOUT_MS);
  });

  try {
    await Promise.race([healthCheck, timeout]);
  } catch (error) {
    if (error instanceof Error && error.message === HEALTH_TIMEOUT_MESSAGE) {
      await replyOrEdit(interaction, { content: "Health check timed out after 5 seconds." });
      return;
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

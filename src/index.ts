/**
 * Conference Bot — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, wires the services, routes interactions.
 * WHY: Startup order and the interaction hot path in one place.
 * FLOWS:
 *  - Startup: load config → login
 *  - Ready: [registration] → [welcome form] → [programme] → [command sync], each stage guarded
 *  - Interaction: detect kind → runWithCtx → wrapped handler
 *  - Member/voice events + slash commands → activity log channel
 *  - Shutdown: SIGTERM/SIGINT → stop schedulers → offline notice → destroy client → flush Sentry
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Node ESM modules: https://nodejs.org/api/esm.html
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, setTag, captureException, flushSentry } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS, FAST_MODE_MULTIPLIER, NOTIFY_TICK_FAST_MS, NOTIFY_TICK_MS } from "./lib/constants.js";
initializeSentry();

import "dotenv/config";

import {
  Client,
  Events,
  GatewayIntentBits,
  type ChatInputCommandInteraction,
  type Guild,
  type EmbedBuilder,
  type Interaction,
  type ModalSubmitInteraction,
} from "discord.js";
import { logger } from "./lib/logger.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason, promise) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error, promise }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // discord.js recovers from most rejections; keep running
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception - bot may be in unstable state");
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

import { env } from "./lib/env.js";
import { loadConferenceConfig, type ConferenceConfig } from "./lib/config.js";
import { createSimulatedClock, systemClock, type Clock } from "./lib/clock.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { replyOrEdit, wrapCommand } from "./lib/cmdWrap.js";
import { newTraceId, runWithCtx, type ReqKind } from "./lib/reqctx.js";
import { createRest, syncGuildCommands } from "./lib/commandSync.js";
import { runStartupStage } from "./lib/startup.js";
import * as health from "./commands/health.js";
import * as participants from "./commands/participants.js";
import { buildCommands } from "./commands/buildCommands.js";
import { PretixClient } from "./features/registration/pretixClient.js";
import { TicketCache } from "./features/registration/ticketCache.js";
import { RegistrationLog } from "./features/registration/registrationLog.js";
import { RegistrationFlow } from "./features/registration/registrationFlow.js";
import {
  DiscordRoleGateway,
  REGISTER_BUTTON_ID,
  REGISTER_MODAL_ID,
  createRegistrationModalHandler,
  handleRegisterButton,
  postOfflineMessage,
  postWelcomeMessage,
} from "./features/registration/form.js";
import { ScheduleCache } from "./features/programme/scheduleCache.js";
import { LivestreamLinks } from "./features/programme/livestreams.js";
import { NotificationState, SessionNotifier } from "./features/programme/notifier.js";
import { GuildProgrammeChannels } from "./features/programme/discordChannels.js";
import { startTicketRefreshScheduler, stopTicketRefreshScheduler } from "./scheduler/ticketRefreshScheduler.js";
import { startProgrammeScheduler, stopProgrammeScheduler } from "./scheduler/programmeScheduler.js";
import {
  ActivityLog,
  commandUsedEmbed,
  memberJoinedEmbed,
  memberLeftEmbed,
  summariseCommand,
  summariseMember,
  summariseVoiceChange,
  voiceChangeEmbed,
} from "./features/activityLog.js";

interface RegistrationServices {
  tickets: TicketCache;
  log: RegistrationLog;
  registerModal: (interaction: ModalSubmitInteraction) => Promise<void>;
}

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.GuildVoiceStates,
  ],
});

let config: ConferenceConfig | null = null;
let conferenceGuild: Guild | null = null;
let registration: RegistrationServices | null = null;
let schedule: ScheduleCache | null = null;
let activity: ActivityLog | null = null;

/** GUILD_ID when set, otherwise the first guild the bot is in. */
function resolveGuild(): Guild | undefined {
  if (env.GUILD_ID) return client.guilds.cache.get(env.GUILD_ID);
  return client.guilds.cache.first();
}

export function createConferenceClock(prog: ConferenceConfig["programNotifications"]): Clock {
  if (!prog.simulatedStartTime) return systemClock;
  return createSimulatedClock(new Date(prog.simulatedStartTime), prog.fastMode ? FAST_MODE_MULTIPLIER : 1);
}

async function startRegistration(conference: ConferenceConfig): Promise<RegistrationServices> {
  const reg = conference.registration;
  const log = await RegistrationLog.load(reg.registrationLogFile);
  const tickets = new TicketCache({
    source: new PretixClient(reg.pretixBaseUrl, env.PRETIX_TOKEN),
    cacheFile: reg.ticketCacheFile,
  });

  try {
    const outcome = await tickets.refresh({ force: true });
    logger.info({ outcome, tickets: tickets.size }, "[tickets] initial refresh");
  } catch (err) {
    // Registration still works through live order lookups
    logger.error({ err }, "[tickets] initial refresh failed and no cache file available");
  }

  startTicketRefreshScheduler(tickets);
  const registerModal = createRegistrationModalHandler(
    (g) => new RegistrationFlow({ cache: tickets, log, gateway: new DiscordRoleGateway(g), roleTables: reg }),
    reg
  );
  return { tickets, log, registerModal };
}

async function startProgramme(guild: Guild, conference: ConferenceConfig): Promise<ScheduleCache> {
  const prog = conference.programNotifications;
  const clock = createConferenceClock(prog);
  const schedule = new ScheduleCache({ apiUrl: prog.apiUrl, cacheFile: prog.scheduleCacheFile });
  const livestreams = new LivestreamLinks(prog.livestreamFile);
  const channels = new GuildProgrammeChannels(guild, prog);

  if (prog.simulatedStartTime) {
    logger.info(
      { simulatedStartTime: prog.simulatedStartTime, fastMode: prog.fastMode },
      "[programme] simulated clock active, clearing room channels"
    );
    await channels.purgeRoomChannels();
  }

  const notifier = new SessionNotifier({
    clock,
    leadMinutes: prog.leadMinutes,
    state: new NotificationState(),
    sessions: () => schedule.sessions,
    livestreams,
    channels,
  });

  await startProgrammeScheduler({
    schedule,
    livestreams,
    notifier,
    pins: channels,
    rooms: Object.keys(prog.roomsToChannelNames),
    tickMs: prog.fastMode ? NOTIFY_TICK_FAST_MS : NOTIFY_TICK_MS,
  });
  return schedule;
}

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, "[shutdown] received signal, shutting down");
  stopTicketRefreshScheduler();
  stopProgrammeScheduler();
  if (conferenceGuild && config) {
    try {
      await postOfflineMessage(conferenceGuild, config.registration);
    } catch (err) {
      logger.warn({ err }, "[shutdown] could not post offline notice");
    }
  }
  client.removeAllListeners();
  await client.destroy();
  await flushSentry();
  process.exit(0);
}

client.once(
  Events.ClientReady,
  wrapEvent(
    "ClientReady",
    async () => {
      logger.info({ user: client.user?.tag, guilds: client.guilds.cache.size }, "[ready] logged in");
      setTag("bot_id", client.user?.id ?? "unknown");

      process.once("SIGTERM", () => void gracefulShutdown("SIGTERM"));
      process.once("SIGINT", () => void gracefulShutdown("SIGINT"));

      const guild = resolveGuild();
      if (!guild) {
        logger.error({ guildId: env.GUILD_ID }, "[ready] conference guild not found");
        return;
      }

      if (!config) throw new Error("Configuration not loaded");
      const conference = config;
      conferenceGuild = guild;
      if (conference.activityLog) activity = new ActivityLog(guild, conference.activityLog.channelName);

      // Modals work as soon as the log and ticket cache exist
      registration = await runStartupStage("registration", () => startRegistration(conference));
      if (registration) {
        await runStartupStage("welcome form", () => postWelcomeMessage(guild, conference.registration));
      }
      schedule = await runStartupStage("programme", () => startProgramme(guild, conference));
      await runStartupStage("command sync", () =>
        syncGuildCommands(createRest(env.DISCORD_TOKEN), env.CLIENT_ID, [guild.id], buildCommands())
      );
      logger.info(
        { guildId: guild.id, registration: registration !== null, programme: schedule !== null },
        "[ready] conference bot ready"
      );
    },
    // the initial ticket and schedule fetches retry with backoff
    120_000
  )
);

// ===== Interaction Router =====

const healthHandler = wrapCommand<ChatInputCommandInteraction>("health", (ctx) =>
  health.execute(ctx, () => ({
    ticketCount: registration?.tickets.size ?? 0,
    ticketsRefreshedAt: registration?.tickets.lastRefresh ?? null,
    registeredUsers: registration?.log.size ?? 0,
    sessionCount: schedule?.sessions.length ?? 0,
  }))
);

const NOT_READY_MESSAGE = "The bot is still starting up, please try again shortly.";

const participantsHandler = wrapCommand<ChatInputCommandInteraction>("participants", async (ctx) => {
  if (!config) {
    await replyOrEdit(ctx.interaction, { content: NOT_READY_MESSAGE });
    return;
  }
  await participants.execute(ctx, { requiredRole: config.guildStatistics.requiredRole });
});

function interactionKind(interaction: Interaction): { kind: ReqKind; cmd?: string } | null {
  if (interaction.isChatInputCommand()) return { kind: "slash", cmd: interaction.commandName };
  if (interaction.isButton()) return { kind: "button", cmd: interaction.customId };
  if (interaction.isModalSubmit()) return { kind: "modal", cmd: interaction.customId };
  return null;
}

/** Activity posts never reject; see ActivityLog.post. */
function logActivity(embed: EmbedBuilder | null): void {
  if (activity && embed) void activity.post(embed);
}

async function routeInteraction(interaction: Interaction): Promise<void> {
  if (interaction.isChatInputCommand()) {
    logActivity(commandUsedEmbed(summariseCommand(interaction), new Date()));
    switch (interaction.commandName) {
      case "health":
        await healthHandler(interaction);
        return;
      case "participants":
        await participantsHandler(interaction);
        return;
      default:
        logger.warn({ cmd: interaction.commandName }, "[router] unknown command");
        return;
    }
  }

  if (interaction.isButton() && interaction.customId === REGISTER_BUTTON_ID) {
    await handleRegisterButton(interaction);
    return;
  }

  if (interaction.isModalSubmit() && interaction.customId === REGISTER_MODAL_ID) {
    if (!registration) {
      await replyOrEdit(interaction, { content: NOT_READY_MESSAGE });
      return;
    }
    await registration.registerModal(interaction);
    return;
  }

  logger.debug({ type: interaction.type }, "[router] unhandled interaction");
}

client.on(
  Events.InteractionCreate,
  wrapEvent("interactionCreate", async (interaction: Interaction) => {
    const route = interactionKind(interaction);
    if (!route) return;

    await runWithCtx(
      {
        traceId: newTraceId(),
        kind: route.kind,
        cmd: route.cmd,
        userId: interaction.user.id,
        guildId: interaction.guildId,
      },
      () => routeInteraction(interaction)
    );
  })
);

// ===== Activity Log =====

client.on(
  Events.GuildMemberAdd,
  wrapEvent("guildMemberAdd", async (member) => {
    logActivity(memberJoinedEmbed(summariseMember(member), new Date()));
  })
);

client.on(
  Events.GuildMemberRemove,
  wrapEvent("guildMemberRemove", async (member) => {
    logActivity(memberLeftEmbed(summariseMember(member), new Date()));
  })
);

client.on(
  Events.VoiceStateUpdate,
  wrapEvent("voiceStateUpdate", async (oldState, newState) => {
    logActivity(voiceChangeEmbed(summariseVoiceChange(oldState, newState), new Date()));
  })
);

async function main(): Promise<void> {
  // A broken config file should stop the bot before it connects
  config = loadConferenceConfig(env.CONFIG_FILE);
  logger.level = config.logLevel;
  await client.login(env.DISCORD_TOKEN);
}

// Skip login when imported under Vitest
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err) => {
    logger.fatal({ err }, "[startup] failed to start");
    process.exit(1);
  });
}

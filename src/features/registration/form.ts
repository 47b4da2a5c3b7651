/**
 * Conference Bot — src/features/registration/form.ts
 * WHAT: The Discord surface of registration: welcome message, "Register here"
 *       button, modal form, replies and the registration log channel.
 * WHY: Attendees register themselves on opening day without waiting for a volunteer.
 * FLOWS:
 *  - postWelcomeMessage(): purge form channel → welcome text + button
 *  - postOfflineMessage(): on shutdown, purge form channel → "currently offline" notice
 *  - button click → showModal(ticket id + name)
 *  - modal submit → defer → RegistrationFlow.register() → ephemeral reply → log channel post
 * DOCS:
 *  - Modals: https://discordjs.guide/interactions/modals.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
  type ButtonInteraction,
  type Guild,
  type ModalSubmitInteraction,
  type Role,
} from "discord.js";
import { logger, redact } from "../../lib/logger.js";
import { classifyError, userFriendlyMessage } from "../../lib/errors.js";
import { SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { findTextChannel, purgeChannel } from "../../lib/channels.js";
import { ensureDeferred, replyOrEdit, withStep, wrapCommand } from "../../lib/cmdWrap.js";
import type { RegistrationConfig } from "../../lib/config.js";
import type { RegistrationFlow, RegistrationOutcome, RoleGateway } from "./registrationFlow.js";

export const REGISTER_BUTTON_ID = "v1:register:start";
export const REGISTER_MODAL_ID = "v1:register:modal";
const TICKET_FIELD_ID = "v1:register:ticket";
const NAME_FIELD_ID = "v1:register:name";

// Colon emoji syntax does not render in button labels
export const REGISTER_BUTTON_LABEL = "Register here \u{1F448}";

const NOT_FOUND_HINT = "If you just bought your ticket, please try again in a few minutes.";
const NO_ROLES_MESSAGE =
  "No such conference ticket found. Did you use another ticket (e.g. Social Event)?";

type ChannelNames = Pick<RegistrationConfig, "formChannelName" | "helpChannelName" | "logChannelName">;

export function buildRegistrationModal(): ModalBuilder {
  const ticketInput = new TextInputBuilder()
    .setCustomId(TICKET_FIELD_ID)
    .setLabel("Ticket ID (as on your ticket)")
    .setPlaceholder("Like '#XXXXX-X' or 'XXXXX'")
    .setStyle(TextInputStyle.Short)
    .setRequired(true)
    .setMinLength(5)
    .setMaxLength(16);

  const nameInput = new TextInputBuilder()
    .setCustomId(NAME_FIELD_ID)
    .setLabel("Name (as on your ticket)")
    .setPlaceholder("Like 'Jane Doe'")
    .setStyle(TextInputStyle.Short)
    .setRequired(true)
    .setMinLength(1)
    .setMaxLength(50);

  return new ModalBuilder()
    .setCustomId(REGISTER_MODAL_ID)
    .setTitle("Conference Registration")
    .addComponents(
      new ActionRowBuilder<TextInputBuilder>().addComponents(ticketInput),
      new ActionRowBuilder<TextInputBuilder>().addComponents(nameInput)
    );
}

const WELCOME_TITLE = "## Welcome to the conference Discord server! :tada:";

export const OFFLINE_MESSAGE =
  `${WELCOME_TITLE}\n` +
  "The registration bot is currently offline. " +
  "We apologize for the inconvenience and are working hard to fix the issue.";

export function buildWelcomeMessage(helpChannelMention: string) {
  const content = [
    WELCOME_TITLE,
    "",
    "Follow these steps to complete your registration:",
    "",
    `:one: Click on the green "${REGISTER_BUTTON_LABEL}" button below.`,
    "",
    ":two: Fill in your ticket ID and the name on your ticket. You can find them",
    "* Printed on your ticket",
    "* In the order confirmation email",
    "",
    ':three: Click "Submit".',
    "",
    "These steps will assign the correct server permissions and set your server nickname.",
    "",
    "Experiencing trouble? Please contact us",
    `* In the ${helpChannelMention} channel`,
    "* By speaking to a volunteer at the registration desk",
  ].join("\n");

  const components = [
    new ActionRowBuilder<ButtonBuilder>().addComponents(
      new ButtonBuilder()
        .setCustomId(REGISTER_BUTTON_ID)
        .setLabel(REGISTER_BUTTON_LABEL)
        .setStyle(ButtonStyle.Success)
    ),
  ];

  return { content, components };
}

function channelMention(guild: Guild, name: string): string {
  const channel = findTextChannel(guild, name);
  return channel ? `<#${channel.id}>` : `#${name}`;
}

/**
 * Replace everything in the form channel with a fresh welcome message.
 * Returns false when the channel does not exist.
 */
export async function postWelcomeMessage(guild: Guild, channels: ChannelNames): Promise<boolean> {
  const channel = findTextChannel(guild, channels.formChannelName);
  if (!channel) {
    logger.error({ channel: channels.formChannelName, guildId: guild.id }, "[registration] form channel not found");
    return false;
  }

  await purgeChannel(channel);
  await channel.send({
    ...buildWelcomeMessage(channelMention(guild, channels.helpChannelName)),
    allowedMentions: SAFE_ALLOWED_MENTIONS,
  });
  logger.info({ channelId: channel.id }, "[registration] welcome message posted");
  return true;
}

/**
 * Swap the form for an offline notice so nobody clicks a button that no
 * longer answers. Returns false when the channel does not exist.
 */
export async function postOfflineMessage(guild: Guild, channels: Pick<ChannelNames, "formChannelName">): Promise<boolean> {
  const channel = findTextChannel(guild, channels.formChannelName);
  if (!channel) {
    logger.warn({ channel: channels.formChannelName, guildId: guild.id }, "[registration] form channel not found for offline notice");
    return false;
  }

  await purgeChannel(channel);
  await channel.send({ content: OFFLINE_MESSAGE, allowedMentions: SAFE_ALLOWED_MENTIONS });
  logger.info({ channelId: channel.id }, "[registration] offline notice posted");
  return true;
}

/** Ephemeral text shown to the attendee. */
export function formatOutcomeForUser(outcome: RegistrationOutcome, helpChannelMention: string): string {
  const help = `If you need help, please contact us in ${helpChannelMention}.`;
  switch (outcome.status) {
    case "registered": {
      const lines = [
        `Thank you ${outcome.nickname}, you are now registered!`,
        "",
        "Also, your nickname was changed to the name you used to register your ticket.",
      ];
      if (!outcome.persisted) {
        lines.push("", `We could not save your registration record. ${help}`);
      }
      return lines.join("\n");
    }
    case "no_roles":
      return `${NO_ROLES_MESSAGE} ${help}`;
    case "rejected": {
      const classified = classifyError(outcome.error);
      const hint = classified.kind === "not_found" ? `\n\n${NOT_FOUND_HINT}\n\n` : " ";
      return `${userFriendlyMessage(classified)}${hint}${help}`;
    }
  }
}

/** Post for organizers in the registration log channel. */
export function formatOutcomeForChannel(
  outcome: RegistrationOutcome,
  userId: string,
  input: { ticketId: string; name: string }
): string {
  const typed = `ticket=${redact(input.ticketId)} name=${redact(input.name)}`;
  switch (outcome.status) {
    case "registered":
      return [
        `:white_check_mark: **<@${userId}> REGISTERED**`,
        `${typed} matched=${outcome.ticket.id} roles=${outcome.roles.join(", ")}`,
      ].join("\n");
    case "no_roles":
      return `:x: **<@${userId}> ERROR**\nTicket without roles: ${outcome.ticket.id} (${outcome.ticket.itemName})\n${typed}`;
    case "rejected":
      return `:x: **<@${userId}> ERROR**\n${outcome.error.message}\n${typed}`;
  }
}

async function postToLogChannel(guild: Guild, channels: ChannelNames, content: string): Promise<void> {
  const channel = findTextChannel(guild, channels.logChannelName);
  if (!channel) {
    logger.warn({ channel: channels.logChannelName }, "[registration] log channel not found");
    return;
  }
  await channel.send({ content, allowedMentions: SAFE_ALLOWED_MENTIONS });
}

/**
 * RoleGateway over a live guild. Role names are resolved from the role
 * cache; an unknown name fails the whole assignment before anything changes.
 */
export class DiscordRoleGateway implements RoleGateway {
  constructor(private readonly guild: Guild) {}

  async assignRoles(userId: string, roleNames: readonly string[]): Promise<void> {
    const roles: Role[] = [];
    const missing: string[] = [];
    for (const name of roleNames) {
      const role = this.guild.roles.cache.find((r) => r.name === name);
      if (role) {
        roles.push(role);
      } else {
        missing.push(name);
      }
    }
    if (missing.length > 0) {
      throw new Error(`Roles not found in guild: ${missing.join(", ")}`);
    }

    const member = await this.guild.members.fetch(userId);
    await member.roles.add(roles, "Conference registration");
  }

  async setNickname(userId: string, nickname: string): Promise<void> {
    const member = await this.guild.members.fetch(userId);
    await member.setNickname(nickname, "Conference registration");
  }
}

export async function handleRegisterButton(interaction: ButtonInteraction): Promise<void> {
  // showModal is the acknowledgement; no defer first
  await interaction.showModal(buildRegistrationModal());
}

/**
 * Modal submit handler. Unexpected failures are posted to the log channel
 * and then left to wrapCommand for the error reply.
 */
export function createRegistrationModalHandler(
  flowFor: (guild: Guild) => RegistrationFlow,
  channels: ChannelNames
) {
  return wrapCommand<ModalSubmitInteraction>("register", async (ctx) => {
    const { interaction } = ctx;
    const guild = interaction.guild;
    if (!guild) {
      await replyOrEdit(interaction, { content: "Registration only works inside the conference server." });
      return;
    }

    await withStep(ctx, "defer", () => ensureDeferred(interaction));

    const input = {
      ticketId: interaction.fields.getTextInputValue(TICKET_FIELD_ID),
      name: interaction.fields.getTextInputValue(NAME_FIELD_ID),
    };
    logger.info(
      { userId: interaction.user.id, ticketId: redact(input.ticketId), name: redact(input.name), traceId: ctx.traceId },
      "[registration] attempt"
    );

    let outcome: RegistrationOutcome;
    try {
      outcome = await withStep(ctx, "register", () =>
        flowFor(guild).register({ userId: interaction.user.id, ticketId: input.ticketId, name: input.name })
      );
    } catch (err) {
      const classified = classifyError(err);
      await postToLogChannel(
        guild,
        channels,
        `:x: **<@${interaction.user.id}> ERROR**\n${classified.kind}: ${redact(classified.message)} (trace ${ctx.traceId})`
      );
      throw err;
    }

    await withStep(ctx, "reply", () =>
      replyOrEdit(interaction, {
        content: formatOutcomeForUser(outcome, channelMention(guild, channels.helpChannelName)),
      })
    );
    await withStep(ctx, "log_channel", () =>
      postToLogChannel(guild, channels, formatOutcomeForChannel(outcome, interaction.user.id, input))
    );
  });
}

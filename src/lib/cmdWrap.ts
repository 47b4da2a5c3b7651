/**
 * Conference Bot — src/lib/cmdWrap.ts
 * WHAT: Interaction lifecycle helpers: tracing, step logging, error replies, safe defers/replies.
 * WHY: Discord gives 3 seconds for the first response. The registration modal may
 *      wait on the ticketing API, so every handler goes through the same defer/reply rules.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply with trace id
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral)
 *  - replyOrEdit(): reply, editReply or followUp depending on state; ephemeral by default
 * DOCS:
 *  - Interaction response rules: https://discord.com/developers/docs/interactions/receiving-and-responding
 *  - InteractionReplyOptions: https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  DiscordAPIError,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
  type ModalSubmitInteraction,
  type ButtonInteraction,
} from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId, type ReqKind } from "./reqctx.js";
import {
  classifyError,
  errorContext,
  isInteractionExpired,
  shouldReportToSentry,
  userFriendlyMessage,
} from "./errors.js";

type Phase = string;

export type InstrumentedInteraction =
  | ChatInputCommandInteraction
  | ModalSubmitInteraction
  | ButtonInteraction;

/**
 * Passed to every wrapped handler. step() labels where we are so a failure
 * log says "lookup_ticket" instead of just "registration failed".
 */
export type CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor<I extends InstrumentedInteraction> = (ctx: CommandContext<I>) => Promise<void>;

function inferKind(interaction: InstrumentedInteraction): ReqKind {
  if (interaction.isChatInputCommand()) return "slash";
  if (interaction.isModalSubmit()) return "modal";
  return "button";
}

/**
 * REST metadata from a DiscordAPIError, body redacted and clipped.
 * Returns null for anything else so callers can spread it.
 */
function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  let bodySnippet: string | undefined;
  const body = err.requestBody;
  if (body.json !== undefined) {
    bodySnippet = redact(JSON.stringify(body.json));
  } else if (body.files?.length) {
    bodySnippet = `[files:${body.files.length}]`;
  }
  if (bodySnippet && bodySnippet.length > 120) {
    bodySnippet = `${bodySnippet.slice(0, 120)}...`;
  }
  return {
    status: err.status,
    code: err.code,
    method: err.method,
    url: err.url,
    bodySnippet,
  };
}

function errorCode(err: unknown): unknown {
  return err instanceof DiscordAPIError ? err.code : undefined;
}

export function wrapCommand<I extends InstrumentedInteraction>(
  name: string,
  fn: CommandExecutor<I>
) {
  /**
   * wrapCommand
   * WHAT: Decorates a handler with tracing, step logging and a friendly error reply.
   * RETURNS: An interaction handler that never rejects.
   * PITFALLS:
   *  - The error reply is ephemeral and carries the trace id; attendees paste it into the help channel.
   */
  return async (interaction: I) => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const cmdName = store.cmd ?? name;
    const kind = store.kind ?? inferKind(interaction);
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext<I> = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: cmdName, phase });
        addBreadcrumb({
          category: "cmd",
          message: cmdName,
          data: { phase, traceId },
          level: "info",
        });
        setTag("phase", phase);
      },
      currentPhase: () => phase,
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: cmdName,
        kind,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );

    setTag("cmd", cmdName);
    setTag("traceId", traceId);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId ?? null,
    });

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: cmdName, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const classified = classifyError(error);
      logger.error(
        {
          evt: "cmd_error",
          traceId,
          cmd: cmdName,
          kind,
          phase,
          ...errorContext(classified),
          err: error,
        },
        `command error: ${classified.message}`
      );
      setTag("errorKind", classified.kind);

      if (shouldReportToSentry(classified)) {
        captureException(error, {
          cmd: cmdName,
          phase,
          traceId,
          errorKind: classified.kind,
        });
      }

      if (isInteractionExpired(classified)) return;

      try {
        await replyOrEdit(interaction, {
          content: `${userFriendlyMessage(classified)}\nTrace: \`${traceId}\``,
        });
      } catch (replyErr) {
        logger.error(
          { err: replyErr, traceId, evt: "cmd_error_reply_fail" },
          "Failed to send error reply"
        );
      }
    }
  };
}

export async function withStep<T>(
  ctx: CommandContext<InstrumentedInteraction>,
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * First acknowledgement via an ephemeral deferReply. 10062 (expired) is
 * logged and swallowed; anything else is rethrown.
 */
export async function ensureDeferred(interaction: InstrumentedInteraction): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  try {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });
    logger.debug({ evt: "cmd_deferred", traceId: reqCtx().traceId }, "[cmd] deferred reply (ephemeral)");
  } catch (err) {
    const code = errorCode(err);
    const logPayload = {
      evt: "cmd_defer_fail",
      traceId: reqCtx().traceId,
      code,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (code === 10062) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply with whichever API the interaction state allows. Replies default to
 * ephemeral; a public reply has to ask for it.
 */
export async function replyOrEdit(
  interaction: InstrumentedInteraction,
  payload: InteractionReplyOptions
): Promise<void> {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code = errorCode(err);
    const logPayload = {
      evt: "cmd_reply_fail",
      traceId: reqCtx().traceId,
      code,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (code === 10062) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}

/**
 * Raid Scheduler — src/lib/cmdWrap.ts
 * WHAT: Interaction lifecycle helpers: tracing, step logging, friendly error replies, safe defers/replies.
 * WHY: Discord wants a first response within 3 seconds; every slash command goes through one wrapper.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - discord.js v14 interactions: https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Interaction response rules: https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
} from "discord.js";
import { logger } from "./logger.js";
import { captureException, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId, runWithCtx } from "./reqctx.js";
import {
  classifyError,
  errorContext,
  isAlreadyAcknowledged,
  isInteractionExpired,
  shouldReportToSentry,
  userFriendlyMessage,
} from "./errors.js";

/** Label for where a command is; "crashed in 'edit_starter'" beats a bare stack. */
type Phase = string;

export type CommandContext = {
  interaction: ChatInputCommandInteraction;
  /** Mark the current execution phase (e.g., "load_raid", "render", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor = (ctx: CommandContext) => Promise<void>;

/**
 * Decorate a slash command handler with a trace id, phase logging and error
 * handling. Never throws to discord.js.
 */
export function wrapCommand(name: string, fn: CommandExecutor) {
  return async (interaction: ChatInputCommandInteraction): Promise<void> => {
    const traceId = reqCtx().traceId ?? newTraceId();
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: name, phase });
      },
      currentPhase: () => phase,
      traceId,
    };

    await runWithCtx(
      {
        traceId,
        cmd: name,
        kind: "slash",
        userId: interaction.user.id,
        guildId: interaction.guildId,
        channelId: interaction.channelId,
      },
      async () => {
        logger.info(
          {
            evt: "cmd_start",
            traceId,
            cmd: name,
            sub: interaction.options.getSubcommand(false) ?? undefined,
            userId: interaction.user.id,
            guildId: interaction.guildId ?? "dm",
          },
          "command start"
        );
        setTag("cmd", name);

        try {
          await fn(commandCtx);
          logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "command ok");
        } catch (error) {
          const classified = classifyError(error);
          logger.error(
            {
              evt: "cmd_error",
              traceId,
              cmd: name,
              phase,
              ...errorContext(classified),
              err: error,
            },
            `command error: ${classified.message}`
          );

          if (shouldReportToSentry(classified)) {
            captureException(error, { cmd: name, phase, traceId, errorKind: classified.kind });
          }

          try {
            await replyOrEdit(interaction, {
              content: `${userFriendlyMessage(classified)}\n-# trace: ${traceId}`,
            });
          } catch (replyErr) {
            logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to send error reply");
          }
        }
      }
    );
  };
}

/** Run work under a named phase. */
export async function withStep<T>(ctx: CommandContext, phase: Phase, fn: () => Promise<T> | T): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * Acknowledge with deferReply unless already acknowledged. 10062 (expired) is
 * logged and swallowed; anything else is rethrown.
 */
export async function ensureDeferred(interaction: ChatInputCommandInteraction, ephemeral = true): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
  } catch (err) {
    const classified = classifyError(err);
    const logPayload = { evt: "cmd_defer_fail", traceId: reqCtx().traceId, kind: classified.kind, err };
    if (isInteractionExpired(classified)) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state; avoids 40060
 * (already acknowledged). Ephemeral unless the payload sets flags.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
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
    const classified = classifyError(err);
    const logPayload = { evt: "cmd_reply_fail", traceId: reqCtx().traceId, kind: classified.kind, err };
    if (isInteractionExpired(classified)) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (isAlreadyAcknowledged(classified)) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}

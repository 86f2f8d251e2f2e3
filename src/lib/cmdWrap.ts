/**
 * Role Ping Ledger — src/lib/cmdWrap.ts
 * WHAT: Standard interaction lifecycle for slash commands: tracing, step logging, safe replies.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - Interaction replies: https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Interaction response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { MessageFlags, type ChatInputCommandInteraction, type InteractionReplyOptions } from "discord.js";
import { logger } from "./logger.js";
import { captureException, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry, userFriendlyMessage } from "./errors.js";

type Phase = string;

export type CommandContext = {
  interaction: ChatInputCommandInteraction;
  /** Mark the current execution phase (e.g., "read", "aggregate", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor = (ctx: CommandContext) => Promise<void>;

// Discord REST codes that mean "too late to answer"
const UNKNOWN_INTERACTION = 10062;
const ALREADY_ACKNOWLEDGED = 40060;

function errorCode(err: unknown): number | undefined {
  const classified = classifyError(err);
  return classified.kind === "discord_api" ? classified.code : undefined;
}

/**
 * Decorates a command handler with tracing, step logging and error replies.
 * Never throws to the caller.
 */
export function wrapCommand(name: string, fn: CommandExecutor) {
  return async (interaction: ChatInputCommandInteraction) => {
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

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: name,
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
        captureException(error instanceof Error ? error : new Error(String(error)), {
          cmd: name,
          phase,
          traceId,
          errorKind: classified.kind,
        });
      }

      try {
        await replyOrEdit(interaction, {
          content: `${userFriendlyMessage(classified)}\nTrace: \`${traceId}\``,
        });
      } catch (replyErr) {
        logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to post error reply");
      }
    }
  };
}

export async function withStep<T>(ctx: CommandContext, phase: Phase, fn: () => Promise<T> | T): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * deferReply if nothing has been sent yet. An expired interaction is logged, not thrown.
 */
export async function ensureDeferred(interaction: ChatInputCommandInteraction, ephemeral = true): Promise<void> {
  if (interaction.deferred || interaction.replied) return;
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
  } catch (err) {
    const code = errorCode(err);
    const logPayload = { evt: "cmd_defer_fail", traceId: reqCtx().traceId, code, err };
    if (code === UNKNOWN_INTERACTION) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state. Ephemeral unless
 * `visibility` is "public". A deferred reply keeps the visibility chosen at defer time.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions,
  visibility: "ephemeral" | "public" = "ephemeral"
) {
  const withFlags: InteractionReplyOptions =
    visibility === "ephemeral" ? { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral } : payload;
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
    const logPayload = { evt: "cmd_reply_fail", traceId: reqCtx().traceId, code, err };
    if (code === UNKNOWN_INTERACTION) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === ALREADY_ACKNOWLEDGED) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}

/**
 * Role Ping Ledger — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, records gateway events, routes slash commands.
 * FLOWS:
 *  - Ready: log identity → start retention scheduler
 *  - MessageCreate: toInboundMessage → ingestMessage (activity row + role pings)
 *  - MessageReactionAdd: resolveReaction (fetch partials) → ingestReaction (spoiler messages only)
 *  - InteractionCreate: slash command → runWithCtx → wrapped executor
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Client, Events, GatewayIntentBits, Partials } from "discord.js";
import { env } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { captureException, flushSentry, initializeSentry, setTag } from "./lib/sentry.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { newTraceId, runWithCtx } from "./lib/reqctx.js";
import { createLedgerContext } from "./store/ledgerContext.js";
import { createCommandRegistry } from "./commands/registry.js";
import { ingestMessage, ingestReaction } from "./features/ingestion.js";
import { resolveReaction, toInboundMessage } from "./features/discordAdapters.js";
import { startRetentionScheduler, stopRetentionScheduler } from "./scheduler/retentionScheduler.js";

initializeSentry({
  dsn: env.SENTRY_DSN,
  environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
  tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
});

// Give Sentry a moment to flush before exiting on an uncaught exception
const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // Don't exit - discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

const ledgers = createLedgerContext({
  dataDir: env.DATA_DIR,
  pingLedgerPath: env.PING_LEDGER_PATH,
  activityLedgerPath: env.ACTIVITY_LEDGER_PATH,
});

const commands = createCommandRegistry(ledgers, env.RETENTION_DAYS);

// MessageContent is privileged: needed for spoiler markup. GuildMembers is
// privileged: needed for role-gated activity and reaction rankings.
const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildMessageReactions,
  ],
  partials: [Partials.Message, Partials.Channel, Partials.Reaction, Partials.User],
});

client.once(
  Events.ClientReady,
  wrapEvent("ready", (ready: Client<true>) => {
    logger.info({ tag: ready.user.tag, id: ready.user.id, guilds: ready.guilds.cache.size }, "Bot ready");
    setTag("bot_id", ready.user.id);
    logger.info(
      { pingLedger: ledgers.pingLedgerPath, activityLedger: ledgers.activityLedgerPath },
      "[ledger] storage locations"
    );
    startRetentionScheduler(ledgers, env.RETENTION_DAYS);
  })
);

client.on(
  Events.MessageCreate,
  wrapEvent("messageCreate", (message) => {
    const outcome = ingestMessage(ledgers, toInboundMessage(message));
    if (outcome.recorded && outcome.pings > 0) {
      logger.debug(
        { evt: "pings_recorded", guildId: message.guildId, pings: outcome.pings },
        "[ingest] role pings recorded"
      );
    }
  })
);

client.on(
  Events.MessageReactionAdd,
  wrapEvent("messageReactionAdd", async (reaction, user) => {
    const outcome = ingestReaction(ledgers, await resolveReaction(reaction, user));
    if (!outcome.recorded && outcome.reason === "write_failed") {
      logger.warn({ evt: "reaction_not_recorded", messageId: reaction.message.id }, "[ingest] reaction dropped");
    }
  })
);

client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isChatInputCommand()) return;

  const executor = commands.get(interaction.commandName);
  if (!executor) {
    logger.warn({ evt: "unknown_command", cmd: interaction.commandName }, "[interaction] unknown command");
    return;
  }

  await runWithCtx(
    {
      traceId: newTraceId(),
      cmd: interaction.commandName,
      userId: interaction.user.id,
      guildId: interaction.guildId ?? null,
      channelId: interaction.channelId ?? null,
    },
    () => executor(interaction)
  );
});

client.on(Events.Error, (err) => {
  logger.error({ evt: "client_error", err }, "[client] error");
  captureException(err, { context: "client" });
});

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  stopRetentionScheduler();
  try {
    await client.destroy();
  } catch (err) {
    logger.warn({ err }, "[shutdown] client.destroy failed (non-fatal)");
  }
  await flushSentry();
  logger.info("[shutdown] Graceful shutdown complete");
  process.exit(0);
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

await client.login(env.DISCORD_TOKEN);

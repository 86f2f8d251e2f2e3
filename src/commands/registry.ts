/**
 * Role Ping Ledger — src/commands/registry.ts
 * WHAT: Maps each slash command name to its wrapped executor, with the ledgers bound in.
 * FLOWS: createCommandRegistry(ledgers, days) → interactionCreate looks up commandName → executor(interaction)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Collection, type ChatInputCommandInteraction } from "discord.js";
import { wrapCommand } from "../lib/cmdWrap.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import * as activity from "./activity.js";
import * as cleanup from "./cleanup.js";
import * as health from "./health.js";
import * as help from "./help.js";
import * as leaderboard from "./leaderboard.js";
import * as mycounts from "./mycounts.js";
import * as resetcounts from "./resetcounts.js";
import * as resetmycounts from "./resetmycounts.js";
import * as rolecounts from "./rolecounts.js";
import * as spoilers from "./spoilers.js";

export type CommandExecutor = (interaction: ChatInputCommandInteraction) => Promise<void>;

export function createCommandRegistry(
  ledgers: LedgerContext,
  retentionDays: number
): Collection<string, CommandExecutor> {
  const commands = new Collection<string, CommandExecutor>();

  commands.set(help.data.name, wrapCommand("help", help.execute));
  commands.set(health.data.name, wrapCommand("health", health.execute));
  commands.set(rolecounts.data.name, wrapCommand("rolecounts", (ctx) => rolecounts.execute(ctx, ledgers)));
  commands.set(leaderboard.data.name, wrapCommand("leaderboard", (ctx) => leaderboard.execute(ctx, ledgers)));
  commands.set(mycounts.data.name, wrapCommand("mycounts", (ctx) => mycounts.execute(ctx, ledgers)));
  commands.set(resetcounts.data.name, wrapCommand("resetcounts", (ctx) => resetcounts.execute(ctx, ledgers)));
  commands.set(
    resetmycounts.data.name,
    wrapCommand("resetmycounts", (ctx) => resetmycounts.execute(ctx, ledgers))
  );
  commands.set(
    cleanup.data.name,
    wrapCommand("cleanup", (ctx) => cleanup.execute(ctx, ledgers, retentionDays))
  );
  commands.set(activity.data.name, wrapCommand("activity", (ctx) => activity.execute(ctx, ledgers)));
  commands.set(spoilers.data.name, wrapCommand("spoilers", (ctx) => spoilers.execute(ctx, ledgers)));

  return commands;
}

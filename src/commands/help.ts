/**
 * Role Ping Ledger — src/commands/help.ts
 * WHAT: /help lists every command with a one-line description.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { EMBED_COLOR } from "./shared.js";

export const data = new SlashCommandBuilder().setName("help").setDescription("Show available commands");

const LINES = [
  "`/rolecounts role` — Top users who pinged a role",
  "`/leaderboard [role]` — Most pinged roles, or one role's top pingers and timeline",
  "`/mycounts` — Roles you have pinged",
  "`/resetcounts role` — Reset all counts for a role (Admin)",
  "`/resetmycounts` — Reset your own counts",
  "`/cleanup [days]` — Remove records older than N days (Manage Server)",
  "`/activity …` — Channels, users, hours, daily volume, distribution, ping ratio, inactive members, role activity",
  "`/spoilers …` — Spoiler reaction leaders, emojis and rank roles",
  "`/health` — Uptime, latency and scheduler status",
];

export async function execute(ctx: CommandContext) {
  await withStep(ctx, "reply", async () => {
    const embed = new EmbedBuilder().setTitle("Role Ping Ledger").setColor(EMBED_COLOR).setDescription(LINES.join("\n"));
    await replyOrEdit(ctx.interaction, { embeds: [embed] });
  });
}

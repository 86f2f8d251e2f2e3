/**
 * Role Ping Ledger — src/commands/rolecounts.ts
 * WHAT: /rolecounts role → top pingers of one role.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { getTopForRole } from "../features/rolePings.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { EMBED_COLOR, formatRanking, requireGuild, userMention } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("rolecounts")
  .setDescription("Show top users who pinged a specific role")
  .setDMPermission(false)
  .addRoleOption((o) => o.setName("role").setDescription("Select a role to view stats for").setRequired(true));

export async function execute(ctx: CommandContext, ledgers: LedgerContext) {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;
  const role = interaction.options.getRole("role", true);

  const top = await withStep(ctx, "aggregate", () => getTopForRole(ledgers, guildId, role.id));

  await withStep(ctx, "reply", async () => {
    const embed = new EmbedBuilder()
      .setTitle(`Top pingers of @${role.name}`)
      .setColor(EMBED_COLOR)
      .setDescription(formatRanking(top, userMention, "No pings recorded for this role yet."));
    await replyOrEdit(interaction, { embeds: [embed] }, "public");
  });
}

/**
 * Role Ping Ledger — src/commands/mycounts.ts
 * WHAT: /mycounts → roles the caller has pinged, busiest first.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { getCountsForUser } from "../features/rolePings.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { EMBED_COLOR, formatRanking, requireGuild, roleMention } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("mycounts")
  .setDescription("Show your personal ping stats")
  .setDMPermission(false);

export async function execute(ctx: CommandContext, ledgers: LedgerContext) {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;

  const counts = await withStep(ctx, "aggregate", () => getCountsForUser(ledgers, guildId, interaction.user.id));

  await withStep(ctx, "reply", async () => {
    const embed = new EmbedBuilder()
      .setTitle("Your role pings")
      .setColor(EMBED_COLOR)
      .setDescription(formatRanking(counts, roleMention, "You haven't pinged any roles yet."));
    await replyOrEdit(interaction, { embeds: [embed] });
  });
}

/**
 * Role Ping Ledger — src/commands/leaderboard.ts
 * WHAT: /leaderboard [role]
 * FLOWS:
 *  - no role → top 5 roles still in the guild by total pings, each with its top 3 pingers
 *  - role → that role's top pingers plus pings per day over the last 30 days
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { windowBounds } from "../lib/time.js";
import { getRoleTimeline, getServerLeaderboard, getTopForRole } from "../features/rolePings.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { EMBED_COLOR, MAX_FIELD, formatDailySeries, formatRanking, requireGuild, roleMention, userMention } from "./shared.js";

const TIMELINE_DAYS = 30;

export const data = new SlashCommandBuilder()
  .setName("leaderboard")
  .setDescription("Show role ping leaderboard")
  .setDMPermission(false)
  .addRoleOption((o) =>
    o.setName("role").setDescription("Select a role to view stats for (optional - shows all roles if not specified)")
  );

export async function execute(ctx: CommandContext, ledgers: LedgerContext) {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;
  const role = interaction.options.getRole("role");

  if (role) {
    const { top, timeline } = await withStep(ctx, "aggregate", () => ({
      top: getTopForRole(ledgers, guildId, role.id),
      timeline: getRoleTimeline(ledgers, guildId, role.id, windowBounds(TIMELINE_DAYS)),
    }));
    await withStep(ctx, "reply", async () => {
      const embed = new EmbedBuilder()
        .setTitle(`Leaderboard for @${role.name}`)
        .setColor(EMBED_COLOR)
        .setDescription(formatRanking(top, userMention, "No pings recorded for this role yet."))
        .addFields({
          name: `Pings per day (last ${TIMELINE_DAYS} days, UTC)`,
          value: formatDailySeries(timeline, "No pings in this period.", MAX_FIELD),
        });
      await replyOrEdit(interaction, { embeds: [embed] }, "public");
    });
    return;
  }

  const { guild } = interaction;
  const board = await withStep(ctx, "aggregate", () =>
    getServerLeaderboard(ledgers, guildId, {
      roleExists: guild ? (roleId) => guild.roles.cache.has(roleId) : undefined,
    })
  );
  await withStep(ctx, "reply", async () => {
    const embed = new EmbedBuilder().setTitle("Role ping leaderboard").setColor(EMBED_COLOR);
    if (board.length === 0) {
      embed.setDescription("No role pings recorded yet.");
    } else {
      embed.addFields(
        board.map((group, idx) => ({
          name: `${idx + 1}. ${group.total} total pings`,
          value: `${roleMention(group.key)}\n${formatRanking(group.entries, userMention)}`,
        }))
      );
    }
    await replyOrEdit(interaction, { embeds: [embed] }, "public");
  });
}

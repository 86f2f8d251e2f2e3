/**
 * Role Ping Ledger — src/commands/activity.ts
 * WHAT: /activity subcommands over the message-activity ledger.
 * FLOWS:
 *  - channels|users → most active in the window
 *  - hours → UTC hour-of-day histogram ; daily → messages per UTC day
 *  - distribution → top 10/25/50% share of messages, p50/p90 per user
 *  - ratio → pings / (pings + messages) per user
 *  - inactive → members with no message in the window (fetches the member list)
 *  - role → most active holders of a role
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder, type Guild, type SlashCommandSubcommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { formatUtc } from "../lib/time.js";
import {
  DEFAULT_ACTIVITY_DAYS,
  DEFAULT_ACTIVITY_LIMIT,
  getDailyActivity,
  getDistribution,
  getHourHistogram,
  getInactiveUsers,
  getPingRatios,
  getRoleActivity,
  getTopChannels,
  getTopUsers,
  type WindowQuery,
} from "../features/messageActivity.js";
import { discordMembership } from "../features/membership.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import {
  EMBED_COLOR,
  channelMention,
  formatDailySeries,
  formatHourHistogram,
  formatPercent,
  formatRanking,
  requireGuild,
  userMention,
} from "./shared.js";

const MAX_DAYS = 365;
const MAX_LIMIT = 25;

function withDays(sub: SlashCommandSubcommandBuilder) {
  return sub.addIntegerOption((o) =>
    o
      .setName("days")
      .setDescription(`Trailing window in days (default: ${DEFAULT_ACTIVITY_DAYS})`)
      .setMinValue(1)
      .setMaxValue(MAX_DAYS)
  );
}

function withLimit(sub: SlashCommandSubcommandBuilder) {
  return sub.addIntegerOption((o) =>
    o
      .setName("limit")
      .setDescription(`How many entries to show (default: ${DEFAULT_ACTIVITY_LIMIT})`)
      .setMinValue(1)
      .setMaxValue(MAX_LIMIT)
  );
}

export const data = new SlashCommandBuilder()
  .setName("activity")
  .setDescription("Message activity statistics")
  .setDMPermission(false)
  .addSubcommand((s) => withLimit(withDays(s.setName("channels").setDescription("Most active channels"))))
  .addSubcommand((s) => withLimit(withDays(s.setName("users").setDescription("Most active users"))))
  .addSubcommand((s) => withDays(s.setName("hours").setDescription("Messages by hour of day (UTC)")))
  .addSubcommand((s) => withDays(s.setName("daily").setDescription("Messages per day (UTC)")))
  .addSubcommand((s) =>
    withDays(s.setName("distribution").setDescription("How much of the traffic comes from the most active users"))
  )
  .addSubcommand((s) => withLimit(withDays(s.setName("ratio").setDescription("Users whose messages are mostly role pings"))))
  .addSubcommand((s) => withLimit(withDays(s.setName("inactive").setDescription("Members with no messages in the window"))))
  .addSubcommand((s) =>
    withLimit(
      withDays(
        s
          .setName("role")
          .setDescription("Most active members of a role")
          .addRoleOption((o) => o.setName("role").setDescription("Role to inspect").setRequired(true))
      )
    )
  );

async function resolveGuild(ctx: CommandContext, guildId: string): Promise<Guild> {
  return ctx.interaction.guild ?? (await ctx.interaction.client.guilds.fetch(guildId));
}

export async function execute(ctx: CommandContext, ledgers: LedgerContext) {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;

  const sub = interaction.options.getSubcommand(true);
  const days = interaction.options.getInteger("days") ?? DEFAULT_ACTIVITY_DAYS;
  const limit = interaction.options.getInteger("limit") ?? DEFAULT_ACTIVITY_LIMIT;
  const q: WindowQuery = { days, limit };
  const span = `last ${days} day${days === 1 ? "" : "s"}`;

  // Member lookups can take a while on big servers
  await ensureDeferred(interaction, false);

  const embed = new EmbedBuilder().setColor(EMBED_COLOR);

  await withStep(ctx, `aggregate:${sub}`, async () => {
    switch (sub) {
      case "channels":
        embed
          .setTitle(`Most active channels (${span})`)
          .setDescription(formatRanking(getTopChannels(ledgers, guildId, q), channelMention));
        break;
      case "users":
        embed
          .setTitle(`Most active users (${span})`)
          .setDescription(formatRanking(getTopUsers(ledgers, guildId, q), userMention));
        break;
      case "hours":
        embed
          .setTitle(`Messages by hour, UTC (${span})`)
          .setDescription(formatHourHistogram(getHourHistogram(ledgers, guildId, q)));
        break;
      case "daily":
        embed
          .setTitle(`Messages per day, UTC (${span})`)
          .setDescription(formatDailySeries(getDailyActivity(ledgers, guildId, q)));
        break;
      case "distribution": {
        const summary = getDistribution(ledgers, guildId, q);
        const lines =
          summary.users === 0
            ? ["No messages in this period."]
            : [
                `${summary.total} messages from ${summary.users} users`,
                ...summary.shares.map(
                  (s) =>
                    `Top ${Math.round(s.fraction * 100)}% (${s.users} users): ${formatPercent(s.share)} of messages`
                ),
                `Median user: ${summary.p50 ?? 0} messages · p90: ${summary.p90 ?? 0}`,
              ];
        embed.setTitle(`Message distribution (${span})`).setDescription(lines.join("\n"));
        break;
      }
      case "ratio": {
        const ratios = getPingRatios(ledgers, guildId, q);
        embed
          .setTitle(`Ping ratio (${span})`)
          .setDescription(
            ratios.length === 0
              ? "No activity in this period."
              : ratios
                  .map(
                    (r, i) =>
                      `${i + 1}. ${userMention(r.userId)} — ${formatPercent(r.ratio)} (${r.pings} pings / ${r.messages} messages)`
                  )
                  .join("\n")
          );
        break;
      }
      case "inactive": {
        const members = await discordMembership(await resolveGuild(ctx, guildId)).memberIds();
        const inactive = getInactiveUsers(ledgers, guildId, members, q);
        embed
          .setTitle(`Inactive members (${span})`)
          .setDescription(
            inactive.length === 0
              ? "Everyone has been active."
              : inactive
                  .map(
                    (u, i) =>
                      `${i + 1}. ${userMention(u.userId)} — ${u.lastSeenMs === null ? "never seen" : `last seen ${formatUtc(u.lastSeenMs)}`}`
                  )
                  .join("\n")
          );
        break;
      }
      case "role": {
        const role = interaction.options.getRole("role", true);
        const holders = await discordMembership(await resolveGuild(ctx, guildId)).roleMemberIds(role.id);
        embed
          .setTitle(`Most active @${role.name} members (${span})`)
          .setDescription(formatRanking(getRoleActivity(ledgers, guildId, new Set(holders), q), userMention));
        break;
      }
      default:
        embed.setTitle("Unknown subcommand").setDescription(`\`${sub}\` is not an activity view.`);
    }
  });

  await withStep(ctx, "reply", () => replyOrEdit(interaction, { embeds: [embed] }, "public"));
}

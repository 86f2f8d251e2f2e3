/**
 * Role Ping Ledger — src/commands/spoilers.ts
 * WHAT: /spoilers subcommands over the per-guild spoiler-reaction store.
 * FLOWS:
 *  - top|emojis → top reactors / most used emojis
 *  - ranks → configured rank roles ordered by their members' reactions
 *  - setranks → overwrite the rank roles (Manage Server, up to 5)
 *  - reset → delete this server's reaction store (Manage Server)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { userFriendlyMessage } from "../lib/errors.js";
import { MAX_RANK_ROLES } from "../lib/validation.js";
import { discordMembership } from "../features/membership.js";
import { rankRolesByReactions } from "../features/roleRanking.js";
import {
  DEFAULT_REACTION_TOP_LIMIT,
  getRankRoles,
  getTopEmojis,
  getTopReactors,
  resetGuildReactions,
  setRankRoles,
} from "../features/spoilerReactions.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { EMBED_COLOR, formatRanking, requireGuild, roleMention, userMention } from "./shared.js";

const RANK_OPTION_NAMES = Array.from({ length: MAX_RANK_ROLES }, (_, i) => `role${i + 1}`);

export const data = new SlashCommandBuilder()
  .setName("spoilers")
  .setDescription("Spoiler reaction statistics")
  .setDMPermission(false)
  .addSubcommand((s) =>
    s
      .setName("top")
      .setDescription("Users who react to spoilers the most")
      .addIntegerOption((o) => o.setName("limit").setDescription("How many users").setMinValue(1).setMaxValue(25))
  )
  .addSubcommand((s) =>
    s
      .setName("emojis")
      .setDescription("Most used emojis on spoilers")
      .addIntegerOption((o) => o.setName("limit").setDescription("How many emojis").setMinValue(1).setMaxValue(25))
  )
  .addSubcommand((s) => s.setName("ranks").setDescription("Rank roles ordered by their members' spoiler reactions"))
  .addSubcommand((s) => {
    s.setName("setranks").setDescription(`Set up to ${MAX_RANK_ROLES} rank roles (Manage Server)`);
    RANK_OPTION_NAMES.forEach((name, i) =>
      s.addRoleOption((o) => o.setName(name).setDescription(`Rank role #${i + 1}`).setRequired(i === 0))
    );
    return s;
  })
  .addSubcommand((s) => s.setName("reset").setDescription("Delete all spoiler reaction stats for this server (Manage Server)"));

export async function execute(ctx: CommandContext, ledgers: LedgerContext) {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;

  const sub = interaction.options.getSubcommand(true);
  const limit = interaction.options.getInteger("limit") ?? DEFAULT_REACTION_TOP_LIMIT;

  if ((sub === "setranks" || sub === "reset") && !interaction.memberPermissions?.has(PermissionFlagsBits.ManageGuild)) {
    await replyOrEdit(interaction, { content: "You need the Manage Server permission for this." });
    return;
  }

  switch (sub) {
    case "top": {
      const top = await withStep(ctx, "aggregate", () => getTopReactors(ledgers, guildId, limit));
      const embed = new EmbedBuilder()
        .setTitle("Top spoiler reactors")
        .setColor(EMBED_COLOR)
        .setDescription(formatRanking(top, userMention, "No spoiler reactions recorded yet."));
      await replyOrEdit(interaction, { embeds: [embed] }, "public");
      return;
    }
    case "emojis": {
      const top = await withStep(ctx, "aggregate", () => getTopEmojis(ledgers, guildId, limit));
      const embed = new EmbedBuilder()
        .setTitle("Most used spoiler reactions")
        .setColor(EMBED_COLOR)
        .setDescription(formatRanking(top, (emoji) => emoji, "No spoiler reactions recorded yet."));
      await replyOrEdit(interaction, { embeds: [embed] }, "public");
      return;
    }
    case "ranks": {
      await ensureDeferred(interaction, false);
      const guild = interaction.guild ?? (await interaction.client.guilds.fetch(guildId));
      const ranking = await withStep(ctx, "rank_roles", () =>
        rankRolesByReactions(ledgers, guildId, discordMembership(guild))
      );
      let description: string;
      if (ranking.length > 0) {
        description = ranking.map((r, i) => `${i + 1}. ${roleMention(r.roleId)} — ${r.total}`).join("\n");
      } else if (getRankRoles(ledgers, guildId).length === 0) {
        description = "No rank roles configured. Use `/spoilers setranks` first.";
      } else {
        description = "None of the configured rank roles exist anymore. Use `/spoilers setranks` to pick new ones.";
      }
      const embed = new EmbedBuilder()
        .setTitle("Rank roles by spoiler reactions")
        .setColor(EMBED_COLOR)
        .setDescription(description);
      await replyOrEdit(interaction, { embeds: [embed] }, "public");
      return;
    }
    case "setranks": {
      const ids = RANK_OPTION_NAMES.map((name) => interaction.options.getRole(name)?.id).filter(
        (id): id is string => id !== undefined
      );
      const saved = await withStep(ctx, "save_config", () => setRankRoles(ledgers, guildId, ids));
      const content = saved.ok
        ? `Rank roles set: ${saved.value.map(roleMention).join(", ")}`
        : userFriendlyMessage(saved.error);
      await replyOrEdit(interaction, { content });
      return;
    }
    case "reset": {
      const dropped = await withStep(ctx, "reset", () => resetGuildReactions(ledgers, guildId));
      const content = dropped.ok
        ? `Spoiler reaction stats reset (${dropped.value.removed} reactions removed).`
        : userFriendlyMessage(dropped.error);
      await replyOrEdit(interaction, { content });
      return;
    }
    default:
      await replyOrEdit(interaction, { content: `Unknown subcommand \`${sub}\`.` });
  }
}

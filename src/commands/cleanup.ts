/**
 * Role Ping Ledger — src/commands/cleanup.ts
 * WHAT: /cleanup [days] → prune this server's records older than N days (Manage Server).
 * FLOWS: validate days → cleanupGuild() → per-store summary
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { userFriendlyMessage } from "../lib/errors.js";
import { validateRetentionDays } from "../lib/validation.js";
import { cleanupGuild, totalRemoved, type StoreCleanup } from "../features/retention.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { EMBED_COLOR, EMBED_COLOR_WARN, requireGuild } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("cleanup")
  .setDescription("Clean up old ping records (Admin only)")
  .setDMPermission(false)
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addIntegerOption((o) =>
    o.setName("days").setDescription("Delete entries older than this many days (default: 30)").setMinValue(1)
  );

function describe(entry: StoreCleanup): string {
  if (!entry.result.ok) return `**${entry.store}**: failed (${userFriendlyMessage(entry.result.error)})`;
  const { removed, remaining } = entry.result.value;
  return `**${entry.store}**: ${removed} removed, ${remaining} remain`;
}

export async function execute(ctx: CommandContext, ledgers: LedgerContext, defaultDays: number) {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;

  // Throws ValidationError for 0/negative; wrapCommand turns that into a reply
  const days = validateRetentionDays(interaction.options.getInteger("days") ?? defaultDays);

  const results = await withStep(ctx, "cleanup", () => cleanupGuild(ledgers, guildId, days));

  await withStep(ctx, "reply", async () => {
    const failed = results.some((r) => !r.result.ok);
    const embed = new EmbedBuilder()
      .setTitle(`Cleaned records older than ${days} days`)
      .setColor(failed ? EMBED_COLOR_WARN : EMBED_COLOR)
      .setDescription([...results.map(describe), "", `Total removed: ${totalRemoved(results)}`].join("\n"));
    await replyOrEdit(interaction, { embeds: [embed] });
  });
}

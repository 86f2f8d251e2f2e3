/**
 * Role Ping Ledger — src/commands/resetcounts.ts
 * WHAT: /resetcounts role → drop every ping of that role in this server (Administrator).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { userFriendlyMessage } from "../lib/errors.js";
import { resetRoleCounts } from "../features/rolePings.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { requireGuild } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("resetcounts")
  .setDescription("Reset all counts for a role (Admin only)")
  .setDMPermission(false)
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .addRoleOption((o) => o.setName("role").setDescription("Select a role to reset counts for").setRequired(true));

export async function execute(ctx: CommandContext, ledgers: LedgerContext) {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;
  const role = interaction.options.getRole("role", true);

  const result = await withStep(ctx, "reset", () => resetRoleCounts(ledgers, guildId, role.id));

  await withStep(ctx, "reply", async () => {
    const content = result.ok
      ? `Reset counts for **@${role.name}** (${result.value.removed} pings removed).`
      : userFriendlyMessage(result.error);
    await replyOrEdit(interaction, { content });
  });
}

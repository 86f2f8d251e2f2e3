/**
 * Role Ping Ledger — src/commands/resetmycounts.ts
 * WHAT: /resetmycounts → drop every ping the caller made in this server.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { userFriendlyMessage } from "../lib/errors.js";
import { resetUserCounts } from "../features/rolePings.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { requireGuild } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("resetmycounts")
  .setDescription("Reset your personal counts")
  .setDMPermission(false);

export async function execute(ctx: CommandContext, ledgers: LedgerContext) {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;

  const result = await withStep(ctx, "reset", () => resetUserCounts(ledgers, guildId, interaction.user.id));

  await withStep(ctx, "reply", async () => {
    const content = result.ok
      ? `Your counts have been reset (${result.value.removed} pings removed).`
      : userFriendlyMessage(result.error);
    await replyOrEdit(interaction, { content });
  });
}

/**
 * Role Ping Ledger — src/commands/health.ts
 * WHAT: /health shows uptime, WS ping and scheduler status.
 * FLOWS:
 *  - Compute uptime/ws.ping + getSchedulerHealth() → reply with an embed
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, EmbedBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { getSchedulerHealth, type SchedulerHealth } from "../lib/schedulerHealth.js";

export const data = new SlashCommandBuilder()
  .setName("health")
  .setDescription("Bot health (uptime and latency).");

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(" ");
}

export function formatRelativeTime(timestamp: number | null, now: number = Date.now()): string {
  if (timestamp === null) return "never";
  const diffSec = Math.floor((now - timestamp) / 1000);

  if (diffSec < 60) return `${diffSec}s ago`;
  if (diffSec < 3600) return `${Math.floor(diffSec / 60)}m ago`;
  if (diffSec < 86400) return `${Math.floor(diffSec / 3600)}h ago`;
  return `${Math.floor(diffSec / 86400)}d ago`;
}

function formatSchedulerStatus(health: SchedulerHealth): string {
  const status = health.consecutiveFailures === 0 ? "OK" : `WARN (${health.consecutiveFailures} failures)`;
  return `${status} - Last: ${formatRelativeTime(health.lastRunAt)}`;
}

export async function execute(ctx: CommandContext) {
  const { interaction } = ctx;

  const metrics = await withStep(ctx, "collect_metrics", () => ({
    uptimeSec: Math.floor(process.uptime()),
    ping: Math.round(interaction.client.ws.ping),
    schedulers: getSchedulerHealth(),
  }));

  await withStep(ctx, "reply", async () => {
    const embed = new EmbedBuilder()
      .setTitle("Health Check")
      .setColor(0x57f287)
      .addFields(
        { name: "Status", value: "Healthy", inline: true },
        { name: "Uptime", value: formatUptime(metrics.uptimeSec), inline: true },
        { name: "WS Ping", value: `${metrics.ping}ms`, inline: true }
      );

    if (metrics.schedulers.size > 0) {
      embed.addFields({
        name: "Schedulers",
        value: Array.from(metrics.schedulers.values())
          .map((h) => `**${h.name}**: ${formatSchedulerStatus(h)}`)
          .join("\n"),
      });
    }
    await replyOrEdit(interaction, { embeds: [embed] });
  });
}

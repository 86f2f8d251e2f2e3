/**
 * Role Ping Ledger — src/commands/shared.ts
 * WHAT: Small helpers shared by the stats commands (guild guard, ranking lines, text charts).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { type ChatInputCommandInteraction } from "discord.js";
import type { DailyPoint, HourBucket, KeyCount } from "../lib/aggregate.js";
import { replyOrEdit } from "../lib/cmdWrap.js";

export const EMBED_COLOR = 0x5865f2;
export const EMBED_COLOR_WARN = 0xfee75c;

/** Embed descriptions cap at 4096 characters; stay well below */
const MAX_DESCRIPTION = 3900;
/** Embed field values cap at 1024 */
export const MAX_FIELD = 1024;

/**
 * The guild id, or null after telling the user the command is server-only.
 */
export async function requireGuild(interaction: ChatInputCommandInteraction): Promise<string | null> {
  if (interaction.guildId) return interaction.guildId;
  await replyOrEdit(interaction, { content: "This command can only be used in a server." });
  return null;
}

export const userMention = (id: string) => `<@${id}>`;
export const roleMention = (id: string) => `<@&${id}>`;
export const channelMention = (id: string) => `<#${id}>`;

/**
 * Numbered "1. <@u1> — 3" lines, or `empty` when there is nothing to list.
 */
export function formatRanking(
  entries: readonly KeyCount[],
  render: (key: string) => string,
  empty = "No data yet."
): string {
  if (entries.length === 0) return empty;
  return clip(entries.map((e, i) => `${i + 1}. ${render(e.key)} — ${e.count}`).join("\n"));
}

function bar(count: number, max: number, width = 16): string {
  if (max === 0 || count === 0) return "";
  return "█".repeat(Math.max(1, Math.round((count / max) * width)));
}

/**
 * Hour histogram as a code block, one line per UTC hour.
 */
export function formatHourHistogram(buckets: readonly HourBucket[]): string {
  const max = Math.max(0, ...buckets.map((b) => b.count));
  const lines = buckets.map((b) => `${String(b.hour).padStart(2, "0")}:00 ${String(b.count).padStart(5)} ${bar(b.count, max)}`);
  return "```\n" + lines.join("\n") + "\n```";
}

/**
 * Daily series as a code block, oldest first.
 */
export function formatDailySeries(
  points: readonly DailyPoint[],
  empty = "No data yet.",
  maxLength: number = MAX_DESCRIPTION
): string {
  if (points.length === 0) return empty;
  const max = Math.max(...points.map((p) => p.count));
  const lines = points.map((p) => `${p.date} ${String(p.count).padStart(5)} ${bar(p.count, max, 10)}`);
  return "```\n" + clip(lines.join("\n"), maxLength - 8) + "\n```";
}

export function formatPercent(share: number): string {
  return `${(share * 100).toFixed(1)}%`;
}

function clip(text: string, max = MAX_DESCRIPTION): string {
  if (text.length <= max) return text;
  const cut = text.lastIndexOf("\n", max - 2);
  return `${text.slice(0, cut > 0 ? cut : max - 2)}\n…`;
}

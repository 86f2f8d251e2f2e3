/**
 * Role Ping Ledger — src/features/spoilerReactions.ts
 * WHAT: Spoiler-reaction stream: classify spoiler messages, record reactions, per-guild queries and reset.
 * FLOWS:
 *  - ingestReaction() → isSpoilerMessage() → recordReaction() → data/reactions/stats/<guild>.json
 *  - /spoilers top|emojis → getTopReactors() / getTopEmojis()
 *  - /spoilers reset → resetGuildReactions()
 *  - /spoilers setranks → setRankRoles()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { topForKey, type KeyCount } from "../lib/aggregate.js";
import { unwrapOr, type Result } from "../lib/result.js";
import { nowIso } from "../lib/time.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { ReactionStore } from "../store/reactionStore.js";
import type { ReactionEvent } from "../store/records.js";

/** Discord renames spoilered uploads with this prefix */
export const SPOILER_ATTACHMENT_PREFIX = "SPOILER_";

/** ||hidden text||, at least one character between the bars */
const SPOILER_MARKUP = /\|\|[\s\S]+?\|\|/;

export const DEFAULT_REACTION_TOP_LIMIT = 10;

export type SpoilerCandidate = {
  content: string;
  attachmentNames: readonly string[];
};

export type ReactionInput = {
  guildId: string;
  messageId: string;
  userId: string;
  emoji: string;
};

/**
 * @example
 * isSpoilerMessage({ content: "ending was ||wild||", attachmentNames: [] }) // true
 * isSpoilerMessage({ content: "", attachmentNames: ["SPOILER_cat.png"] })   // true
 * isSpoilerMessage({ content: "a || b", attachmentNames: ["cat.png"] })     // false
 */
export function isSpoilerMessage(msg: SpoilerCandidate): boolean {
  if (msg.attachmentNames.some((name) => name.startsWith(SPOILER_ATTACHMENT_PREFIX))) return true;
  return SPOILER_MARKUP.test(msg.content);
}

export function recordReaction(ctx: LedgerContext, input: ReactionInput, now: Date = new Date()): Result<void> {
  const event: ReactionEvent = {
    message_id: input.messageId,
    user_id: input.userId,
    emoji: input.emoji,
    timestamp: nowIso(now),
  };
  return new ReactionStore(ctx).append(input.guildId, event);
}

export function readGuildReactions(ctx: LedgerContext, guildId: string): ReactionEvent[] {
  return unwrapOr(new ReactionStore(ctx).readAll(guildId), []);
}

export function getTopReactors(
  ctx: LedgerContext,
  guildId: string,
  limit: number = DEFAULT_REACTION_TOP_LIMIT
): KeyCount[] {
  return topForKey(readGuildReactions(ctx, guildId), (r) => r.user_id, { limit });
}

export function getTopEmojis(
  ctx: LedgerContext,
  guildId: string,
  limit: number = DEFAULT_REACTION_TOP_LIMIT
): KeyCount[] {
  return topForKey(readGuildReactions(ctx, guildId), (r) => r.emoji, { limit });
}

/**
 * Delete the guild's whole reaction store.
 */
export function resetGuildReactions(ctx: LedgerContext, guildId: string): Result<{ removed: number }> {
  return new ReactionStore(ctx).drop(guildId);
}

export function getRankRoles(ctx: LedgerContext, guildId: string): string[] {
  return new ReactionStore(ctx).loadRankRoles(guildId);
}

export function setRankRoles(ctx: LedgerContext, guildId: string, roleIds: readonly string[]): Result<string[]> {
  return new ReactionStore(ctx).saveRankRoles(guildId, roleIds);
}

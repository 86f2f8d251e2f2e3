/**
 * Role Ping Ledger — src/features/ingestion.ts
 * WHAT: Decides which inbound events get recorded and appends them.
 * FLOWS:
 *  - messageCreate → toInboundMessage() → ingestMessage()
 *      → recordMessage() once, recordPing() per mentionable role
 *  - messageReactionAdd → resolveReaction() → ingestReaction()
 *      → isSpoilerMessage() → recordReaction()
 *
 * Works on plain DTOs so nothing here depends on discord.js types.
 * Append failures are already logged by the stores; ingestion carries on.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { recordMessage } from "./messageActivity.js";
import { recordPing } from "./rolePings.js";
import { isSpoilerMessage, recordReaction } from "./spoilerReactions.js";

export type InboundRole = {
  id: string;
  /** Roles that cannot be @-mentioned by members are never counted */
  mentionable: boolean;
};

export type InboundMessage = {
  id: string;
  /** null for direct messages */
  guildId: string | null;
  channelId: string;
  authorId: string;
  /** Bot accounts and webhooks */
  authorIsBot: boolean;
  content: string;
  attachmentNames: string[];
  mentionedRoles: InboundRole[];
};

export type ReactionParent = Pick<InboundMessage, "id" | "guildId" | "channelId" | "content" | "attachmentNames">;

export type InboundReaction = {
  /** Unicode emoji, or <:name:id> for custom emoji */
  emoji: string;
  userId: string;
  userIsBot: boolean;
  message: ReactionParent;
};

export type MessageIngestOutcome =
  | { recorded: false; reason: "bot" | "dm" }
  | { recorded: true; activity: boolean; pings: number };

export type ReactionIngestOutcome =
  | { recorded: false; reason: "bot" | "dm" | "not_spoiler" | "write_failed" }
  | { recorded: true };

export function ingestMessage(ctx: LedgerContext, msg: InboundMessage, now: Date = new Date()): MessageIngestOutcome {
  if (msg.authorIsBot) return { recorded: false, reason: "bot" };
  if (!msg.guildId) return { recorded: false, reason: "dm" };
  const guildId = msg.guildId;

  const activity = recordMessage(ctx, { guildId, userId: msg.authorId, channelId: msg.channelId }, now).ok;

  let pings = 0;
  let skippedProtected = 0;
  for (const role of msg.mentionedRoles) {
    if (!role.mentionable) {
      skippedProtected++;
      continue;
    }
    const written = recordPing(
      ctx,
      { guildId, roleId: role.id, userId: msg.authorId, channelId: msg.channelId },
      now
    );
    if (written.ok) pings++;
  }

  if (pings > 0 || skippedProtected > 0) {
    logger.debug(
      { guildId, messageId: msg.id, userId: msg.authorId, pings, skippedProtected },
      "[ingest] role mentions processed"
    );
  }
  return { recorded: true, activity, pings };
}

export function ingestReaction(ctx: LedgerContext, reaction: InboundReaction, now: Date = new Date()): ReactionIngestOutcome {
  if (reaction.userIsBot) return { recorded: false, reason: "bot" };
  if (!reaction.message.guildId) return { recorded: false, reason: "dm" };
  if (!isSpoilerMessage(reaction.message)) return { recorded: false, reason: "not_spoiler" };

  const written = recordReaction(
    ctx,
    {
      guildId: reaction.message.guildId,
      messageId: reaction.message.id,
      userId: reaction.userId,
      emoji: reaction.emoji,
    },
    now
  );
  if (!written.ok) return { recorded: false, reason: "write_failed" };

  logger.debug(
    { guildId: reaction.message.guildId, messageId: reaction.message.id, userId: reaction.userId },
    "[ingest] spoiler reaction recorded"
  );
  return { recorded: true };
}

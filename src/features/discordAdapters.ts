/**
 * Role Ping Ledger — src/features/discordAdapters.ts
 * WHAT: Converts discord.js structures into the ingestion DTOs.
 * FLOWS:
 *  - messageCreate(message) → toInboundMessage(message)
 *  - messageReactionAdd(reaction, user) → resolveReaction() (fetch partials) → InboundReaction
 * DOCS:
 *  - Partials: https://discordjs.guide/popular-topics/partials.html
 *  - MessageMentions.roles: https://discord.js.org/#/docs/discord.js/main/class/MessageMentions?scrollTo=roles
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Message, MessageReaction, PartialMessageReaction, PartialUser, User } from "discord.js";
import type { InboundMessage, InboundReaction } from "./ingestion.js";

export function toInboundMessage(message: Message): InboundMessage {
  return {
    id: message.id,
    guildId: message.guildId,
    channelId: message.channelId,
    authorId: message.author.id,
    // Webhook posts (integrations, relays) are not member activity
    authorIsBot: message.author.bot || message.webhookId !== null,
    content: message.content,
    attachmentNames: message.attachments.map((a) => a.name),
    mentionedRoles: message.mentions.roles.map((role) => ({ id: role.id, mentionable: role.mentionable })),
  };
}

/**
 * Fetches whatever the gateway delivered as partial (uncached messages,
 * reactions on old messages) and builds the DTO.
 * Throws when a fetch fails; the event wrapper logs it.
 */
export async function resolveReaction(
  reaction: MessageReaction | PartialMessageReaction,
  user: User | PartialUser
): Promise<InboundReaction> {
  const full = reaction.partial ? await reaction.fetch() : reaction;
  const message = full.message.partial ? await full.message.fetch() : full.message;
  const reactor = user.partial ? await user.fetch() : user;

  return {
    emoji: full.emoji.toString(),
    userId: reactor.id,
    userIsBot: reactor.bot,
    message: {
      id: message.id,
      guildId: message.guildId,
      channelId: message.channelId,
      content: message.content,
      attachmentNames: message.attachments.map((a) => a.name),
    },
  };
}

/**
 * Role Ping Ledger — src/store/records.ts
 * WHAT: Record shapes for the three event streams and their CSV codecs.
 *
 * Field names are the on-disk column names. Ids are opaque strings; Discord
 * snowflakes overflow JS numbers, so they are never parsed.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { CsvLedger, type RowCodec } from "./csvLedger.js";
import type { LedgerContext } from "./ledgerContext.js";

/** One role mention by one user. Duplicates are meaningful: each row is one ping. */
export type PingEvent = {
  guild_id: string;
  role_id: string;
  user_id: string;
  channel_id: string;
  timestamp: string;
};

/** One qualifying guild message, regardless of content. */
export type MessageActivityEvent = {
  guild_id: string;
  user_id: string;
  channel_id: string;
  timestamp: string;
};

/** One reaction on spoiler content. Lives in a guild-specific store, so no guild_id. */
export type ReactionEvent = {
  message_id: string;
  user_id: string;
  emoji: string;
  timestamp: string;
};

export const PING_FIELDS = ["guild_id", "role_id", "user_id", "channel_id", "timestamp"] as const;
export const ACTIVITY_FIELDS = ["guild_id", "user_id", "channel_id", "timestamp"] as const;

export const pingCodec: RowCodec<PingEvent> = {
  fields: PING_FIELDS,
  encode: (r) => [r.guild_id, r.role_id, r.user_id, r.channel_id, r.timestamp],
  decode: ([guild_id = "", role_id = "", user_id = "", channel_id = "", timestamp = ""]) => ({
    guild_id,
    role_id,
    user_id,
    channel_id,
    timestamp,
  }),
};

export const activityCodec: RowCodec<MessageActivityEvent> = {
  fields: ACTIVITY_FIELDS,
  encode: (r) => [r.guild_id, r.user_id, r.channel_id, r.timestamp],
  decode: ([guild_id = "", user_id = "", channel_id = "", timestamp = ""]) => ({
    guild_id,
    user_id,
    channel_id,
    timestamp,
  }),
};

export function pingLedger(ctx: LedgerContext): CsvLedger<PingEvent> {
  return new CsvLedger(ctx.pingLedgerPath, pingCodec, "role_pings");
}

export function activityLedger(ctx: LedgerContext): CsvLedger<MessageActivityEvent> {
  return new CsvLedger(ctx.activityLedgerPath, activityCodec, "activity_messages");
}

/**
 * Role Ping Ledger — src/features/messageActivity.ts
 * WHAT: Message-activity stream: one row per qualifying message, plus every /activity query.
 * FLOWS:
 *  - ingestMessage() → recordMessage() → activity_messages.csv append
 *  - /activity channels|users|hours|daily|distribution|ratio|inactive|role → the getters below
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  dailySeries,
  hourHistogram,
  inactiveUsers,
  mostActive,
  perUserCounts,
  pingRatio,
  roleGatedTop,
  type DailyPoint,
  type HourBucket,
  type InactiveUser,
  type KeyCount,
  type RatioEntry,
} from "../lib/aggregate.js";
import { distributionSummary, type DistributionSummary } from "../lib/percentiles.js";
import { unwrapOr, type Result } from "../lib/result.js";
import { nowIso, windowBounds } from "../lib/time.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { activityLedger, type MessageActivityEvent } from "../store/records.js";
import { readGuildPings } from "./rolePings.js";

export const DEFAULT_ACTIVITY_DAYS = 7;
export const DEFAULT_ACTIVITY_LIMIT = 10;

export type MessageInput = {
  guildId: string;
  userId: string;
  channelId: string;
};

export type WindowQuery = {
  days?: number;
  limit?: number;
  now?: Date;
};

export function recordMessage(ctx: LedgerContext, msg: MessageInput, now: Date = new Date()): Result<void> {
  return activityLedger(ctx).append({
    guild_id: msg.guildId,
    user_id: msg.userId,
    channel_id: msg.channelId,
    timestamp: nowIso(now),
  });
}

export function readGuildActivity(ctx: LedgerContext, guildId: string): MessageActivityEvent[] {
  return unwrapOr(activityLedger(ctx).readAll(), []).filter((m) => m.guild_id === guildId);
}

function windowOf(q: WindowQuery) {
  return windowBounds(q.days ?? DEFAULT_ACTIVITY_DAYS, q.now);
}

export function getTopChannels(ctx: LedgerContext, guildId: string, q: WindowQuery = {}): KeyCount[] {
  return mostActive(readGuildActivity(ctx, guildId), (m) => m.channel_id, windowOf(q), q.limit ?? DEFAULT_ACTIVITY_LIMIT);
}

export function getTopUsers(ctx: LedgerContext, guildId: string, q: WindowQuery = {}): KeyCount[] {
  return mostActive(readGuildActivity(ctx, guildId), (m) => m.user_id, windowOf(q), q.limit ?? DEFAULT_ACTIVITY_LIMIT);
}

export function getHourHistogram(ctx: LedgerContext, guildId: string, q: WindowQuery = {}): HourBucket[] {
  return hourHistogram(readGuildActivity(ctx, guildId), windowOf(q));
}

export function getDailyActivity(ctx: LedgerContext, guildId: string, q: WindowQuery = {}): DailyPoint[] {
  return dailySeries(readGuildActivity(ctx, guildId), windowOf(q));
}

/**
 * How concentrated message volume is: top 10/25/50% shares plus p50/p90 per-user counts.
 */
export function getDistribution(ctx: LedgerContext, guildId: string, q: WindowQuery = {}): DistributionSummary {
  return distributionSummary(perUserCounts(readGuildActivity(ctx, guildId), (m) => m.user_id, windowOf(q)));
}

/**
 * Users whose traffic is mostly role pings, highest ratio first.
 */
export function getPingRatios(ctx: LedgerContext, guildId: string, q: WindowQuery = {}): RatioEntry[] {
  const ratios = pingRatio(readGuildPings(ctx, guildId), readGuildActivity(ctx, guildId), windowOf(q));
  return q.limit === undefined ? ratios : ratios.slice(0, q.limit);
}

/**
 * Members with no message in the window. `memberIds` comes from the membership resolver.
 */
export function getInactiveUsers(
  ctx: LedgerContext,
  guildId: string,
  memberIds: Iterable<string>,
  q: WindowQuery = {}
): InactiveUser[] {
  const inactive = inactiveUsers(memberIds, readGuildActivity(ctx, guildId), (m) => m.user_id, windowOf(q));
  return q.limit === undefined ? inactive : inactive.slice(0, q.limit);
}

/**
 * Most active users among the current holders of a role.
 */
export function getRoleActivity(
  ctx: LedgerContext,
  guildId: string,
  roleMemberIds: ReadonlySet<string>,
  q: WindowQuery = {}
): KeyCount[] {
  return roleGatedTop(
    readGuildActivity(ctx, guildId),
    (m) => m.user_id,
    roleMemberIds,
    windowOf(q),
    q.limit ?? DEFAULT_ACTIVITY_LIMIT
  );
}

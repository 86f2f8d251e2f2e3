/**
 * Role Ping Ledger — src/features/rolePings.ts
 * WHAT: Role-mention stream: record pings, rank pingers per role, personal counts, resets.
 * FLOWS:
 *  - ingestMessage() → recordPing() → role_pings.csv append
 *  - /rolecounts → getTopForRole() ; /mycounts → getCountsForUser()
 *  - /leaderboard → getServerLeaderboard() or getRoleTimeline()
 *  - /resetcounts, /resetmycounts → resetRoleCounts() / resetUserCounts()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { dailySeries, groupedRanking, topForKey, type DailyPoint, type GroupRanking, type KeyCount } from "../lib/aggregate.js";
import { unwrapOr, type Result } from "../lib/result.js";
import { nowIso, type TimeWindow } from "../lib/time.js";
import type { RemovalReport } from "../store/csvLedger.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { pingLedger, type PingEvent } from "../store/records.js";

export const DEFAULT_ROLE_TOP_LIMIT = 10;
export const LEADERBOARD_ROLES = 5;
export const LEADERBOARD_USERS_PER_ROLE = 3;

export type PingInput = {
  guildId: string;
  roleId: string;
  userId: string;
  channelId: string;
};

export function recordPing(ctx: LedgerContext, ping: PingInput, now: Date = new Date()): Result<void> {
  return pingLedger(ctx).append({
    guild_id: ping.guildId,
    role_id: ping.roleId,
    user_id: ping.userId,
    channel_id: ping.channelId,
    timestamp: nowIso(now),
  });
}

/**
 * Every ping of one guild, or [] if the ledger cannot be read.
 */
export function readGuildPings(ctx: LedgerContext, guildId: string): PingEvent[] {
  return unwrapOr(pingLedger(ctx).readAll(), []).filter((p) => p.guild_id === guildId);
}

/**
 * Users who pinged a role most, as (user_id, count).
 */
export function getTopForRole(
  ctx: LedgerContext,
  guildId: string,
  roleId: string,
  limit: number = DEFAULT_ROLE_TOP_LIMIT
): KeyCount[] {
  return topForKey(readGuildPings(ctx, guildId), (p) => p.user_id, {
    where: (p) => p.role_id === roleId,
    limit,
  });
}

/**
 * Roles one user pinged, as (role_id, count), busiest first.
 */
export function getCountsForUser(ctx: LedgerContext, guildId: string, userId: string): KeyCount[] {
  return topForKey(readGuildPings(ctx, guildId), (p) => p.role_id, {
    where: (p) => p.user_id === userId,
  });
}

/**
 * Most-pinged roles of a guild, each with its top pingers.
 * `roleExists` drops roles before the top `roles` are taken, so a deleted role
 * never takes a slot.
 */
export function getServerLeaderboard(
  ctx: LedgerContext,
  guildId: string,
  options: { roles?: number; perRole?: number; roleExists?: (roleId: string) => boolean } = {}
): GroupRanking[] {
  const { roleExists } = options;
  const pings = readGuildPings(ctx, guildId);
  return groupedRanking(
    roleExists ? pings.filter((p) => roleExists(p.role_id)) : pings,
    (p) => p.role_id,
    (p) => p.user_id,
    {
      groups: options.roles ?? LEADERBOARD_ROLES,
      perGroup: options.perRole ?? LEADERBOARD_USERS_PER_ROLE,
    }
  );
}

/**
 * Pings of one role per UTC day, oldest first.
 */
export function getRoleTimeline(
  ctx: LedgerContext,
  guildId: string,
  roleId: string,
  window?: TimeWindow
): DailyPoint[] {
  return dailySeries(
    readGuildPings(ctx, guildId).filter((p) => p.role_id === roleId),
    window
  );
}

/**
 * Drop every ping of (guild, role). Other guilds' rows for the same role id stay.
 */
export function resetRoleCounts(ctx: LedgerContext, guildId: string, roleId: string): Result<RemovalReport> {
  const result = pingLedger(ctx).removeWhere((p) => p.guild_id === guildId && p.role_id === roleId);
  if (result.ok) {
    logger.info({ guildId, roleId, ...result.value }, "[pings] role counts reset");
  }
  return result;
}

/**
 * Drop every ping a user made in one guild.
 */
export function resetUserCounts(ctx: LedgerContext, guildId: string, userId: string): Result<RemovalReport> {
  const result = pingLedger(ctx).removeWhere((p) => p.guild_id === guildId && p.user_id === userId);
  if (result.ok) {
    logger.info({ guildId, userId, ...result.value }, "[pings] user counts reset");
  }
  return result;
}

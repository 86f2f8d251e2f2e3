/**
 * Role Ping Ledger — src/features/roleRanking.ts
 * WHAT: Ranks a guild's monitored rank roles by the spoiler reactions their current members made.
 * FLOWS:
 *  - /spoilers ranks → rankRolesByReactions(ctx, guildId, resolver)
 *      → per-user reaction counts → memberRoleIds(user) → accumulateRoleTotals()
 *
 * A user holding two monitored roles adds their full count to both. Totals
 * measure what each role's members contribute; they are not a partition of
 * all reactions.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { countBy } from "../lib/aggregate.js";
import { logger } from "../lib/logger.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import type { MembershipResolver } from "./membership.js";
import { getRankRoles, readGuildReactions } from "./spoilerReactions.js";

export type RoleTotal = { roleId: string; total: number };

/**
 * Pure accumulation step.
 *
 * Output holds every monitored role that still exists, zero totals included,
 * highest total first; equal totals keep the configured order.
 *
 * @example
 * accumulateRoleTotals(
 *   new Map([["u1", 10]]),
 *   new Map([["u1", ["r1", "r2"]]]),
 *   ["r1", "r2"],
 *   new Set(["r1", "r2"])
 * );
 * // [{ roleId: "r1", total: 10 }, { roleId: "r2", total: 10 }]
 */
export function accumulateRoleTotals(
  countsByUser: ReadonlyMap<string, number>,
  rolesByUser: ReadonlyMap<string, readonly string[]>,
  monitoredRoles: readonly string[],
  existingRoles: ReadonlySet<string>
): RoleTotal[] {
  const totals = new Map<string, number>();
  for (const roleId of monitoredRoles) {
    if (existingRoles.has(roleId) && !totals.has(roleId)) totals.set(roleId, 0);
  }

  for (const [userId, count] of countsByUser) {
    // Set: a role listed twice on a member still counts once
    for (const roleId of new Set(rolesByUser.get(userId) ?? [])) {
      const current = totals.get(roleId);
      if (current !== undefined) totals.set(roleId, current + count);
    }
  }

  return Array.from(totals, ([roleId, total]) => ({ roleId, total })).sort((a, b) => b.total - a.total);
}

/**
 * Resolve memberships for every reacting user and rank the guild's rank roles.
 * Returns [] when no rank roles are configured.
 */
export async function rankRolesByReactions(
  ctx: LedgerContext,
  guildId: string,
  resolver: MembershipResolver
): Promise<RoleTotal[]> {
  const monitored = getRankRoles(ctx, guildId);
  if (monitored.length === 0) return [];

  const existing = new Set<string>();
  for (const roleId of monitored) {
    if (await resolver.roleExists(roleId)) existing.add(roleId);
  }
  const stale = monitored.filter((id) => !existing.has(id));
  if (stale.length > 0) {
    logger.debug({ guildId, stale }, "[roleRanking] skipping rank roles that no longer exist");
  }

  const countsByUser = countBy(readGuildReactions(ctx, guildId), (r) => r.user_id);
  const rolesByUser = new Map<string, string[]>();
  for (const userId of countsByUser.keys()) {
    rolesByUser.set(userId, await resolver.memberRoleIds(userId));
  }

  return accumulateRoleTotals(countsByUser, rolesByUser, monitored, existing);
}

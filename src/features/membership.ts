/**
 * Role Ping Ledger — src/features/membership.ts
 * WHAT: Current-membership lookups the aggregations need, behind a narrow interface.
 * FLOWS:
 *  - commands build discordMembership(guild) → roleRanking / inactivity / role-gated activity
 * DOCS:
 *  - GuildMemberManager.fetch: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberManager?scrollTo=fetch
 *  - Role.members: https://discord.js.org/#/docs/discord.js/main/class/Role?scrollTo=members
 *
 * Membership is always evaluated at query time, never stored with events.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild } from "discord.js";
import { classifyError, errorContext } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export interface MembershipResolver {
  /** Role ids the user holds right now; [] if they are no longer a member */
  memberRoleIds(userId: string): Promise<string[]>;
  roleExists(roleId: string): Promise<boolean>;
  /** User ids currently holding the role */
  roleMemberIds(roleId: string): Promise<string[]>;
  /** Every (non-bot) member of the guild */
  memberIds(): Promise<string[]>;
}

// Discord error codes for "that member/role is gone"
const UNKNOWN_MEMBER = 10007;
const UNKNOWN_USER = 10013;

/**
 * Resolver over a live guild. Member lists come from one full fetch, which
 * needs the GuildMembers privileged intent.
 */
export function discordMembership(guild: Guild): MembershipResolver {
  let fullFetch: Promise<void> | null = null;
  const ensureMembers = () => {
    fullFetch ??= guild.members.fetch().then(() => undefined);
    return fullFetch;
  };

  return {
    async memberRoleIds(userId) {
      try {
        const member = await guild.members.fetch(userId);
        return Array.from(member.roles.cache.keys());
      } catch (err) {
        const classified = classifyError(err);
        if (
          classified.kind === "discord_api" &&
          (classified.code === UNKNOWN_MEMBER || classified.code === UNKNOWN_USER)
        ) {
          return [];
        }
        logger.warn(errorContext(classified, { guildId: guild.id, userId }), "[membership] member lookup failed");
        return [];
      }
    },

    async roleExists(roleId) {
      if (guild.roles.cache.has(roleId)) return true;
      try {
        return (await guild.roles.fetch(roleId)) !== null;
      } catch (err) {
        logger.debug({ err, guildId: guild.id, roleId }, "[membership] role fetch failed; treating as deleted");
        return false;
      }
    },

    async roleMemberIds(roleId) {
      await ensureMembers();
      const role = guild.roles.cache.get(roleId);
      if (!role) return [];
      return Array.from(role.members.filter((m) => !m.user.bot).keys());
    },

    async memberIds() {
      await ensureMembers();
      return Array.from(guild.members.cache.filter((m) => !m.user.bot).keys());
    },
  };
}

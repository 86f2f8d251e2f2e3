/**
 * Role Ping Ledger — src/commands/buildCommands.ts
 * WHAT: JSON payloads of every slash command, for bulk registration with Discord.
 *
 * Guild commands update instantly; global ones can take up to an hour to propagate.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { data as activityData } from "./activity.js";
import { data as cleanupData } from "./cleanup.js";
import { data as healthData } from "./health.js";
import { data as helpData } from "./help.js";
import { data as leaderboardData } from "./leaderboard.js";
import { data as mycountsData } from "./mycounts.js";
import { data as resetcountsData } from "./resetcounts.js";
import { data as resetmycountsData } from "./resetmycounts.js";
import { data as rolecountsData } from "./rolecounts.js";
import { data as spoilersData } from "./spoilers.js";

export function buildCommands() {
  return [
    helpData.toJSON(),
    rolecountsData.toJSON(),
    leaderboardData.toJSON(),
    mycountsData.toJSON(),
    resetcountsData.toJSON(),
    resetmycountsData.toJSON(),
    cleanupData.toJSON(),
    activityData.toJSON(),
    spoilersData.toJSON(),
    healthData.toJSON(),
  ];
}

/**
 * Role Ping Ledger — tests/features/messageActivity.test.ts
 * WHAT: Activity recording and every /activity query over a temp ledger.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  getDailyActivity,
  getDistribution,
  getHourHistogram,
  getInactiveUsers,
  getPingRatios,
  getRoleActivity,
  getTopChannels,
  getTopUsers,
  readGuildActivity,
  recordMessage,
} from "../../src/features/messageActivity.js";
import { recordPing } from "../../src/features/rolePings.js";
import { activityLedger } from "../../src/store/records.js";
import { at, createTempLedgers, type TempLedgers } from "../utils/ledgers.js";

const NOW = at(2025, 1, 8);

describe("messageActivity", () => {
  let tmp: TempLedgers;

  const message = (userId: string, channelId: string, when: Date, guildId = "g1") =>
    recordMessage(tmp.ledgers, { guildId, userId, channelId }, when);

  beforeEach(() => {
    tmp = createTempLedgers();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("records one row per message", () => {
    message("u1", "c1", at(2025, 1, 5, 10));
    message("u2", "c1", at(2025, 1, 5, 11), "g2");
    expect(readGuildActivity(tmp.ledgers, "g1")).toEqual([
      { guild_id: "g1", user_id: "u1", channel_id: "c1", timestamp: "2025-01-05T10:00:00.000Z" },
    ]);
  });

  it("includes the window start and excludes anything older", () => {
    activityLedger(tmp.ledgers).rewrite([
      { guild_id: "g1", user_id: "edge", channel_id: "c1", timestamp: "2025-01-01T00:00:00.000000" },
      { guild_id: "g1", user_id: "older", channel_id: "c1", timestamp: "2024-12-31T23:59:59.999999" },
    ]);
    expect(getTopUsers(tmp.ledgers, "g1", { days: 7, now: NOW })).toEqual([{ key: "edge", count: 1 }]);
  });

  it("ranks channels and users inside the window", () => {
    message("u1", "c2", at(2025, 1, 6));
    message("u2", "c1", at(2025, 1, 6));
    message("u1", "c2", at(2025, 1, 7));
    message("u3", "c3", at(2024, 12, 1));
    expect(getTopChannels(tmp.ledgers, "g1", { days: 7, now: NOW })).toEqual([
      { key: "c2", count: 2 },
      { key: "c1", count: 1 },
    ]);
    expect(getTopUsers(tmp.ledgers, "g1", { days: 7, limit: 1, now: NOW })).toEqual([{ key: "u1", count: 2 }]);
  });

  it("buckets by UTC hour and by UTC day", () => {
    message("u1", "c1", at(2025, 1, 6, 14, 5));
    message("u1", "c1", at(2025, 1, 6, 14, 55));
    message("u2", "c1", at(2025, 1, 7, 3));
    const hours = getHourHistogram(tmp.ledgers, "g1", { days: 7, now: NOW });
    expect(hours[14]).toEqual({ hour: 14, count: 2 });
    expect(hours[3]).toEqual({ hour: 3, count: 1 });
    expect(getDailyActivity(tmp.ledgers, "g1", { days: 7, now: NOW })).toEqual([
      { date: "2025-01-06", count: 2 },
      { date: "2025-01-07", count: 1 },
    ]);
  });

  it("summarises how concentrated the traffic is", () => {
    for (let i = 0; i < 6; i++) message("heavy", "c1", at(2025, 1, 6));
    message("light1", "c1", at(2025, 1, 6));
    message("light2", "c1", at(2025, 1, 6));
    message("light3", "c1", at(2025, 1, 6));
    message("light3", "c1", at(2025, 1, 6));

    const summary = getDistribution(tmp.ledgers, "g1", { days: 7, now: NOW });
    expect(summary.users).toBe(4);
    expect(summary.total).toBe(10);
    expect(summary.shares[0]).toEqual({ fraction: 0.1, users: 1, volume: 6, share: 0.6 });
    expect(summary.shares[2]).toEqual({ fraction: 0.5, users: 2, volume: 8, share: 0.8 });
  });

  it("computes ping ratios from both ledgers", () => {
    recordPing(tmp.ledgers, { guildId: "g1", roleId: "r1", userId: "u1", channelId: "c1" }, at(2025, 1, 6));
    recordPing(tmp.ledgers, { guildId: "g1", roleId: "r1", userId: "u1", channelId: "c1" }, at(2025, 1, 6));
    message("u1", "c1", at(2025, 1, 6));
    message("u1", "c1", at(2025, 1, 6));
    message("u2", "c1", at(2025, 1, 6));
    expect(getPingRatios(tmp.ledgers, "g1", { days: 7, now: NOW })).toEqual([
      { userId: "u1", pings: 2, messages: 2, ratio: 0.5 },
      { userId: "u2", pings: 0, messages: 1, ratio: 0 },
    ]);
  });

  it("lists inactive members", () => {
    message("u1", "c1", at(2025, 1, 6));
    message("u2", "c1", at(2024, 12, 1));
    const inactive = getInactiveUsers(tmp.ledgers, "g1", ["u1", "u2", "u3"], { days: 7, now: NOW });
    expect(inactive).toEqual([
      { userId: "u3", lastSeenMs: null },
      { userId: "u2", lastSeenMs: at(2024, 12, 1).getTime() },
    ]);
  });

  it("ranks activity among current role holders only", () => {
    message("u1", "c1", at(2025, 1, 6));
    message("u2", "c1", at(2025, 1, 6));
    message("u2", "c1", at(2025, 1, 6));
    expect(getRoleActivity(tmp.ledgers, "g1", new Set(["u1"]), { days: 7, now: NOW })).toEqual([
      { key: "u1", count: 1 },
    ]);
  });
});

/**
 * Role Ping Ledger — tests/features/roleRanking.test.ts
 * WHAT: Rank-role totals from spoiler reactions and current memberships.
 * WHY: A member holding several monitored roles contributes to each of them.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { accumulateRoleTotals, rankRolesByReactions } from "../../src/features/roleRanking.js";
import { recordReaction, setRankRoles } from "../../src/features/spoilerReactions.js";
import { at, createTempLedgers, type TempLedgers } from "../utils/ledgers.js";
import { staticMembership } from "../utils/membership.js";

describe("accumulateRoleTotals", () => {
  it("credits a member's full count to every monitored role they hold", () => {
    const totals = accumulateRoleTotals(
      new Map([["u1", 10]]),
      new Map([["u1", ["r1", "r2"]]]),
      ["r1", "r2"],
      new Set(["r1", "r2"])
    );
    expect(totals).toEqual([
      { roleId: "r1", total: 10 },
      { roleId: "r2", total: 10 },
    ]);
  });

  it("keeps zero totals and configured order on ties", () => {
    const totals = accumulateRoleTotals(
      new Map([
        ["u1", 2],
        ["u2", 5],
      ]),
      new Map([
        ["u1", ["r3"]],
        ["u2", ["r2", "unmonitored"]],
      ]),
      ["r1", "r2", "r3", "r4"],
      new Set(["r1", "r2", "r3", "r4"])
    );
    expect(totals).toEqual([
      { roleId: "r2", total: 5 },
      { roleId: "r3", total: 2 },
      { roleId: "r1", total: 0 },
      { roleId: "r4", total: 0 },
    ]);
  });

  it("leaves out roles that no longer exist", () => {
    const totals = accumulateRoleTotals(
      new Map([["u1", 3]]),
      new Map([["u1", ["r1", "gone"]]]),
      ["gone", "r1"],
      new Set(["r1"])
    );
    expect(totals).toEqual([{ roleId: "r1", total: 3 }]);
  });

  it("counts a role listed twice on a member once", () => {
    const totals = accumulateRoleTotals(
      new Map([["u1", 4]]),
      new Map([["u1", ["r1", "r1"]]]),
      ["r1"],
      new Set(["r1"])
    );
    expect(totals).toEqual([{ roleId: "r1", total: 4 }]);
  });
});

describe("rankRolesByReactions", () => {
  let tmp: TempLedgers;

  const react = (userId: string) =>
    recordReaction(tmp.ledgers, { guildId: "g1", messageId: "m1", userId, emoji: "👀" }, at(2025, 1, 20));

  beforeEach(() => {
    tmp = createTempLedgers();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("returns nothing when no rank roles are configured", async () => {
    react("u1");
    const resolver = staticMembership({ rolesByUser: { u1: ["r1"] }, existingRoles: ["r1"] });
    expect(await rankRolesByReactions(tmp.ledgers, "g1", resolver)).toEqual([]);
    expect(resolver.memberRoleIds).not.toHaveBeenCalled();
  });

  it("ranks configured roles by their current members' reactions", async () => {
    setRankRoles(tmp.ledgers, "g1", ["r1", "r2", "deleted"]);
    for (let i = 0; i < 3; i++) react("u1");
    react("u2");
    // u3 left the server
    react("u3");
    react("u3");

    const resolver = staticMembership({
      rolesByUser: { u1: ["r2"], u2: ["r1", "r2"] },
      existingRoles: ["r1", "r2"],
    });

    expect(await rankRolesByReactions(tmp.ledgers, "g1", resolver)).toEqual([
      { roleId: "r2", total: 4 },
      { roleId: "r1", total: 1 },
    ]);
    expect(resolver.memberRoleIds).toHaveBeenCalledTimes(3);
  });
});

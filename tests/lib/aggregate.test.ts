/**
 * Role Ping Ledger — tests/lib/aggregate.test.ts
 * WHAT: Ranking, time-bucket, ratio, inactivity and role-gated aggregations.
 * WHY: Every command's numbers come from these; ties must follow first-seen order.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  countBy,
  dailySeries,
  filterWindow,
  groupedRanking,
  hourHistogram,
  inactiveUsers,
  lastSeen,
  mostActive,
  perUserCounts,
  pingRatio,
  rankCounts,
  roleGatedTop,
  topForKey,
} from "../../src/lib/aggregate.js";
import { windowBounds } from "../../src/lib/time.js";

type Row = { guild_id: string; role_id: string; user_id: string; channel_id: string; timestamp: string };

function row(user_id: string, timestamp: string, extra: Partial<Row> = {}): Row {
  return { guild_id: "g1", role_id: "r1", user_id, channel_id: "c1", timestamp, ...extra };
}

const NOW = new Date("2025-01-08T00:00:00Z");
const WEEK = windowBounds(7, NOW);

describe("countBy / rankCounts", () => {
  it("counts in first-seen order", () => {
    const counts = countBy(["b", "a", "b", "c"], (k) => k);
    expect(Array.from(counts)).toEqual([
      ["b", 2],
      ["a", 1],
      ["c", 1],
    ]);
  });

  it("sorts descending and keeps first-seen order on ties", () => {
    const counts = new Map([
      ["x", 1],
      ["y", 3],
      ["z", 1],
    ]);
    expect(rankCounts(counts)).toEqual([
      { key: "y", count: 3 },
      { key: "x", count: 1 },
      { key: "z", count: 1 },
    ]);
    expect(rankCounts(counts, 2)).toEqual([
      { key: "y", count: 3 },
      { key: "x", count: 1 },
    ]);
    expect(rankCounts(counts, 0)).toEqual([]);
  });
});

describe("topForKey", () => {
  it("ranks pingers of one role within one guild", () => {
    const rows = [
      row("u2", "2025-01-01T00:00:00"),
      row("u1", "2025-01-01T00:00:00"),
      row("u1", "2025-01-01T00:00:00"),
      row("u3", "2025-01-01T00:00:00", { role_id: "r2" }),
      row("u2", "2025-01-01T00:00:00"),
      row("u1", "2025-01-01T00:00:00", { guild_id: "g2" }),
      row("u3", "2025-01-01T00:00:00"),
    ];
    const top = topForKey(rows, (r) => r.user_id, {
      where: (r) => r.guild_id === "g1" && r.role_id === "r1",
    });
    expect(top).toEqual([
      { key: "u2", count: 2 },
      { key: "u1", count: 2 },
      { key: "u3", count: 1 },
    ]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(topForKey([row("u1", "x")], (r) => r.user_id, { where: () => false })).toEqual([]);
  });
});

describe("groupedRanking", () => {
  it("ranks groups by total and trims entries without changing totals", () => {
    const rows = [
      row("u1", "t", { role_id: "rA" }),
      row("u1", "t", { role_id: "rB" }),
      row("u2", "t", { role_id: "rB" }),
      row("u3", "t", { role_id: "rB" }),
      row("u2", "t", { role_id: "rA" }),
      row("u4", "t", { role_id: "rC" }),
    ];
    const ranking = groupedRanking(
      rows,
      (r) => r.role_id,
      (r) => r.user_id,
      { groups: 2, perGroup: 1 }
    );
    expect(ranking).toEqual([
      { key: "rB", total: 3, entries: [{ key: "u1", count: 1 }] },
      { key: "rA", total: 2, entries: [{ key: "u1", count: 1 }] },
    ]);
  });
});

describe("window filtering", () => {
  it("keeps [start, end) and drops malformed timestamps", () => {
    const rows = [
      row("start", "2025-01-01T00:00:00Z"),
      row("before", "2024-12-31T23:59:59.999Z"),
      row("end", "2025-01-08T00:00:00Z"),
      row("last", "2025-01-07T23:59:59.999Z"),
      row("bad", "yesterday-ish"),
    ];
    expect(filterWindow(rows, WEEK).map((r) => r.user_id)).toEqual(["start", "last"]);
  });
});

describe("dailySeries", () => {
  it("counts per UTC date in ascending order", () => {
    const rows = [
      row("u1", "2025-01-03T23:30:00Z"),
      row("u1", "2025-01-02T10:00:00Z"),
      // 00:30 at +01:00 is still Jan 2 in UTC
      row("u2", "2025-01-03T00:30:00+01:00"),
      row("u1", "2025-01-03T01:00:00Z"),
    ];
    expect(dailySeries(rows)).toEqual([
      { date: "2025-01-02", count: 2 },
      { date: "2025-01-03", count: 2 },
    ]);
  });

  it("respects an optional window", () => {
    const rows = [row("u1", "2024-12-01T00:00:00Z"), row("u1", "2025-01-05T00:00:00Z")];
    expect(dailySeries(rows, WEEK)).toEqual([{ date: "2025-01-05", count: 1 }]);
  });
});

describe("hourHistogram", () => {
  it("always returns 24 buckets", () => {
    const rows = [
      row("u1", "2025-01-05T09:15:00Z"),
      row("u2", "2025-01-06T09:45:00Z"),
      row("u3", "2025-01-06T23:00:00Z"),
      row("u4", "2024-01-01T09:00:00Z"),
    ];
    const buckets = hourHistogram(rows, WEEK);
    expect(buckets).toHaveLength(24);
    expect(buckets[9]).toEqual({ hour: 9, count: 2 });
    expect(buckets[23]).toEqual({ hour: 23, count: 1 });
    expect(buckets.reduce((sum, b) => sum + b.count, 0)).toBe(3);
  });
});

describe("mostActive / perUserCounts", () => {
  const rows = [
    row("u1", "2025-01-05T00:00:00Z", { channel_id: "c2" }),
    row("u2", "2025-01-05T00:00:00Z", { channel_id: "c1" }),
    row("u1", "2025-01-06T00:00:00Z", { channel_id: "c2" }),
    row("u1", "2024-06-01T00:00:00Z", { channel_id: "c1" }),
  ];

  it("ranks channels inside the window", () => {
    expect(mostActive(rows, (r) => r.channel_id, WEEK)).toEqual([
      { key: "c2", count: 2 },
      { key: "c1", count: 1 },
    ]);
  });

  it("lists per-user counts inside the window", () => {
    expect(perUserCounts(rows, (r) => r.user_id, WEEK)).toEqual([2, 1]);
  });
});

describe("pingRatio", () => {
  it("computes pings / (pings + messages) per user", () => {
    const pings = [row("u1", "2025-01-05T00:00:00Z"), row("u2", "2025-01-05T00:00:00Z"), row("u1", "2025-01-05T00:00:00Z")];
    const messages = [
      row("u1", "2025-01-05T00:00:00Z"),
      row("u2", "2025-01-05T00:00:00Z"),
      row("u2", "2025-01-05T00:00:00Z"),
      row("u2", "2025-01-05T00:00:00Z"),
      row("u3", "2025-01-05T00:00:00Z"),
    ];
    expect(pingRatio(pings, messages, WEEK)).toEqual([
      { userId: "u1", pings: 2, messages: 1, ratio: 2 / 3 },
      { userId: "u2", pings: 1, messages: 3, ratio: 0.25 },
      { userId: "u3", pings: 0, messages: 1, ratio: 0 },
    ]);
  });

  it("ignores rows outside the window", () => {
    const pings = [row("u1", "2024-01-01T00:00:00Z")];
    expect(pingRatio(pings, [], WEEK)).toEqual([]);
  });
});

describe("lastSeen / inactiveUsers", () => {
  const rows = [
    row("active", "2025-01-06T00:00:00Z"),
    row("stale", "2024-12-20T00:00:00Z"),
    row("older", "2024-11-01T00:00:00Z"),
    row("stale", "2024-12-25T00:00:00Z"),
    // after the window end: must not count as activity
    row("future", "2025-01-09T00:00:00Z"),
  ];

  it("tracks the latest timestamp per user before a bound", () => {
    const seen = lastSeen(rows, (r) => r.user_id, WEEK.endMs);
    expect(seen.get("stale")).toBe(Date.parse("2024-12-25T00:00:00Z"));
    expect(seen.has("future")).toBe(false);
  });

  it("lists never-seen users first, then oldest activity", () => {
    const inactive = inactiveUsers(["active", "stale", "ghost", "older", "future", "ghost"], rows, (r) => r.user_id, WEEK);
    expect(inactive).toEqual([
      { userId: "ghost", lastSeenMs: null },
      { userId: "future", lastSeenMs: null },
      { userId: "older", lastSeenMs: Date.parse("2024-11-01T00:00:00Z") },
      { userId: "stale", lastSeenMs: Date.parse("2024-12-25T00:00:00Z") },
    ]);
  });
});

describe("roleGatedTop", () => {
  it("counts only current role holders", () => {
    const rows = [
      row("u1", "2025-01-05T00:00:00Z"),
      row("u2", "2025-01-05T00:00:00Z"),
      row("u2", "2025-01-05T00:00:00Z"),
      row("u3", "2025-01-05T00:00:00Z"),
    ];
    expect(roleGatedTop(rows, (r) => r.user_id, new Set(["u1", "u3"]), WEEK)).toEqual([
      { key: "u1", count: 1 },
      { key: "u3", count: 1 },
    ]);
  });
});

/**
 * Role Ping Ledger — src/lib/aggregate.ts
 * WHAT: Pure aggregations over ledger rows: top-K, grouped rankings, time buckets,
 *       ratios, last-seen/inactivity, role-gated activity.
 * FLOWS:
 *  - store.readAll() → rows → one of these → (key, count) sequences for embeds
 * DOCS:
 *  - Array.prototype.sort is stable since ES2019: https://tc39.es/ecma262/#sec-array.prototype.sort
 *
 * Every ranking breaks ties by first-seen order. Counting goes through a Map,
 * which iterates in insertion order, and the stable sort keeps that order for
 * equal counts.
 *
 * Windowed functions take a TimeWindow from windowBounds(days, now). Rows whose
 * timestamp does not parse are left out and counted in a debug log.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { inWindow, parseTimestamp, utcDateKey, utcHour, type TimeWindow } from "./time.js";

export type KeyCount = { key: string; count: number };

export type GroupRanking = {
  key: string;
  total: number;
  entries: KeyCount[];
};

export type DailyPoint = { date: string; count: number };
export type HourBucket = { hour: number; count: number };

export type RatioEntry = {
  userId: string;
  pings: number;
  messages: number;
  /** pings / (pings + messages), in [0, 1] */
  ratio: number;
};

export type InactiveUser = {
  userId: string;
  /** Most recent record before the window's end, epoch ms; null if never seen */
  lastSeenMs: number | null;
};

/** Anything carrying a ledger timestamp */
export type Stamped = { timestamp: string };

export type Timed<T> = { row: T; at: number };

// ===== Counting and ranking =====

/**
 * Count rows per key, in first-seen key order.
 */
export function countBy<T>(rows: Iterable<T>, keyOf: (row: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const key = keyOf(row);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Sort counts descending, ties in map order. No limit means every key.
 */
export function rankCounts(counts: ReadonlyMap<string, number>, limit?: number): KeyCount[] {
  const ranked = Array.from(counts, ([key, count]) => ({ key, count })).sort((a, b) => b.count - a.count);
  return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
}

/**
 * Top-K values of one field among the rows that match.
 *
 * @example
 * topForKey(pings, (p) => p.user_id, {
 *   where: (p) => p.guild_id === "1" && p.role_id === "10",
 *   limit: 10,
 * });
 * // [{ key: "u1", count: 3 }, { key: "u2", count: 2 }, { key: "u3", count: 1 }]
 */
export function topForKey<T>(
  rows: readonly T[],
  keyOf: (row: T) => string,
  options: { where?: (row: T) => boolean; limit?: number } = {}
): KeyCount[] {
  const { where, limit } = options;
  const matching = where ? rows.filter(where) : rows;
  return rankCounts(countBy(matching, keyOf), limit);
}

/**
 * Two-level ranking: groups by total, and inside each group the top entries.
 * `groups` caps how many groups come back, `perGroup` how many entries each keeps;
 * a group's total always counts every row, not just the kept entries.
 */
export function groupedRanking<T>(
  rows: readonly T[],
  groupOf: (row: T) => string,
  entryOf: (row: T) => string,
  options: { groups?: number; perGroup?: number } = {}
): GroupRanking[] {
  const buckets = new Map<string, T[]>();
  for (const row of rows) {
    const key = groupOf(row);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      buckets.set(key, [row]);
    }
  }

  const ranked = Array.from(buckets, ([key, members]) => ({
    key,
    total: members.length,
    entries: rankCounts(countBy(members, entryOf), options.perGroup),
  })).sort((a, b) => b.total - a.total);

  return options.groups === undefined ? ranked : ranked.slice(0, Math.max(0, options.groups));
}

// ===== Time handling =====

/**
 * Pair each row with its parsed timestamp. Unparsable rows are dropped.
 */
export function withTimestamps<T extends Stamped>(rows: readonly T[], label = "rows"): Timed<T>[] {
  const out: Timed<T>[] = [];
  let malformed = 0;
  for (const row of rows) {
    const at = parseTimestamp(row.timestamp);
    if (at === null) {
      malformed++;
      continue;
    }
    out.push({ row, at });
  }
  if (malformed > 0) {
    logger.debug({ label, malformed }, "[aggregate] skipped rows with malformed timestamps");
  }
  return out;
}

/**
 * Rows whose timestamp falls in [start, end).
 */
export function filterWindow<T extends Stamped>(rows: readonly T[], window: TimeWindow, label?: string): T[] {
  return withTimestamps(rows, label)
    .filter(({ at }) => inWindow(at, window))
    .map(({ row }) => row);
}

/**
 * Count per UTC calendar date, ascending. Dates with no rows are absent.
 * Pass a window to restrict the series; without one every parsable row counts.
 */
export function dailySeries<T extends Stamped>(rows: readonly T[], window?: TimeWindow): DailyPoint[] {
  const timed = withTimestamps(rows, "dailySeries");
  const counts = new Map<string, number>();
  for (const { at } of timed) {
    if (window && !inWindow(at, window)) continue;
    const date = utcDateKey(at);
    counts.set(date, (counts.get(date) ?? 0) + 1);
  }
  // YYYY-MM-DD sorts lexicographically in date order
  return Array.from(counts, ([date, count]) => ({ date, count })).sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : 0
  );
}

/**
 * All 24 UTC hours in order, zero-count hours included.
 */
export function hourHistogram<T extends Stamped>(rows: readonly T[], window: TimeWindow): HourBucket[] {
  const buckets: HourBucket[] = Array.from({ length: 24 }, (_, hour) => ({ hour, count: 0 }));
  for (const { at } of withTimestamps(rows, "hourHistogram")) {
    if (!inWindow(at, window)) continue;
    buckets[utcHour(at)].count++;
  }
  return buckets;
}

/**
 * Top-K of one field within the window (most active channels or users).
 */
export function mostActive<T extends Stamped>(
  rows: readonly T[],
  keyOf: (row: T) => string,
  window: TimeWindow,
  limit?: number
): KeyCount[] {
  return rankCounts(countBy(filterWindow(rows, window, "mostActive"), keyOf), limit);
}

// ===== Per-user metrics =====

/**
 * Per-user share of pings in their total traffic within the window.
 * Only users with at least one record appear. Highest ratio first; equal
 * ratios keep first-seen order (ping rows first, then message rows).
 */
export function pingRatio(
  pings: readonly (Stamped & { user_id: string })[],
  messages: readonly (Stamped & { user_id: string })[],
  window: TimeWindow
): RatioEntry[] {
  const totals = new Map<string, { pings: number; messages: number }>();
  const slot = (userId: string) => {
    let entry = totals.get(userId);
    if (!entry) {
      entry = { pings: 0, messages: 0 };
      totals.set(userId, entry);
    }
    return entry;
  };

  for (const row of filterWindow(pings, window, "pingRatio.pings")) slot(row.user_id).pings++;
  for (const row of filterWindow(messages, window, "pingRatio.messages")) slot(row.user_id).messages++;

  const out: RatioEntry[] = [];
  for (const [userId, t] of totals) {
    const total = t.pings + t.messages;
    if (total === 0) continue;
    out.push({ userId, pings: t.pings, messages: t.messages, ratio: t.pings / total });
  }
  return out.sort((a, b) => b.ratio - a.ratio);
}

/**
 * Latest timestamp per user, ignoring rows at or after `beforeMs` when given.
 */
export function lastSeen<T extends Stamped>(
  rows: readonly T[],
  userOf: (row: T) => string,
  beforeMs?: number
): Map<string, number> {
  const seen = new Map<string, number>();
  for (const { row, at } of withTimestamps(rows, "lastSeen")) {
    if (beforeMs !== undefined && at >= beforeMs) continue;
    const user = userOf(row);
    const prev = seen.get(user);
    if (prev === undefined || at > prev) seen.set(user, at);
  }
  return seen;
}

/**
 * Candidates with no record inside the window. Never-seen users come first,
 * then the rest by oldest last activity.
 */
export function inactiveUsers<T extends Stamped>(
  candidates: Iterable<string>,
  rows: readonly T[],
  userOf: (row: T) => string,
  window: TimeWindow
): InactiveUser[] {
  const seen = lastSeen(rows, userOf, window.endMs);
  const inactive: InactiveUser[] = [];
  const listed = new Set<string>();
  for (const userId of candidates) {
    if (listed.has(userId)) continue;
    listed.add(userId);
    const at = seen.get(userId);
    if (at === undefined) {
      inactive.push({ userId, lastSeenMs: null });
    } else if (at < window.startMs) {
      inactive.push({ userId, lastSeenMs: at });
    }
  }
  return inactive.sort((a, b) => {
    if (a.lastSeenMs === null || b.lastSeenMs === null) {
      return (a.lastSeenMs === null ? 0 : 1) - (b.lastSeenMs === null ? 0 : 1);
    }
    return a.lastSeenMs - b.lastSeenMs;
  });
}

/**
 * Per-user top-K within the window, restricted to the given members
 * (typically everyone currently holding a role).
 */
export function roleGatedTop<T extends Stamped>(
  rows: readonly T[],
  userOf: (row: T) => string,
  members: ReadonlySet<string>,
  window: TimeWindow,
  limit?: number
): KeyCount[] {
  const gated = rows.filter((row) => members.has(userOf(row)));
  return mostActive(gated, userOf, window, limit);
}

/**
 * Per-user counts within the window as plain numbers, for distribution math.
 */
export function perUserCounts<T extends Stamped>(
  rows: readonly T[],
  userOf: (row: T) => string,
  window: TimeWindow
): number[] {
  return Array.from(countBy(filterWindow(rows, window, "perUserCounts"), userOf).values());
}

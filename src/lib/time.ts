/**
 * Role Ping Ledger — src/lib/time.ts
 * WHAT: ISO-8601 timestamp parsing/formatting and trailing-window math.
 * FLOWS:
 *  - nowIso() → timestamp written into every ledger row
 *  - parseTimestamp() → epoch ms (UTC) or null for anything unparsable
 *  - windowBounds(days, now) → [start, end) used by every windowed aggregation
 * DOCS:
 *  - ISO 8601: https://en.wikipedia.org/wiki/ISO_8601
 *
 * NOTE: Ledger timestamps may be timezone-naive ("2025-01-20T12:00:00", older
 * rows) or offset-qualified ("...+00:00", "...Z"). Naive means UTC. We do not
 * hand these to Date.parse, which reads naive date-times as local time.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/**
 * date, optional time (T or space separator), optional fraction of any
 * precision, optional Z / ±HH:MM / ±HHMM / ±HH offset.
 */
const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

/**
 * Current time as the ISO string stored in ledgers, e.g. "2025-10-20T18:42:07.123Z".
 */
export function nowIso(now: Date = new Date()): string {
  return now.toISOString();
}

function parseOffsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset === "Z" || offset === "z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse a ledger timestamp into epoch milliseconds (UTC).
 *
 * Returns null for malformed input, including out-of-range fields such as
 * month 13 or Feb 30. Sub-millisecond digits are truncated.
 *
 * @example
 * parseTimestamp("2025-01-20T12:00:00")        // 1737374400000 (naive → UTC)
 * parseTimestamp("2025-01-20T13:00:00+01:00")  // 1737374400000
 * parseTimestamp("not a date")                  // null
 */
export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = ISO_RE.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = "0", mi = "0", s = "0", frac = "", offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const ms = Number(frac.padEnd(3, "0").slice(0, 3));

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const offsetMinutes = parseOffsetMinutes(offset);
  if (offsetMinutes === null) return null;

  const base = Date.UTC(year, month - 1, day, hour, minute, second, ms);
  // Date.UTC rolls Feb 30 over into March; reject instead of silently shifting
  const check = new Date(base);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  return base - offsetMinutes * 60 * 1000;
}

/**
 * UTC calendar date ("YYYY-MM-DD") of an epoch-ms instant.
 */
export function utcDateKey(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

/**
 * UTC hour of day (0-23) of an epoch-ms instant.
 */
export function utcHour(epochMs: number): number {
  return new Date(epochMs).getUTCHours();
}

export type TimeWindow = {
  /** inclusive lower bound, epoch ms */
  startMs: number;
  /** exclusive upper bound, epoch ms */
  endMs: number;
};

/**
 * Trailing window [now - days, now).
 */
export function windowBounds(days: number, now: Date = new Date()): TimeWindow {
  const endMs = now.getTime();
  return { startMs: endMs - days * DAY_MS, endMs };
}

export function inWindow(epochMs: number, window: TimeWindow): boolean {
  return epochMs >= window.startMs && epochMs < window.endMs;
}

/**
 * Formats an epoch-ms instant for embeds: "2025-10-20 18:42 UTC".
 */
export function formatUtc(epochMs: number): string {
  return new Date(epochMs)
    .toISOString()
    .replace("T", " ")
    .replace(/:\d{2}\.\d{3}Z$/, " UTC");
}

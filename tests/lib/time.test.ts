/**
 * Role Ping Ledger — tests/lib/time.test.ts
 * WHAT: Timestamp parsing (naive = UTC, offsets, bad input) and window math.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  DAY_MS,
  formatUtc,
  inWindow,
  nowIso,
  parseTimestamp,
  utcDateKey,
  utcHour,
  windowBounds,
} from "../../src/lib/time.js";

describe("parseTimestamp", () => {
  it("reads a naive date-time as UTC", () => {
    expect(parseTimestamp("2025-01-20T12:00:00")).toBe(Date.UTC(2025, 0, 20, 12, 0, 0));
  });

  it("applies explicit offsets", () => {
    expect(parseTimestamp("2025-01-20T13:00:00+01:00")).toBe(Date.UTC(2025, 0, 20, 12, 0, 0));
    expect(parseTimestamp("2025-01-20T07:30:00-0430")).toBe(Date.UTC(2025, 0, 20, 12, 0, 0));
    expect(parseTimestamp("2025-01-20T12:00:00Z")).toBe(Date.UTC(2025, 0, 20, 12, 0, 0));
  });

  it("keeps milliseconds and truncates finer fractions", () => {
    expect(parseTimestamp("2025-01-20T12:00:00.123456+00:00")).toBe(Date.UTC(2025, 0, 20, 12, 0, 0, 123));
    expect(parseTimestamp("2025-01-20T12:00:00.5Z")).toBe(Date.UTC(2025, 0, 20, 12, 0, 0, 500));
  });

  it("accepts a space separator and a bare date", () => {
    expect(parseTimestamp("2025-01-20 12:00:00")).toBe(Date.UTC(2025, 0, 20, 12));
    expect(parseTimestamp("2025-01-20")).toBe(Date.UTC(2025, 0, 20));
  });

  it("round-trips what nowIso writes", () => {
    const now = new Date(Date.UTC(2025, 9, 20, 18, 42, 7, 123));
    expect(nowIso(now)).toBe("2025-10-20T18:42:07.123Z");
    expect(parseTimestamp(nowIso(now))).toBe(now.getTime());
  });

  it("returns null for malformed or impossible values", () => {
    expect(parseTimestamp("not a date")).toBeNull();
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp("2025-13-01T00:00:00")).toBeNull();
    expect(parseTimestamp("2025-02-30T00:00:00")).toBeNull();
    expect(parseTimestamp("2025-01-20T24:00:00")).toBeNull();
    expect(parseTimestamp("2025-01-20T12:00:00+25:00")).toBeNull();
  });
});

describe("windowBounds / inWindow", () => {
  const now = new Date(Date.UTC(2025, 0, 8));
  const window = windowBounds(7, now);

  it("spans [now - days, now)", () => {
    expect(window).toEqual({ startMs: Date.UTC(2025, 0, 1), endMs: Date.UTC(2025, 0, 8) });
    expect(window.endMs - window.startMs).toBe(7 * DAY_MS);
  });

  it("includes the start and excludes the end", () => {
    expect(inWindow(window.startMs, window)).toBe(true);
    expect(inWindow(window.startMs - 1, window)).toBe(false);
    expect(inWindow(window.endMs - 1, window)).toBe(true);
    expect(inWindow(window.endMs, window)).toBe(false);
  });
});

describe("UTC helpers", () => {
  const instant = Date.UTC(2025, 9, 20, 18, 42, 7, 123);

  it("utcDateKey", () => {
    expect(utcDateKey(instant)).toBe("2025-10-20");
  });

  it("utcHour", () => {
    expect(utcHour(instant)).toBe(18);
  });

  it("formatUtc", () => {
    expect(formatUtc(instant)).toBe("2025-10-20 18:42 UTC");
  });
});

/**
 * Role Ping Ledger — tests/lib/reqctx.test.ts
 * WHAT: Unit tests for request context and async local storage.
 * WHY: Verify trace ID generation and context propagation across awaits.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { ctx, newTraceId, runWithCtx } from "../../src/lib/reqctx.js";

describe("newTraceId", () => {
  it("returns 11 base62 characters", () => {
    expect(newTraceId()).toMatch(/^[0-9A-Za-z]{11}$/);
  });

  it("differs between calls", () => {
    const ids = new Set(Array.from({ length: 50 }, () => newTraceId()));
    expect(ids.size).toBe(50);
  });
});

describe("runWithCtx / ctx", () => {
  it("is empty outside a context", () => {
    expect(ctx()).toEqual({});
  });

  it("exposes the bound fields and returns fn's value", () => {
    const result = runWithCtx({ traceId: "t1", cmd: "health", userId: "u1" }, () => ctx());
    expect(result).toEqual({ traceId: "t1", cmd: "health", userId: "u1", guildId: null, channelId: null });
  });

  it("lets nested contexts inherit unset fields", () => {
    const inner = runWithCtx({ traceId: "outer", guildId: "g1" }, () =>
      runWithCtx({ cmd: "leaderboard" }, () => ctx())
    );
    expect(inner).toMatchObject({ traceId: "outer", guildId: "g1", cmd: "leaderboard" });
  });

  it("generates a trace id when none is given", () => {
    const traceId = runWithCtx({ cmd: "help" }, () => ctx().traceId);
    expect(traceId).toMatch(/^[0-9A-Za-z]{11}$/);
  });

  it("survives awaits", async () => {
    const seen = await runWithCtx({ traceId: "async-1" }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return ctx().traceId;
    });
    expect(seen).toBe("async-1");
    expect(ctx()).toEqual({});
  });
});

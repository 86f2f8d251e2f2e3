/**
 * Role Ping Ledger — tests/lib/eventWrap.test.ts
 * WHAT: Unit tests for the event handler wrapper.
 * WHY: Verify error protection, timeouts, Sentry filtering and context extraction.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
}));

const sentryMock = vi.hoisted(() => ({
  captureException: vi.fn(),
}));

vi.mock("../../src/lib/sentry.js", () => sentryMock);

import { extractEventContext, wrapEvent } from "../../src/lib/eventWrap.js";
import { createDiscordAPIError } from "../utils/discordMocks.js";

beforeEach(() => {
  vi.clearAllMocks();
});

describe("wrapEvent", () => {
  it("passes the event arguments through", async () => {
    const handler = vi.fn((_a: string, _b: number) => {});
    await wrapEvent("messageCreate", handler)("x", 1);
    expect(handler).toHaveBeenCalledWith("x", 1);
    expect(loggerMock.error).not.toHaveBeenCalled();
  });

  it("never rejects when the handler throws", async () => {
    const wrapped = wrapEvent("messageCreate", () => {
      throw new Error("boom");
    });

    await expect(wrapped()).resolves.toBeUndefined();
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "event_error", event: "messageCreate", errorKind: "unknown" }),
      "[messageCreate] event handler failed: boom"
    );
    expect(sentryMock.captureException).toHaveBeenCalledWith(expect.any(Error), {
      event: "messageCreate",
      errorKind: "unknown",
    });
  });

  it("does not report operational Discord errors", async () => {
    const wrapped = wrapEvent("messageReactionAdd", async () => {
      throw createDiscordAPIError(10008, "Unknown Message", 404);
    });

    await wrapped();
    expect(loggerMock.error).toHaveBeenCalledTimes(1);
    expect(sentryMock.captureException).not.toHaveBeenCalled();
  });

  it("includes ids from the event arguments in the log", async () => {
    const wrapped = wrapEvent("messageCreate", (_message: object) => {
      throw new Error("boom");
    });

    await wrapped({ id: "m1", guildId: "g1", channelId: "c1", author: { id: "u1" } });
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ guildId: "g1", channelId: "c1", userId: "u1", entityId: "m1" }),
      "[messageCreate] event handler failed: boom"
    );
  });

  it("gives up on handlers that outlive the timeout", async () => {
    vi.useFakeTimers();
    const wrapped = wrapEvent("messageReactionAdd", () => new Promise<void>(() => {}), 50);

    const pending = wrapped();
    await vi.advanceTimersByTimeAsync(50);
    await expect(pending).resolves.toBeUndefined();
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: "messageReactionAdd" }),
      "[messageReactionAdd] event handler failed: Event handler timeout after 50ms"
    );
  });
});

describe("extractEventContext", () => {
  it("reads a message", () => {
    expect(extractEventContext([{ id: "m1", guildId: "g1", channelId: "c1", author: { id: "u1" } }])).toEqual({
      guildId: "g1",
      channelId: "c1",
      userId: "u1",
      entityId: "m1",
    });
  });

  it("reads a reaction through its message, then the reacting user", () => {
    const reaction = { message: { id: "m1", guildId: "g1", channelId: "c1" } };
    const user = { id: "u2" };
    expect(extractEventContext([reaction, user])).toEqual({
      guildId: "g1",
      channelId: "c1",
      messageId: "m1",
      entityId: "u2",
    });
  });

  it("ignores primitives and nulls", () => {
    expect(extractEventContext([null, undefined, "text", 42])).toEqual({});
  });
});

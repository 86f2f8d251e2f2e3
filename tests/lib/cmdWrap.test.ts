/**
 * Role Ping Ledger — tests/lib/cmdWrap.test.ts
 * WHAT: Proves wrapCommand logs, reports and replies with a trace id on thrown errors.
 * HOW: Hoisted vitest mocks for logger/sentry/reqctx and a fake ChatInputCommandInteraction.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi, beforeEach } from "vitest";
import { MessageFlags } from "discord.js";

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
  setTag: vi.fn(),
}));

vi.mock("../../src/lib/sentry.js", () => sentryMock);

vi.mock("../../src/lib/reqctx.js", () => ({
  ctx: vi.fn(() => ({ traceId: "trace-fixed" })),
  newTraceId: vi.fn(() => "trace-new"),
}));

import { ensureDeferred, replyOrEdit, withStep, wrapCommand, type CommandContext } from "../../src/lib/cmdWrap.js";
import { ValidationError } from "../../src/lib/validation.js";
import { createDiscordAPIError, createMockInteraction } from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";

beforeEach(() => {
  vi.clearAllMocks();
});

describe("wrapCommand", () => {
  it("runs the handler with the request trace id and logs success", async () => {
    const interaction = createMockInteraction();
    const handler = vi.fn(async (_ctx: CommandContext) => {});

    await wrapCommand("rolecounts", handler)(interaction);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].traceId).toBe("trace-fixed");
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_ok", cmd: "rolecounts", traceId: "trace-fixed" }),
      "command ok"
    );
    expect(sentryMock.setTag).toHaveBeenCalledWith("cmd", "rolecounts");
    expect(interaction.reply).not.toHaveBeenCalled();
  });

  it("replies with a generic message and trace id when the handler throws", async () => {
    const interaction = createMockInteraction();

    await wrapCommand("leaderboard", async (ctx) => {
      ctx.step("aggregate");
      throw new Error("boom");
    })(interaction);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "An unexpected error occurred.\nTrace: `trace-fixed`",
      flags: MessageFlags.Ephemeral,
    });
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_error", cmd: "leaderboard", phase: "aggregate", errorKind: "unknown" }),
      "command error: boom"
    );
    expect(sentryMock.captureException).toHaveBeenCalledTimes(1);
  });

  it("shows validation messages verbatim and does not report them", async () => {
    const interaction = createMockInteraction();

    await wrapCommand("cleanup", async () => {
      throw new ValidationError("days must be a positive whole number of days (got 0)", "days");
    })(interaction);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "days must be a positive whole number of days (got 0)\nTrace: `trace-fixed`",
      flags: MessageFlags.Ephemeral,
    });
    expect(sentryMock.captureException).not.toHaveBeenCalled();
  });

  it("edits the deferred reply when the handler fails after deferring", async () => {
    const interaction = createMockInteraction({ deferred: true });

    await wrapCommand("activity", async () => {
      throw new Error("late failure");
    })(interaction);

    expect(interaction.editReply).toHaveBeenCalledWith({
      content: "An unexpected error occurred.\nTrace: `trace-fixed`",
    });
    expect(interaction.reply).not.toHaveBeenCalled();
  });

  it("never rejects when the error reply itself fails", async () => {
    const interaction = createMockInteraction({
      reply: vi.fn().mockRejectedValue(createDiscordAPIError(50013, "Missing Permissions", 403)),
    });

    await expect(
      wrapCommand("help", async () => {
        throw new Error("boom");
      })(interaction)
    ).resolves.toBeUndefined();
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_error_reply_fail" }),
      "Failed to post error reply"
    );
  });
});

describe("withStep", () => {
  it("marks the phase and returns the callback's value", async () => {
    const ctx = createTestCommandContext(createMockInteraction());
    const value = await withStep(ctx, "aggregate", () => 42);
    expect(value).toBe(42);
    expect(ctx.currentPhase()).toBe("aggregate");
  });
});

describe("replyOrEdit", () => {
  it("replies ephemerally by default", async () => {
    const interaction = createMockInteraction();
    await replyOrEdit(interaction, { content: "hi" });
    expect(interaction.reply).toHaveBeenCalledWith({ content: "hi", flags: MessageFlags.Ephemeral });
  });

  it("replies publicly when asked", async () => {
    const interaction = createMockInteraction();
    await replyOrEdit(interaction, { content: "hi" }, "public");
    expect(interaction.reply).toHaveBeenCalledWith({ content: "hi" });
  });

  it("follows up once a reply was sent", async () => {
    const interaction = createMockInteraction({ replied: true });
    await replyOrEdit(interaction, { content: "more" });
    expect(interaction.followUp).toHaveBeenCalledWith({ content: "more", flags: MessageFlags.Ephemeral });
  });

  it("swallows an expired interaction", async () => {
    const interaction = createMockInteraction({
      reply: vi.fn().mockRejectedValue(createDiscordAPIError(10062, "Unknown interaction", 404)),
    });
    await expect(replyOrEdit(interaction, { content: "hi" })).resolves.toBeUndefined();
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_reply_fail", code: 10062 }),
      "reply/edit skipped; interaction expired"
    );
  });

  it("swallows an already acknowledged interaction", async () => {
    const interaction = createMockInteraction({
      reply: vi.fn().mockRejectedValue(createDiscordAPIError(40060, "Interaction has already been acknowledged")),
    });
    await expect(replyOrEdit(interaction, { content: "hi" })).resolves.toBeUndefined();
  });

  it("rethrows anything else", async () => {
    const failure = createDiscordAPIError(50013, "Missing Permissions", 403);
    const interaction = createMockInteraction({ reply: vi.fn().mockRejectedValue(failure) });
    await expect(replyOrEdit(interaction, { content: "hi" })).rejects.toBe(failure);
  });
});

describe("ensureDeferred", () => {
  it("defers ephemerally once", async () => {
    const interaction = createMockInteraction();
    await ensureDeferred(interaction);
    await ensureDeferred(interaction);
    expect(interaction.deferReply).toHaveBeenCalledTimes(1);
    expect(interaction.deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral });
    expect(interaction.deferred).toBe(true);
  });

  it("defers publicly when asked", async () => {
    const interaction = createMockInteraction();
    await ensureDeferred(interaction, false);
    expect(interaction.deferReply).toHaveBeenCalledWith({});
  });

  it("skips interactions that were already answered", async () => {
    const interaction = createMockInteraction({ replied: true });
    await ensureDeferred(interaction);
    expect(interaction.deferReply).not.toHaveBeenCalled();
  });

  it("logs and continues when the interaction expired", async () => {
    const interaction = createMockInteraction({
      deferReply: vi.fn().mockRejectedValue(createDiscordAPIError(10062, "Unknown interaction", 404)),
    });
    await expect(ensureDeferred(interaction)).resolves.toBeUndefined();
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_defer_fail", code: 10062 }),
      "defer failed (interaction expired)"
    );
  });
});

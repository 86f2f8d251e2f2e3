/**
 * Role Ping Ledger — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches, classifies and logs errors
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  import { wrapEvent } from "./eventWrap.js";
 *  client.on(Events.MessageCreate, wrapEvent("messageCreate", async (message) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Handlers here only touch local files and fetch a partial or two.
 * Override via EVENT_TIMEOUT_MS or per handler.
 */
const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "10000", 10);

/**
 * Wrap an event handler with error protection. The returned handler never rejects.
 *
 * @example
 * client.on(Events.MessageReactionAdd, wrapEvent("messageReactionAdd", async (reaction, user) => {
 *   ingestReaction(ledgers, await resolveReaction(reaction, user));
 * }));
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        handler(...args),
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)), timeoutMs);
        }),
      ]);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err instanceof Error ? err : new Error(String(err)), {
          event: eventName,
          errorKind: classified.kind,
          ...contextIds,
        });
      }
      // Never re-throw: one bad event must not take the bot down
    } finally {
      clearTimeout(timer);
    }
  };
}

function stringProp(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" ? value : undefined;
}

function objectProp(obj: object, key: string): object | undefined {
  const value: unknown = Reflect.get(obj, key);
  return value !== null && typeof value === "object" ? value : undefined;
}

/**
 * Pull guild/user/channel ids out of whatever discord.js passed to the event
 * (Message, MessageReaction, User...). Unknown shapes contribute nothing.
 */
export function extractEventContext(args: readonly unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId = stringProp(arg, "guildId");
    if (guildId) context.guildId = guildId;

    const channelId = stringProp(arg, "channelId");
    if (channelId) context.channelId = channelId;

    // MessageReaction carries its message rather than ids of its own
    const message = objectProp(arg, "message");
    if (message) {
      const msgGuild = stringProp(message, "guildId");
      if (msgGuild) context.guildId = msgGuild;
      const msgChannel = stringProp(message, "channelId");
      if (msgChannel) context.channelId = msgChannel;
      const msgId = stringProp(message, "id");
      if (msgId) context.messageId = msgId;
    }

    const author = objectProp(arg, "author");
    const authorId = author ? stringProp(author, "id") : undefined;
    if (authorId) context.userId = authorId;

    const id = stringProp(arg, "id");
    if (id && !context.entityId) context.entityId = id;
  }

  return context;
}

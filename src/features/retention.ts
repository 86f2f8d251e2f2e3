/**
 * Role Ping Ledger — src/features/retention.ts
 * WHAT: Age-based pruning of every ledger (read → filter → atomic rewrite).
 * FLOWS:
 *  - retentionScheduler (startup + every 24h) → runRetention(ctx, days)
 *  - /cleanup [days] → cleanupGuild(ctx, guildId, days)
 *
 * A record survives iff its timestamp parses and is at or after now - days.
 * Unparsable timestamps count as expired. When nothing would be removed the
 * file is left untouched and the call still succeeds with removed: 0.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Stamped } from "../lib/aggregate.js";
import { errorContext } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { attempt, ok, type Result } from "../lib/result.js";
import { DAY_MS, parseTimestamp } from "../lib/time.js";
import { validateRetentionDays } from "../lib/validation.js";
import type { CsvLedger } from "../store/csvLedger.js";
import type { LedgerContext } from "../store/ledgerContext.js";
import { ReactionStore } from "../store/reactionStore.js";
import { activityLedger, pingLedger } from "../store/records.js";

export const DEFAULT_RETENTION_DAYS = 30;

export type CleanupReport = {
  removed: number;
  remaining: number;
  /** false for a no-op: missing store or nothing expired */
  rewritten: boolean;
};

export type CleanupOptions = {
  /** Only this guild's rows are eligible; other guilds' rows always survive */
  guildId?: string;
  now?: Date;
};

export type StoreCleanup = {
  /** "role_pings", "activity_messages" or "reactions:<guild_id>" */
  store: string;
  result: Result<CleanupReport>;
};

const NOTHING_TO_DO: CleanupReport = { removed: 0, remaining: 0, rewritten: false };

function cutoffMs(days: number, now: Date): number {
  return now.getTime() - days * DAY_MS;
}

function isExpired(timestamp: string, cutoff: number): boolean {
  const at = parseTimestamp(timestamp);
  return at === null || at < cutoff;
}

/**
 * Prune one shared CSV ledger.
 */
export function cleanupLedger<T extends Stamped & { guild_id: string }>(
  ledger: CsvLedger<T>,
  days: number,
  opts: CleanupOptions = {}
): Result<CleanupReport> {
  const checked = attempt(() => validateRetentionDays(days));
  if (!checked.ok) return checked;
  if (!ledger.exists()) return ok(NOTHING_TO_DO);

  const cutoff = cutoffMs(days, opts.now ?? new Date());
  const { guildId } = opts;
  const result = ledger.removeWhere(
    (row) => (guildId === undefined || row.guild_id === guildId) && isExpired(row.timestamp, cutoff)
  );
  if (!result.ok) return result;

  const report = { ...result.value, rewritten: result.value.removed > 0 };
  logger.info({ ledger: ledger.name, days, guildId, ...report }, "[retention] ledger cleaned");
  return ok(report);
}

/**
 * Prune one guild's reaction store.
 */
export function cleanupReactions(
  ctx: LedgerContext,
  guildId: string,
  days: number,
  opts: Pick<CleanupOptions, "now"> = {}
): Result<CleanupReport> {
  const checked = attempt(() => validateRetentionDays(days));
  if (!checked.ok) return checked;

  const store = new ReactionStore(ctx);
  if (!store.exists(guildId)) return ok(NOTHING_TO_DO);

  const all = store.readAll(guildId);
  if (!all.ok) return all;

  const cutoff = cutoffMs(days, opts.now ?? new Date());
  const kept = all.value.filter((r) => !isExpired(r.timestamp, cutoff));
  const removed = all.value.length - kept.length;
  if (removed === 0) return ok({ removed: 0, remaining: kept.length, rewritten: false });

  const written = store.rewrite(guildId, kept);
  if (!written.ok) return written;

  logger.info({ guildId, days, removed, remaining: kept.length }, "[retention] reactions cleaned");
  return ok({ removed, remaining: kept.length, rewritten: true });
}

/**
 * Prune one guild across every stream (manual /cleanup).
 */
export function cleanupGuild(
  ctx: LedgerContext,
  guildId: string,
  days: number,
  opts: Pick<CleanupOptions, "now"> = {}
): StoreCleanup[] {
  const scoped = { guildId, now: opts.now };
  return [
    { store: "role_pings", result: cleanupLedger(pingLedger(ctx), days, scoped) },
    { store: "activity_messages", result: cleanupLedger(activityLedger(ctx), days, scoped) },
    { store: `reactions:${guildId}`, result: cleanupReactions(ctx, guildId, days, opts) },
  ];
}

/**
 * Prune everything: both shared ledgers and every guild's reaction store.
 */
export function runRetention(
  ctx: LedgerContext,
  days: number = DEFAULT_RETENTION_DAYS,
  opts: Pick<CleanupOptions, "now"> = {}
): StoreCleanup[] {
  const results: StoreCleanup[] = [
    { store: "role_pings", result: cleanupLedger(pingLedger(ctx), days, opts) },
    { store: "activity_messages", result: cleanupLedger(activityLedger(ctx), days, opts) },
  ];

  const guilds = new ReactionStore(ctx).listGuilds();
  if (guilds.ok) {
    for (const guildId of guilds.value) {
      results.push({ store: `reactions:${guildId}`, result: cleanupReactions(ctx, guildId, days, opts) });
    }
  } else {
    logger.warn(errorContext(guilds.error), "[retention] could not list reaction stores");
    results.push({ store: "reactions", result: guilds });
  }

  return results;
}

/**
 * Sum of removed rows across successful cleanups.
 */
export function totalRemoved(results: readonly StoreCleanup[]): number {
  return results.reduce((sum, r) => sum + (r.result.ok ? r.result.value.removed : 0), 0);
}

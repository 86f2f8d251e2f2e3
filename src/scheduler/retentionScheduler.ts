/**
 * Role Ping Ledger — src/scheduler/retentionScheduler.ts
 * WHAT: Runs ledger retention once at startup and then every 24 hours.
 * FLOWS:
 *  - startRetentionScheduler(ctx, days) → runRetentionOnce() → runRetention() → recordSchedulerRun()
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 *
 * Runs never overlap: retention is fully synchronous, so the next tick cannot
 * start until the previous one has returned.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { runRetention, totalRemoved } from "../features/retention.js";
import { classifyError, errorContext } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { DAY_MS } from "../lib/time.js";
import type { LedgerContext } from "../store/ledgerContext.js";

export const RETENTION_SCHEDULER_NAME = "retention";
export const RETENTION_INTERVAL_MS = DAY_MS;

let _activeInterval: NodeJS.Timeout | null = null;

/**
 * One retention pass. Returns true when every store was cleaned.
 */
export function runRetentionOnce(ctx: LedgerContext, days: number): boolean {
  try {
    const results = runRetention(ctx, days);
    const failures = results.filter((r) => !r.result.ok).map((r) => r.store);
    const success = failures.length === 0;
    recordSchedulerRun(RETENTION_SCHEDULER_NAME, success);

    if (success) {
      logger.info({ days, stores: results.length, removed: totalRemoved(results) }, "[retention:scheduler] run complete");
    } else {
      logger.warn({ days, failures }, "[retention:scheduler] run finished with failures");
    }
    return success;
  } catch (err) {
    recordSchedulerRun(RETENTION_SCHEDULER_NAME, false);
    logger.error(errorContext(classifyError(err), { err, days }), "[retention:scheduler] run failed");
    return false;
  }
}

/**
 * @example
 * // In src/index.ts ClientReady event:
 * startRetentionScheduler(ledgers, env.RETENTION_DAYS);
 */
export function startRetentionScheduler(
  ctx: LedgerContext,
  days: number,
  intervalMs: number = RETENTION_INTERVAL_MS
): void {
  // Opt-out for tests; an interval left running keeps vitest alive
  if (process.env.RETENTION_SCHEDULER_DISABLED === "1") {
    logger.debug("[retention:scheduler] scheduler disabled via env flag");
    return;
  }
  if (_activeInterval) {
    logger.debug("[retention:scheduler] already running");
    return;
  }

  logger.info({ days, intervalMs }, "[retention:scheduler] starting retention scheduler");
  runRetentionOnce(ctx, days);

  const interval = setInterval(() => {
    runRetentionOnce(ctx, days);
  }, intervalMs);
  // Don't hold the process open on shutdown
  interval.unref();
  _activeInterval = interval;
}

export function stopRetentionScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[retention:scheduler] scheduler stopped");
  }
}

/**
 * Role Ping Ledger — src/lib/schedulerHealth.ts
 * WHAT: Health tracking for scheduled background tasks.
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update state → error log past the failure threshold
 *  - getSchedulerHealth() / getSchedulerHealthByName(name) → /health
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  /** Scheduler name, e.g. "retention" */
  name: string;
  /** Last run attempt (success or failure), epoch ms */
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Failures since the last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

/** Consecutive failures before an error-level log */
const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

/**
 * @example
 * const ok = runRetentionOnce(ctx, 30);
 * recordSchedulerRun("retention", ok);
 */
export function recordSchedulerRun(name: string, success: boolean, now: number = Date.now()): void {
  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

/** Copy of every tracked scheduler's state */
export function getSchedulerHealth(): Map<string, SchedulerHealth> {
  return new Map(Array.from(schedulerHealth, ([name, h]) => [name, { ...h }]));
}

export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = schedulerHealth.get(name);
  return health ? { ...health } : undefined;
}

/** Test helper: clean slate between tests */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}

/**
 * Role Ping Ledger — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture and shutdown.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import { logger } from "./logger.js";

let sentryEnabled = false;

export type SentryOptions = {
  dsn?: string;
  environment?: string;
  tracesSampleRate?: number;
  release?: string;
};

function hasValidDsn(dsn: string | undefined): dsn is string {
  // Sentry DSN format: https://{key}@{org}.ingest.sentry.io/{project}
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates with a structurally valid DSN and never under Vitest.
 */
export function initializeSentry(opts: SentryOptions): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(opts.dsn)) {
    logger.info("[sentry] DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: opts.dsn,
      environment: opts.environment ?? process.env.NODE_ENV ?? "development",
      release: opts.release,
      tracesSampleRate: opts.tracesSampleRate ?? 0.1,
    });
    sentryEnabled = true;
    logger.info({ environment: opts.environment }, "[sentry] error tracking enabled");
  } catch (err) {
    sentryEnabled = false;
    logger.warn({ err }, "[sentry] initialization failed, continuing without error tracking");
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception with optional extra context. No-op when disabled.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;
  Sentry.captureException(error, context ? { extra: context } : undefined);
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;
  Sentry.setTag(key, value);
}

/**
 * Flush pending events before the process exits.
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err }, "[sentry] flush failed");
  }
}

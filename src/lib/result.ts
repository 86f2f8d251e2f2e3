/**
 * Role Ping Ledger — src/lib/result.ts
 * WHAT: Ok/Failed result type for best-effort ledger I/O.
 * FLOWS:
 *  - store call → Result<T>
 *  - call site decides: degrade to empty (queries), ignore (ingestion), or report (commands)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { classifyError, type ClassifiedError } from "./errors.js";

export type Ok<T> = { ok: true; value: T };
export type Failed = { ok: false; error: ClassifiedError };
export type Result<T> = Ok<T> | Failed;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function failed(error: ClassifiedError): Failed {
  return { ok: false, error };
}

/**
 * Run a synchronous operation and capture any thrown error as a classified failure.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (err) {
    return failed(classifyError(err));
  }
}

/**
 * The degrade-to-default rule used by query paths.
 */
export function unwrapOr<T>(result: Result<T>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

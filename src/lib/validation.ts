/**
 * Role Ping Ledger — src/lib/validation.ts
 * WHAT: Input validation helpers for ledger operations.
 * FLOWS:
 *  - validateRetentionDays(days) → throws if not a positive whole number
 *  - validateStoreKey(id) → throws if the id is unsafe as a file name
 *  - validateRankRoles(ids) → ordered, de-duplicated list of at most 5 role ids
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** Most role ids a guild may monitor for reaction ranking */
export const MAX_RANK_ROLES = 5;

/**
 * Store keys become file names (data/reactions/stats/<guild_id>.json).
 * Snowflakes are digits; tests and tools use short slugs. Nothing else gets through.
 */
const STORE_KEY_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * ValidationError
 * WHAT: Custom error class for validation failures.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * validateRetentionDays
 * Rejects zero, negatives, fractions, NaN and Infinity. A zero-day horizon
 * would delete every record, so it is never coerced.
 *
 * @example
 * validateRetentionDays(30); // 30
 * validateRetentionDays(0);  // throws ValidationError
 */
export function validateRetentionDays(days: number, fieldName = "days"): number {
  if (!Number.isFinite(days) || !Number.isInteger(days) || days <= 0) {
    throw new ValidationError(`${fieldName} must be a positive whole number of days (got ${days})`, fieldName);
  }
  return days;
}

/**
 * validateStoreKey
 * Guards ids that are turned into file names.
 */
export function validateStoreKey(id: string, fieldName = "guildId"): string {
  if (!id || typeof id !== "string") {
    throw new ValidationError(`${fieldName} cannot be empty`, fieldName);
  }
  if (!STORE_KEY_PATTERN.test(id)) {
    throw new ValidationError(`${fieldName} contains characters not allowed in a store name`, fieldName);
  }
  return id;
}

/**
 * validateRankRoles
 * Keeps first occurrence order, drops blanks and duplicates, caps at MAX_RANK_ROLES.
 * More than MAX_RANK_ROLES distinct ids is an error rather than a silent truncation.
 */
export function validateRankRoles(roleIds: readonly string[], fieldName = "rank_roles"): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of roleIds) {
    const id = raw.trim();
    if (!id || seen.has(id)) continue;
    seen.add(id);
    out.push(id);
  }
  if (out.length > MAX_RANK_ROLES) {
    throw new ValidationError(`at most ${MAX_RANK_ROLES} rank roles can be configured (got ${out.length})`, fieldName);
  }
  return out;
}

/**
 * Role Ping Ledger — src/lib/percentiles.ts
 * WHAT: Distribution summaries over per-user counts (top-fraction shares, nearest-rank percentiles)
 * FLOWS: perUserCounts(rows, window) → distributionSummary(counts) → /activity distribution
 * DOCS: https://en.wikipedia.org/wiki/Percentile (nearest-rank method)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** Fractions reported by /activity distribution: top 10%, 25%, 50% of users */
export const DEFAULT_TOP_FRACTIONS = [0.1, 0.25, 0.5] as const;

export type TopShare = {
  /** Requested fraction of users, e.g. 0.1 */
  fraction: number;
  /** How many users that fraction works out to (at least 1 when there are users) */
  users: number;
  /** Records those users account for */
  volume: number;
  /** volume / total, in [0, 1]; 0 when there is no traffic */
  share: number;
};

export type DistributionSummary = {
  users: number;
  total: number;
  shares: TopShare[];
  p50: number | null;
  p90: number | null;
};

/**
 * Compute multiple percentiles at once.
 *
 * Uses nearest-rank method: take the value at ceil((p/100)*n)-1.
 *
 * @returns Map of percentile -> value (null if empty input)
 *
 * @example
 * computePercentiles([100, 200, 300, 400, 500], [50, 95])
 * // Map { 50 => 300, 95 => 500 }
 */
export function computePercentiles(
  values: readonly number[],
  percentiles: readonly number[]
): Map<number, number | null> {
  const result = new Map<number, number | null>();

  if (values.length === 0) {
    for (const p of percentiles) {
      result.set(p, null);
    }
    return result;
  }

  // Sort once, compute many
  const sorted = [...values].sort((a, b) => a - b);

  for (const p of percentiles) {
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    result.set(p, sorted[Math.max(0, Math.min(index, sorted.length - 1))]);
  }

  return result;
}

/**
 * Share of all traffic held by the busiest `fraction` of users.
 * The group size is ceil(users × fraction), never below one user.
 *
 * @example
 * topShare([50, 30, 10, 5, 5], 0.25)
 * // { fraction: 0.25, users: 2, volume: 80, share: 0.8 }
 */
export function topShare(counts: readonly number[], fraction: number): TopShare {
  const sorted = [...counts].sort((a, b) => b - a);
  const total = sorted.reduce((sum, n) => sum + n, 0);
  if (sorted.length === 0) {
    return { fraction, users: 0, volume: 0, share: 0 };
  }

  const users = Math.min(sorted.length, Math.max(1, Math.ceil(sorted.length * fraction)));
  const volume = sorted.slice(0, users).reduce((sum, n) => sum + n, 0);
  return { fraction, users, volume, share: total === 0 ? 0 : volume / total };
}

export function distributionSummary(
  counts: readonly number[],
  fractions: readonly number[] = DEFAULT_TOP_FRACTIONS
): DistributionSummary {
  const pct = computePercentiles(counts, [50, 90]);
  return {
    users: counts.length,
    total: counts.reduce((sum, n) => sum + n, 0),
    shares: fractions.map((f) => topShare(counts, f)),
    p50: pct.get(50) ?? null,
    p90: pct.get(90) ?? null,
  };
}

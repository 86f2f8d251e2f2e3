/**
 * Role Ping Ledger — src/store/ledgerContext.ts
 * WHAT: Explicit context object holding every ledger location.
 * FLOWS: env (or a test tmpdir) → createLedgerContext() → passed into every store/feature call
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import path from "node:path";

export const PING_LEDGER_FILE = "role_pings.csv";
export const ACTIVITY_LEDGER_FILE = "activity_messages.csv";

export type LedgerContext = {
  /** Shared CSV of PingEvent rows, partitioned logically by guild_id */
  pingLedgerPath: string;
  /** Shared CSV of MessageActivityEvent rows */
  activityLedgerPath: string;
  /** One JSON document per guild: <dir>/<guild_id>.json */
  reactionStatsDir: string;
  /** One RankRoleConfig per guild: <dir>/<guild_id>.json */
  reactionConfigDir: string;
};

export type LedgerContextOptions = {
  /** Base directory for reaction stores and, by default, the CSV ledgers' relative paths */
  dataDir: string;
  pingLedgerPath?: string;
  activityLedgerPath?: string;
  /** Directory relative CSV paths resolve against (defaults to process.cwd()) */
  rootDir?: string;
};

/**
 * Build a context. Relative CSV paths resolve against rootDir, matching the
 * historical layout where role_pings.csv sits next to the data/ directory.
 *
 * @example
 * createLedgerContext({ dataDir: "data" })
 * // { pingLedgerPath: "<cwd>/role_pings.csv", reactionStatsDir: "<cwd>/data/reactions/stats", ... }
 */
export function createLedgerContext(opts: LedgerContextOptions): LedgerContext {
  const rootDir = opts.rootDir ?? process.cwd();
  const dataDir = path.resolve(rootDir, opts.dataDir);
  return {
    pingLedgerPath: path.resolve(rootDir, opts.pingLedgerPath ?? PING_LEDGER_FILE),
    activityLedgerPath: path.resolve(rootDir, opts.activityLedgerPath ?? ACTIVITY_LEDGER_FILE),
    reactionStatsDir: path.join(dataDir, "reactions", "stats"),
    reactionConfigDir: path.join(dataDir, "reactions", "configs"),
  };
}

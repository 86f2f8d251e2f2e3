/**
 * Role Ping Ledger — src/store/reactionStore.ts
 * WHAT: Per-guild JSON stores for spoiler reactions and rank-role configuration.
 * FLOWS:
 *  - <stats>/<guild_id>.json   {"reactions": [ReactionEvent, ...]}
 *  - <configs>/<guild_id>.json {"rank_roles": [role_id, ...]}  (≤ 5)
 *  - append = read → push → atomic rewrite
 *  - drop = delete the guild's stats file (explicit reset)
 * DOCS:
 *  - zod: https://zod.dev
 *  - write-file-atomic: https://github.com/npm/write-file-atomic
 *
 * A document that is not JSON, or has no reactions array, is a failed read.
 * Append refuses to write over such a file so a hand-edit gone wrong can be
 * repaired instead of being replaced by a one-entry document.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import { errorContext } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { attempt, failed, ok, type Result } from "../lib/result.js";
import { validateRankRoles, validateStoreKey } from "../lib/validation.js";
import type { LedgerContext } from "./ledgerContext.js";
import type { ReactionEvent } from "./records.js";

// Older documents may carry numeric ids; normalise them to strings
const idSchema = z.union([z.string(), z.number()]).transform(String);

const reactionEntrySchema = z.object({
  message_id: idSchema,
  user_id: idSchema,
  emoji: z.string(),
  timestamp: z.string(),
});

const statsDocumentSchema = z.object({
  reactions: z.array(z.unknown()),
});

const configDocumentSchema = z.object({
  rank_roles: z.array(idSchema).default([]),
});

export type ReactionStatsDocument = { reactions: ReactionEvent[] };
export type RankRoleConfig = { rank_roles: string[] };

function writeJson(filePath: string, doc: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileAtomic.sync(filePath, `${JSON.stringify(doc, null, 2)}\n`, { encoding: "utf8" });
}

export class ReactionStore {
  constructor(private readonly ctx: LedgerContext) {}

  statsPath(guildId: string): string {
    return path.join(this.ctx.reactionStatsDir, `${validateStoreKey(guildId)}.json`);
  }

  configPath(guildId: string): string {
    return path.join(this.ctx.reactionConfigDir, `${validateStoreKey(guildId)}.json`);
  }

  exists(guildId: string): boolean {
    const p = attempt(() => this.statsPath(guildId));
    return p.ok && fs.existsSync(p.value);
  }

  /**
   * Create {"reactions": []} if the guild's file is absent or empty.
   */
  ensure(guildId: string): Result<void> {
    const result = attempt(() => {
      const filePath = this.statsPath(guildId);
      if (fs.existsSync(filePath) && fs.statSync(filePath).size > 0) return;
      writeJson(filePath, { reactions: [] });
    });
    if (!result.ok) {
      logger.warn(errorContext(result.error, { guildId }), "[reactions] ensure failed");
    }
    return result;
  }

  /**
   * Every reaction in append order. Entries missing a field are skipped.
   */
  readAll(guildId: string): Result<ReactionEvent[]> {
    const ensured = this.ensure(guildId);
    if (!ensured.ok) return ensured;

    const filePath = this.statsPath(guildId);
    const read = attempt(() => fs.readFileSync(filePath, "utf8"));
    if (!read.ok) {
      logger.warn(errorContext(read.error, { guildId }), "[reactions] read failed");
      return read;
    }

    let json: unknown;
    try {
      json = JSON.parse(read.value);
    } catch (err) {
      logger.warn({ err, guildId, path: filePath }, "[reactions] stats file is not valid JSON");
      return failed({ kind: "corrupt_store", path: filePath, message: "reaction stats file is not valid JSON" });
    }

    const doc = statsDocumentSchema.safeParse(json);
    if (!doc.success) {
      logger.warn({ guildId, path: filePath, issues: doc.error.issues }, "[reactions] stats file has no reactions array");
      return failed({ kind: "corrupt_store", path: filePath, message: "reaction stats file has no reactions array" });
    }

    const reactions: ReactionEvent[] = [];
    let skipped = 0;
    for (const entry of doc.data.reactions) {
      const parsed = reactionEntrySchema.safeParse(entry);
      if (parsed.success) {
        reactions.push(parsed.data);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      logger.debug({ guildId, skipped }, "[reactions] skipped malformed entries");
    }
    return ok(reactions);
  }

  append(guildId: string, event: ReactionEvent): Result<void> {
    const current = this.readAll(guildId);
    if (!current.ok) {
      logger.warn(errorContext(current.error, { guildId }), "[reactions] append abandoned");
      return current;
    }
    return this.rewrite(guildId, [...current.value, event]);
  }

  rewrite(guildId: string, events: readonly ReactionEvent[]): Result<void> {
    const result = attempt(() => writeJson(this.statsPath(guildId), { reactions: events }));
    if (!result.ok) {
      logger.warn(errorContext(result.error, { guildId }), "[reactions] rewrite failed");
    }
    return result;
  }

  /**
   * Delete the guild's stats file. Reports how many entries it held
   * (0 when the file was missing or unreadable).
   */
  drop(guildId: string): Result<{ removed: number }> {
    const existing = this.exists(guildId) ? this.readAll(guildId) : ok<ReactionEvent[]>([]);
    const removed = existing.ok ? existing.value.length : 0;
    const result = attempt(() => {
      const filePath = this.statsPath(guildId);
      if (fs.existsSync(filePath)) fs.unlinkSync(filePath);
      return { removed };
    });
    if (result.ok) {
      logger.info({ guildId, removed }, "[reactions] guild store dropped");
    } else {
      logger.warn(errorContext(result.error, { guildId }), "[reactions] drop failed");
    }
    return result;
  }

  /**
   * Guild ids that currently have a stats file.
   */
  listGuilds(): Result<string[]> {
    const dir = this.ctx.reactionStatsDir;
    if (!fs.existsSync(dir)) return ok([]);
    return attempt(() =>
      fs
        .readdirSync(dir)
        .filter((name) => name.endsWith(".json"))
        .map((name) => name.slice(0, -".json".length))
        .sort()
    );
  }

  // ===== Rank-role configuration =====

  /**
   * Configured rank roles in order. Missing or unreadable config reads as [].
   */
  loadRankRoles(guildId: string): string[] {
    const result = attempt(() => {
      const filePath = this.configPath(guildId);
      if (!fs.existsSync(filePath)) return [];
      const parsed = configDocumentSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf8")));
      if (!parsed.success) {
        logger.warn({ guildId, path: filePath }, "[reactions] rank-role config has unexpected shape");
        return [];
      }
      return parsed.data.rank_roles;
    });
    if (!result.ok) {
      logger.warn(errorContext(result.error, { guildId }), "[reactions] rank-role config unreadable");
      return [];
    }
    return result.value;
  }

  /**
   * Overwrite the guild's rank roles. Validates count and de-duplicates.
   */
  saveRankRoles(guildId: string, roleIds: readonly string[]): Result<string[]> {
    const result = attempt(() => {
      const rankRoles = validateRankRoles(roleIds);
      const doc: RankRoleConfig = { rank_roles: rankRoles };
      writeJson(this.configPath(guildId), doc);
      return rankRoles;
    });
    if (result.ok) {
      logger.info({ guildId, rankRoles: result.value }, "[reactions] rank roles saved");
    } else {
      logger.warn(errorContext(result.error, { guildId }), "[reactions] rank roles not saved");
    }
    return result;
  }
}

/**
 * Role Ping Ledger — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * FLOWS: load .env → parse/validate → export typed env object
 *
 * Only the process entrypoint and scripts import this module: core ledger code
 * receives a LedgerContext instead, so tests never need a token.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false under tests so values set before import win
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw extraction. Every variable is trimmed to absorb stray whitespace in .env files.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DATA_DIR: process.env.DATA_DIR?.trim(),
  PING_LEDGER_PATH: process.env.PING_LEDGER_PATH?.trim(),
  ACTIVITY_LEDGER_PATH: process.env.ACTIVITY_LEDGER_PATH?.trim(),
  RETENTION_DAYS: process.env.RETENTION_DAYS?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),
};

// Empty strings from a half-filled .env behave like "not set"
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v ? v : undefined));

const schema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: optionalString,
  GUILD_ID: optionalString,
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Ledger locations. Reaction stores live under DATA_DIR/reactions/{stats,configs}.
  DATA_DIR: z.string().min(1).default("data"),
  PING_LEDGER_PATH: z.string().min(1).default("role_pings.csv"),
  ACTIVITY_LEDGER_PATH: z.string().min(1).default("activity_messages.csv"),

  // Retention horizon for the scheduled cleanup
  RETENTION_DAYS: z.coerce.number().int().positive().default(30),

  LOG_LEVEL: optionalString,

  SENTRY_DSN: optionalString,
  SENTRY_ENVIRONMENT: optionalString,
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof schema>;

const parsed = schema.safeParse(raw);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment configuration: ${issues}`);
}

export const env: Env = parsed.data;

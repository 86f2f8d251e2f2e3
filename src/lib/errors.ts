/**
 * Role Ping Ledger — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - shouldReportToSentry(err) → boolean (filter noise)
 *  - errorContext(err) → structured log fields
 * USAGE:
 *  import { classifyError } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "storage_io" && classified.code === "ENOSPC") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ValidationError as ValidationFailure } from "./validation.js";

// ===== Error Type Definitions =====

/**
 * Base shape. `kind` is the discriminator TypeScript narrows on in switches.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Local disk failure while touching a ledger file.
 * `code` is the Node.js system error code (ENOENT, EACCES, ENOSPC, EISDIR...).
 */
export interface StorageIoError extends AppError {
  kind: "storage_io";
  code: string;
  path?: string;
  syscall?: string;
}

/** A store exists but its content is not the expected shape (bad JSON, wrong document). */
export interface CorruptStoreError extends AppError {
  kind: "corrupt_store";
  path: string;
}

/**
 * Discord API errors. Discord uses numeric codes, e.g.
 * 10062 Unknown Interaction, 50013 Missing Permissions, 10011 Unknown Role.
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Validation errors (user input, e.g. /cleanup days:0) */
export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
  value?: unknown;
}

/** Network errors (transient) */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

/** Unknown/unclassified errors */
export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | StorageIoError
  | CorruptStoreError
  | DiscordApiError
  | ValidationError
  | NetworkError
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

const STORAGE_CODES = [
  "ENOENT",
  "EACCES",
  "EPERM",
  "ENOSPC",
  "EISDIR",
  "ENOTDIR",
  "EMFILE",
  "ENFILE",
  "EROFS",
  "EBUSY",
  "EEXIST",
  "EIO",
  "EDQUOT",
];

function readString(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" ? value : undefined;
}

function readNumber(obj: object, key: string): number | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "number" ? value : undefined;
}

// ===== Error Classification =====

/**
 * Classify any caught error into the discriminated union.
 *
 * Heuristics run from most specific to least: our own ValidationError first,
 * then Node fs errors, Discord errors, network errors, and finally unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (err instanceof ValidationFailure) {
    return {
      kind: "validation",
      field: err.field ?? "unknown",
      message: err.message,
      cause,
    };
  }

  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const error = err;
  const message = readString(error, "message") ?? String(err);
  const name = readString(error, "name");
  const stringCode = readString(error, "code");
  const numericCode = readNumber(error, "code");

  if (stringCode && STORAGE_CODES.includes(stringCode)) {
    return {
      kind: "storage_io",
      code: stringCode,
      path: readString(error, "path"),
      syscall: readString(error, "syscall"),
      message,
      cause,
    };
  }

  if (numericCode !== undefined && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code: numericCode,
      httpStatus: readNumber(error, "status") ?? readNumber(error, "httpStatus"),
      method: readString(error, "method"),
      path: readString(error, "url") ?? readString(error, "path"),
      message,
      cause,
    };
  }

  if (stringCode && NETWORK_CODES.includes(stringCode)) {
    return {
      kind: "network",
      code: stringCode,
      host: readString(error, "hostname") ?? readString(error, "host"),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

/**
 * Should this error be sent to Sentry?
 * Operational Discord noise, user errors and transient network blips are not bugs.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Interaction already acknowledged
        10008, // Unknown message
        10011, // Unknown role
        50013, // Missing permissions
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "network":
    case "validation":
      return false;
    default:
      return true;
  }
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "storage_io":
      return { ...base, ioCode: err.code, path: err.path, syscall: err.syscall };
    case "corrupt_store":
      return { ...base, path: err.path };
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "validation":
      return { ...base, field: err.field };
    default:
      return base;
  }
}

/**
 * User-facing message for an error, shown in ephemeral replies.
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "storage_io":
      if (err.code === "ENOSPC") return "The bot's disk is full. Statistics could not be saved.";
      return "Statistics storage is temporarily unavailable. Please try again.";
    case "corrupt_store":
      return "Stored statistics for this server could not be read.";
    case "discord_api":
      if (err.code === 10062) return "This interaction has expired. Please try the command again.";
      if (err.code === 50013) return "I don't have permission to do that.";
      return "Discord returned an error. Please try again.";
    case "validation":
      return err.message;
    case "network":
      return "Network error. Please try again in a moment.";
    default:
      return "An unexpected error occurred.";
  }
}

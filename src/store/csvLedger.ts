/**
 * Role Ping Ledger — src/store/csvLedger.ts
 * WHAT: Append-only CSV ledger with a fixed header (one instance per stream).
 * FLOWS:
 *  - ensure() → header written if the file is missing or empty
 *  - append(row) → one line at the end, never touches earlier bytes
 *  - readAll() → ensure() then every row in append order
 *  - rewrite(rows) → temp file + rename, header included
 *  - removeWhere(pred) → read → filter → rewrite (skipped when nothing matched);
 *    malformed rows are written back as they were read
 * DOCS:
 *  - write-file-atomic: https://github.com/npm/write-file-atomic
 *
 * All I/O is synchronous: an append never interleaves with a rewrite issued by
 * another handler.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";
import { encodeCsvRow, parseCsv } from "../lib/csv.js";
import { errorContext } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { attempt, failed, ok, type Result } from "../lib/result.js";

/**
 * Maps a record type to its CSV columns. `decode` receives the values in
 * `fields` order, whatever order the file's header uses.
 */
export interface RowCodec<T> {
  readonly fields: readonly string[];
  encode(record: T): string[];
  decode(values: readonly string[]): T;
}

export type RemovalReport = {
  removed: number;
  remaining: number;
};

/** A data row as read: decoded, or kept verbatim when its column count is off. */
type LedgerLine<T> = { kind: "record"; record: T } | { kind: "malformed"; values: string[] };

export class CsvLedger<T> {
  constructor(
    readonly filePath: string,
    readonly codec: RowCodec<T>,
    /** Short label for logs, e.g. "role_pings" */
    readonly name: string
  ) {}

  private header(): string {
    return encodeCsvRow(this.codec.fields);
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Create the file with its header if it is absent or zero bytes.
   * Existing content is never modified.
   */
  ensure(): Result<void> {
    const result = attempt(() => {
      if (fs.existsSync(this.filePath) && fs.statSync(this.filePath).size > 0) return;
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      writeFileAtomic.sync(this.filePath, this.header(), { encoding: "utf8" });
      logger.debug({ ledger: this.name, path: this.filePath }, "[ledger] created with header");
    });
    if (!result.ok) {
      logger.warn(errorContext(result.error, { ledger: this.name }), "[ledger] ensure failed");
    }
    return result;
  }

  /**
   * Append one record. Failures are logged and returned, never thrown:
   * ingestion is best-effort.
   */
  append(record: T): Result<void> {
    const ensured = this.ensure();
    if (!ensured.ok) return ensured;

    const result = attempt(() => {
      const line = encodeCsvRow(this.codec.encode(record));
      // A hand-edited file may have lost its final newline; never glue two rows together
      const prefix = this.endsWithNewline() ? "" : "\n";
      fs.appendFileSync(this.filePath, prefix + line, { encoding: "utf8" });
    });
    if (!result.ok) {
      logger.warn(errorContext(result.error, { ledger: this.name }), "[ledger] append failed");
    }
    return result;
  }

  /**
   * Every record in append order. A missing store reads as empty.
   * Rows whose column count does not match the header are skipped.
   */
  readAll(): Result<T[]> {
    const lines = this.readLines();
    if (!lines.ok) return lines;
    return ok(lines.value.flatMap((line) => (line.kind === "record" ? [line.record] : [])));
  }

  private readLines(): Result<LedgerLine<T>[]> {
    const ensured = this.ensure();
    if (!ensured.ok) return ensured;

    const read = attempt(() => fs.readFileSync(this.filePath, "utf8"));
    if (!read.ok) {
      logger.warn(errorContext(read.error, { ledger: this.name }), "[ledger] read failed");
      return read;
    }

    const [headerRow, ...dataRows] = parseCsv(read.value.replace(/^\uFEFF/, ""));
    if (!headerRow) return ok([]);

    const columnIndex = new Map<string, number>();
    headerRow.forEach((col, idx) => columnIndex.set(col.trim(), idx));
    const positions: number[] = [];
    for (const field of this.codec.fields) {
      const idx = columnIndex.get(field);
      if (idx === undefined) {
        logger.warn(
          { ledger: this.name, path: this.filePath, header: headerRow, missing: field },
          "[ledger] header is missing a required column"
        );
        return failed({
          kind: "corrupt_store",
          path: this.filePath,
          message: `${this.name}: header is missing column "${field}"`,
        });
      }
      positions.push(idx);
    }

    const lines: LedgerLine<T>[] = [];
    let skipped = 0;
    for (const raw of dataRows) {
      if (raw.length !== headerRow.length) {
        skipped++;
        lines.push({ kind: "malformed", values: raw });
        continue;
      }
      lines.push({ kind: "record", record: this.codec.decode(positions.map((idx) => raw[idx])) });
    }

    if (skipped > 0) {
      logger.debug({ ledger: this.name, skipped }, "[ledger] skipped malformed rows");
    }
    return ok(lines);
  }

  /**
   * Replace the whole file with exactly `records`. Readers see either the old
   * file or the new one, never a truncated one.
   */
  rewrite(records: readonly T[]): Result<void> {
    return this.writeLines(records.map((record): LedgerLine<T> => ({ kind: "record", record })));
  }

  private writeLines(lines: readonly LedgerLine<T>[]): Result<void> {
    const result = attempt(() => {
      const body = lines
        .map((line) => encodeCsvRow(line.kind === "record" ? this.codec.encode(line.record) : line.values))
        .join("");
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      writeFileAtomic.sync(this.filePath, this.header() + body, { encoding: "utf8" });
    });
    if (result.ok) {
      logger.debug({ ledger: this.name, rows: lines.length }, "[ledger] rewritten");
    } else {
      logger.warn(errorContext(result.error, { ledger: this.name }), "[ledger] rewrite failed");
    }
    return result;
  }

  /**
   * Drop every record matching `predicate`. No rewrite when nothing matches.
   * Malformed rows never match; they are kept in place and left out of both counts.
   */
  removeWhere(predicate: (row: T) => boolean): Result<RemovalReport> {
    const lines = this.readLines();
    if (!lines.ok) return lines;

    const kept = lines.value.filter((line) => line.kind === "malformed" || !predicate(line.record));
    const removed = lines.value.length - kept.length;
    const remaining = kept.filter((line) => line.kind === "record").length;
    if (removed === 0) return ok({ removed: 0, remaining });

    const written = this.writeLines(kept);
    if (!written.ok) return written;
    return ok({ removed, remaining });
  }

  private endsWithNewline(): boolean {
    const size = fs.statSync(this.filePath).size;
    if (size === 0) return true;
    const fd = fs.openSync(this.filePath, "r");
    try {
      const buf = Buffer.alloc(1);
      fs.readSync(fd, buf, 0, 1, size - 1);
      return buf[0] === 0x0a || buf[0] === 0x0d;
    } finally {
      fs.closeSync(fd);
    }
  }
}

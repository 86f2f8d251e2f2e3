/**
 * Role Ping Ledger — src/lib/csv.ts
 * WHAT: RFC 4180 CSV encoding/decoding for the flat ledgers.
 * FLOWS:
 *  - encodeCsvRow(fields) → one line with trailing "\n"
 *  - parseCsv(text) → string[][] (quoted fields, "" escapes, LF/CRLF, blank lines dropped)
 * DOCS:
 *  - RFC 4180 CSV: https://datatracker.ietf.org/doc/html/rfc4180
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * escapeCsvField
 * WHAT: Escapes a field for CSV output per RFC 4180.
 * HOW: Wraps in quotes if it contains comma/newline/quote; doubles internal quotes.
 */
export function escapeCsvField(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }

  const str = String(value);

  if (str.includes(",") || str.includes("\n") || str.includes("\r") || str.includes('"')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

export function encodeCsvRow(fields: readonly string[]): string {
  return `${fields.map(escapeCsvField).join(",")}\n`;
}

/**
 * parseCsv
 * WHAT: Splits CSV text into rows of fields.
 *
 * Rows that are entirely empty (blank lines, the final newline) are dropped.
 * An unterminated quote swallows the rest of the input into that field,
 * which is what most CSV readers do; the row then fails the column-count
 * check in the ledger reader and is skipped there.
 *
 * @example
 * parseCsv('a,b\r\n"x,1","say ""hi"""\n')
 * // [["a", "b"], ["x,1", 'say "hi"']]
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    row.push(field);
    if (!(row.length === 1 && row[0] === "" && !fieldStarted)) {
      rows.push(row);
    }
    row = [];
    field = "";
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        inQuotes = true;
        fieldStarted = true;
        break;
      case ",":
        row.push(field);
        field = "";
        fieldStarted = true;
        break;
      case "\r":
        // CRLF: let the "\n" close the row; a lone CR also ends it
        if (text[i + 1] !== "\n") endRow();
        break;
      case "\n":
        endRow();
        break;
      default:
        field += ch;
        fieldStarted = true;
    }
  }

  if (field !== "" || row.length > 0 || fieldStarted) {
    endRow();
  }

  return rows;
}

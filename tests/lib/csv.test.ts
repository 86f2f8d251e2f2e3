/**
 * Role Ping Ledger — tests/lib/csv.test.ts
 * WHAT: Unit tests for CSV utilities.
 * WHY: Verify CSV escaping and parsing comply with RFC 4180.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { encodeCsvRow, escapeCsvField, parseCsv } from "../../src/lib/csv.js";

describe("csv", () => {
  describe("escapeCsvField", () => {
    it("leaves plain values alone", () => {
      expect(escapeCsvField("123456789012345678")).toBe("123456789012345678");
    });

    it("quotes values with commas, quotes or line breaks", () => {
      expect(escapeCsvField("a,b")).toBe('"a,b"');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvField("line1\nline2")).toBe('"line1\nline2"');
      expect(escapeCsvField("cr\rhere")).toBe('"cr\rhere"');
    });

    it("writes null and undefined as empty", () => {
      expect(escapeCsvField(null)).toBe("");
      expect(escapeCsvField(undefined)).toBe("");
    });
  });

  describe("encodeCsvRow", () => {
    it("joins escaped fields and ends with a newline", () => {
      expect(encodeCsvRow(["1", "x,y", "3"])).toBe('1,"x,y",3\n');
    });
  });

  describe("parseCsv", () => {
    it("splits rows and fields", () => {
      expect(parseCsv("a,b\n1,2\n")).toEqual([
        ["a", "b"],
        ["1", "2"],
      ]);
    });

    it("handles quoted fields, doubled quotes and CRLF", () => {
      expect(parseCsv('a,b\r\n"x,1","say ""hi"""\r\n')).toEqual([
        ["a", "b"],
        ["x,1", 'say "hi"'],
      ]);
    });

    it("keeps newlines inside quotes", () => {
      expect(parseCsv('k,v\n1,"two\nlines"\n')).toEqual([
        ["k", "v"],
        ["1", "two\nlines"],
      ]);
    });

    it("drops blank lines but keeps empty fields", () => {
      expect(parseCsv("a,b\n\n,\n")).toEqual([
        ["a", "b"],
        ["", ""],
      ]);
    });

    it("reads a last row without a trailing newline", () => {
      expect(parseCsv("a,b\n1,2")).toEqual([
        ["a", "b"],
        ["1", "2"],
      ]);
    });

    it("returns no rows for empty input", () => {
      expect(parseCsv("")).toEqual([]);
    });

    it("parses what encodeCsvRow writes", () => {
      const fields = ["1", 'quote "q"', "comma,here", "multi\nline"];
      expect(parseCsv(encodeCsvRow(fields))).toEqual([fields]);
    });
  });
});

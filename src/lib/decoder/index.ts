/**
 * Decoder module - parses delimited export text into raw records
 */

import Papa from "papaparse";
import type { ParseError } from "papaparse";
import type { DecodedTable, RawRecord } from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import { DecodeError } from "../../utils/errors.js";

const BYTE_ORDER_MARK = "\uFEFF";

interface ScannedRows {
  rows: string[][];
  brokenLines: number;
}

function isBlankLine(row: string[]): boolean {
  return row.length === 1 && row[0] === "";
}

/**
 * Offset just past the line break that follows `from`, or -1 on the last line
 */
function nextLineStart(text: string, from: number): number {
  const newline = text.indexOf("\n", from);
  const carriageReturn = text.indexOf("\r", from);
  const lineBreak =
    newline === -1
      ? carriageReturn
      : carriageReturn === -1
        ? newline
        : Math.min(newline, carriageReturn);
  if (lineBreak === -1) return -1;
  return text.startsWith("\r\n", lineBreak) ? lineBreak + 2 : lineBreak + 1;
}

function quoteOffset(error: ParseError): number | undefined {
  return "index" in error && typeof error.index === "number"
    ? error.index
    : undefined;
}

/**
 * Split text into rows. A quote that is never closed would run to the end of
 * the input; the physical line holding it is dropped and scanning resumes on
 * the next line.
 */
function scanRows(input: string, delimiter: string): ScannedRows {
  const rows: string[][] = [];
  let brokenLines = 0;
  let remaining = input;

  for (;;) {
    const parsed = Papa.parse<string[]>(remaining, {
      delimiter,
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
    });

    const unterminated = parsed.errors.find(
      (error) => error.code === "MissingQuotes",
    );
    if (!unterminated) {
      rows.push(...parsed.data);
      break;
    }

    // The unterminated row is always the last one parsed
    rows.push(...parsed.data.slice(0, -1));
    brokenLines++;

    const offset = quoteOffset(unterminated);
    const resume = offset === undefined ? -1 : nextLineStart(remaining, offset);
    logger.debug("Skipping line with an unterminated quote", {
      dataRow: rows.length,
    });
    if (resume === -1) break;
    remaining = remaining.slice(resume);
  }

  return { rows: rows.filter((row) => !isBlankLine(row)), brokenLines };
}

/**
 * Decode delimited text. The first non-blank line is the header; data lines
 * whose field count differs from the header's, or that open a quote and never
 * close it, are skipped.
 *
 * @throws DecodeError if there is no usable header row
 */
export function decodeTable(text: string, delimiter: string): DecodedTable {
  const input = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
  const { rows, brokenLines } = scanRows(input, delimiter);

  const [headers, ...lines] = rows;
  if (!headers || headers.every((name) => name.trim() === "")) {
    throw new DecodeError("Export contains no header row", { brokenLines });
  }

  const records: RawRecord[] = [];
  let skippedLines = brokenLines;

  lines.forEach((fields, index) => {
    if (fields.length !== headers.length) {
      skippedLines++;
      logger.debug("Skipping malformed line", {
        dataRow: index + 1,
        expectedFields: headers.length,
        actualFields: fields.length,
      });
      return;
    }

    const record = new Map<string, string>();
    headers.forEach((name, column) => {
      // Repeated header names keep the first column's value
      if (!record.has(name)) {
        record.set(name, fields[column] ?? "");
      }
    });
    records.push(record);
  });

  logger.info(`Decoded ${records.length} records`, {
    columns: headers.length,
    skippedLines,
  });

  return { headers, records, skippedLines };
}

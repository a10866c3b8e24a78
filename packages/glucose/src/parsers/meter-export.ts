/**
 * Meter export parser
 *
 * Parses glucometer CSV exports, one line at a time:
 *
 * ```
 * "2024-03-10 08:15:00","6.20","Before Meal","blood sample","Food (30 g); Rapid-acting insulin (4.0)"
 * ```
 *
 * Rows that do not have the timestamp/value shape are dropped and counted.
 */

import type { MealContext, Reading } from "../models/index.js";
import { annotationCodes, parseComment } from "./annotations.js";
import { parseTimestamp, splitLines } from "./csv-utils.js";
import { isFingerstickRow, isKetoneRow, isValidGlucose } from "./validation.js";

/**
 * Options for parsing an export
 */
export interface ParseOptions {
  /** Keep manual finger-stick readings (default: true) */
  fingerstick?: boolean;
}

/**
 * Outcome of parsing a single line
 */
export type LineParseOutcome =
  | { status: "reading"; reading: Reading }
  | { status: "blank" }
  | { status: "malformed" }
  | { status: "ketone" }
  | { status: "fingerstick" };

/**
 * Parse result
 */
export interface ParseResult {
  readings: Reading[];
  errors: string[];
  counts: {
    /** Lines in the file, including blank and dropped ones */
    total: number;
    parsed: number;
    blank: number;
    malformed: number;
    ketone: number;
    fingerstick: number;
  };
}

/**
 * Maximum number of malformed lines quoted in ParseResult.errors
 */
export const MAX_REPORTED_ERRORS = 20;

const ROW_PATTERN =
  /^"(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})","([^"]*)"(?:,"([^"]*)")?(?:,"([^"]*)")?(?:,"(.*)")?\s*$/;

function parseMealContext(value: string): MealContext | undefined {
  const lower = value.toLowerCase();
  if (lower.startsWith("before")) return "before";
  if (lower.startsWith("after")) return "after";
  return undefined;
}

function parseValue(raw: string): number | null {
  if (!/^\s*-?\d+(?:\.\d+)?\s*$/.test(raw)) return null;
  const value = parseFloat(raw);
  return isValidGlucose(value) ? value : null;
}

/**
 * Parse one export line
 */
export function parseMeterLine(line: string, options: ParseOptions = {}): LineParseOutcome {
  const { fingerstick = true } = options;

  if (line.trim() === "") return { status: "blank" };

  const match = line.match(ROW_PATTERN);
  if (!match) return { status: "malformed" };

  const [, rawTimestamp, rawValue, meal = "", method = "", comment = ""] = match;

  const clock = parseTimestamp(rawTimestamp);
  const value = parseValue(rawValue);
  if (!clock || value === null) return { status: "malformed" };

  if (isKetoneRow(method, comment)) return { status: "ketone" };
  if (!fingerstick && isFingerstickRow(method)) return { status: "fingerstick" };

  return {
    status: "reading",
    reading: {
      timestamp: clock.timestamp,
      date: clock.date,
      time: clock.time,
      value,
      mealContext: parseMealContext(meal),
      measureMethod: method || undefined,
      annotations: parseComment(comment),
    },
  };
}

/**
 * Parse a whole export into readings sorted by timestamp
 */
export function parseMeterExport(content: string, options: ParseOptions = {}): ParseResult {
  const lines = splitLines(content);
  // A trailing newline is not a blank row
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  const result: ParseResult = {
    readings: [],
    errors: [],
    counts: { total: lines.length, parsed: 0, blank: 0, malformed: 0, ketone: 0, fingerstick: 0 },
  };

  lines.forEach((line, idx) => {
    const outcome = parseMeterLine(line, options);
    switch (outcome.status) {
      case "reading":
        result.readings.push(outcome.reading);
        result.counts.parsed++;
        break;
      case "malformed":
        result.counts.malformed++;
        if (result.errors.length < MAX_REPORTED_ERRORS) {
          result.errors.push(`Line ${idx + 1}: unrecognised row: ${line}`);
        }
        break;
      default:
        result.counts[outcome.status]++;
    }
  });

  result.readings.sort((a, b) => a.timestamp - b.timestamp);
  return result;
}

/**
 * Options for normalized data rows
 */
export interface DataRowOptions {
  /** Include annotation codes (default: true) */
  icons?: boolean;
}

/**
 * Whitespace-joined normalized record: `HH:MM:SS <value> "<annotation codes>"`
 */
export function formatDataRow(reading: Reading, options: DataRowOptions = {}): string {
  const { icons = true } = options;
  const codes = icons ? annotationCodes(reading.annotations) : "";
  return `${reading.time} ${reading.value} "${codes}"`;
}

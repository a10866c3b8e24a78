/**
 * CSV and timestamp utilities for meter exports
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Wall-clock timestamp split into its parts
 */
export interface WallClock {
  timestamp: number;
  date: string;
  time: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Parse a "YYYY-MM-DD HH:MM:SS" export timestamp.
 *
 * Exports carry no timezone, so the value is kept as wall-clock time and
 * encoded with Date.UTC. Returns null unless every field is in range.
 */
export function parseTimestamp(value: string): WallClock | null {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/);
  if (!match) return null;

  const [, year, month, day, hour, minute, second] = match.map((part) => parseInt(part, 10));
  if (hour > 23 || minute > 59 || second > 59) return null;

  const timestamp = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(timestamp);
  // Date.UTC rolls 2024-02-30 over to March; reject instead
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }

  return {
    timestamp,
    date: formatDate(timestamp),
    time: formatTime(timestamp),
  };
}

/**
 * Format a wall-clock timestamp as YYYY-MM-DD
 */
export function formatDate(timestampMs: number): string {
  const d = new Date(timestampMs);
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

/**
 * Format a wall-clock timestamp as HH:MM:SS
 */
export function formatTime(timestampMs: number): string {
  const d = new Date(timestampMs);
  return `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

/**
 * Midnight (wall-clock) of a YYYY-MM-DD date, in milliseconds
 */
export function dateToMs(date: string): number {
  const [year, month, day] = date.split("-").map((part) => parseInt(part, 10));
  return Date.UTC(year, month - 1, day);
}

/**
 * Shift a YYYY-MM-DD date by a number of days
 */
export function addDays(date: string, days: number): string {
  return formatDate(dateToMs(date) + days * MS_PER_DAY);
}

/**
 * Format a YYYY-MM-DD date as "Sunday, 10 March 2024"
 */
export function formatLongDate(date: string): string {
  const formatter = new Intl.DateTimeFormat("en-GB", {
    timeZone: "UTC",
    weekday: "long",
    day: "numeric",
    month: "long",
    year: "numeric",
  });

  const parts = formatter.formatToParts(new Date(dateToMs(date)));
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value || "";

  return `${part("weekday")}, ${part("day")} ${part("month")} ${part("year")}`;
}

/**
 * Split a file into lines, tolerating CRLF endings
 */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

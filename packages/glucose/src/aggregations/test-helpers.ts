/**
 * Reading fixtures shared by the aggregation tests
 */

import type { Reading } from "../models/index.js";
import { parseTimestamp } from "../parsers/csv-utils.js";

export function reading(stamp: string, value: number): Reading {
  const clock = parseTimestamp(stamp);
  if (!clock) throw new Error(`bad timestamp ${stamp}`);
  return { ...clock, value, annotations: [] };
}

/**
 * `count` readings every 15 minutes from `date` at `startTime`
 */
export function readingsEvery15Minutes(
  date: string,
  count: number,
  value = 6,
  startTime = "00:00:00"
): Reading[] {
  const start = parseTimestamp(`${date} ${startTime}`);
  if (!start) throw new Error(`bad start ${date} ${startTime}`);

  return Array.from({ length: count }, (_, i) => {
    const d = new Date(start.timestamp + i * 15 * 60 * 1000);
    const stamp = d.toISOString().slice(0, 19).replace("T", " ");
    return reading(stamp, value);
  });
}

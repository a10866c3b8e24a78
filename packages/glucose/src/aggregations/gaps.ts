/**
 * Gap filling for sparse exports
 */

import type { Reading } from "../models/index.js";
import { formatDate, formatTime } from "../parsers/csv-utils.js";

const MS_PER_MINUTE = 60 * 1000;

/**
 * Insert linearly interpolated readings into gaps longer than
 * `intervalMinutes` and shorter than `maxGapMinutes` (a day by default).
 *
 * A gap of g minutes gets floor(g / interval) evenly spaced points between
 * its two ends. Inserted readings are flagged `estimated` and carry no
 * annotations. Input must be sorted by timestamp.
 */
export function fillGaps(
  readings: readonly Reading[],
  intervalMinutes: number,
  maxGapMinutes: number = 24 * 60
): Reading[] {
  if (intervalMinutes <= 0) return [...readings];

  const interval = intervalMinutes * MS_PER_MINUTE;
  const maxGap = maxGapMinutes * MS_PER_MINUTE;
  const filled: Reading[] = [];

  readings.forEach((reading, i) => {
    filled.push(reading);

    const next = readings[i + 1];
    if (!next) return;

    const gap = next.timestamp - reading.timestamp;
    if (gap <= interval || gap >= maxGap) return;

    const n = Math.floor(gap / interval);
    for (let j = 1; j <= n; j++) {
      const fraction = j / (n + 1);
      const timestamp = Math.floor((reading.timestamp + gap * fraction) / 1000) * 1000;
      const value = reading.value + (next.value - reading.value) * fraction;

      filled.push({
        timestamp,
        date: formatDate(timestamp),
        time: formatTime(timestamp),
        value: Math.round(value * 100) / 100,
        annotations: [],
        estimated: true,
      });
    }
  });

  return filled;
}

/**
 * Time-of-day interval bucketing
 */

import type { IntervalBucket, IntervalKey, Reading } from "../models/index.js";

/** Default bucket width in minutes */
export const DEFAULT_GRANULARITY_MINUTES = 15;

/**
 * Interval key of a reading: its time of day truncated to the granularity,
 * in minutes since midnight
 */
export function intervalKey(
  reading: Pick<Reading, "time">,
  granularityMinutes: number = DEFAULT_GRANULARITY_MINUTES
): IntervalKey {
  const [hours, minutes] = reading.time.split(":").map((part) => parseInt(part, 10));
  const minuteOfDay = hours * 60 + minutes;
  return Math.floor(minuteOfDay / granularityMinutes) * granularityMinutes;
}

/**
 * Format an interval key as HH:MM:00
 */
export function formatIntervalKey(key: IntervalKey): string {
  const hours = String(Math.floor(key / 60)).padStart(2, "0");
  const minutes = String(key % 60).padStart(2, "0");
  return `${hours}:${minutes}:00`;
}

/**
 * Fold readings into per-interval buckets.
 *
 * The update is asymmetric and kept as the report has always drawn it:
 * `minValue` is replaced by a larger arriving value and `maxValue` by a
 * smaller one, so after folding `minValue` holds the highest reading and
 * `maxValue` the lowest. The band drawn between them is the same either way.
 */
export function bucketByInterval(
  readings: readonly Reading[],
  granularityMinutes: number = DEFAULT_GRANULARITY_MINUTES
): Map<IntervalKey, IntervalBucket> {
  if (!Number.isInteger(granularityMinutes) || granularityMinutes < 1) {
    throw new RangeError(`Invalid bucket granularity: ${granularityMinutes}`);
  }

  const buckets = new Map<IntervalKey, IntervalBucket>();

  for (const reading of readings) {
    const key = intervalKey(reading, granularityMinutes);
    const bucket = buckets.get(key);

    if (!bucket) {
      buckets.set(key, { key, minValue: reading.value, maxValue: reading.value, count: 1 });
      continue;
    }

    bucket.count++;
    if (bucket.minValue < reading.value) bucket.minValue = reading.value;
    if (bucket.maxValue > reading.value) bucket.maxValue = reading.value;
  }

  return buckets;
}

/**
 * Buckets ordered by interval key
 */
export function sortedBuckets(buckets: Map<IntervalKey, IntervalBucket>): IntervalBucket[] {
  return [...buckets.values()].sort((a, b) => a.key - b.key);
}

/**
 * Daily grouping
 */

import type { DaySeries, Reading } from "../models/index.js";

/**
 * Group readings by calendar date. Each series is ordered by timestamp;
 * dates come from the readings, so no series is ever empty.
 */
export function groupByDay(readings: readonly Reading[]): Map<string, DaySeries> {
  const days = new Map<string, DaySeries>();

  for (const reading of readings) {
    const series = days.get(reading.date);
    if (series) {
      series.readings.push(reading);
    } else {
      days.set(reading.date, { date: reading.date, readings: [reading] });
    }
  }

  for (const series of days.values()) {
    series.readings.sort((a, b) => a.timestamp - b.timestamp);
  }

  return days;
}

/**
 * Day series ordered by date
 */
export function sortedDays(days: Map<string, DaySeries>): DaySeries[] {
  return [...days.values()].sort((a, b) => a.date.localeCompare(b.date));
}

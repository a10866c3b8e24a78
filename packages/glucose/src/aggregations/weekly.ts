/**
 * Weekly grouping
 */

import type { Reading, WeekGroup } from "../models/index.js";
import { addDays, dateToMs, formatDate } from "../parsers/csv-utils.js";

/**
 * Minimum readings for a week to be charted: one full day at the default
 * 15 minute cadence
 */
export const MIN_WEEK_SAMPLES = 96;

/**
 * ISO week-year and week number of a YYYY-MM-DD date
 */
export function isoWeekOf(date: string): { isoYear: number; isoWeek: number } {
  const d = new Date(dateToMs(date));
  const dayNum = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - dayNum);
  const yearStart = new Date(Date.UTC(d.getUTCFullYear(), 0, 1));
  const isoWeek = Math.ceil(((d.getTime() - yearStart.getTime()) / 86400000 + 1) / 7);
  return { isoYear: d.getUTCFullYear(), isoWeek };
}

/**
 * Week key string (YYYY-Www)
 */
export function weekKey(isoYear: number, isoWeek: number): string {
  return `${isoYear}-W${String(isoWeek).padStart(2, "0")}`;
}

/**
 * Monday that starts a week: the Monday of the week holding January 4,
 * plus 7 x (week - 1) days
 */
export function weekStart(isoYear: number, isoWeek: number): string {
  const jan4 = new Date(Date.UTC(isoYear, 0, 4));
  const offset = (jan4.getUTCDay() + 6) % 7;
  const firstMonday = formatDate(jan4.getTime() - offset * 86400000);
  return addDays(firstMonday, 7 * (isoWeek - 1));
}

/**
 * Group readings by ISO week
 */
export function groupByWeek(readings: readonly Reading[]): Map<string, WeekGroup> {
  const weeks = new Map<string, WeekGroup>();

  for (const reading of readings) {
    const { isoYear, isoWeek } = isoWeekOf(reading.date);
    const key = weekKey(isoYear, isoWeek);

    let group = weeks.get(key);
    if (!group) {
      const start = weekStart(isoYear, isoWeek);
      group = { isoYear, isoWeek, key, start, end: addDays(start, 6), dates: [], sampleCount: 0 };
      weeks.set(key, group);
    }

    group.sampleCount++;
    if (!group.dates.includes(reading.date)) group.dates.push(reading.date);
  }

  for (const group of weeks.values()) {
    group.dates.sort();
  }

  return weeks;
}

/**
 * Drop weeks with fewer than `minSamples` readings
 */
export function retainWeeks(
  weeks: Map<string, WeekGroup>,
  minSamples: number = MIN_WEEK_SAMPLES
): Map<string, WeekGroup> {
  const retained = new Map<string, WeekGroup>();
  for (const [key, group] of weeks) {
    if (group.sampleCount >= minSamples) retained.set(key, group);
  }
  return retained;
}

/**
 * Report model assembly
 *
 * Runs the bucketing and statistics stages over the complete reading set.
 */

import type { DayReport, GlucoseSummary, Reading, ReportModel, WeekReport } from "../models/index.js";
import { summarizeReadings } from "../analysis/glucose-stats.js";
import type { GlucoseUnit } from "../analysis/units.js";
import { groupByDay, sortedDays } from "./daily.js";
import { bucketByInterval, DEFAULT_GRANULARITY_MINUTES, sortedBuckets } from "./intervals.js";
import { groupByWeek, MIN_WEEK_SAMPLES, retainWeeks } from "./weekly.js";

export interface ReportModelOptions {
  units?: GlucoseUnit;
  granularityMinutes?: number;
  minWeekSamples?: number;
}

function requireSummary(summary: GlucoseSummary | null, what: string): GlucoseSummary {
  if (!summary) {
    throw new Error(`No readings to summarize for ${what}`);
  }
  return summary;
}

/**
 * Build the report model from parsed readings
 */
export function buildReportModel(readings: readonly Reading[], options: ReportModelOptions = {}): ReportModel {
  const {
    units,
    granularityMinutes = DEFAULT_GRANULARITY_MINUTES,
    minWeekSamples = MIN_WEEK_SAMPLES,
  } = options;

  const sorted = [...readings].sort((a, b) => a.timestamp - b.timestamp);

  const days: DayReport[] = sortedDays(groupByDay(sorted)).map((day) => ({
    day,
    summary: requireSummary(summarizeReadings(day.readings, units), day.date),
  }));

  const retained = retainWeeks(groupByWeek(sorted), minWeekSamples);
  const weeks: WeekReport[] = [...retained.values()]
    .sort((a, b) => a.key.localeCompare(b.key))
    .map((week) => {
      const members = new Set(week.dates);
      const weekReadings = sorted.filter((r) => members.has(r.date));
      return {
        week,
        readings: weekReadings,
        buckets: sortedBuckets(bucketByInterval(weekReadings, granularityMinutes)),
        summary: requireSummary(summarizeReadings(weekReadings, units), week.key),
      };
    });

  return {
    readings: sorted,
    period: sorted.length > 0 ? { start: sorted[0].date, end: sorted[sorted.length - 1].date } : null,
    overall: summarizeReadings(sorted, units),
    buckets: sortedBuckets(bucketByInterval(sorted, granularityMinutes)),
    days,
    weeks,
  };
}

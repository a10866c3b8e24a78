/**
 * Aggregate types produced by the bucketing and statistics stages
 */

import type { Reading } from "./reading.js";

/**
 * Time of day quantized to the bucketing granularity, in minutes since midnight
 */
export type IntervalKey = number;

/**
 * Extremes recorded for one time-of-day interval
 */
export interface IntervalBucket {
  key: IntervalKey;
  minValue: number;
  maxValue: number;
  /** Number of readings folded into the bucket */
  count: number;
}

/**
 * All readings for one calendar date, ordered by timestamp
 */
export interface DaySeries {
  date: string;
  readings: Reading[];
}

/**
 * Readings grouped by ISO week
 */
export interface WeekGroup {
  isoYear: number;
  isoWeek: number;
  /** YYYY-Www */
  key: string;
  /** Monday of the week, YYYY-MM-DD */
  start: string;
  /** Sunday of the week, YYYY-MM-DD */
  end: string;
  /** Member dates that have readings, ascending */
  dates: string[];
  sampleCount: number;
}

/**
 * Summary statistics for a set of readings
 */
export interface GlucoseSummary {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
  /** Estimated A1C (%) derived from the median */
  a1c: number;
}

/**
 * A retained week with everything needed to chart it
 */
export interface WeekReport {
  week: WeekGroup;
  readings: Reading[];
  buckets: IntervalBucket[];
  summary: GlucoseSummary;
}

/**
 * A day with its summary
 */
export interface DayReport {
  day: DaySeries;
  summary: GlucoseSummary;
}

/**
 * Everything the script builder consumes
 */
export interface ReportModel {
  readings: Reading[];
  /** First and last reading dates, YYYY-MM-DD */
  period: { start: string; end: string } | null;
  overall: GlucoseSummary | null;
  buckets: IntervalBucket[];
  /** Ascending by date */
  days: DayReport[];
  /** Retained weeks, ascending by key */
  weeks: WeekReport[];
}

/**
 * @glucoplot/glucose - Aggregations
 *
 * Day, week and time-of-day rollups
 */

export {
  bucketByInterval,
  intervalKey,
  formatIntervalKey,
  sortedBuckets,
  DEFAULT_GRANULARITY_MINUTES,
} from "./intervals.js";
export { groupByDay, sortedDays } from "./daily.js";
export {
  groupByWeek,
  retainWeeks,
  isoWeekOf,
  weekKey,
  weekStart,
  MIN_WEEK_SAMPLES,
} from "./weekly.js";
export { fillGaps } from "./gaps.js";
export { buildReportModel, type ReportModelOptions } from "./report-model.js";

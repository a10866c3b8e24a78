/**
 * @glucoplot/glucose - Models
 *
 * Type definitions for readings and their aggregates
 */

export type {
  MealContext,
  AnnotationKind,
  Annotation,
  Reading,
} from "./reading.js";

export type {
  IntervalKey,
  IntervalBucket,
  DaySeries,
  WeekGroup,
  GlucoseSummary,
  WeekReport,
  DayReport,
  ReportModel,
} from "./aggregates.js";

/**
 * Reading types - a single glucose measurement from a meter export
 */

/**
 * Meal context recorded by the meter ("Before Meal" / "After Meal")
 */
export type MealContext = "before" | "after";

/**
 * Annotation categories decoded from the comment field
 */
export type AnnotationKind = "insulin" | "food";

/**
 * Symbolic meal/insulin annotation attached to a reading.
 *
 * Insulin doses carry an `R` (rapid-acting) or `L` (long-acting) suffix;
 * a dose is an empty string when the comment gave none.
 */
export interface Annotation {
  kind: AnnotationKind;
  doses: string[];
}

/**
 * A normalized glucose reading
 */
export interface Reading {
  /** Wall-clock time of the reading in milliseconds (naive export time read as UTC) */
  readonly timestamp: number;
  /** Calendar date, YYYY-MM-DD */
  readonly date: string;
  /** Time of day, HH:MM:SS */
  readonly time: string;
  /** Glucose value in the export's units */
  readonly value: number;
  readonly mealContext?: MealContext;
  /** Measurement method as exported (e.g. "blood sample", "CGM") */
  readonly measureMethod?: string;
  /** At most one insulin and one food annotation */
  readonly annotations: readonly Annotation[];
  /** True for readings interpolated into a gap */
  readonly estimated?: boolean;
}

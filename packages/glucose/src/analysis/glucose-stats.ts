/**
 * Glucose statistical analysis functions
 */

import type { GlucoseSummary, Reading } from "../models/index.js";
import { MGDL_MAGNITUDE_THRESHOLD, UNIT_MGDL, type GlucoseUnit } from "./units.js";

/**
 * Arithmetic mean. Throws on an empty sequence.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError("Cannot compute the mean of an empty sequence");
  }
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Median (mean of the two middle values for even lengths). Throws on an
 * empty sequence.
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError("Cannot compute the median of an empty sequence");
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Estimate A1C (%) from a median glucose value.
 *
 * mg/dL: (median + 46.7) / 28.7; mmol/L: (median + 2.59) / 1.59.
 * Without units, a median of 35 or more selects the mg/dL formula.
 */
export function estimateA1c(medianValue: number, units?: GlucoseUnit): number {
  const highMagnitude =
    units !== undefined ? units === UNIT_MGDL : medianValue >= MGDL_MAGNITUDE_THRESHOLD;

  return highMagnitude ? (medianValue + 46.7) / 28.7 : (medianValue + 2.59) / 1.59;
}

/**
 * Summarize a set of values, or null when there are none
 */
export function summarizeGlucose(values: readonly number[], units?: GlucoseUnit): GlucoseSummary | null {
  if (values.length === 0) return null;

  const med = median(values);
  return {
    count: values.length,
    mean: mean(values),
    median: med,
    min: values.reduce((a, b) => Math.min(a, b)),
    max: values.reduce((a, b) => Math.max(a, b)),
    a1c: estimateA1c(med, units),
  };
}

/**
 * Summarize readings, or null when there are none
 */
export function summarizeReadings(readings: readonly Reading[], units?: GlucoseUnit): GlucoseSummary | null {
  return summarizeGlucose(
    readings.map((r) => r.value),
    units
  );
}

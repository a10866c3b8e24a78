/**
 * Glucose units and conversions
 */

export const UNIT_MGDL = "mg/dL";
export const UNIT_MMOLL = "mmol/L";

export type GlucoseUnit = typeof UNIT_MGDL | typeof UNIT_MMOLL;

/**
 * Values at or above this are taken to be mg/dL when units are unknown
 */
export const MGDL_MAGNITUDE_THRESHOLD = 35;

/**
 * Default target range and chart limits, per unit
 */
export const UNIT_DEFAULTS = {
  [UNIT_MMOLL]: { low: 4, high: 8, graphMin: 0, graphMax: 21, tickStep: 2, labelOffset: 6 },
  [UNIT_MGDL]: { low: 72, high: 144, graphMin: 0, graphMax: 400, tickStep: 50, labelOffset: 108 },
} as const;

/**
 * Convert a glucose value between units.
 *
 * With no target unit the value is converted to the other one. mmol/L
 * results are rounded to two decimals, mg/dL results to whole numbers.
 */
export function convertGlucoseUnit(value: number, from: GlucoseUnit, to?: GlucoseUnit): number {
  if (from === to) return value;

  if (from === UNIT_MGDL) {
    return Math.round((value / 18) * 100) / 100;
  }
  return Math.round(value * 18);
}

/**
 * Normalize a user-supplied unit string ("mg", "mmol/l", ...)
 */
export function parseUnit(value: string | undefined): GlucoseUnit | undefined {
  if (!value) return undefined;
  if (/mg/i.test(value)) return UNIT_MGDL;
  if (/mm/i.test(value)) return UNIT_MMOLL;
  return undefined;
}

/**
 * Infer units from the configured target range: a high above 35 or a low
 * above 20 can only be mg/dL
 */
export function inferUnitsFromBounds(high?: number, low?: number): GlucoseUnit {
  if ((high !== undefined && high > 35) || (low !== undefined && low > 20)) {
    return UNIT_MGDL;
  }
  return UNIT_MMOLL;
}

/**
 * Infer units from the readings themselves: a mean above 35 means mg/dL
 */
export function inferUnitsFromMean(mean: number): GlucoseUnit {
  return mean > MGDL_MAGNITUDE_THRESHOLD ? UNIT_MGDL : UNIT_MMOLL;
}

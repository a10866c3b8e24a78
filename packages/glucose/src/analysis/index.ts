/**
 * @glucoplot/glucose - Analysis
 *
 * Statistics and unit handling
 */

export {
  mean,
  median,
  estimateA1c,
  summarizeGlucose,
  summarizeReadings,
} from "./glucose-stats.js";

export {
  UNIT_MGDL,
  UNIT_MMOLL,
  UNIT_DEFAULTS,
  MGDL_MAGNITUDE_THRESHOLD,
  convertGlucoseUnit,
  parseUnit,
  inferUnitsFromBounds,
  inferUnitsFromMean,
  type GlucoseUnit,
} from "./units.js";

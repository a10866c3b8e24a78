/**
 * Report color palette
 */

export const COLORS = {
  /** Line color inside the target range */
  inRange: "#02538f",
  /** Line color outside the target range, and below-range fill */
  outOfRange: "#d71920",
  /** Above-range fill */
  aboveRange: "#f1b80e",
  /** Target range shading */
  target: "#0072b2",
  /** Interval max/min band */
  band: "#979797",
  /** Median glucose label */
  medianLabel: "#009e73",
  /** A1C label */
  a1cLabel: "#e69f00",
  /** Grid lines */
  grid: "#d0d0d0",
} as const;

/**
 * Typed renderer directives
 *
 * The script builder appends these records in order; serializeScript turns
 * them into renderer text as the last step.
 */

export type SmoothingMethod = "mcsplines" | "csplines" | "acsplines" | "bezier" | "sbezier" | "unique";

export type DatasetRole = "day" | "average" | "band" | "week" | "week-band";

export type ChartGroup = "overall" | "week" | "day";

export interface CommentDirective {
  kind: "comment";
  text: string;
}

export interface SetDirective {
  kind: "set";
  option: string;
  value?: string;
}

export interface ResetDirective {
  kind: "reset";
}

/**
 * Named inline dataset, one whitespace-separated row per line
 */
export interface DatasetDirective {
  kind: "dataset";
  name: string;
  role: DatasetRole;
  rows: string[];
}

/**
 * Renderer-side smoothing of a dataset into a named table
 */
export interface SmoothDirective {
  kind: "smooth";
  source: string;
  target: string;
  method: SmoothingMethod;
}

export interface MultiplotDirective {
  kind: "multiplot";
  action: "begin" | "end";
  /** Charts per page, for "begin" */
  rows?: number;
}

export interface PageBreakDirective {
  kind: "page-break";
  rows: number;
}

export interface ChartLabel {
  text: string;
  position: "left" | "right";
  color: string;
}

export interface TargetRange {
  low: number;
  high: number;
  color: string;
}

/** Shaded max/min band from a `key max min` dataset */
export interface BandLayer {
  kind: "band";
  dataset: string;
  color: string;
}

/** Smoothed line, colored by whether each sample is inside the bounds */
export interface LineLayer {
  kind: "line";
  table: string;
  low: number;
  high: number;
  inRange: string;
  outOfRange: string;
}

/** Fill between the smoothed line and a bound */
export interface FillLayer {
  kind: "fill";
  table: string;
  bound: number;
  side: "above" | "below";
  color: string;
}

/** Annotation codes drawn at a fixed height */
export interface LabelsLayer {
  kind: "labels";
  dataset: string;
  y: number;
}

export type PlotLayer = BandLayer | LineLayer | FillLayer | LabelsLayer;

export interface ChartDirective {
  kind: "chart";
  group: ChartGroup;
  title: string;
  target: TargetRange;
  labels: ChartLabel[];
  layers: PlotLayer[];
}

/**
 * Release named datasets and tables
 */
export interface CleanupDirective {
  kind: "cleanup";
  names: string[];
}

export type Directive =
  | CommentDirective
  | SetDirective
  | ResetDirective
  | DatasetDirective
  | SmoothDirective
  | MultiplotDirective
  | PageBreakDirective
  | ChartDirective
  | CleanupDirective;

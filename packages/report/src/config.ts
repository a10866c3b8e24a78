/**
 * Report configuration
 *
 * Values come from CLI flags, then GLUCOPLOT_* environment variables (the
 * CLI loads .env.local with dotenv), then per-unit defaults.
 */

import {
  convertGlucoseUnit,
  DEFAULT_GRANULARITY_MINUTES,
  inferUnitsFromBounds,
  inferUnitsFromMean,
  mean,
  MIN_WEEK_SAMPLES,
  parseUnit,
  UNIT_DEFAULTS,
  UNIT_MGDL,
  UNIT_MMOLL,
  type GlucoseUnit,
  type Reading,
} from "@glucoplot/glucose";
import { DEFAULT_RENDER_COMMAND } from "./render/renderer.js";

export type PageUnit = "cm" | "in";

export interface PageSize {
  width: number;
  height: number;
  unit: PageUnit;
}

/**
 * Named page sizes (landscape)
 */
export const PAGE_SIZES = {
  a4: { width: 29.7, height: 21, unit: "cm" },
  letter: { width: 11, height: 8.5, unit: "in" },
} as const satisfies Record<string, PageSize>;

export const DEFAULT_CHARTS_PER_PAGE = 2;

/**
 * Raw options as given on the command line or in the environment
 */
export interface ReportOptions {
  input?: string;
  output?: string;
  low?: number;
  high?: number;
  max?: number;
  graphs?: number;
  units?: string;
  pagesize?: string;
  icons?: boolean;
  fingerstick?: boolean;
  fillGaps?: number;
  renderer?: string;
  log?: string;
  script?: string;
}

/**
 * Fully resolved configuration
 */
export interface ReportConfig {
  input: string;
  output: string;
  low: number;
  high: number;
  graphMin: number;
  graphMax: number;
  units: GlucoseUnit;
  /** Units were not given and the bounds do not imply mg/dL; re-check against the data */
  inferUnits: boolean;
  pageSize: PageSize;
  icons: boolean;
  fingerstick: boolean;
  chartsPerPage: number;
  granularityMinutes: number;
  minWeekSamples: number;
  /** Gap filling interval in minutes, 0 to disable */
  fillGapsMinutes: number;
  renderer: string;
  logFile?: string;
  /** Write the script here instead of rendering */
  scriptOnly?: string;
}

/**
 * Parse a page size: "a4", "letter" or "<w><cm|in>,<h><cm|in>".
 * Anything else falls back to A4.
 */
export function parsePageSize(value: string | undefined): PageSize {
  if (!value) return { ...PAGE_SIZES.a4 };
  if (/a4/i.test(value)) return { ...PAGE_SIZES.a4 };
  if (/letter/i.test(value)) return { ...PAGE_SIZES.letter };

  const match = value.match(/^\s*(\d+(?:\.\d+)?)(cm|in)\s*,\s*(\d+(?:\.\d+)?)(cm|in)\s*$/i);
  if (match) {
    const unit: PageUnit = match[2].toLowerCase() === "in" ? "in" : "cm";
    const heightUnit: PageUnit = match[4].toLowerCase() === "in" ? "in" : "cm";
    if (unit === heightUnit) {
      return { width: parseFloat(match[1]), height: parseFloat(match[3]), unit };
    }
  }

  return { ...PAGE_SIZES.a4 };
}

/**
 * Format a page size for the renderer ("29.7cm,21cm")
 */
export function formatPageSize(size: PageSize): string {
  return `${size.width}${size.unit},${size.height}${size.unit}`;
}

function parseEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid value for ${name}: ${raw}`);
  }
  return value;
}

function parseEnvBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return !/^(0|false|no|off)$/i.test(raw.trim());
}

/**
 * Read GLUCOPLOT_* environment variables
 */
export function loadEnvOptions(env: NodeJS.ProcessEnv = process.env): ReportOptions {
  return {
    input: env.GLUCOPLOT_INPUT || undefined,
    output: env.GLUCOPLOT_OUTPUT || undefined,
    low: parseEnvNumber(env, "GLUCOPLOT_LOW"),
    high: parseEnvNumber(env, "GLUCOPLOT_HIGH"),
    max: parseEnvNumber(env, "GLUCOPLOT_MAX"),
    graphs: parseEnvNumber(env, "GLUCOPLOT_GRAPHS"),
    units: env.GLUCOPLOT_UNITS || undefined,
    pagesize: env.GLUCOPLOT_PAGESIZE || undefined,
    icons: parseEnvBoolean(env, "GLUCOPLOT_ICONS"),
    fingerstick: parseEnvBoolean(env, "GLUCOPLOT_FINGERSTICK"),
    fillGaps: parseEnvNumber(env, "GLUCOPLOT_FILL_GAPS"),
    renderer: env.GLUCOPLOT_RENDERER || undefined,
    log: env.GLUCOPLOT_LOG || undefined,
  };
}

/**
 * Merge option sources; later sources win where they define a value
 */
export function mergeOptions(...sources: ReportOptions[]): ReportOptions {
  const merged: ReportOptions = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

/**
 * Resolve raw options into a complete configuration
 */
export function resolveConfig(options: ReportOptions): ReportConfig {
  if (!options.input) throw new Error("No input file given");
  if (!options.output && !options.script) throw new Error("No output file given");

  const explicitUnits = parseUnit(options.units);
  const units = explicitUnits ?? inferUnitsFromBounds(options.high, options.low);
  const defaults = UNIT_DEFAULTS[units];

  const graphs = options.graphs;
  const chartsPerPage =
    graphs !== undefined && Number.isInteger(graphs) && graphs >= 1 ? graphs : DEFAULT_CHARTS_PER_PAGE;

  return {
    input: options.input,
    output: options.output ?? "",
    low: options.low ?? defaults.low,
    high: options.high ?? defaults.high,
    graphMin: defaults.graphMin,
    graphMax: options.max ?? defaults.graphMax,
    units,
    inferUnits: explicitUnits === undefined && units === UNIT_MMOLL,
    pageSize: parsePageSize(options.pagesize),
    icons: options.icons ?? true,
    fingerstick: options.fingerstick ?? true,
    chartsPerPage,
    granularityMinutes: DEFAULT_GRANULARITY_MINUTES,
    minWeekSamples: MIN_WEEK_SAMPLES,
    fillGapsMinutes: options.fillGaps !== undefined && options.fillGaps > 0 ? options.fillGaps : 0,
    renderer: options.renderer || DEFAULT_RENDER_COMMAND,
    logFile: options.log,
    scriptOnly: options.script,
  };
}

/**
 * Switch an inferred mmol/L configuration to mg/dL when the readings' mean
 * is above 35 and a bound is still at its mmol/L default. The bounds are
 * converted and the graph range moves with them.
 */
export function adjustUnitsToData(config: ReportConfig, readings: readonly Reading[]): ReportConfig {
  if (!config.inferUnits || config.units !== UNIT_MMOLL || readings.length === 0) {
    return config;
  }

  const mmoll = UNIT_DEFAULTS[UNIT_MMOLL];
  if (config.low !== mmoll.low && config.high !== mmoll.high) return config;

  const average = mean(readings.map((r) => r.value));
  if (inferUnitsFromMean(average) !== UNIT_MGDL) return config;

  const mgdl = UNIT_DEFAULTS[UNIT_MGDL];
  return {
    ...config,
    units: UNIT_MGDL,
    low: convertGlucoseUnit(config.low, UNIT_MMOLL, UNIT_MGDL),
    high: convertGlucoseUnit(config.high, UNIT_MMOLL, UNIT_MGDL),
    graphMin: mgdl.graphMin,
    graphMax: config.graphMax === mmoll.graphMax ? mgdl.graphMax : config.graphMax,
  };
}

/**
 * glucoplot command definition
 */

import { Command, InvalidArgumentError } from "commander";
import { loadEnvOptions, mergeOptions, resolveConfig, type ReportOptions } from "./config.js";
import { generateReport } from "./pipeline.js";

export interface CliOptions {
  input?: string;
  output?: string;
  low?: number;
  high?: number;
  max?: number;
  graphs?: number;
  units?: string;
  pagesize?: string;
  icons: boolean;
  fingerstick: boolean;
  fillGaps?: number;
  renderer?: string;
  log?: string;
  script?: string;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseCount(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not a whole number.");
  }
  return parsed;
}

/**
 * Map parsed flags onto report options. The negated flags default to true,
 * so only an explicit --no-* overrides the environment.
 */
export function toReportOptions(options: CliOptions): ReportOptions {
  return {
    input: options.input,
    output: options.output,
    low: options.low,
    high: options.high,
    max: options.max,
    graphs: options.graphs,
    units: options.units,
    pagesize: options.pagesize,
    icons: options.icons ? undefined : false,
    fingerstick: options.fingerstick ? undefined : false,
    fillGaps: options.fillGaps,
    renderer: options.renderer,
    log: options.log,
    script: options.script,
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("glucoplot")
    .description("Render glucometer CSV exports into a PDF report of glucose charts")
    .version("0.1.0")
    .option("-i, --input <file>", "Meter export to read")
    .option("-o, --output <file>", "PDF file to write")
    .option("--low <value>", "Low end of the target range", parseNumber)
    .option("--high <value>", "High end of the target range", parseNumber)
    .option("--max <value>", "Top of the chart y axis", parseNumber)
    .option("--graphs <count>", "Charts per page (default: 2)", parseCount)
    .option("--units <units>", "mmol/L or mg/dL (default: inferred)")
    .option("--pagesize <size>", "a4, letter or <w>cm,<h>cm (default: a4)")
    .option("--no-icons", "Leave out food and insulin markers")
    .option("--no-fingerstick", "Leave out finger-stick readings")
    .option("--fill-gaps <minutes>", "Interpolate gaps longer than this many minutes", parseNumber)
    .option("--renderer <command>", "Renderer executable (default: gnuplot)")
    .option("--log <file>", "Write renderer diagnostics to this file")
    .option("--script <file>", "Write the renderer script here instead of rendering")
    .action(async (options: CliOptions) => {
      const controller = new AbortController();
      const abort = () => controller.abort();
      process.once("SIGINT", abort);

      try {
        const config = resolveConfig(mergeOptions(loadEnvOptions(), toReportOptions(options)));
        await generateReport(config, { signal: controller.signal });
      } catch (error) {
        console.error("Report error:", error instanceof Error ? error.message : error);
        process.exit(1);
      } finally {
        process.off("SIGINT", abort);
      }
    });

  return program;
}

/**
 * Report pipeline: read, parse, aggregate, build the script, render
 */

import { readFile, writeFile } from "fs/promises";
import {
  buildReportModel,
  fillGaps,
  parseMeterExport,
  type ParseResult,
  type ReportModel,
} from "@glucoplot/glucose";
import { adjustUnitsToData, type ReportConfig } from "./config.js";
import { consoleLogger, type Logger } from "./logger.js";
import { renderScript, type RenderResult } from "./render/renderer.js";
import { buildReportScript, type ReportScript } from "./script/builder.js";
import { serializeScript } from "./script/serialize.js";

export interface GenerateOptions {
  signal?: AbortSignal;
  log?: Logger;
}

export interface ReportOutcome {
  /** Configuration after units were checked against the data */
  config: ReportConfig;
  parse: ParseResult;
  model: ReportModel;
  script: ReportScript;
  scriptText: string;
  /** Null when only the script was written */
  render: RenderResult | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function generateReport(config: ReportConfig, options: GenerateOptions = {}): Promise<ReportOutcome> {
  const { signal, log = consoleLogger } = options;

  let content: string;
  try {
    content = await readFile(config.input, "utf-8");
  } catch (error) {
    throw new Error(`Could not read input file '${config.input}': ${errorMessage(error)}`, { cause: error });
  }

  const parse = parseMeterExport(content, { fingerstick: config.fingerstick });
  const { counts } = parse;
  log.info(`Parsed ${counts.parsed} of ${counts.total} rows from ${config.input}`);
  if (counts.malformed > 0) {
    log.warn(`Dropped ${counts.malformed} malformed row(s)`);
    for (const error of parse.errors) log.warn(`  ${error}`);
  }
  if (counts.ketone > 0) log.info(`Skipped ${counts.ketone} ketone row(s)`);
  if (counts.fingerstick > 0) log.info(`Skipped ${counts.fingerstick} finger-stick row(s)`);

  const resolved = adjustUnitsToData(config, parse.readings);
  if (resolved.units !== config.units) {
    log.info(`Readings look like ${resolved.units}; using ${resolved.units} bounds`);
  }

  const readings =
    resolved.fillGapsMinutes > 0 ? fillGaps(parse.readings, resolved.fillGapsMinutes) : parse.readings;
  if (readings.length === 0) {
    log.warn("No readings found; the report will be empty");
  }

  const model = buildReportModel(readings, {
    units: resolved.units,
    granularityMinutes: resolved.granularityMinutes,
    minWeekSamples: resolved.minWeekSamples,
  });
  const script = buildReportScript(model, resolved);
  const scriptText = serializeScript(script.directives);
  const chartCount = script.charts.overall + script.charts.week + script.charts.day;

  if (resolved.scriptOnly) {
    try {
      await writeFile(resolved.scriptOnly, scriptText);
    } catch (error) {
      throw new Error(`Could not write script file '${resolved.scriptOnly}': ${errorMessage(error)}`, { cause: error });
    }
    log.info(`Wrote script for ${chartCount} charts to ${resolved.scriptOnly}`);
    return { config: resolved, parse, model, script, scriptText, render: null };
  }

  const render = await renderScript(scriptText, resolved.output, {
    command: resolved.renderer,
    logFile: resolved.logFile,
    signal,
    log,
  });
  log.info(`Wrote ${chartCount} charts (${script.charts.week} weekly, ${script.charts.day} daily) to ${resolved.output}`);

  return { config: resolved, parse, model, script, scriptText, render };
}

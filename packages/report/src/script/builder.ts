/**
 * Report script builder
 *
 * Turns a ReportModel into an ordered list of typed directives:
 * table-stage setup, datasets, smoothing, chart-stage setup, the overall,
 * weekly and daily chart groups, then cleanup.
 */

import {
  formatDataRow,
  formatIntervalKey,
  formatLongDate,
  UNIT_DEFAULTS,
  UNIT_MMOLL,
  type DayReport,
  type GlucoseSummary,
  type GlucoseUnit,
  type IntervalBucket,
  type Reading,
  type ReportModel,
  type WeekReport,
} from "@glucoplot/glucose";
import { formatPageSize, type PageSize } from "../config.js";
import { COLORS } from "./colors.js";
import type {
  ChartDirective,
  ChartGroup,
  ChartLabel,
  DatasetRole,
  Directive,
  PlotLayer,
  SmoothDirective,
  SmoothingMethod,
} from "./directives.js";
import { quote } from "./serialize.js";

/**
 * Chart options; ReportConfig satisfies this
 */
export interface ScriptOptions {
  low: number;
  high: number;
  graphMin: number;
  graphMax: number;
  units: GlucoseUnit;
  pageSize: PageSize;
  icons: boolean;
  chartsPerPage: number;
  smoothing?: SmoothingMethod;
}

export interface ReportScript {
  directives: Directive[];
  /** Charts emitted, per group */
  charts: Record<ChartGroup, number>;
  pageBreaks: number;
}

/** Fewer distinct times than this are tabulated without spline smoothing */
const MIN_SPLINE_POINTS = 3;

function compactDate(date: string): string {
  return date.replace(/-/g, "");
}

function formatGlucose(value: number, units: GlucoseUnit): string {
  return units === UNIT_MMOLL ? value.toFixed(1) : value.toFixed(0);
}

function byTimeOfDay(readings: readonly Reading[]): Reading[] {
  return [...readings].sort((a, b) => a.time.localeCompare(b.time) || a.timestamp - b.timestamp);
}

export class ReportScriptBuilder {
  private directives: Directive[] = [];
  private declared: string[] = [];
  private smoothed: SmoothDirective[] = [];
  private pageBreaks = 0;
  private charts: Record<ChartGroup, number> = { overall: 0, week: 0, day: 0 };

  constructor(private readonly options: ScriptOptions) {}

  build(model: ReportModel): ReportScript {
    this.directives = [];
    this.declared = [];
    this.smoothed = [];
    this.pageBreaks = 0;
    this.charts = { overall: 0, week: 0, day: 0 };

    this.addTableSetup();
    this.addDatasets(model);
    this.directives.push(...this.smoothed);
    this.addChartSetup();
    this.addChartGroup(this.overallCharts(model));
    this.addChartGroup([...model.weeks].reverse().map((week) => this.weekChart(week)));
    this.addChartGroup([...model.days].reverse().map((day) => this.dayChart(day)));
    this.directives.push({ kind: "cleanup", names: [...this.declared] });

    return { directives: this.directives, charts: { ...this.charts }, pageBreaks: this.pageBreaks };
  }

  private set(option: string, value?: string): void {
    this.directives.push({ kind: "set", option, value });
  }

  private addTableSetup(): void {
    this.directives.push({ kind: "comment", text: "Glucose report" });
    this.set("datafile separator", "whitespace");
    this.set("xdata", "time");
    this.set("timefmt", quote("%H:%M:%S"));
    this.set("format x", `${quote("%s")} timedate`);
    this.set("samples", "10000");
  }

  private addDataset(name: string, role: DatasetRole, rows: string[]): void {
    this.directives.push({ kind: "dataset", name, role, rows });
    this.declared.push(name);
  }

  private addSmoothed(name: string, readings: readonly Reading[]): void {
    const distinctTimes = new Set(readings.map((r) => r.time)).size;
    const method = distinctTimes >= MIN_SPLINE_POINTS ? (this.options.smoothing ?? "mcsplines") : "unique";
    const target = `Smooth${name}`;
    this.smoothed.push({ kind: "smooth", source: name, target, method });
    this.declared.push(target);
  }

  private rows(readings: readonly Reading[], icons: boolean): string[] {
    return byTimeOfDay(readings).map((r) => formatDataRow(r, { icons }));
  }

  private bandRows(buckets: readonly IntervalBucket[]): string[] {
    return buckets.map((b) => `${formatIntervalKey(b.key)} ${b.minValue} ${b.maxValue}`);
  }

  private addDatasets(model: ReportModel): void {
    for (const { day } of model.days) {
      const name = `Day${compactDate(day.date)}`;
      this.addDataset(name, "day", this.rows(day.readings, this.options.icons));
      this.addSmoothed(name, day.readings);
    }

    if (model.readings.length > 0) {
      this.addDataset("Average", "average", this.rows(model.readings, false));
      this.addSmoothed("Average", model.readings);
      this.addDataset("Band", "band", this.bandRows(model.buckets));
    }

    for (const week of model.weeks) {
      const name = `Week${week.week.key.replace("-", "")}`;
      this.addDataset(name, "week", this.rows(week.readings, false));
      this.addSmoothed(name, week.readings);
      this.addDataset(`Band${name}`, "week-band", this.bandRows(week.buckets));
    }
  }

  private addChartSetup(): void {
    const { units, graphMin, graphMax, pageSize } = this.options;
    this.directives.push({ kind: "reset" });
    this.set("datafile separator", "whitespace");
    this.set("terminal", `pdfcairo size ${formatPageSize(pageSize)} enhanced font ${quote("Helvetica,11")}`);
    this.set("key", "off");
    this.set("xdata", "time");
    this.set("timefmt", quote("%H:%M:%S"));
    this.set("format x", `${quote("%H:%M")} timedate`);
    this.set("xrange", `[${quote("00:00:00")}:${quote("23:58:00")}]`);
    this.set("xtics", "7200");
    this.set("yrange", `[${graphMin}:${graphMax}]`);
    this.set("ytics", String(UNIT_DEFAULTS[units].tickStep));
    this.set("grid", `xtics ytics lc rgb ${quote(COLORS.grid)}`);
    this.set("xlabel", quote("Time of day"));
    this.set("ylabel", quote(`Blood glucose (${units})`));
  }

  private addChartGroup(charts: ChartDirective[]): void {
    if (charts.length === 0) return;
    const rows = this.options.chartsPerPage;

    this.directives.push({ kind: "multiplot", action: "begin", rows });
    charts.forEach((chart, idx) => {
      this.directives.push(chart);
      this.charts[chart.group]++;
      const count = idx + 1;
      if (count % rows === 0 && count < charts.length) {
        this.directives.push({ kind: "page-break", rows });
        this.pageBreaks++;
      }
    });
    this.directives.push({ kind: "multiplot", action: "end" });
  }

  private summaryLabels(summary: GlucoseSummary): ChartLabel[] {
    const { units } = this.options;
    return [
      {
        text: `Median glucose: ${formatGlucose(summary.median, units)} ${units} (mean ${formatGlucose(summary.mean, units)})`,
        position: "left",
        color: COLORS.medianLabel,
      },
      { text: `Median HbA1c: ${summary.a1c.toFixed(1)}%`, position: "right", color: COLORS.a1cLabel },
    ];
  }

  private chart(group: ChartGroup, title: string, summary: GlucoseSummary, layers: PlotLayer[]): ChartDirective {
    const { low, high } = this.options;
    return {
      kind: "chart",
      group,
      title,
      target: { low, high, color: COLORS.target },
      labels: this.summaryLabels(summary),
      layers,
    };
  }

  private line(table: string): PlotLayer {
    return {
      kind: "line",
      table,
      low: this.options.low,
      high: this.options.high,
      inRange: COLORS.inRange,
      outOfRange: COLORS.outOfRange,
    };
  }

  private overallCharts(model: ReportModel): ChartDirective[] {
    if (!model.overall || !model.period) return [];
    const title =
      `Overall Average Glucose Summary for ${formatLongDate(model.period.start)}` +
      ` to ${formatLongDate(model.period.end)}`;
    return [
      this.chart("overall", title, model.overall, [
        { kind: "band", dataset: "Band", color: COLORS.band },
        this.line("SmoothAverage"),
      ]),
    ];
  }

  private weekChart({ week, summary }: WeekReport): ChartDirective {
    const name = `Week${week.key.replace("-", "")}`;
    const title = `Average Glucose for ${formatLongDate(week.start)} to ${formatLongDate(week.end)}`;
    return this.chart("week", title, summary, [
      { kind: "band", dataset: `Band${name}`, color: COLORS.band },
      this.line(`Smooth${name}`),
    ]);
  }

  private dayChart({ day, summary }: DayReport): ChartDirective {
    const { low, high, icons, graphMax, units } = this.options;
    const name = `Day${compactDate(day.date)}`;
    const table = `Smooth${name}`;
    const layers: PlotLayer[] = [
      { kind: "fill", table, bound: high, side: "above", color: COLORS.aboveRange },
      { kind: "fill", table, bound: low, side: "below", color: COLORS.outOfRange },
      this.line(table),
    ];
    if (icons && day.readings.some((r) => r.annotations.length > 0)) {
      layers.push({ kind: "labels", dataset: name, y: graphMax - UNIT_DEFAULTS[units].labelOffset });
    }
    return this.chart("day", `Daily Glucose Summary for ${formatLongDate(day.date)}`, summary, layers);
  }
}

/**
 * Build the directive list for a report model
 */
export function buildReportScript(model: ReportModel, options: ScriptOptions): ReportScript {
  return new ReportScriptBuilder(options).build(model);
}

import { describe, it, expect } from "vitest";
import { buildReportModel, parseMeterExport, type ReportModel } from "@glucoplot/glucose";
import { exportCsv, exportRows } from "../__tests__/fixtures.js";
import { buildReportScript, ReportScriptBuilder, type ScriptOptions } from "./builder.js";
import type { ChartDirective, DatasetDirective, Directive, SmoothDirective } from "./directives.js";

const OPTIONS: ScriptOptions = {
  low: 4,
  high: 8,
  graphMin: 0,
  graphMax: 21,
  units: "mmol/L",
  pageSize: { width: 29.7, height: 21, unit: "cm" },
  icons: true,
  chartsPerPage: 2,
};

function modelFrom(csv: string): ReportModel {
  return buildReportModel(parseMeterExport(csv).readings, { units: "mmol/L" });
}

const datasets = (directives: Directive[]) =>
  directives.filter((d): d is DatasetDirective => d.kind === "dataset");
const charts = (directives: Directive[]) => directives.filter((d): d is ChartDirective => d.kind === "chart");
const smooths = (directives: Directive[]) => directives.filter((d): d is SmoothDirective => d.kind === "smooth");

// Monday to Friday, four readings a day: no week reaches 96 samples
const FIVE_DAYS = exportCsv(
  exportRows("2024-03-04", 4),
  exportRows("2024-03-05", 4),
  exportRows("2024-03-06", 4),
  exportRows("2024-03-07", 4),
  exportRows("2024-03-08", 4)
);

describe("ReportScriptBuilder", () => {
  describe("page breaks", () => {
    it("breaks after charts 2 and 4 of 5 days at 2 charts per page", () => {
      const script = buildReportScript(modelFrom(FIVE_DAYS), OPTIONS);

      expect(script.charts).toEqual({ overall: 1, week: 0, day: 5 });
      expect(script.pageBreaks).toBe(2);

      const dayGroup = script.directives.filter(
        (d) => (d.kind === "chart" && d.group === "day") || d.kind === "page-break"
      );
      expect(dayGroup.map((d) => d.kind)).toEqual([
        "chart",
        "chart",
        "page-break",
        "chart",
        "chart",
        "page-break",
        "chart",
      ]);
    });

    it("never ends a group with a page break", () => {
      const script = buildReportScript(modelFrom(FIVE_DAYS), { ...OPTIONS, chartsPerPage: 5 });

      expect(script.pageBreaks).toBe(0);
    });

    it("opens and closes a multiplot per non-empty group", () => {
      const script = buildReportScript(modelFrom(FIVE_DAYS), OPTIONS);

      const multiplots = script.directives.filter((d) => d.kind === "multiplot");
      expect(multiplots).toEqual([
        { kind: "multiplot", action: "begin", rows: 2 },
        { kind: "multiplot", action: "end" },
        { kind: "multiplot", action: "begin", rows: 2 },
        { kind: "multiplot", action: "end" },
      ]);
    });
  });

  describe("ordering", () => {
    it("emits setup, datasets, smoothing, chart setup, charts, then cleanup", () => {
      const { directives } = buildReportScript(modelFrom(FIVE_DAYS), OPTIONS);
      const kinds = directives.map((d) => d.kind);

      const lastDataset = kinds.lastIndexOf("dataset");
      const firstSmooth = kinds.indexOf("smooth");
      const lastSmooth = kinds.lastIndexOf("smooth");
      const reset = kinds.indexOf("reset");
      const firstChart = kinds.indexOf("chart");

      expect(kinds[0]).toBe("comment");
      expect(kinds.indexOf("dataset")).toBeGreaterThan(0);
      expect(lastDataset).toBeLessThan(firstSmooth);
      expect(lastSmooth).toBeLessThan(reset);
      expect(reset).toBeLessThan(firstChart);
      expect(kinds[kinds.length - 1]).toBe("cleanup");
    });

    it("lists days newest first", () => {
      const { directives } = buildReportScript(modelFrom(FIVE_DAYS), OPTIONS);

      expect(charts(directives).map((c) => c.title)).toEqual([
        "Overall Average Glucose Summary for Monday, 4 March 2024 to Friday, 8 March 2024",
        "Daily Glucose Summary for Friday, 8 March 2024",
        "Daily Glucose Summary for Thursday, 7 March 2024",
        "Daily Glucose Summary for Wednesday, 6 March 2024",
        "Daily Glucose Summary for Tuesday, 5 March 2024",
        "Daily Glucose Summary for Monday, 4 March 2024",
      ]);
    });
  });

  describe("datasets", () => {
    it("declares one dataset per day plus the average and band", () => {
      const { directives } = buildReportScript(modelFrom(FIVE_DAYS), OPTIONS);

      expect(datasets(directives).map((d) => [d.name, d.role])).toEqual([
        ["Day20240304", "day"],
        ["Day20240305", "day"],
        ["Day20240306", "day"],
        ["Day20240307", "day"],
        ["Day20240308", "day"],
        ["Average", "average"],
        ["Band", "band"],
      ]);
    });

    it("writes day rows as time, value and quoted codes", () => {
      const csv = exportCsv(
        exportRows("2024-03-04", 1, { start: "08:00", value: 5.5, comment: "Food (30);Rapid-acting insulin (4.5)" }),
        exportRows("2024-03-04", 1, { start: "07:00", value: 4.2 })
      );
      const { directives } = buildReportScript(modelFrom(csv), OPTIONS);

      expect(datasets(directives)[0].rows).toEqual(['07:00:00 4.2 ""', '08:00:00 5.5 "I^{4R} F^{30}"']);
    });

    it("omits codes when icons are off", () => {
      const csv = exportCsv(exportRows("2024-03-04", 1, { value: 5.5, comment: "Food" }));
      const { directives } = buildReportScript(modelFrom(csv), { ...OPTIONS, icons: false });

      expect(datasets(directives)[0].rows).toEqual(['00:00:00 5.5 ""']);
    });

    it("collapses all readings onto one day for the average", () => {
      const csv = exportCsv(
        exportRows("2024-03-04", 1, { start: "09:00", value: 7 }),
        exportRows("2024-03-05", 1, { start: "08:00", value: 5 })
      );
      const { directives } = buildReportScript(modelFrom(csv), OPTIONS);
      const average = datasets(directives).find((d) => d.role === "average");

      expect(average?.rows).toEqual(['08:00:00 5 ""', '09:00:00 7 ""']);
    });

    it("writes band rows per interval", () => {
      const csv = exportCsv(
        exportRows("2024-03-04", 1, { start: "08:00", value: 5 }),
        exportRows("2024-03-05", 1, { start: "08:10", value: 9 })
      );
      const { directives } = buildReportScript(modelFrom(csv), OPTIONS);
      const band = datasets(directives).find((d) => d.role === "band");

      // The second reading replaces minValue (9 > 5) but not maxValue
      expect(band?.rows).toEqual(["08:00:00 9 5"]);
    });

    it("adds week datasets and charts for weeks with a full day of readings", () => {
      const csv = exportCsv(exportRows("2024-03-05", 96), exportRows("2024-03-12", 10));
      const { directives, charts: counts } = buildReportScript(modelFrom(csv), OPTIONS);

      expect(datasets(directives).map((d) => [d.name, d.role])).toEqual([
        ["Day20240305", "day"],
        ["Day20240312", "day"],
        ["Average", "average"],
        ["Band", "band"],
        ["Week2024W10", "week"],
        ["BandWeek2024W10", "week-band"],
      ]);
      expect(counts).toEqual({ overall: 1, week: 1, day: 2 });
      expect(charts(directives)[1].title).toBe("Average Glucose for Monday, 4 March 2024 to Sunday, 10 March 2024");
    });

    it("smooths every day, average and week dataset into a table", () => {
      const csv = exportCsv(exportRows("2024-03-05", 96), exportRows("2024-03-12", 2));
      const { directives } = buildReportScript(modelFrom(csv), OPTIONS);

      expect(smooths(directives)).toEqual([
        { kind: "smooth", source: "Day20240305", target: "SmoothDay20240305", method: "mcsplines" },
        { kind: "smooth", source: "Day20240312", target: "SmoothDay20240312", method: "unique" },
        { kind: "smooth", source: "Average", target: "SmoothAverage", method: "mcsplines" },
        { kind: "smooth", source: "Week2024W10", target: "SmoothWeek2024W10", method: "mcsplines" },
      ]);
    });

    it("releases every dataset and table at the end", () => {
      const csv = exportCsv(exportRows("2024-03-04", 4));
      const { directives } = buildReportScript(modelFrom(csv), OPTIONS);

      expect(directives[directives.length - 1]).toEqual({
        kind: "cleanup",
        names: ["Day20240304", "SmoothDay20240304", "Average", "SmoothAverage", "Band"],
      });
    });
  });

  describe("charts", () => {
    it("labels the median, mean and A1C", () => {
      const csv = exportCsv(exportRows("2024-03-04", 4, { value: 6 }));
      const { directives } = buildReportScript(modelFrom(csv), OPTIONS);

      expect(charts(directives)[1].labels).toEqual([
        { text: "Median glucose: 6.0 mmol/L (mean 6.0)", position: "left", color: "#009e73" },
        { text: "Median HbA1c: 5.4%", position: "right", color: "#e69f00" },
      ]);
    });

    it("formats mg/dL labels without decimals", () => {
      const csv = exportCsv(exportRows("2024-03-04", 4, { value: 120 }));
      const model = buildReportModel(parseMeterExport(csv).readings, { units: "mg/dL" });
      const { directives } = buildReportScript(model, {
        ...OPTIONS,
        units: "mg/dL",
        low: 72,
        high: 144,
        graphMax: 400,
      });

      // (120 + 46.7) / 28.7 = 5.808...
      expect(charts(directives)[0].labels.map((l) => l.text)).toEqual([
        "Median glucose: 120 mg/dL (mean 120)",
        "Median HbA1c: 5.8%",
      ]);
    });

    it("shades the target range", () => {
      const { directives } = buildReportScript(modelFrom(FIVE_DAYS), OPTIONS);

      for (const chart of charts(directives)) {
        expect(chart.target).toEqual({ low: 4, high: 8, color: "#0072b2" });
      }
    });

    it("draws the band under the overall line", () => {
      const { directives } = buildReportScript(modelFrom(FIVE_DAYS), OPTIONS);

      expect(charts(directives)[0].layers).toEqual([
        { kind: "band", dataset: "Band", color: "#979797" },
        { kind: "line", table: "SmoothAverage", low: 4, high: 8, inRange: "#02538f", outOfRange: "#d71920" },
      ]);
    });

    it("fills daily charts outside the bounds and adds annotation labels", () => {
      const csv = exportCsv(exportRows("2024-03-04", 4, { comment: "Food" }));
      const { directives } = buildReportScript(modelFrom(csv), OPTIONS);

      expect(charts(directives)[1].layers).toEqual([
        { kind: "fill", table: "SmoothDay20240304", bound: 8, side: "above", color: "#f1b80e" },
        { kind: "fill", table: "SmoothDay20240304", bound: 4, side: "below", color: "#d71920" },
        { kind: "line", table: "SmoothDay20240304", low: 4, high: 8, inRange: "#02538f", outOfRange: "#d71920" },
        { kind: "labels", dataset: "Day20240304", y: 15 },
      ]);
    });

    it("leaves annotation labels off when icons are off", () => {
      const csv = exportCsv(exportRows("2024-03-04", 4, { comment: "Food" }));
      const { directives } = buildReportScript(modelFrom(csv), { ...OPTIONS, icons: false });

      expect(charts(directives)[1].layers.map((l) => l.kind)).toEqual(["fill", "fill", "line"]);
    });
  });

  it("emits no charts or datasets for an empty model", () => {
    const { directives, charts: counts, pageBreaks } = buildReportScript(modelFrom(""), OPTIONS);

    expect(counts).toEqual({ overall: 0, week: 0, day: 0 });
    expect(pageBreaks).toBe(0);
    expect(directives.filter((d) => d.kind === "dataset" || d.kind === "chart" || d.kind === "multiplot")).toEqual([]);
    expect(directives[directives.length - 1]).toEqual({ kind: "cleanup", names: [] });
  });

  it("starts over on each build", () => {
    const builder = new ReportScriptBuilder(OPTIONS);
    const model = modelFrom(FIVE_DAYS);

    const first = builder.build(model);
    const second = builder.build(model);

    expect(second.directives).toEqual(first.directives);
    expect(second.pageBreaks).toBe(2);
  });
});

/**
 * Renderer script serialization
 */

import type { ChartDirective, Directive, PlotLayer } from "./directives.js";

/** Strings in the script are double-quoted; backslash escapes apply */
export function quote(text: string): string {
  return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function hexColor(color: string): string {
  return `0x${color.replace(/^#/, "")}`;
}

/** x column of a smoothed table, which stores seconds since midnight */
const TABLE_TIME = `(strftime("%H:%M:%S", $1))`;

function serializeLayer(layer: PlotLayer): string {
  switch (layer.kind) {
    case "band":
      return `$${layer.dataset} using 1:2:3 with filledcurves fc rgb ${quote(layer.color)} fs transparent solid 0.4 noborder notitle`;
    case "line":
      return (
        `$${layer.table} using ${TABLE_TIME}:2:` +
        `(($2 > ${layer.high} || $2 < ${layer.low}) ? ${hexColor(layer.outOfRange)} : ${hexColor(layer.inRange)}) ` +
        `with lines lw 3 lc rgb variable notitle`
      );
    case "fill":
      return (
        `$${layer.table} using ${TABLE_TIME}:2:(${layer.bound}) ` +
        `with filledcurves ${layer.side} fc rgb ${quote(layer.color)} fs transparent solid 0.5 noborder notitle`
      );
    case "labels":
      return `$${layer.dataset} using 1:(${layer.y}):3 with labels left rotate by 90 font ",9" notitle`;
  }
}

function serializeChart(chart: ChartDirective): string[] {
  const lines = [
    `set title ${quote(chart.title)} font ",16"`,
    `set object 1 rect from graph 0, first ${chart.target.low} to graph 1, first ${chart.target.high} ` +
      `fc rgb ${quote(chart.target.color)} fs transparent solid 0.15 noborder behind`,
  ];

  chart.labels.forEach((label, idx) => {
    const at = label.position === "left" ? "graph 0.02, graph 0.93 left" : "graph 0.98, graph 0.93 right";
    lines.push(`set label ${idx + 1} ${quote(label.text)} at ${at} front tc rgb ${quote(label.color)}`);
  });

  lines.push(`plot ${chart.layers.map(serializeLayer).join(", \\\n     ")}`);

  chart.labels.forEach((_, idx) => lines.push(`unset label ${idx + 1}`));
  lines.push("unset object 1");
  return lines;
}

/**
 * Serialize one directive to script lines
 */
export function serializeDirective(directive: Directive): string[] {
  switch (directive.kind) {
    case "comment":
      return [`# ${directive.text}`];
    case "set":
      return [directive.value === undefined ? `set ${directive.option}` : `set ${directive.option} ${directive.value}`];
    case "reset":
      return ["reset"];
    case "dataset":
      return [`$${directive.name} << EOD`, ...directive.rows, "EOD"];
    case "smooth":
      return [
        `set table $${directive.target}`,
        `plot $${directive.source} using 1:2 smooth ${directive.method}`,
        "unset table",
      ];
    case "multiplot":
      return directive.action === "begin"
        ? [`set multiplot layout ${directive.rows ?? 1},1`]
        : ["unset multiplot"];
    case "page-break":
      return ["unset multiplot", `set multiplot layout ${directive.rows},1`];
    case "chart":
      return serializeChart(directive);
    case "cleanup":
      return directive.names.length > 0 ? [`undefine ${directive.names.map((name) => `$${name}`).join(" ")}`] : [];
  }
}

/**
 * Serialize a directive sequence into the complete script text
 */
export function serializeScript(directives: readonly Directive[]): string {
  return directives.flatMap(serializeDirective).join("\n") + "\n";
}

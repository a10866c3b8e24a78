/**
 * @glucoplot/glucose
 *
 * Glucose reading model, meter export parsing, aggregation and statistics
 *
 * @example
 * ```typescript
 * import { parseMeterExport, buildReportModel } from "@glucoplot/glucose";
 *
 * const { readings } = parseMeterExport(csv);
 * const model = buildReportModel(readings, { units: "mmol/L" });
 * ```
 */

// Models - Type definitions
export * from "./models/index.js";

// Parsers - Meter export and comment decoding
export * from "./parsers/index.js";

// Analysis - Statistics and units
export * from "./analysis/index.js";

// Aggregations - Day, week and interval rollups
export * from "./aggregations/index.js";

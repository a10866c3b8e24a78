/**
 * @glucoplot/report
 *
 * Builds renderer scripts from glucose report models and renders them to PDF
 */

export * from "./config.js";
export { consoleLogger, type Logger } from "./logger.js";
export * from "./script/index.js";
export { renderScript, DEFAULT_RENDER_COMMAND, type RenderOptions, type RenderResult } from "./render/renderer.js";
export { generateReport, type GenerateOptions, type ReportOutcome } from "./pipeline.js";

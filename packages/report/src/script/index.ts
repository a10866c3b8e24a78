export * from "./directives.js";
export { buildReportScript, ReportScriptBuilder, type ReportScript, type ScriptOptions } from "./builder.js";
export { quote, serializeDirective, serializeScript } from "./serialize.js";
export { COLORS } from "./colors.js";

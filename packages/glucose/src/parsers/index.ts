/**
 * @glucoplot/glucose - Parsers
 *
 * Meter export parsing and annotation decoding
 */

export {
  parseMeterExport,
  parseMeterLine,
  formatDataRow,
  MAX_REPORTED_ERRORS,
  type ParseOptions,
  type ParseResult,
  type LineParseOutcome,
  type DataRowOptions,
} from "./meter-export.js";

export {
  parseComment,
  annotationCode,
  annotationCodes,
  truncateDose,
  COMMENT_DELIMITER,
} from "./annotations.js";

export {
  parseTimestamp,
  formatDate,
  formatTime,
  formatLongDate,
  dateToMs,
  addDays,
  splitLines,
  type WallClock,
} from "./csv-utils.js";

export { isKetoneRow, isFingerstickRow, isValidGlucose } from "./validation.js";

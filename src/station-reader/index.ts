/**
 * Station record reader: public API.
 */

export * from "./schemas.js";
export {
  QC_CHARS,
  EC_CHARS,
  UNDEFINED_SENTINEL,
  decodeQc,
  decodeEc,
  encodeQc,
  encodeEc,
} from "./codes.js";
export * from "./errors.js";
export { getReadMode, getMaxHeaderLines, getLogPath } from "./config.js";
export {
  HEADER_KEYS,
  TABLE_COLUMNS,
  SUPPORTED_FORMAT,
  parseHeader,
  scanHeader,
  isTableHeader,
  type HeaderKey,
  type HeaderOptions,
  type HeaderScan,
} from "./header.js";
export { parseRow } from "./row.js";
export { parse, splitLines, type ParseOptions, type StationRecord } from "./parser.js";
export { serialize, serializeHeader, serializeRow, serializeTableHeader } from "./writer.js";
export { readStationFile } from "./readFile.js";
export { valuesOf, datesOf, summarize, type StationSummary } from "./series.js";

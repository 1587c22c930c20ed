/**
 * Header scanning: FORMAT line, comments, KEY | VALUE metadata, up to the table header row.
 */

import { parseCompactDate, parseDecimal, parseInteger } from "./codes.js";
import { getMaxHeaderLines } from "./config.js";
import { MalformedHeaderError, type LineLocation } from "./errors.js";
import { StationMetadataSchema, type StationMetadata } from "./schemas.js";
import { debugLog } from "../logger.js";

export const SUPPORTED_FORMAT = "1.0";

export const TABLE_COLUMNS = ["ID", "SOUID", "DATE", "VAR", "QC", "EC"] as const;

/** Recognised metadata keys, in the order the writer emits them. */
export const HEADER_KEYS = [
  "CLEANING",
  "CREATED",
  "VARIABLE",
  "COUNTRY",
  "ID",
  "NAME",
  "LATITUDE",
  "LONGITUDE",
  "ALTITUDE",
  "START_DATE",
  "END_DATE",
] as const;
export type HeaderKey = (typeof HEADER_KEYS)[number];

export type HeaderFieldKind = "string" | "integer" | "decimal" | "date";

type MetadataField = Exclude<keyof StationMetadata, "format">;

export const HEADER_FIELDS: Record<HeaderKey, { field: MetadataField; kind: HeaderFieldKind }> = {
  CLEANING: { field: "cleaning", kind: "integer" },
  CREATED: { field: "created", kind: "date" },
  VARIABLE: { field: "variable", kind: "string" },
  COUNTRY: { field: "country", kind: "string" },
  ID: { field: "id", kind: "string" },
  NAME: { field: "name", kind: "string" },
  LATITUDE: { field: "latitude", kind: "decimal" },
  LONGITUDE: { field: "longitude", kind: "decimal" },
  ALTITUDE: { field: "altitude", kind: "decimal" },
  START_DATE: { field: "startDate", kind: "date" },
  END_DATE: { field: "endDate", kind: "date" },
};

const REQUIRED_KEYS: readonly HeaderKey[] = ["ID", "VARIABLE"];

export interface HeaderOptions {
  /** Overrides STATION_READER_MAX_HEADER_LINES */
  maxHeaderLines?: number;
}

export interface HeaderScan {
  metadata: StationMetadata;
  /** 0-based index of the table header row in the scanned lines */
  tableHeaderIndex: number;
}

interface RawEntry extends LineLocation {
  value: string;
}

export function toHeaderKey(key: string): HeaderKey | undefined {
  return HEADER_KEYS.find((k) => k === key);
}

export function isTableHeader(line: string): boolean {
  const cols = line.split(",").map((c) => c.trim());
  return cols.length === TABLE_COLUMNS.length && cols.every((c, i) => c === TABLE_COLUMNS[i]);
}

function convertValue(kind: HeaderFieldKind, raw: string): string | number | null {
  switch (kind) {
    case "string":
      return raw;
    case "integer":
      return parseInteger(raw);
    case "decimal":
      return parseDecimal(raw);
    case "date":
      return parseCompactDate(raw);
  }
}

/**
 * Scan lines up to and including the table header row. Line 1 must be the FORMAT line.
 * Lines that are not KEY | VALUE metadata, and unknown keys, are skipped.
 * Throws MalformedHeaderError on a missing or unsupported FORMAT line, a missing table
 * header, a duplicated key, a missing required key, or a value that does not parse.
 */
export function scanHeader(lines: readonly string[], options: HeaderOptions = {}): HeaderScan {
  const maxLines = options.maxHeaderLines ?? getMaxHeaderLines();
  const entries = new Map<HeaderKey, RawEntry>();
  let tableHeaderIndex: number | undefined;

  const first = lines.length > 0 ? lines[0] : "";
  const formatMatch = /^FORMAT\s+(\S+)$/.exec(first.trim());
  if (formatMatch === null) {
    throw new MalformedHeaderError(`missing FORMAT ${SUPPORTED_FORMAT} line`, { lineNumber: 1, line: first });
  }
  if (formatMatch[1] !== SUPPORTED_FORMAT) {
    throw new MalformedHeaderError(`unsupported format version ${formatMatch[1]}`, { lineNumber: 1, line: first });
  }
  const format = formatMatch[1];

  const limit = Math.min(lines.length, maxLines);
  for (let i = 1; i < limit; i++) {
    const line = lines[i];
    const trimmed = line.trim();
    const location: LineLocation = { lineNumber: i + 1, line };
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    if (isTableHeader(trimmed)) {
      tableHeaderIndex = i;
      break;
    }

    const pipe = trimmed.indexOf("|");
    if (pipe === -1) {
      debugLog(`ignoring header line ${i + 1}: ${trimmed}`);
      continue;
    }
    const rawKey = trimmed.slice(0, pipe).trim();
    const key = toHeaderKey(rawKey);
    if (key === undefined) {
      debugLog(`ignoring header key ${rawKey} at line ${i + 1}`);
      continue;
    }
    if (entries.has(key)) throw new MalformedHeaderError(`duplicate key ${key}`, location);
    entries.set(key, { ...location, value: trimmed.slice(pipe + 1).trim() });
  }

  if (tableHeaderIndex === undefined) {
    const scope = lines.length > limit ? ` within ${limit} lines` : "";
    throw new MalformedHeaderError(`table header (${TABLE_COLUMNS.join(", ")}) not found${scope}`);
  }
  for (const key of REQUIRED_KEYS) {
    if (!entries.has(key)) throw new MalformedHeaderError(`missing required key ${key}`);
  }

  const candidate: Record<string, unknown> = { format };
  for (const [key, entry] of entries) {
    const { field, kind } = HEADER_FIELDS[key];
    const value = convertValue(kind, entry.value);
    if (value === null) {
      throw new MalformedHeaderError(`invalid ${key} value "${entry.value}"`, entry);
    }
    candidate[field] = value;
  }

  const result = StationMetadataSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = HEADER_KEYS.find((k) => HEADER_FIELDS[k].field === issue.path[0]);
    const entry = key === undefined ? undefined : entries.get(key);
    const label = key ?? issue.path.join(".");
    throw new MalformedHeaderError(`invalid ${label}: ${issue.message}`, entry);
  }

  return { metadata: Object.freeze(result.data), tableHeaderIndex };
}

export function parseHeader(lines: readonly string[], options: HeaderOptions = {}): StationMetadata {
  return scanHeader(lines, options).metadata;
}

/**
 * Serializes a StationRecord back to the station file format.
 * parse(serialize(record)) reproduces the record apart from line numbers.
 */

import { EC_CHARS, QC_CHARS, encodeEc, encodeQc, encodeValue, formatCompactDate, formatDecimal } from "./codes.js";
import { HEADER_FIELDS, HEADER_KEYS, SUPPORTED_FORMAT, TABLE_COLUMNS, type HeaderFieldKind } from "./header.js";
import type { StationRecord } from "./parser.js";
import { EcCode, QcCode, type Observation, type StationMetadata } from "./schemas.js";

const KEY_WIDTH = Math.max(...HEADER_KEYS.map((k) => k.length));
const ID_WIDTH = 9;
const SOUID_WIDTH = 8;
const DATE_WIDTH = 8;
const VAR_WIDTH = 8;

function describeCodes<T extends string>(codes: readonly T[], chars: Record<T, string>): string {
  return codes.map((code) => `${chars[code]}=${code}`).join(" ");
}

function headerComments(): string[] {
  return [
    "#",
    "# VAR: -999.00 marks an undefined value",
    `# QC:  ${describeCodes(QcCode.options, QC_CHARS)}`,
    `# EC:  ${describeCodes(EcCode.options, EC_CHARS)}`,
    "#",
  ];
}

function formatHeaderValue(kind: HeaderFieldKind, value: string | number): string {
  if (typeof value === "number") {
    return kind === "decimal" ? formatDecimal(value) : String(value);
  }
  return kind === "date" ? formatCompactDate(value) : value;
}

export function serializeHeader(metadata: StationMetadata): string[] {
  const lines = [`FORMAT ${SUPPORTED_FORMAT}`, ...headerComments()];
  for (const key of HEADER_KEYS) {
    const { field, kind } = HEADER_FIELDS[key];
    const value = metadata[field];
    if (value === undefined) continue;
    lines.push(`${key.padEnd(KEY_WIDTH)} | ${formatHeaderValue(kind, value)}`);
  }
  return lines;
}

export function serializeTableHeader(): string {
  const [id, souid, date, variable, qc, ec] = TABLE_COLUMNS;
  return [
    id.padEnd(ID_WIDTH),
    souid.padEnd(SOUID_WIDTH),
    date.padEnd(DATE_WIDTH),
    variable.padStart(VAR_WIDTH),
    qc,
    ec,
  ].join(", ");
}

export function serializeRow(observation: Observation): string {
  return [
    observation.stationId.padEnd(ID_WIDTH),
    observation.sourceId.padEnd(SOUID_WIDTH),
    formatCompactDate(observation.date),
    encodeValue(observation.value).padStart(VAR_WIDTH),
    encodeQc(observation.qc),
    encodeEc(observation.ec),
  ].join(", ");
}

export function serialize(record: StationRecord): string {
  const lines = [
    ...serializeHeader(record.metadata),
    "",
    serializeTableHeader(),
    ...record.observations.map(serializeRow),
  ];
  return lines.join("\n") + "\n";
}

/**
 * Data rows: ID, SOUID, DATE, VAR, QC, EC. Comma separated, whitespace padded.
 */

import { decodeEc, decodeQc, decodeValue, parseCompactDate } from "./codes.js";
import { MalformedRowError, type LineLocation } from "./errors.js";
import type { Observation } from "./schemas.js";
import { TABLE_COLUMNS } from "./header.js";

/**
 * Parse one data row. lineNumber is only used for error reporting and the
 * observation's lineNumber field.
 */
export function parseRow(line: string, lineNumber = 1): Observation {
  const location: LineLocation = { lineNumber, line };
  const fields = line.split(",").map((f) => f.trim());
  if (fields.length !== TABLE_COLUMNS.length) {
    throw new MalformedRowError(`expected ${TABLE_COLUMNS.length} fields, found ${fields.length}`, location);
  }
  const [stationId, sourceId, rawDate, rawValue, rawQc, rawEc] = fields;

  if (stationId === "") throw new MalformedRowError("empty ID", location);

  const date = parseCompactDate(rawDate);
  if (date === null) throw new MalformedRowError(`invalid DATE "${rawDate}"`, location);

  const value = decodeValue(rawValue);
  if (value === undefined) throw new MalformedRowError(`invalid VAR "${rawValue}"`, location);

  const qc = decodeQc(rawQc);
  if (qc === undefined) throw new MalformedRowError(`unknown QC code "${rawQc}"`, location);

  const ec = decodeEc(rawEc);
  if (ec === undefined) throw new MalformedRowError(`unknown EC code "${rawEc}"`, location);

  return Object.freeze({ stationId, sourceId, date, value, qc, ec, lineNumber });
}

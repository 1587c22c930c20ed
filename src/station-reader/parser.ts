/**
 * Station record parser: header + data rows → StationRecord.
 * Single pass over one in-memory string; observations keep file order.
 */

import { getReadMode } from "./config.js";
import { EmptyDatasetError, MalformedRowError } from "./errors.js";
import { scanHeader, type HeaderOptions } from "./header.js";
import { parseRow } from "./row.js";
import type { Observation, ReadMode, StationMetadata } from "./schemas.js";
import { debugLog } from "../logger.js";

export interface ParseOptions extends HeaderOptions {
  /**
   * strict: first bad row aborts the parse.
   * permissive: bad rows are collected in rejectedRows and parsing continues.
   * Overrides STATION_READER_MODE.
   */
  mode?: ReadMode;
  /** Reject rows whose ID does not start with the header ID. Off by default. */
  checkStationId?: boolean;
}

export interface StationRecord {
  readonly metadata: StationMetadata;
  readonly observations: readonly Observation[];
  /** Always empty in strict mode */
  readonly rejectedRows: readonly MalformedRowError[];
}

export function splitLines(text: string): string[] {
  const body = text.startsWith("\uFEFF") ? text.slice(1) : text;
  return body.split(/\r?\n/);
}

export function parse(text: string, options: ParseOptions = {}): StationRecord {
  const mode = options.mode ?? getReadMode();
  const lines = splitLines(text);
  const { metadata, tableHeaderIndex } = scanHeader(lines, options);

  const observations: Observation[] = [];
  const rejectedRows: MalformedRowError[] = [];
  let dataRows = 0;

  for (let i = tableHeaderIndex + 1; i < lines.length; i++) {
    const line = lines[i];
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;
    dataRows++;

    try {
      const observation = parseRow(line, i + 1);
      if (options.checkStationId === true && !observation.stationId.startsWith(metadata.id)) {
        throw new MalformedRowError(`station ${observation.stationId} does not belong to ${metadata.id}`, {
          lineNumber: i + 1,
          line,
        });
      }
      observations.push(observation);
    } catch (err) {
      if (mode === "permissive" && err instanceof MalformedRowError) {
        debugLog(`rejected row: ${err.message}`);
        rejectedRows.push(err);
        continue;
      }
      throw err;
    }
  }

  if (dataRows === 0) {
    throw new EmptyDatasetError(`no data rows follow the table header for station ${metadata.id}`);
  }

  return Object.freeze({
    metadata,
    observations: Object.freeze(observations),
    rejectedRows: Object.freeze(rejectedRows),
  });
}

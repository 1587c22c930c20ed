/**
 * Accessors over a parsed record's observation series. Counts only; no statistics.
 */

import type { StationRecord } from "./parser.js";
import type { CalendarDate, VariableCode } from "./schemas.js";

export interface StationSummary {
  id: string;
  name: string | null;
  variable: VariableCode;
  rows: number;
  undefinedValues: number;
  firstDate: CalendarDate | null;
  lastDate: CalendarDate | null;
  rejectedRows: number;
}

/** Values in file order; null for the undefined sentinel. */
export function valuesOf(record: StationRecord): (number | null)[] {
  return record.observations.map((o) => o.value);
}

/** Dates in file order. */
export function datesOf(record: StationRecord): CalendarDate[] {
  return record.observations.map((o) => o.date);
}

export function summarize(record: StationRecord): StationSummary {
  const { metadata, observations } = record;
  const count = observations.length;
  return {
    id: metadata.id,
    name: metadata.name ?? null,
    variable: metadata.variable,
    rows: count,
    undefinedValues: observations.filter((o) => o.value === null).length,
    firstDate: count > 0 ? observations[0].date : null,
    lastDate: count > 0 ? observations[count - 1].date : null,
    rejectedRows: record.rejectedRows.length,
  };
}

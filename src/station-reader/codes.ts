/**
 * Fixed character tables for the QC and EC columns, plus the scalar formats
 * shared by the header and data rows (compact dates, decimals, the -999 sentinel).
 */

import { EcCode, QcCode, type CalendarDate } from "./schemas.js";

export const QC_CHARS = {
  valid: "_",
  suspect: "1",
  disagree: "2",
  secondary: "3",
  missing: "9",
} as const satisfies Record<QcCode, string>;

export const EC_CHARS = {
  none: "_",
  duplicate: "D",
  gap: "G",
  "internal-consistency": "I",
  streak: "K",
  "multiday-length": "L",
  megaconsistency: "M",
  naught: "N",
  "climatological-outlier": "O",
  "lagged-range": "R",
  "spatial-consistency": "S",
  "temporal-consistency": "T",
  "ninety-nine-check": "W",
  bounds: "X",
} as const satisfies Record<EcCode, string>;

const QC_BY_CHAR = new Map<string, QcCode>(QcCode.options.map((code) => [QC_CHARS[code], code] as const));
const EC_BY_CHAR = new Map<string, EcCode>(EcCode.options.map((code) => [EC_CHARS[code], code] as const));

/** Value written in the VAR column when a reading is undefined. */
export const UNDEFINED_SENTINEL = -999;

export function decodeQc(ch: string): QcCode | undefined {
  return QC_BY_CHAR.get(ch);
}

export function decodeEc(ch: string): EcCode | undefined {
  return EC_BY_CHAR.get(ch);
}

export function encodeQc(code: QcCode): string {
  return QC_CHARS[code];
}

export function encodeEc(code: EcCode): string {
  return EC_CHARS[code];
}

/**
 * Parse YYYYMMDD into an ISO calendar date. Returns null unless the string is
 * eight digits naming a real day (19980230 is rejected).
 */
export function parseCompactDate(raw: string): CalendarDate | null {
  const m = /^(\d{4})(\d{2})(\d{2})$/.exec(raw);
  if (m === null) return null;
  const year = parseInt(m[1], 10);
  const month = parseInt(m[2], 10);
  const day = parseInt(m[3], 10);
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return `${m[1]}-${m[2]}-${m[3]}`;
}

export function formatCompactDate(date: CalendarDate): string {
  return date.replace(/-/g, "");
}

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Plain decimal notation only: no hex, no Infinity, no empty string. */
export function parseDecimal(raw: string): number | null {
  if (!DECIMAL_RE.test(raw)) return null;
  const n = Number(raw);
  if (!Number.isFinite(n)) return null;
  return n === 0 ? 0 : n;
}

export function parseInteger(raw: string): number | null {
  if (!/^[+-]?\d+$/.test(raw)) return null;
  const n = parseInt(raw, 10);
  return Number.isSafeInteger(n) ? n : null;
}

/** Two decimals when that is exact (153 → "153.00"), otherwise the shortest exact form. */
export function formatDecimal(n: number): string {
  const fixed = n.toFixed(2);
  return Number(fixed) === n ? fixed : String(n);
}

/** VAR column value: -999 is the undefined sentinel, never a reading. */
export function decodeValue(raw: string): number | null | undefined {
  const n = parseDecimal(raw);
  if (n === null) return undefined;
  return n === UNDEFINED_SENTINEL ? null : n;
}

export function encodeValue(value: number | null): string {
  return value === null ? formatDecimal(UNDEFINED_SENTINEL) : formatDecimal(value);
}

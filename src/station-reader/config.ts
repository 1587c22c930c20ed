/**
 * Station reader config: env-based getters with safe parsing and clamped defaults.
 * Explicit ParseOptions take precedence over anything read here.
 */

import { ReadMode } from "./schemas.js";

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

/** Row error handling (STATION_READER_MODE). Default strict; unknown values fall back to it. */
export function getReadMode(): ReadMode {
  const result = ReadMode.safeParse(process.env.STATION_READER_MODE);
  return result.success ? result.data : "strict";
}

/** Lines scanned for the table header before giving up. Default 500. */
export function getMaxHeaderLines(): number {
  return parseIntEnv("STATION_READER_MAX_HEADER_LINES", 500, 10, 100_000);
}

/** JSONL event log for the CLI. Unset means no log. */
export function getLogPath(): string | null {
  const raw = process.env.STATION_READER_LOG_PATH;
  if (raw == null || raw.trim() === "") return null;
  return raw.trim();
}

/**
 * Shared fixtures for station reader tests.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";

export const SAMPLE_PATH = fileURLToPath(new URL("./fixtures/0009084_.txt", import.meta.url));

export function loadSample(): string {
  return readFileSync(SAMPLE_PATH, "utf-8");
}

export const SAMPLE_VALUES = [0, 0, 0, 0, 8, 0, 0, 0, 4.4, 1, 2.5, 0, 0, 0, 0, 5.3, 12, 0, 0, 0];

export const MINIMAL_HEADER = [
  "FORMAT 1.0",
  "# test station",
  "VARIABLE | TMAX",
  "ID       | 0000001_",
  "",
  "ID, SOUID, DATE, VAR, QC, EC",
];

/** Small document: MINIMAL_HEADER (or the given header lines) followed by rows. */
export function makeDocument(rows: string[], header: string[] = MINIMAL_HEADER): string {
  return [...header, ...rows].join("\n") + "\n";
}

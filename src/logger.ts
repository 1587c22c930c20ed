/**
 * Logging: JSONL event files plus debug console output.
 * Set DEBUG_STATION_READER=true to enable debug output.
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";

export const DEBUG_STATION_READER = process.env.DEBUG_STATION_READER === "true";

/** Appends `event` as one JSON line to `path`, creating parent directories first. */
export async function appendJsonl(path: string, event: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, `${JSON.stringify(event)}\n`, "utf-8");
}

export function debugLog(...args: unknown[]): void {
  if (DEBUG_STATION_READER) {
    console.log("[station-reader]", ...args);
  }
}

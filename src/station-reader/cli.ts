/**
 * parse-station CLI: parse station files, print one summary line each (or JSON with --json).
 *
 * Usage:
 *   npm run parse-station -- <file...> [--permissive] [--json]
 *
 * Options:
 *   --permissive  Collect bad rows instead of failing on the first one
 *   --json        Print the parsed records as JSON
 *
 * Exit code is 1 when any file fails to parse.
 */

import { getLogPath, getReadMode } from "./config.js";
import { isStationRecordError } from "./errors.js";
import type { StationRecord } from "./parser.js";
import { readStationFile } from "./readFile.js";
import type { ReadMode } from "./schemas.js";
import { summarize, type StationSummary } from "./series.js";
import { appendJsonl } from "../logger.js";

export interface CliArgs {
  files: string[];
  mode: ReadMode;
  json: boolean;
}

export interface CliIo {
  log(message: string): void;
  error(message: string): void;
}

interface ParseEvent {
  tsISO: string;
  file: string;
  ok: boolean;
  mode: ReadMode;
  summary?: StationSummary;
  error?: string;
}

export const USAGE = "Usage: parse-station <file...> [--permissive] [--json]";

export function parseArgs(argv: readonly string[]): CliArgs {
  const files: string[] = [];
  let mode = getReadMode();
  let json = false;
  for (const arg of argv) {
    if (arg === "--permissive") mode = "permissive";
    else if (arg === "--json") json = true;
    else if (arg.startsWith("--")) throw new Error(`Unknown option ${arg}`);
    else files.push(arg);
  }
  if (files.length === 0) throw new Error("No input files");
  return { files, mode, json };
}

function formatSummary(file: string, s: StationSummary): string {
  const range = s.firstDate !== null && s.lastDate !== null ? `${s.firstDate}..${s.lastDate}` : "-";
  const parts = [
    `${file}: ${s.id}`,
    s.variable,
    `${s.rows} rows`,
    range,
    `${s.undefinedValues} undefined`,
  ];
  if (s.rejectedRows > 0) parts.push(`${s.rejectedRows} rejected`);
  return parts.join(" | ");
}

function errorMessage(err: unknown): string {
  if (isStationRecordError(err)) return err.message;
  return err instanceof Error ? err.message : String(err);
}

export async function runCli(argv: readonly string[], io: CliIo = console): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    io.error(`[parse-station] ${errorMessage(err)}`);
    io.error(USAGE);
    return 2;
  }

  const logPath = getLogPath();
  const records: { file: string; record: StationRecord }[] = [];
  let failed = 0;

  for (const file of args.files) {
    const event: ParseEvent = { tsISO: new Date().toISOString(), file, ok: false, mode: args.mode };
    try {
      const record = await readStationFile(file, { mode: args.mode });
      const summary = summarize(record);
      event.ok = true;
      event.summary = summary;
      records.push({ file, record });
      if (!args.json) io.log(formatSummary(file, summary));
      for (const rejected of record.rejectedRows) {
        io.error(`[parse-station] ${file}: ${rejected.message}`);
      }
    } catch (err) {
      failed++;
      event.error = errorMessage(err);
      io.error(`[parse-station] ${file}: ${event.error}`);
    }
    if (logPath !== null) await appendJsonl(logPath, event);
  }

  if (args.json) io.log(JSON.stringify(records, null, 2));
  return failed > 0 ? 1 : 0;
}

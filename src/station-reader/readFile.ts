import { readFile } from "fs/promises";
import { parse, type ParseOptions, type StationRecord } from "./parser.js";

/** Reads the whole file once (UTF-8), then parses it. */
export async function readStationFile(path: string, options: ParseOptions = {}): Promise<StationRecord> {
  const text = await readFile(path, "utf-8");
  return parse(text, options);
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { parseArgs, runCli, USAGE, type CliIo } from "../cli.js";
import { SAMPLE_PATH, makeDocument } from "./fixtures.js";

function captureIo(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    log: (message: string) => {
      out.push(message);
    },
    error: (message: string) => {
      err.push(message);
    },
  };
}

describe("parseArgs", () => {
  it("collects files and flags", () => {
    expect(parseArgs(["a.txt", "--json", "b.txt", "--permissive"])).toEqual({
      files: ["a.txt", "b.txt"],
      mode: "permissive",
      json: true,
    });
  });

  it("rejects unknown options and empty input", () => {
    expect(() => parseArgs(["--fast", "a.txt"])).toThrow("Unknown option --fast");
    expect(() => parseArgs([])).toThrow("No input files");
  });
});

describe("runCli", () => {
  let testDir: string;
  let originalLogPath: string | undefined;
  let originalMode: string | undefined;

  beforeEach(async () => {
    originalLogPath = process.env.STATION_READER_LOG_PATH;
    originalMode = process.env.STATION_READER_MODE;
    delete process.env.STATION_READER_LOG_PATH;
    delete process.env.STATION_READER_MODE;
    testDir = join(tmpdir(), `station-reader-cli-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    if (originalLogPath === undefined) delete process.env.STATION_READER_LOG_PATH;
    else process.env.STATION_READER_LOG_PATH = originalLogPath;
    if (originalMode === undefined) delete process.env.STATION_READER_MODE;
    else process.env.STATION_READER_MODE = originalMode;
    await rm(testDir, { recursive: true, force: true });
  });

  it("prints a summary line per file", async () => {
    const io = captureIo();
    const code = await runCli([SAMPLE_PATH], io);
    expect(code).toBe(0);
    expect(io.out).toEqual([`${SAMPLE_PATH}: 0009084_ | PPT | 20 rows | 1998-03-01..1998-03-20 | 0 undefined`]);
    expect(io.err).toEqual([]);
  });

  it("prints records as JSON with --json", async () => {
    const io = captureIo();
    await runCli([SAMPLE_PATH, "--json"], io);
    expect(io.out).toHaveLength(1);
    const parsed: unknown = JSON.parse(io.out[0]);
    expect(parsed).toMatchObject([
      { file: SAMPLE_PATH, record: { metadata: { id: "0009084_", variable: "PPT" }, rejectedRows: [] } },
    ]);
  });

  it("reports failures with line numbers and exits 1", async () => {
    const path = join(testDir, "short.txt");
    await writeFile(path, makeDocument(["0000001_1, 0000001_, 20010101, 1.00, _"]), "utf-8");
    const io = captureIo();
    const code = await runCli([path, SAMPLE_PATH], io);
    expect(code).toBe(1);
    expect(io.err).toEqual([
      `[parse-station] ${path}: MalformedRow at line 7: expected 6 fields, found 5 [0000001_1, 0000001_, 20010101, 1.00, _]`,
    ]);
    expect(io.out).toHaveLength(1);
  });

  it("lists rejected rows in permissive mode", async () => {
    const path = join(testDir, "mixed.txt");
    await writeFile(
      path,
      makeDocument(["0000001_1, 0000001_, 20010101, 1.00, _, _", "0000001_1, 0000001_, 20010102, 1.00, _, Q"]),
      "utf-8"
    );
    const io = captureIo();
    expect(await runCli([path, "--permissive"], io)).toBe(0);
    expect(io.out).toEqual([`${path}: 0000001_ | TMAX | 1 rows | 2001-01-01..2001-01-01 | 0 undefined | 1 rejected`]);
    expect(io.err).toEqual([
      `[parse-station] ${path}: MalformedRow at line 8: unknown EC code "Q" [0000001_1, 0000001_, 20010102, 1.00, _, Q]`,
    ]);
  });

  it("prints usage on bad arguments", async () => {
    const io = captureIo();
    expect(await runCli([], io)).toBe(2);
    expect(io.err).toEqual(["[parse-station] No input files", USAGE]);
  });

  it("appends one JSONL event per file when a log path is configured", async () => {
    const logPath = join(testDir, "logs", "events.jsonl");
    process.env.STATION_READER_LOG_PATH = logPath;
    const missing = join(testDir, "absent.txt");
    await runCli([SAMPLE_PATH, missing], captureIo());
    const events = (await readFile(logPath, "utf-8"))
      .trim()
      .split("\n")
      .map((l): unknown => JSON.parse(l));
    expect(events).toHaveLength(2);
    expect(events[0]).toMatchObject({ file: SAMPLE_PATH, ok: true, mode: "strict", summary: { rows: 20 } });
    expect(events[1]).toMatchObject({ file: missing, ok: false });
  });
});

#!/usr/bin/env node
/**
 * Entry point for the parse-station CLI. See src/station-reader/cli.ts for options.
 */

import { runCli } from "../src/station-reader/cli.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error("[parse-station] Error:", e);
    process.exit(1);
  });

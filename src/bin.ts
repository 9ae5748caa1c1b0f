#!/usr/bin/env node
import { runCli } from "./cli.js";
import { log } from "./utils/telemetry.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.fatal({ err }, "Fatal error");
    process.exitCode = 1;
  }
);

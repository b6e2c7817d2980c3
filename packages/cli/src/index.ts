#!/usr/bin/env node
import { getLogger, loadDotenv } from "@agent-tools/core";
import { runCli } from "./program.js";

loadDotenv();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    getLogger().fatal("Unexpected failure", error);
    process.exitCode = 1;
  });

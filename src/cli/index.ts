#!/usr/bin/env node
import { runCli } from "./cli.js";

const controller = new AbortController();
process.once("SIGINT", () => {
  console.error("Cancelling: files in progress will be marked cancelled");
  controller.abort();
});

process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });

#!/usr/bin/env node
/**
 * @module bin
 * @fileoverview `breadth-crawler` executable. Ctrl-C stops the crawl and
 * still writes the records gathered so far.
 */

import { runCli } from "./cli.js";

const controller = new AbortController();
process.once("SIGINT", () => {
  console.error("[breadth-crawler] Interrupted, finishing up...");
  controller.abort();
});

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  });

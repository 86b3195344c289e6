#!/usr/bin/env node
/**
 * pyschemagen CLI - generate Python dataclasses from reflected Pkl schemas
 */

import { runCli } from "./cli.js";

// Skip node and script name
const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });

export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";

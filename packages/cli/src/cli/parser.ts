/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  inputFile?: string;
  options: CliOptions;
  /** Options that are not recognised, and extra positional arguments */
  unexpected: string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const unexpected: string[] = [];
  let command = "";
  let inputFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith("-") || arg === "-") {
      if (!command) {
        command = arg;
      } else if (!inputFile) {
        inputFile = arg;
      } else {
        unexpected.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, unexpected: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, unexpected: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "--suffix":
        options.suffix = args[++i] ?? "";
        break;
      case "--indent":
        options.indent = args[++i] ?? "";
        break;
      case "--no-header":
        options.noHeader = true;
        break;
      default:
        unexpected.push(arg);
    }
  }

  return { command, inputFile, options, unexpected };
};

/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { checkCommand } from "../commands/check.js";
import type { CommandSummary } from "../commands/emit.js";
import type { PyschemagenConfig, Result } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const COMMANDS = new Set(["generate", "check"]);

const finish = (
  result: Result<CommandSummary, string>,
  quiet: boolean
): number => {
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return 1;
  }

  const { succeeded, failed } = result.value;
  if (failed.length > 0) {
    console.error(
      `Error: ${failed.length} module(s) failed: ${failed.join(", ")}`
    );
    return 1;
  }
  if (!quiet) {
    console.log(`Done: ${succeeded.length} module(s)`);
  }
  return 0;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`pyschemagen v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (!COMMANDS.has(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'pyschemagen --help' for usage information");
    return 2;
  }

  if (parsed.unexpected.length > 0) {
    console.error(`Error: Unexpected arguments: ${parsed.unexpected.join(" ")}`);
    return 2;
  }

  if (!parsed.inputFile) {
    console.error("Error: Reflected program required");
    console.error(`Usage: pyschemagen ${parsed.command} <input.json>`);
    return 2;
  }

  // The config file is optional; without one the project root is cwd
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: PyschemagenConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return 3;
    }
    fileConfig = configResult.value;
  }

  const resolved = resolveConfig(
    fileConfig,
    parsed.options,
    configPath ? dirname(configPath) : cwd,
    parsed.inputFile,
    cwd
  );
  if (!resolved.ok) {
    console.error(`Error: ${resolved.error}`);
    return 2;
  }

  const config = resolved.value;
  if (config.verbose && configPath) {
    console.log(`Using ${configPath}`);
  }

  return parsed.command === "generate"
    ? finish(generateCommand(config), config.quiet)
    : finish(checkCommand(config), config.quiet);
};

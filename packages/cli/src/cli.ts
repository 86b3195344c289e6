/**
 * CLI argument parsing and command dispatch
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export { generateCommand } from "./commands/generate.js";
export { checkCommand } from "./commands/check.js";
export type { CommandSummary } from "./commands/emit.js";

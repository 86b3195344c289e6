/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { defaultOptions, isValidSuffix } from "@pyschemagen/emitter";
import type {
  PyschemagenConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "pyschemagen.json";

const DEFAULT_OUT_DIR = "generated";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0;

/**
 * Check the parsed file against the config shape
 */
const validateConfig = (
  data: unknown
): Result<PyschemagenConfig, string> => {
  if (!isRecord(data)) {
    return { ok: false, error: `${CONFIG_FILE_NAME} must contain an object` };
  }

  const { $schema, outDir, suffix, indent, includeHeader } = data;
  const problem = (field: string, expected: string): Result<never, string> => ({
    ok: false,
    error: `${CONFIG_FILE_NAME}: '${field}' must be ${expected}`,
  });

  if ($schema !== undefined && typeof $schema !== "string") {
    return problem("$schema", "a string");
  }
  if (outDir !== undefined && typeof outDir !== "string") {
    return problem("outDir", "a string");
  }
  if (suffix !== undefined && typeof suffix !== "string") {
    return problem("suffix", "a string");
  }
  if (indent !== undefined && !isPositiveInteger(indent)) {
    return problem("indent", "a positive integer");
  }
  if (includeHeader !== undefined && typeof includeHeader !== "boolean") {
    return problem("includeHeader", "a boolean");
  }

  return {
    ok: true,
    value: { $schema, outDir, suffix, indent, includeHeader },
  };
};

/**
 * Load pyschemagen.json
 */
export const loadConfig = (
  configPath: string
): Result<PyschemagenConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return validateConfig(data);
};

/**
 * Find pyschemagen.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const parseIndent = (raw: string): number | undefined => {
  if (!/^\d+$/.test(raw)) return undefined;
  const value = Number(raw);
  return value > 0 ? value : undefined;
};

/**
 * Merge defaults, the config file and CLI options, in increasing
 * precedence. Relative paths from the file resolve against `projectRoot`,
 * those from the command line against `cwd`.
 */
export const resolveConfig = (
  config: PyschemagenConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  inputFile: string,
  cwd: string = projectRoot
): Result<ResolvedConfig, string> => {
  let indent = config.indent ?? defaultOptions.indent;
  if (cliOptions.indent !== undefined) {
    const parsed = parseIndent(cliOptions.indent);
    if (parsed === undefined) {
      return {
        ok: false,
        error: `--indent must be a positive integer, got '${cliOptions.indent}'`,
      };
    }
    indent = parsed;
  }

  const suffix = cliOptions.suffix ?? config.suffix ?? defaultOptions.suffix;
  if (suffix === "") {
    return { ok: false, error: "The file name suffix cannot be empty" };
  }
  if (!isValidSuffix(suffix)) {
    return {
      ok: false,
      error: `The file name suffix may only contain letters, digits and underscores, got '${suffix}'`,
    };
  }

  const outDir =
    cliOptions.out !== undefined
      ? resolve(cwd, cliOptions.out)
      : resolve(projectRoot, config.outDir ?? DEFAULT_OUT_DIR);

  return {
    ok: true,
    value: {
      inputPath: resolve(cwd, inputFile),
      projectRoot,
      outDir,
      emitter: {
        indent,
        suffix,
        includeHeader: cliOptions.noHeader
          ? false
          : (config.includeHeader ?? defaultOptions.includeHeader),
      },
      verbose: cliOptions.verbose ?? false,
      quiet: cliOptions.quiet ?? false,
    },
  };
};

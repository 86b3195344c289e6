/**
 * Config.yaml parser for golden tests
 */

import YAML from "yaml";
import type { DiagnosticsMode, TestEntry } from "./types.js";

const INPUT_EXTENSION = ".json";

/**
 * Trim, drop empty, deduplicate and sort diagnostic codes
 */
const normalizeDiagnosticCodes = (
  codes: readonly string[]
): readonly string[] => {
  const normalized = codes.map((c) => c.trim()).filter((c) => c.length > 0);
  return [...new Set(normalized)].sort();
};

/**
 * Parse and validate expectDiagnostics field.
 * - Must be an array of strings
 * - Each code must match PSG#### format
 * - Returns undefined if empty or not present
 */
const parseExpectDiagnostics = (
  value: unknown
): readonly string[] | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value)) {
    throw new Error("expectDiagnostics must be an array of strings");
  }

  const strings: string[] = [];
  for (const v of value) {
    if (typeof v !== "string") {
      throw new Error(
        `expectDiagnostics must contain strings. Got: ${JSON.stringify(v)}`
      );
    }
    strings.push(v);
  }

  const codes = normalizeDiagnosticCodes(strings);
  for (const c of codes) {
    if (!/^PSG\d{4}$/.test(c)) {
      throw new Error(
        `Invalid diagnostic code "${c}". Expected format PSG####.`
      );
    }
  }

  return codes.length > 0 ? codes : undefined;
};

const parseDiagnosticsMode = (value: unknown): DiagnosticsMode | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (value === "contains" || value === "exact") {
    return value;
  }
  throw new Error(
    `Invalid expectDiagnosticsMode: ${JSON.stringify(value)}. ` +
      `Must be "contains" or "exact".`
  );
};

const checkInput = (input: string): void => {
  if (!input.endsWith(INPUT_EXTENSION)) {
    throw new Error(`input must end with ${INPUT_EXTENSION}: ${input}`);
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseEntry = (item: unknown): TestEntry => {
  // "Zoo.json: title"
  if (typeof item === "string") {
    const colonIdx = item.indexOf(":");
    if (colonIdx === -1) {
      throw new Error(
        `Invalid test entry format: "${item}". Expected "Input.json: title".`
      );
    }
    const input = item.slice(0, colonIdx).trim();
    const title = item.slice(colonIdx + 1).trim();
    checkInput(input);
    if (title.length === 0) {
      throw new Error(`Title cannot be empty for ${input}`);
    }
    return { input, title };
  }

  if (!isRecord(item)) {
    throw new Error(`Invalid test entry: ${JSON.stringify(item)}`);
  }

  // { "Zoo.json": "title" }
  const keys = Object.keys(item);
  const [onlyKey] = keys;
  if (keys.length === 1 && onlyKey?.endsWith(INPUT_EXTENSION)) {
    const title = item[onlyKey];
    if (typeof title !== "string") {
      throw new Error(`Title must be a string for ${onlyKey}`);
    }
    return { input: onlyKey, title };
  }

  // { input, title, expectDiagnostics?, expectDiagnosticsMode? }
  const { input, title } = item;
  if (typeof input !== "string" || typeof title !== "string") {
    throw new Error("Each test entry must have 'input' and 'title' as strings");
  }
  checkInput(input);

  const expectDiagnostics = parseExpectDiagnostics(item.expectDiagnostics);
  const expectDiagnosticsMode = parseDiagnosticsMode(
    item.expectDiagnosticsMode
  );
  if (expectDiagnosticsMode && !expectDiagnostics) {
    throw new Error(
      `expectDiagnosticsMode is set for ${input} but expectDiagnostics is missing.`
    );
  }

  return { input, title, expectDiagnostics, expectDiagnosticsMode };
};

/**
 * Parse config.yaml and extract test entries
 */
export const parseConfigYaml = (yamlContent: string): readonly TestEntry[] => {
  const parsed: unknown = YAML.parse(yamlContent);

  if (!Array.isArray(parsed)) {
    throw new Error("config.yaml must be an array of test entries");
  }

  return parsed.map(parseEntry);
};

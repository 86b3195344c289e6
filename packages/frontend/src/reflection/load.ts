/**
 * Reflected program file loading
 */

import * as fs from "node:fs";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import type { ReflectedProgram } from "../model/declarations.js";
import { parseReflectedProgram } from "./parse.js";

/**
 * Read a reflected program JSON file and validate it.
 */
export const loadReflectedProgram = (
  filePath: string
): Result<ReflectedProgram, readonly Diagnostic[]> => {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "PSG1002",
          "error",
          `Failed to read reflected program ${filePath}: ${
            err instanceof Error ? err.message : String(err)
          }`
        ),
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "PSG1003",
          "error",
          `Invalid JSON in ${filePath}: ${
            err instanceof Error ? err.message : String(err)
          }`
        ),
      ],
    };
  }

  return parseReflectedProgram(parsed);
};

/**
 * Test scenario runner
 */

import { expect } from "chai";
import * as fs from "fs";
import * as path from "path";
import {
  formatDiagnostic,
  loadReflectedProgram,
  type Diagnostic,
} from "@pyschemagen/frontend";
import { emitPythonFiles } from "../emitter.js";
import type { DiagnosticsMode, Scenario } from "./types.js";

/**
 * Normalize Python output for comparison
 */
export const normalizePython = (code: string): string =>
  code
    .replace(/\r\n/g, "\n")
    .replace(/[ \t]+$/gm, "")
    .trim();

const describeDiagnostics = (diagnostics: readonly Diagnostic[]): string =>
  diagnostics.map((d) => `  ${formatDiagnostic(d)}`).join("\n");

const checkDiagnostics = (
  scenario: Scenario,
  expected: readonly string[],
  actual: readonly Diagnostic[]
): void => {
  const actualCodes = new Set<string>(actual.map((d) => d.code));
  const expectedSet = new Set(expected);
  const mode: DiagnosticsMode = scenario.expectDiagnosticsMode ?? "contains";

  const missing = expected.filter((c) => !actualCodes.has(c));
  if (missing.length) {
    throw new Error(
      `Missing expected diagnostics (${mode}): ${missing.join(", ")}\n` +
        `Expected: ${expected.join(", ")}\n` +
        `Actual diagnostics:\n${describeDiagnostics(actual)}`
    );
  }

  if (mode === "exact") {
    const unexpected = actual.filter((d) => !expectedSet.has(d.code));
    if (unexpected.length) {
      throw new Error(
        `Unexpected diagnostics in exact mode:\n` +
          describeDiagnostics(unexpected)
      );
    }
  }
};

/**
 * Run a single test scenario: read the reflected program, emit every
 * namespace and compare each file with its expected counterpart
 */
export const runScenario = (scenario: Scenario): void => {
  const loaded = loadReflectedProgram(scenario.inputPath);
  const expectedCodes = scenario.expectDiagnostics ?? [];

  if (!loaded.ok) {
    if (expectedCodes.length > 0) {
      checkDiagnostics(scenario, expectedCodes, loaded.error);
      return;
    }
    throw new Error(
      `Reading ${scenario.inputPath} failed:\n${describeDiagnostics(loaded.error)}`
    );
  }

  const { files, failures } = emitPythonFiles(loaded.value);
  const diagnostics = failures.flatMap((f) => f.diagnostics);

  if (expectedCodes.length > 0) {
    if (diagnostics.length === 0) {
      throw new Error(
        `Expected diagnostics ${expectedCodes.join(", ")} but emission succeeded for ${scenario.inputPath}`
      );
    }
    checkDiagnostics(scenario, expectedCodes, diagnostics);
    return;
  }

  if (failures.length > 0) {
    throw new Error(`Emit failed:\n${describeDiagnostics(diagnostics)}`);
  }

  const { expectedDir } = scenario;
  if (!expectedDir) {
    throw new Error(
      `Expected directory missing for successful test: ${scenario.inputPath}`
    );
  }

  for (const file of files) {
    const expectedPath = path.join(expectedDir, file.fileName);
    if (!fs.existsSync(expectedPath)) {
      throw new Error(
        `No expected output for namespace '${file.namespace}': ${expectedPath}`
      );
    }
    const expected = fs.readFileSync(expectedPath, "utf-8");

    expect(normalizePython(file.content)).to.equal(
      normalizePython(expected),
      `Python output mismatch for ${scenario.pathParts.join("/")}/${file.fileName}`
    );
  }
};

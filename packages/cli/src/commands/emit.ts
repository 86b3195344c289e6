/**
 * Shared pipeline for generate and check: read the reflected program,
 * emit every namespace and report failures
 */

import {
  formatDiagnostic,
  loadReflectedProgram,
  type Diagnostic,
} from "@pyschemagen/frontend";
import { emitPythonFiles, type EmitResult } from "@pyschemagen/emitter";
import type { ResolvedConfig, Result } from "../types.js";

export type CommandSummary = {
  /** Namespaces that produced a file */
  readonly succeeded: readonly string[];
  readonly failed: readonly string[];
};

const reportDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Run the emitter over the configured input. Namespaces that fail are
 * reported on stderr and left out of the returned files; only an unreadable
 * input is an error.
 */
export const emitProgram = (
  config: ResolvedConfig
): Result<EmitResult, string> => {
  const loaded = loadReflectedProgram(config.inputPath);
  if (!loaded.ok) {
    reportDiagnostics(loaded.error);
    return {
      ok: false,
      error: `Could not read reflected program: ${config.inputPath}`,
    };
  }

  if (config.verbose) {
    console.log(
      `Read ${loaded.value.modules.length} module(s), ` +
        `${loaded.value.mappings.length} mapping(s)`
    );
  }

  const result = emitPythonFiles(loaded.value, config.emitter);
  for (const failure of result.failures) {
    console.error(`✗ ${failure.namespace}`);
    reportDiagnostics(failure.diagnostics);
  }

  return { ok: true, value: result };
};

export const summarize = (result: EmitResult): CommandSummary => ({
  succeeded: result.files.map((f) => f.namespace),
  failed: result.failures.map((f) => f.namespace),
});

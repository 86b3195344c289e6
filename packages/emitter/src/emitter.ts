/**
 * Main Python Emitter - Public API
 * Orchestrates code generation from the reflected program
 */

import type {
  Diagnostic,
  ReflectedProgram,
  Result,
} from "@pyschemagen/frontend";
import type { EmitterOptions, GeneratedFile } from "./types.js";
import { emitModule } from "./core/format/module-emitter/index.js";

export type NamespaceFailure = {
  readonly namespace: string;
  readonly diagnostics: readonly Diagnostic[];
};

export type EmitResult = {
  readonly files: readonly GeneratedFile[];
  readonly failures: readonly NamespaceFailure[];
};

/**
 * Emit the file for the module named `namespace`
 */
export const emitPythonFile = (
  program: ReflectedProgram,
  namespace: string,
  options: Partial<EmitterOptions> = {}
): Result<GeneratedFile, readonly Diagnostic[]> => {
  const module = program.modules.find((m) => m.name === namespace);
  if (!module) {
    throw new Error(`ICE: no module named '${namespace}' in the program`);
  }
  return emitModule(module, program, options);
};

/**
 * Batch emit every module. A failing namespace produces no file and does
 * not stop the others.
 */
export const emitPythonFiles = (
  program: ReflectedProgram,
  options: Partial<EmitterOptions> = {}
): EmitResult => {
  const files: GeneratedFile[] = [];
  const failures: NamespaceFailure[] = [];

  for (const module of program.modules) {
    const result = emitModule(module, program, options);
    if (result.ok) {
      files.push(result.value);
    } else {
      failures.push({ namespace: module.name, diagnostics: result.error });
    }
  }

  return { files, failures };
};

/**
 * pyschemagen frontend - reflected schema model and input reader
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  formatLocation,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./model/index.js";
export * from "./reflection/index.js";

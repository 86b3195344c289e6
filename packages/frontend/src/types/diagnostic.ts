/**
 * Diagnostic types for pyschemagen
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "PSG1001" // Invalid reflected input shape
  | "PSG1002" // Input file not readable
  | "PSG1003" // Input file is not valid JSON
  | "PSG2001" // Type has no Python spelling
  | "PSG2002" // Declared type reference has no mapping
  | "PSG3001" // Python keyword used as identifier
  | "PSG3002" // Invalid Python identifier
  | "PSG3003" // Naming collision
  | "PSG6001"; // Internal compiler error

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  readonly relatedLocations?: readonly SourceLocation[];
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  relatedLocations?: readonly SourceLocation[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  relatedLocations,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatLocation = (location: SourceLocation): string =>
  `${location.file}:${location.line}:${location.column}`;

/**
 * Render a diagnostic as `file:line:column severity CODE: message`.
 * The hint, when present, goes on its own indented lines.
 */
export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(formatLocation(diagnostic.location));
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  const head = parts.join(" ");
  if (!diagnostic.hint) {
    return head;
  }

  const hintLines = diagnostic.hint.split("\n").map((line) => `  ${line}`);
  return [head, "  Hint:", ...hintLines].join("\n");
};

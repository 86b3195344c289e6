/**
 * Golden test types
 */

/**
 * "contains" allows extra codes beside the expected ones; "exact" does not
 */
export type DiagnosticsMode = "contains" | "exact";

/** Diagnostic expectations shared by config entries and scenarios */
export type DiagnosticExpectation = {
  readonly expectDiagnostics?: readonly string[];
  readonly expectDiagnosticsMode?: DiagnosticsMode;
};

/** One entry of a config.yaml */
export type TestEntry = DiagnosticExpectation & {
  /** Reflected-program JSON file beside the config */
  readonly input: string;
  readonly title: string;
};

export type Scenario = DiagnosticExpectation & {
  readonly pathParts: readonly string[];
  readonly title: string;
  readonly inputPath: string;
  /** Holds one `<Namespace>_<suffix>.py` per generated namespace; absent when diagnostics are expected */
  readonly expectedDir?: string;
};

export type DescribeNode = {
  readonly name: string;
  readonly children: Map<string, DescribeNode>;
  readonly tests: Scenario[];
};

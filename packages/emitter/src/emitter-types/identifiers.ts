/**
 * Python identifier rules
 */

/**
 * Python 3 hard keywords. Soft keywords (`match`, `case`, `type`, `_`) are
 * valid identifiers and are left out.
 */
const PYTHON_KEYWORDS: ReadonlySet<string> = new Set([
  "False",
  "None",
  "True",
  "and",
  "as",
  "assert",
  "async",
  "await",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "else",
  "except",
  "finally",
  "for",
  "from",
  "global",
  "if",
  "import",
  "in",
  "is",
  "lambda",
  "nonlocal",
  "not",
  "or",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield",
]);

/**
 * Module-level names bound by the fixed preamble. A generated declaration
 * with one of these names would shadow an import.
 */
export const PREAMBLE_NAMES: ReadonlySet<string> = new Set([
  "annotations",
  "Any",
  "Callable",
  "Dict",
  "List",
  "Literal",
  "Optional",
  "Set",
  "Union",
  "dataclass",
  "pkl",
  "Enum",
]);

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const isPythonKeyword = (name: string): boolean =>
  PYTHON_KEYWORDS.has(name);

export const isValidPythonIdentifier = (name: string): boolean =>
  IDENTIFIER_PATTERN.test(name);

/**
 * Dotted module path such as `base.Types_pkl`: every segment an identifier
 * that is not a keyword
 */
export const isValidModulePath = (path: string): boolean =>
  path
    .split(".")
    .every(
      (segment) => isValidPythonIdentifier(segment) && !isPythonKeyword(segment)
    );

/** A file name suffix is a plain word of letters, digits and `_` */
export const isValidSuffix = (suffix: string): boolean =>
  /^[A-Za-z0-9_]+$/.test(suffix);

/**
 * Local alias for a foreign namespace's generated module
 */
export const namespaceAlias = (namespace: string): string => {
  const alias = namespace.replace(/[^A-Za-z0-9_]/g, "_");
  return /^[0-9]/.test(alias) ? `_${alias}` : alias;
};

/**
 * Module name of a namespace's generated file, without `.py`
 */
export const moduleFileStem = (namespace: string, suffix: string): string =>
  `${namespace}_${suffix}`;

export const outputFileName = (namespace: string, suffix: string): string =>
  `${moduleFileStem(namespace, suffix)}.py`;

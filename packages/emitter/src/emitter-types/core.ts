/**
 * Core emitter types
 */

import type { Mapping, SourceLocation } from "@pyschemagen/frontend";

/**
 * Options for Python code generation
 */
export type EmitterOptions = {
  /** Spaces per indentation level */
  readonly indent: number;
  /** Output file name suffix: `<namespace>_<suffix>.py` */
  readonly suffix: string;
  /** Emit the "Code generated from" header comment */
  readonly includeHeader: boolean;
};

/**
 * Mappings keyed by the declaration's qualified name
 */
export type MappingTable = ReadonlyMap<string, Mapping>;

/**
 * Read-only state threaded through every emission call for one namespace
 */
export type EmitterContext = {
  readonly namespace: string;
  readonly mappings: MappingTable;
  readonly options: EmitterOptions;
  /** One level of indentation, derived from `options.indent` */
  readonly indentUnit: string;
  /** Location of the property or declaration currently being rendered */
  readonly site?: SourceLocation;
};

/**
 * One generated Python file
 */
export type GeneratedFile = {
  readonly namespace: string;
  readonly fileName: string;
  readonly content: string;
  /** Target names in emission order */
  readonly members: readonly string[];
};

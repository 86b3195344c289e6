/**
 * Type definitions for CLI
 */

import type { EmitterOptions } from "@pyschemagen/emitter";

export type { Result } from "@pyschemagen/frontend";

/**
 * Configuration file (pyschemagen.json). Every field is optional.
 */
export type PyschemagenConfig = {
  readonly $schema?: string;
  /** Output directory, relative to the config file */
  readonly outDir?: string;
  readonly suffix?: string;
  readonly indent?: number;
  readonly includeHeader?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  suffix?: string;
  indent?: string; // Raw value; validated when the config is resolved
  noHeader?: boolean;
};

/**
 * Combined configuration (defaults, then config file, then CLI args)
 */
export type ResolvedConfig = {
  readonly inputPath: string;
  readonly projectRoot: string; // Directory containing pyschemagen.json, or the working directory
  readonly outDir: string;
  readonly emitter: EmitterOptions;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

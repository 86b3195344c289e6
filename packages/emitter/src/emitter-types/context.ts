/**
 * Context creation and manipulation functions
 */

import type { Mapping, SourceLocation } from "@pyschemagen/frontend";
import type { EmitterContext, EmitterOptions, MappingTable } from "./core.js";

export const buildMappingTable = (
  mappings: readonly Mapping[]
): MappingTable =>
  new Map(mappings.map((mapping) => [mapping.declaration, mapping]));

/**
 * Create the context for emitting one namespace
 */
export const createContext = (
  namespace: string,
  mappings: MappingTable,
  options: EmitterOptions
): EmitterContext => ({
  namespace,
  mappings,
  options,
  indentUnit: " ".repeat(options.indent),
});

/**
 * Set the source location reported by rendering failures
 */
export const withSite = (
  context: EmitterContext,
  site: SourceLocation
): EmitterContext => ({
  ...context,
  site,
});

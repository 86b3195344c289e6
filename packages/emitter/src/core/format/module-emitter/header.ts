/**
 * File header generation
 */

import type { SchemaModule } from "@pyschemagen/frontend";
import type { EmitterOptions } from "../../../types.js";
import { generateFileHeader } from "../../../constants.js";

/**
 * Header lines for the module's file; empty when headers are turned off
 */
export const generateHeader = (
  module: SchemaModule,
  options: EmitterOptions
): readonly string[] =>
  options.includeHeader ? generateFileHeader(module.name) : [];

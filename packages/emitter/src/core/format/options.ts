/**
 * Emitter options and defaults
 */

import { isValidSuffix, type EmitterOptions } from "../../types.js";

/**
 * Default emitter options
 */
export const defaultOptions: EmitterOptions = {
  indent: 4,
  suffix: "pkl",
  includeHeader: true,
};

export const resolveOptions = (
  options: Partial<EmitterOptions> = {}
): EmitterOptions => {
  const resolved = { ...defaultOptions, ...options };
  if (!Number.isInteger(resolved.indent) || resolved.indent < 1) {
    throw new Error(
      `ICE: indent must be a positive integer, got ${resolved.indent}`
    );
  }
  if (!isValidSuffix(resolved.suffix)) {
    throw new Error(
      `ICE: suffix must be letters, digits and underscores, got ${JSON.stringify(resolved.suffix)}`
    );
  }
  return resolved;
};

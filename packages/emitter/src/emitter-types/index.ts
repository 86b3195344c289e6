/**
 * Emitter types - Public API
 */

export type {
  EmitterOptions,
  EmitterContext,
  MappingTable,
  GeneratedFile,
} from "./core.js";
export type {
  CollisionEntry,
  NameCollisionError,
  UnsupportedTypeError,
  UnresolvedReferenceError,
  TypeRenderError,
} from "./errors.js";
export {
  nameCollisionError,
  unsupportedTypeError,
  unresolvedReferenceError,
} from "./errors.js";
export { buildMappingTable, createContext, withSite } from "./context.js";
export { quotePython, commentLines } from "./formatting.js";
export {
  PREAMBLE_NAMES,
  isPythonKeyword,
  isValidPythonIdentifier,
  isValidModulePath,
  isValidSuffix,
  namespaceAlias,
  moduleFileStem,
  outputFileName,
} from "./identifiers.js";

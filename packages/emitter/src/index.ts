/**
 * pyschemagen emitter - Python code generator
 */

export * from "./types.js";
export { emitType, emitTypeList } from "./types/index.js";
export { defaultOptions, resolveOptions } from "./core/format/options.js";
export { orderMembers } from "./core/semantic/emission-order.js";
export {
  checkForeignImports,
  checkUniqueNames,
  validateIdentifiers,
  type NamedDeclaration,
} from "./core/semantic/naming-collisions.js";
export {
  emitModule,
  assembleOutput,
  generateMember,
  type AssemblyParts,
  type GeneratedMember,
} from "./core/format/module-emitter/index.js";
export { generateFileHeader, PREAMBLE_LINES } from "./constants.js";
export {
  emitPythonFile,
  emitPythonFiles,
  type EmitResult,
  type NamespaceFailure,
} from "./emitter.js";

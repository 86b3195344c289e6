/**
 * Type emitter - Public API
 */

export { emitType, emitTypeList } from "./emitter.js";
export { emitPrimitiveType } from "./primitives.js";
export { emitNullableType } from "./nullables.js";
export { emitUnionType } from "./unions.js";
export {
  emitDeclaredType,
  qualifyMapping,
  collectForeignNamespaces,
} from "./references.js";
export { emitStringLiteralType } from "./literals.js";
export { emitGenericType } from "./generics.js";
export { emitFunctionType } from "./functions.js";

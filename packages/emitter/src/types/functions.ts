/**
 * Function type emission
 */

import type { FunctionTypeExpression, Result } from "@pyschemagen/frontend";
import type { EmitterContext, TypeRenderError } from "../types.js";
import { emitType, emitTypeList } from "./emitter.js";

/**
 * Emit `(A, B) -> R` as `Callable[[A, B], R]`
 */
export const emitFunctionType = (
  type: FunctionTypeExpression,
  context: EmitterContext
): Result<string, TypeRenderError> => {
  const params = emitTypeList(type.parameters, context);
  if (!params.ok) {
    return params;
  }

  const returnType = emitType(type.returnType, context);
  if (!returnType.ok) {
    return returnType;
  }

  return {
    ok: true,
    value: `Callable[[${params.value.join(", ")}], ${returnType.value}]`,
  };
};

/**
 * Nullable type emission
 */

import type { NullableTypeExpression, Result } from "@pyschemagen/frontend";
import type { EmitterContext, TypeRenderError } from "../types.js";
import { emitType } from "./emitter.js";

/**
 * Emit `T?` as `Optional[T]`
 */
export const emitNullableType = (
  type: NullableTypeExpression,
  context: EmitterContext
): Result<string, TypeRenderError> => {
  const inner = emitType(type.inner, context);
  if (!inner.ok) {
    return inner;
  }
  return { ok: true, value: `Optional[${inner.value}]` };
};

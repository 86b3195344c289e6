/**
 * Union type emission
 */

import type { Result, UnionTypeExpression } from "@pyschemagen/frontend";
import type { EmitterContext, TypeRenderError } from "../types.js";
import { emitTypeList } from "./emitter.js";

/**
 * Emit `A|B` as `Union[A, B]`, members in source order
 */
export const emitUnionType = (
  type: UnionTypeExpression,
  context: EmitterContext
): Result<string, TypeRenderError> => {
  const members = emitTypeList(type.types, context);
  if (!members.ok) {
    return members;
  }
  return { ok: true, value: `Union[${members.value.join(", ")}]` };
};

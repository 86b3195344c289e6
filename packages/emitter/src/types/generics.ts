/**
 * Generic type emission
 */

import {
  formatTypeExpression,
  type GenericTypeExpression,
  type Result,
} from "@pyschemagen/frontend";
import {
  unsupportedTypeError,
  type EmitterContext,
  type TypeRenderError,
} from "../types.js";
import { emitType, emitTypeList } from "./emitter.js";

/**
 * Emit `Base<A, B>` as `Base[A, B]`
 */
export const emitGenericType = (
  type: GenericTypeExpression,
  context: EmitterContext
): Result<string, TypeRenderError> => {
  if (type.typeArguments.length === 0) {
    return {
      ok: false,
      error: unsupportedTypeError(
        formatTypeExpression(type),
        context.site,
        "has no type arguments"
      ),
    };
  }

  const base = emitType(type.base, context);
  if (!base.ok) {
    return base;
  }

  const args = emitTypeList(type.typeArguments, context);
  if (!args.ok) {
    return args;
  }

  return { ok: true, value: `${base.value}[${args.value.join(", ")}]` };
};

/**
 * Type emission main dispatcher
 */

import type { Result, TypeExpression } from "@pyschemagen/frontend";
import {
  type EmitterContext,
  type TypeRenderError,
  unsupportedTypeError,
} from "../types.js";
import { emitPrimitiveType } from "./primitives.js";
import { emitNullableType } from "./nullables.js";
import { emitUnionType } from "./unions.js";
import { emitDeclaredType } from "./references.js";
import { emitStringLiteralType } from "./literals.js";
import { emitGenericType } from "./generics.js";
import { emitFunctionType } from "./functions.js";

/**
 * Emit Python type syntax for a type expression.
 *
 * Pure: the same expression and context always give the same text. Fails
 * on the first shape with no Python spelling; nothing is rendered partially.
 */
export const emitType = (
  type: TypeExpression,
  context: EmitterContext
): Result<string, TypeRenderError> => {
  switch (type.kind) {
    case "primitiveType":
      return emitPrimitiveType(type);

    case "nullableType":
      return emitNullableType(type, context);

    case "unionType":
      return emitUnionType(type, context);

    case "declaredType":
      return emitDeclaredType(type, context);

    case "stringLiteralType":
      return emitStringLiteralType(type);

    case "genericType":
      return emitGenericType(type, context);

    case "functionType":
      return emitFunctionType(type, context);

    case "opaqueType":
      return {
        ok: false,
        error: unsupportedTypeError(type.display, context.site),
      };

    default: {
      const unmatched: never = type;
      return emitUnknownShape(unmatched, context);
    }
  }
};

/**
 * Reached only when the input bypassed the type checker
 */
const emitUnknownShape = (
  type: unknown,
  context: EmitterContext
): Result<string, TypeRenderError> => {
  const display =
    typeof type === "object" && type !== null && "kind" in type
      ? String(type.kind)
      : String(type);
  return {
    ok: false,
    error: unsupportedTypeError(display, context.site),
  };
};

/**
 * Emit each type in order, stopping at the first failure
 */
export const emitTypeList = (
  types: readonly TypeExpression[],
  context: EmitterContext
): Result<readonly string[], TypeRenderError> => {
  const rendered: string[] = [];
  for (const type of types) {
    const result = emitType(type, context);
    if (!result.ok) {
      return result;
    }
    rendered.push(result.value);
  }
  return { ok: true, value: rendered };
};

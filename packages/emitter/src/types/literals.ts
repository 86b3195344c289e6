/**
 * Literal type emission
 */

import type { Result, StringLiteralTypeExpression } from "@pyschemagen/frontend";
import { quotePython, type TypeRenderError } from "../types.js";

export const emitStringLiteralType = (
  type: StringLiteralTypeExpression
): Result<string, TypeRenderError> => ({
  ok: true,
  value: `Literal[${quotePython(type.value)}]`,
});

/**
 * Primitive type emission
 */

import type {
  PrimitiveTypeExpression,
  PrimitiveTypeName,
  Result,
} from "@pyschemagen/frontend";
import type { TypeRenderError } from "../types.js";

/**
 * Python spelling of each primitive. Collection primitives are the `typing`
 * generics and take their arguments through `genericType`.
 */
const PRIMITIVE_SPELLINGS: Record<PrimitiveTypeName, string> = {
  string: "str",
  int: "int",
  float: "float",
  number: "float",
  boolean: "bool",
  null: "None",
  any: "Any",
  bytes: "bytes",
  duration: "pkl.Duration",
  dataSize: "pkl.DataSize",
  dynamic: "pkl.Dynamic",
  pair: "pkl.Pair",
  list: "List",
  map: "Dict",
  set: "Set",
};

export const emitPrimitiveType = (
  type: PrimitiveTypeExpression
): Result<string, TypeRenderError> => ({
  ok: true,
  value: PRIMITIVE_SPELLINGS[type.name],
});

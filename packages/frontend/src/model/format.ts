/**
 * Source-style display of type expressions, used in diagnostics
 */

import type { PrimitiveTypeName, TypeExpression } from "./types.js";

const PRIMITIVE_DISPLAY: Record<PrimitiveTypeName, string> = {
  string: "String",
  int: "Int",
  float: "Float",
  number: "Number",
  boolean: "Boolean",
  null: "Null",
  any: "Any",
  bytes: "Bytes",
  duration: "Duration",
  dataSize: "DataSize",
  dynamic: "Dynamic",
  pair: "Pair",
  list: "List",
  map: "Map",
  set: "Set",
};

const needsParens = (type: TypeExpression): boolean =>
  type.kind === "unionType" || type.kind === "functionType";

export const formatTypeExpression = (type: TypeExpression): string => {
  switch (type.kind) {
    case "primitiveType":
      return PRIMITIVE_DISPLAY[type.name];
    case "nullableType": {
      const inner = formatTypeExpression(type.inner);
      return needsParens(type.inner) ? `(${inner})?` : `${inner}?`;
    }
    case "unionType":
      return type.types.map(formatTypeExpression).join("|");
    case "declaredType":
      return type.declaration;
    case "stringLiteralType":
      return JSON.stringify(type.value);
    case "genericType":
      return `${formatTypeExpression(type.base)}<${type.typeArguments
        .map(formatTypeExpression)
        .join(", ")}>`;
    case "functionType":
      return `(${type.parameters
        .map(formatTypeExpression)
        .join(", ")}) -> ${formatTypeExpression(type.returnType)}`;
    case "opaqueType":
      return type.display;
  }
};

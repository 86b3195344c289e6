/**
 * Type expressions attached to reflected declarations
 *
 * A closed union: the emitter matches on `kind` exhaustively, and any shape
 * the reflector cannot describe in these terms arrives as `opaqueType`.
 */

export type TypeExpression =
  | PrimitiveTypeExpression
  | NullableTypeExpression
  | UnionTypeExpression
  | DeclaredTypeExpression
  | StringLiteralTypeExpression
  | GenericTypeExpression
  | FunctionTypeExpression
  | OpaqueTypeExpression;

export type PrimitiveTypeName =
  | "string"
  | "int"
  | "float"
  | "number"
  | "boolean"
  | "null"
  | "any"
  | "bytes"
  | "duration"
  | "dataSize"
  | "dynamic"
  | "pair"
  | "list"
  | "map"
  | "set";

export const PRIMITIVE_TYPE_NAMES: readonly PrimitiveTypeName[] = [
  "string",
  "int",
  "float",
  "number",
  "boolean",
  "null",
  "any",
  "bytes",
  "duration",
  "dataSize",
  "dynamic",
  "pair",
  "list",
  "map",
  "set",
];

export type PrimitiveTypeExpression = {
  readonly kind: "primitiveType";
  readonly name: PrimitiveTypeName;
};

export type NullableTypeExpression = {
  readonly kind: "nullableType";
  readonly inner: TypeExpression;
};

export type UnionTypeExpression = {
  readonly kind: "unionType";
  /** Source order is kept in the rendered output */
  readonly types: readonly TypeExpression[];
};

/**
 * Reference to another declaration, by its qualified name.
 * The target identifier and namespace come from the mapping table.
 */
export type DeclaredTypeExpression = {
  readonly kind: "declaredType";
  readonly declaration: string;
};

export type StringLiteralTypeExpression = {
  readonly kind: "stringLiteralType";
  readonly value: string;
};

export type GenericTypeExpression = {
  readonly kind: "genericType";
  readonly base: TypeExpression;
  readonly typeArguments: readonly TypeExpression[];
};

export type FunctionTypeExpression = {
  readonly kind: "functionType";
  readonly parameters: readonly TypeExpression[];
  readonly returnType: TypeExpression;
};

/**
 * A reflected type with no Python spelling (`nothing`, constrained types,
 * unbound type parameters). `display` is the source form.
 */
export type OpaqueTypeExpression = {
  readonly kind: "opaqueType";
  readonly display: string;
};

/**
 * Declared type references
 */

import type {
  DeclaredTypeExpression,
  Mapping,
  Result,
  TypeExpression,
} from "@pyschemagen/frontend";
import {
  namespaceAlias,
  unresolvedReferenceError,
  type EmitterContext,
  type TypeRenderError,
} from "../types.js";

/**
 * Python name for a mapped declaration as seen from the context namespace.
 * Declarations from another namespace go through that namespace's alias.
 */
export const qualifyMapping = (
  mapping: Mapping,
  context: EmitterContext
): string =>
  mapping.namespace === context.namespace
    ? mapping.targetName
    : `${namespaceAlias(mapping.namespace)}.${mapping.targetName}`;

export const emitDeclaredType = (
  type: DeclaredTypeExpression,
  context: EmitterContext
): Result<string, TypeRenderError> => {
  const mapping = context.mappings.get(type.declaration);
  if (!mapping) {
    return {
      ok: false,
      error: unresolvedReferenceError(type.declaration, context.site),
    };
  }
  return { ok: true, value: qualifyMapping(mapping, context) };
};

/**
 * Namespaces other than the context's that a type refers to, in the order
 * they are first reached. Unmapped references are skipped; rendering
 * reports them.
 */
export const collectForeignNamespaces = (
  type: TypeExpression,
  context: EmitterContext
): readonly string[] => {
  const found: string[] = [];

  const visit = (t: TypeExpression): void => {
    switch (t.kind) {
      case "declaredType": {
        const namespace = context.mappings.get(t.declaration)?.namespace;
        if (
          namespace !== undefined &&
          namespace !== context.namespace &&
          !found.includes(namespace)
        ) {
          found.push(namespace);
        }
        return;
      }
      case "nullableType":
        visit(t.inner);
        return;
      case "unionType":
        t.types.forEach(visit);
        return;
      case "genericType":
        visit(t.base);
        t.typeArguments.forEach(visit);
        return;
      case "functionType":
        t.parameters.forEach(visit);
        visit(t.returnType);
        return;
      case "primitiveType":
      case "stringLiteralType":
      case "opaqueType":
        return;
    }
  };

  visit(type);
  return found;
};

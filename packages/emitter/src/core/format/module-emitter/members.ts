/**
 * Per-declaration body generation
 */

import type { Declaration, Result } from "@pyschemagen/frontend";
import type { EmitterContext, TypeRenderError } from "../../../types.js";
import type { GeneratedMember } from "./generated-member.js";
import { emitClassMember } from "./class-ast.js";
import { emitEnumMember } from "./enum-ast.js";
import { emitTypeAliasMember } from "./type-alias-ast.js";

/**
 * Generate the member for one declaration
 */
export const generateMember = (
  declaration: Declaration,
  declarationIndex: number,
  targetName: string,
  context: EmitterContext
): Result<GeneratedMember, TypeRenderError> => {
  switch (declaration.kind) {
    case "classDeclaration":
      return emitClassMember(
        declaration,
        declarationIndex,
        targetName,
        context
      );
    case "enumDeclaration":
      return emitEnumMember(
        declaration,
        declarationIndex,
        targetName,
        context
      );
    case "typeAliasDeclaration":
      return emitTypeAliasMember(
        declaration,
        declarationIndex,
        targetName,
        context
      );
  }
};

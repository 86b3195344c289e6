import type { Result, TypeAliasDeclaration } from "@pyschemagen/frontend";
import {
  commentLines,
  withSite,
  type EmitterContext,
  type TypeRenderError,
} from "../../../types.js";
import { collectForeignNamespaces, emitType } from "../../../types/index.js";
import { line, lines } from "../document/index.js";
import { foreignImport, type GeneratedMember } from "./generated-member.js";

export const emitTypeAliasMember = (
  stmt: TypeAliasDeclaration,
  declarationIndex: number,
  targetName: string,
  context: EmitterContext
): Result<GeneratedMember, TypeRenderError> => {
  const rendered = emitType(stmt.type, withSite(context, stmt.location));
  if (!rendered.ok) {
    return rendered;
  }

  return {
    ok: true,
    value: {
      targetName,
      qualifiedName: stmt.qualifiedName,
      sourceKind: "typealias",
      declarationIndex,
      body: [
        ...lines(commentLines(stmt.docComment)),
        line(`${targetName} = ${rendered.value}`),
      ],
      auxiliary: collectForeignNamespaces(stmt.type, context).map((ns) =>
        foreignImport(ns, context)
      ),
      isModuleRootClass: false,
    },
  };
};

import type { EnumDeclaration, Result } from "@pyschemagen/frontend";
import {
  commentLines,
  quotePython,
  type EmitterContext,
  type TypeRenderError,
} from "../../../types.js";
import { block, line, lines } from "../document/index.js";
import type { GeneratedMember } from "./generated-member.js";

export const ENUM_IMPORT = "from enum import Enum";

/**
 * Emit a schema enum as a `str`-valued `Enum`
 */
export const emitEnumMember = (
  stmt: EnumDeclaration,
  declarationIndex: number,
  targetName: string,
  _context: EmitterContext
): Result<GeneratedMember, TypeRenderError> => {
  const memberLines =
    stmt.members.length > 0
      ? stmt.members.map((m) => `${m.name} = ${quotePython(m.value)}`)
      : ["pass"];

  return {
    ok: true,
    value: {
      targetName,
      qualifiedName: stmt.qualifiedName,
      sourceKind: "enum",
      declarationIndex,
      body: [
        ...lines(commentLines(stmt.docComment)),
        line(`class ${targetName}(str, Enum):`),
        block(lines(memberLines)),
      ],
      auxiliary: [ENUM_IMPORT],
      isModuleRootClass: false,
    },
  };
};

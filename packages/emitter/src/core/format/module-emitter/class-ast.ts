import type { ClassDeclaration, Result } from "@pyschemagen/frontend";
import {
  commentLines,
  quotePython,
  unresolvedReferenceError,
  withSite,
  type EmitterContext,
  type TypeRenderError,
} from "../../../types.js";
import {
  collectForeignNamespaces,
  emitType,
  qualifyMapping,
} from "../../../types/index.js";
import {
  blankLine,
  block,
  line,
  lines,
  type DocUnit,
} from "../document/index.js";
import { foreignImport, type GeneratedMember } from "./generated-member.js";

type Superclass = {
  readonly rendered: string;
  /** Set when the parent is generated into the same namespace */
  readonly localName?: string;
  readonly namespace: string;
};

const resolveSuperclass = (
  stmt: ClassDeclaration,
  context: EmitterContext
): Result<Superclass | undefined, TypeRenderError> => {
  if (stmt.superclass === undefined) {
    return { ok: true, value: undefined };
  }

  const mapping = context.mappings.get(stmt.superclass);
  if (!mapping) {
    return {
      ok: false,
      error: unresolvedReferenceError(
        stmt.superclass,
        stmt.location,
        `is the superclass of '${stmt.qualifiedName}' but has no mapping`
      ),
    };
  }

  const isLocal = mapping.namespace === context.namespace;
  return {
    ok: true,
    value: {
      rendered: qualifyMapping(mapping, context),
      localName: isLocal ? mapping.targetName : undefined,
      namespace: mapping.namespace,
    },
  };
};

/**
 * Emit a schema class as a `@dataclass`
 */
export const emitClassMember = (
  stmt: ClassDeclaration,
  declarationIndex: number,
  targetName: string,
  context: EmitterContext
): Result<GeneratedMember, TypeRenderError> => {
  const superclassResult = resolveSuperclass(stmt, context);
  if (!superclassResult.ok) {
    return superclassResult;
  }
  const superclass = superclassResult.value;

  const foreign: string[] = [];
  const addForeign = (namespaces: readonly string[]): void => {
    for (const ns of namespaces) {
      if (!foreign.includes(ns)) foreign.push(ns);
    }
  };
  if (superclass && superclass.localName === undefined) {
    addForeign([superclass.namespace]);
  }

  const fieldUnits: DocUnit[] = [];
  for (const property of stmt.properties) {
    const rendered = emitType(
      property.type,
      withSite(context, property.location)
    );
    if (!rendered.ok) {
      return rendered;
    }
    addForeign(collectForeignNamespaces(property.type, context));
    fieldUnits.push(...lines(commentLines(property.docComment)));
    fieldUnits.push(line(`${property.name}: ${rendered.value}`));
  }

  const bases = superclass ? `(${superclass.rendered})` : "";
  const classBody: DocUnit[] = [
    ...fieldUnits,
    ...(fieldUnits.length > 0 ? [blankLine()] : []),
    line(`_registered_identifier = ${quotePython(stmt.qualifiedName)}`),
  ];

  return {
    ok: true,
    value: {
      targetName,
      qualifiedName: stmt.qualifiedName,
      sourceKind: stmt.isModuleClass ? "module" : "class",
      declarationIndex,
      body: [
        ...lines(commentLines(stmt.docComment)),
        line("@dataclass"),
        line(`class ${targetName}${bases}:`),
        block(classBody),
      ],
      auxiliary: foreign.map((ns) => foreignImport(ns, context)),
      isModuleRootClass: stmt.isModuleClass,
      superclass: superclass?.localName,
    },
  };
};

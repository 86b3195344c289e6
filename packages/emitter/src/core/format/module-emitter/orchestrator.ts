/**
 * Module emission orchestrator
 */

import {
  traverse,
  type Declaration,
  type Diagnostic,
  type ReflectedProgram,
  type Result,
  type SchemaModule,
} from "@pyschemagen/frontend";
import {
  buildMappingTable,
  createContext,
  outputFileName,
  unresolvedReferenceError,
  type EmitterContext,
  type EmitterOptions,
  type GeneratedFile,
  type UnresolvedReferenceError,
} from "../../../types.js";
import { resolveOptions } from "../options.js";
import {
  checkForeignImports,
  checkUniqueNames,
  validateIdentifiers,
  type NamedDeclaration,
} from "../../semantic/naming-collisions.js";
import { orderMembers } from "../../semantic/emission-order.js";
import { generateHeader } from "./header.js";
import { generateMember } from "./members.js";
import { assembleOutput } from "./assembly.js";

const declarationIndex = (
  program: ReflectedProgram
): ReadonlyMap<string, Declaration> =>
  new Map(
    program.modules.flatMap((m) =>
      m.declarations.map((d) => [d.qualifiedName, d] as const)
    )
  );

const resolveTarget = (
  declaration: Declaration,
  module: SchemaModule,
  context: EmitterContext
): Result<NamedDeclaration, UnresolvedReferenceError> => {
  const mapping = context.mappings.get(declaration.qualifiedName);
  if (!mapping) {
    return {
      ok: false,
      error: unresolvedReferenceError(
        declaration.qualifiedName,
        declaration.location
      ),
    };
  }
  if (mapping.namespace !== context.namespace) {
    return {
      ok: false,
      error: unresolvedReferenceError(
        declaration.qualifiedName,
        declaration.location,
        `is declared in module '${module.name}' but mapped to namespace ` +
          `'${mapping.namespace}'`
      ),
    };
  }
  return {
    ok: true,
    value: { declaration, targetName: mapping.targetName },
  };
};

/**
 * Emit the Python file for one schema module. The run is all or nothing:
 * the first problem fails the namespace and no text is produced.
 */
export const emitModule = (
  module: SchemaModule,
  program: ReflectedProgram,
  options: Partial<EmitterOptions> = {}
): Result<GeneratedFile, readonly Diagnostic[]> => {
  const resolved = resolveOptions(options);
  const context = createContext(
    module.name,
    buildMappingTable(program.mappings),
    resolved
  );

  // Every declaration must be mapped into the module's own namespace.
  const targets = traverse(module.declarations, (d) =>
    resolveTarget(d, module, context)
  );
  if (!targets.ok) {
    return { ok: false, error: [targets.error] };
  }

  const unique = checkUniqueNames(
    module.name,
    program.mappings,
    declarationIndex(program)
  );
  if (!unique.ok) {
    return { ok: false, error: [unique.error] };
  }

  const identifiers = validateIdentifiers(targets.value);
  if (!identifiers.ok) {
    return { ok: false, error: [identifiers.error] };
  }

  const imports = checkForeignImports(targets.value, context);
  if (!imports.ok) {
    return { ok: false, error: [imports.error] };
  }

  const members = traverse(targets.value, (named, index) =>
    generateMember(named.declaration, index, named.targetName, context)
  );
  if (!members.ok) {
    return { ok: false, error: [members.error] };
  }

  const ordered = orderMembers(members.value);
  const content = assembleOutput(
    {
      moduleName: module.name,
      header: generateHeader(module, resolved),
      members: ordered,
    },
    context
  );

  return {
    ok: true,
    value: {
      namespace: module.name,
      fileName: outputFileName(module.name, resolved.suffix),
      content,
      members: ordered.map((m) => m.targetName),
    },
  };
};

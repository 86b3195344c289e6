import {
  createDiagnostic,
  getSourceKind,
  type Declaration,
  type Diagnostic,
  type Mapping,
  type Result,
  type SourceLocation,
  type TypeExpression,
} from "@pyschemagen/frontend";
import {
  isPythonKeyword,
  isValidModulePath,
  isValidPythonIdentifier,
  moduleFileStem,
  nameCollisionError,
  namespaceAlias,
  PREAMBLE_NAMES,
  type CollisionEntry,
  type EmitterContext,
  type NameCollisionError,
} from "../../emitter-types/index.js";
import { collectForeignNamespaces } from "../../types/index.js";

/**
 * A declaration of the namespace paired with its mapped identifier
 */
export type NamedDeclaration = {
  readonly declaration: Declaration;
  readonly targetName: string;
};

/** Class attributes written by the generator itself */
const RESERVED_CLASS_MEMBERS: ReadonlySet<string> = new Set([
  "_registered_identifier",
]);
const RESERVED_ROOT_MEMBERS: ReadonlySet<string> = new Set([
  "_registered_identifier",
  "load_pkl",
]);

const renameHint = (name: string): string =>
  [
    "Rename it with an annotation, for example:",
    `  @python.Name { value = "${name}_" }`,
  ].join("\n");

/**
 * Verify that the mappings of `namespace` bind pairwise distinct
 * identifiers. Groups are formed in mapping order; the first group with
 * more than one declaration is reported.
 *
 * Mappings whose declaration is not in `declarations` have nothing to
 * generate here and are skipped.
 */
export const checkUniqueNames = (
  namespace: string,
  mappings: readonly Mapping[],
  declarations: ReadonlyMap<string, Declaration>
): Result<void, NameCollisionError> => {
  const byTarget = new Map<string, CollisionEntry[]>();

  for (const mapping of mappings) {
    if (mapping.namespace !== namespace) continue;
    const declaration = declarations.get(mapping.declaration);
    if (!declaration) continue;

    const group = byTarget.get(mapping.targetName) ?? [];
    group.push({
      kind: getSourceKind(declaration),
      qualifiedName: declaration.qualifiedName,
      sourceName: declaration.name,
      location: declaration.location,
    });
    byTarget.set(mapping.targetName, group);
  }

  for (const [targetName, group] of byTarget) {
    if (group.length > 1) {
      return {
        ok: false,
        error: nameCollisionError(namespace, targetName, group),
      };
    }
  }

  return { ok: true, value: undefined };
};

const checkIdentifier = (
  name: string,
  what: string,
  location: SourceLocation
): Diagnostic | undefined => {
  if (!isValidPythonIdentifier(name)) {
    return createDiagnostic(
      "PSG3002",
      "error",
      `'${name}' is not a valid Python identifier (${what}).`,
      location
    );
  }
  if (isPythonKeyword(name)) {
    return createDiagnostic(
      "PSG3001",
      "error",
      `Python keyword '${name}' cannot be used as the name of ${what}.`,
      location,
      renameHint(name)
    );
  }
  return undefined;
};

type MemberItem = {
  readonly name: string;
  readonly location: SourceLocation;
};

/**
 * Report the first member name that repeats, or that takes a name the
 * generator writes itself
 */
const checkMemberNames = (
  owner: string,
  memberKind: string,
  items: readonly MemberItem[],
  reserved: ReadonlySet<string>
): Diagnostic | undefined => {
  const seen = new Set<string>();
  for (const item of items) {
    if (reserved.has(item.name)) {
      return createDiagnostic(
        "PSG3003",
        "error",
        `${memberKind} '${item.name}' of ${owner} collides with the ` +
          `generated member '${item.name}'.`,
        item.location,
        renameHint(item.name)
      );
    }
    if (seen.has(item.name)) {
      return createDiagnostic(
        "PSG3003",
        "error",
        `${owner} declares ${memberKind.toLowerCase()} '${item.name}' ` +
          `more than once.`,
        item.location
      );
    }
    seen.add(item.name);
  }
  return undefined;
};

const validateDeclaration = ({
  declaration,
  targetName,
}: NamedDeclaration): Diagnostic | undefined => {
  const what = `${getSourceKind(declaration)} ${declaration.qualifiedName}`;
  const targetProblem = checkIdentifier(targetName, what, declaration.location);
  if (targetProblem) return targetProblem;

  if (PREAMBLE_NAMES.has(targetName)) {
    return createDiagnostic(
      "PSG3003",
      "error",
      `${what} maps to '${targetName}', which shadows a name imported by ` +
        `every generated file.`,
      declaration.location,
      renameHint(targetName)
    );
  }

  switch (declaration.kind) {
    case "classDeclaration": {
      for (const property of declaration.properties) {
        const problem = checkIdentifier(
          property.name,
          `property ${declaration.qualifiedName}.${property.name}`,
          property.location
        );
        if (problem) return problem;
      }
      return checkMemberNames(
        declaration.qualifiedName,
        "Property",
        declaration.properties,
        declaration.isModuleClass
          ? RESERVED_ROOT_MEMBERS
          : RESERVED_CLASS_MEMBERS
      );
    }

    case "enumDeclaration": {
      // Enum members carry no location of their own.
      const items = declaration.members.map((m) => ({
        name: m.name,
        location: declaration.location,
      }));
      for (const item of items) {
        const problem = checkIdentifier(
          item.name,
          `enum member ${declaration.qualifiedName}.${item.name}`,
          item.location
        );
        if (problem) return problem;
      }
      return checkMemberNames(
        declaration.qualifiedName,
        "Enum member",
        items,
        new Set()
      );
    }

    case "typeAliasDeclaration":
      return undefined;
  }
};

/**
 * Check every generated identifier of a namespace: mapped names, property
 * names and enum member names. Stops at the first problem.
 */
export const validateIdentifiers = (
  declarations: readonly NamedDeclaration[]
): Result<void, Diagnostic> => {
  for (const named of declarations) {
    const problem = validateDeclaration(named);
    if (problem) {
      return { ok: false, error: problem };
    }
  }
  return { ok: true, value: undefined };
};

type ForeignReference = {
  readonly namespace: string;
  readonly location: SourceLocation;
  /** Label of the referencing declaration or property */
  readonly from: string;
};

const typeReferences = (
  type: TypeExpression,
  location: SourceLocation,
  from: string,
  context: EmitterContext
): ForeignReference[] =>
  collectForeignNamespaces(type, context).map((namespace) => ({
    namespace,
    location,
    from,
  }));

const foreignReferences = (
  declaration: Declaration,
  context: EmitterContext
): ForeignReference[] => {
  const from = `${getSourceKind(declaration)} ${declaration.qualifiedName}`;
  switch (declaration.kind) {
    case "classDeclaration": {
      const parent =
        declaration.superclass === undefined
          ? undefined
          : context.mappings.get(declaration.superclass);
      const inherited =
        parent && parent.namespace !== context.namespace
          ? [
              {
                namespace: parent.namespace,
                location: declaration.location,
                from,
              },
            ]
          : [];
      return [
        ...inherited,
        ...declaration.properties.flatMap((property) =>
          typeReferences(
            property.type,
            property.location,
            `property ${declaration.qualifiedName}.${property.name}`,
            context
          )
        ),
      ];
    }
    case "enumDeclaration":
      return [];
    case "typeAliasDeclaration":
      return typeReferences(
        declaration.type,
        declaration.location,
        from,
        context
      );
  }
};

const checkForeignReference = (
  { namespace, location, from }: ForeignReference,
  alias: string,
  importedAs: ReadonlyMap<string, string>,
  localNames: ReadonlyMap<string, Declaration>,
  context: EmitterContext
): Diagnostic | undefined => {
  const stem = moduleFileStem(namespace, context.options.suffix);
  if (!isValidModulePath(stem)) {
    return createDiagnostic(
      "PSG3002",
      "error",
      `Namespace '${namespace}' cannot be imported from ${from}: '${stem}' ` +
        `is not a valid Python module name.`,
      location
    );
  }

  const other = importedAs.get(alias);
  if (other !== undefined) {
    return createDiagnostic(
      "PSG3003",
      "error",
      `Namespaces '${other}' and '${namespace}' would both be imported ` +
        `as '${alias}'.`,
      location
    );
  }

  if (PREAMBLE_NAMES.has(alias)) {
    return createDiagnostic(
      "PSG3003",
      "error",
      `Namespace '${namespace}' would be imported as '${alias}', which ` +
        `shadows a name imported by every generated file.`,
      location
    );
  }

  const local = localNames.get(alias);
  if (local) {
    return createDiagnostic(
      "PSG3003",
      "error",
      `${getSourceKind(local)} ${local.qualifiedName} maps to '${alias}', ` +
        `which is also the import alias of namespace '${namespace}'.`,
      local.location,
      renameHint(alias),
      [location]
    );
  }

  return undefined;
};

/**
 * Check the import of every foreign namespace the declarations refer to:
 * its module name must be importable, and its alias must not be taken by
 * another import, a preamble name or a local declaration.
 */
export const checkForeignImports = (
  declarations: readonly NamedDeclaration[],
  context: EmitterContext
): Result<void, Diagnostic> => {
  const localNames = new Map(
    declarations.map((named) => [named.targetName, named.declaration] as const)
  );
  // alias -> namespace
  const importedAs = new Map<string, string>();

  for (const { declaration } of declarations) {
    for (const reference of foreignReferences(declaration, context)) {
      const alias = namespaceAlias(reference.namespace);
      if (importedAs.get(alias) === reference.namespace) continue;

      const problem = checkForeignReference(
        reference,
        alias,
        importedAs,
        localNames,
        context
      );
      if (problem) {
        return { ok: false, error: problem };
      }
      importedAs.set(alias, reference.namespace);
    }
  }

  return { ok: true, value: undefined };
};

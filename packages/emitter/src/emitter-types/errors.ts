/**
 * Fatal emission errors
 *
 * Each error is a Diagnostic (so it prints like any other) carrying a
 * structured payload for callers that inspect it.
 */

import {
  createDiagnostic,
  formatLocation,
  type DeclarationSourceKind,
  type Diagnostic,
  type SourceLocation,
} from "@pyschemagen/frontend";

export type CollisionEntry = {
  readonly kind: DeclarationSourceKind;
  readonly qualifiedName: string;
  readonly sourceName: string;
  readonly location: SourceLocation;
};

export type NameCollisionError = Diagnostic & {
  readonly code: "PSG3003";
  readonly namespace: string;
  readonly targetName: string;
  readonly conflicts: readonly CollisionEntry[];
};

export type UnsupportedTypeError = Diagnostic & {
  readonly code: "PSG2001";
  /** Source form of the type that could not be rendered */
  readonly display: string;
};

export type UnresolvedReferenceError = Diagnostic & {
  readonly code: "PSG2002";
  readonly declaration: string;
};

export type TypeRenderError = UnsupportedTypeError | UnresolvedReferenceError;

const declarationKeyword = (kind: DeclarationSourceKind): string => {
  switch (kind) {
    case "module":
      return "module";
    case "class":
    case "enum":
      return "class";
    case "typealias":
      return "typealias";
  }
};

/**
 * Example showing how a rename annotation resolves the collision
 */
const renameExample = (targetName: string, entry: CollisionEntry): string =>
  [
    "Rename one of the declarations with an annotation, for example:",
    `  @python.Name { value = "${targetName}2" }`,
    `  ${declarationKeyword(entry.kind)} ${entry.sourceName}`,
  ].join("\n");

export const nameCollisionError = (
  namespace: string,
  targetName: string,
  conflicts: readonly CollisionEntry[]
): NameCollisionError => {
  const details = conflicts
    .map(
      (c) => `${c.kind} ${c.qualifiedName} (${formatLocation(c.location)})`
    )
    .join(", ");
  const last = conflicts[conflicts.length - 1];
  const first = conflicts[0];

  return {
    ...createDiagnostic(
      "PSG3003",
      "error",
      `Naming collision in namespace '${namespace}': ${details} all map to ` +
        `Python identifier '${targetName}'.`,
      first?.location,
      last ? renameExample(targetName, last) : undefined,
      conflicts.map((c) => c.location)
    ),
    code: "PSG3003",
    namespace,
    targetName,
    conflicts,
  };
};

export const unsupportedTypeError = (
  display: string,
  location: SourceLocation | undefined,
  reason = "has no Python type syntax"
): UnsupportedTypeError => ({
  ...createDiagnostic(
    "PSG2001",
    "error",
    `Type \`${display}\` ${reason}.`,
    location
  ),
  code: "PSG2001",
  display,
});

export const unresolvedReferenceError = (
  declaration: string,
  location: SourceLocation | undefined,
  detail = "has no mapping"
): UnresolvedReferenceError => ({
  ...createDiagnostic(
    "PSG2002",
    "error",
    `Declaration '${declaration}' ${detail}.`,
    location,
    "Every referenced declaration needs an entry in the mapping table."
  ),
  code: "PSG2002",
  declaration,
});

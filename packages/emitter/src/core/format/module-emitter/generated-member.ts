/**
 * Generated members - one per declaration of the namespace
 */

import type { DeclarationSourceKind } from "@pyschemagen/frontend";
import {
  moduleFileStem,
  namespaceAlias,
  type EmitterContext,
} from "../../../types.js";
import type { DocUnit } from "../document/index.js";

export type GeneratedMember = {
  readonly targetName: string;
  readonly qualifiedName: string;
  readonly sourceKind: DeclarationSourceKind;
  /** Position of the declaration in its module; the ordering tie-break */
  readonly declarationIndex: number;
  readonly body: readonly DocUnit[];
  /** Module-level text this member needs once per file, such as imports */
  readonly auxiliary: readonly string[];
  readonly isModuleRootClass: boolean;
  /** Target name of the parent class when it is generated in the same namespace */
  readonly superclass?: string;
};

/**
 * Import line making a foreign namespace's declarations reachable through
 * its alias
 */
export const foreignImport = (
  namespace: string,
  context: EmitterContext
): string =>
  `import ${moduleFileStem(namespace, context.options.suffix)} as ` +
  namespaceAlias(namespace);

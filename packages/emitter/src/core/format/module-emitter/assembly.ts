/**
 * Final output assembly
 *
 * Lays out one namespace's file: header, the fixed preamble, auxiliary
 * lines, the ordered member bodies and the loader stub. Indentation is
 * applied once, by the document printer.
 */

import type { EmitterContext } from "../../../types.js";
import { PREAMBLE_LINES } from "../../../constants.js";
import {
  blankLine,
  block,
  lines,
  printDocument,
  separated,
  type DocUnit,
} from "../document/index.js";
import type { GeneratedMember } from "./generated-member.js";
import { classLoader, moduleLoader } from "./loader.js";

export type AssemblyParts = {
  readonly moduleName: string;
  readonly header: readonly string[];
  /** Members in emission order */
  readonly members: readonly GeneratedMember[];
};

/**
 * Auxiliary lines of all members, first occurrence wins
 */
export const collectAuxiliary = (
  members: readonly GeneratedMember[]
): readonly string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const member of members) {
    for (const text of member.auxiliary) {
      if (seen.has(text)) continue;
      seen.add(text);
      result.push(text);
    }
  }
  return result;
};

const memberUnits = (
  member: GeneratedMember,
  moduleName: string
): readonly DocUnit[] =>
  member.isModuleRootClass
    ? [...member.body, block([blankLine(), ...classLoader(moduleName)])]
    : member.body;

export const assembleOutput = (
  parts: AssemblyParts,
  context: EmitterContext
): string => {
  const hasRoot = parts.members.some((m) => m.isModuleRootClass);

  const units: DocUnit[] = [
    ...lines(parts.header),
    ...lines(PREAMBLE_LINES),
    ...lines(collectAuxiliary(parts.members)),
    blankLine(),
    blankLine(),
    ...separated([
      ...parts.members.map((m) => memberUnits(m, parts.moduleName)),
      hasRoot ? [] : moduleLoader(parts.moduleName),
    ]),
  ];

  return printDocument(units, context.indentUnit);
};

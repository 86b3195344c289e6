/**
 * Builders for document units
 */

import type { DocBlankLine, DocBlock, DocLine, DocUnit } from "./types.js";

export const line = (text: string, indentLevel: number = 0): DocLine => ({
  kind: "line",
  text,
  indentLevel,
});

export const lines = (
  texts: readonly string[],
  indentLevel: number = 0
): readonly DocLine[] => texts.map((text) => line(text, indentLevel));

export const blankLine = (): DocBlankLine => ({ kind: "blankLine" });

export const block = (
  units: readonly DocUnit[],
  indentLevel: number = 1
): DocBlock => ({
  kind: "block",
  indentLevel,
  units,
});

/**
 * Concatenate groups with exactly one blank line between non-empty groups
 */
export const separated = (
  groups: readonly (readonly DocUnit[])[]
): readonly DocUnit[] =>
  groups
    .filter((group) => group.length > 0)
    .flatMap((group, index) => (index === 0 ? group : [blankLine(), ...group]));

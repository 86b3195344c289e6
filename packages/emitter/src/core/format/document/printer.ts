/**
 * Document printer
 */

import type { DocUnit } from "./types.js";

const flatten = (
  units: readonly DocUnit[],
  baseLevel: number,
  indentUnit: string,
  out: string[]
): void => {
  for (const unit of units) {
    switch (unit.kind) {
      case "line": {
        if (/[\r\n]/.test(unit.text)) {
          throw new Error(
            `ICE: document line contains a line break: ${JSON.stringify(unit.text)}`
          );
        }
        const text = unit.text.trimEnd();
        out.push(
          text === ""
            ? ""
            : indentUnit.repeat(baseLevel + unit.indentLevel) + text
        );
        break;
      }
      case "blankLine":
        out.push("");
        break;
      case "block":
        flatten(unit.units, baseLevel + unit.indentLevel, indentUnit, out);
        break;
    }
  }
};

/**
 * Print units as text ending in exactly one newline. Leading and trailing
 * blank lines are dropped; whitespace-only lines print empty.
 */
export const printDocument = (
  units: readonly DocUnit[],
  indentUnit: string
): string => {
  const out: string[] = [];
  flatten(units, 0, indentUnit, out);

  let start = 0;
  while (start < out.length && out[start] === "") start++;
  let end = out.length;
  while (end > start && out[end - 1] === "") end--;

  return `${out.slice(start, end).join("\n")}\n`;
};

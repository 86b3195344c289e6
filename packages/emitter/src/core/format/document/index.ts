export type { DocBlankLine, DocBlock, DocLine, DocUnit } from "./types.js";
export { line, lines, blankLine, block, separated } from "./builders.js";
export { printDocument } from "./printer.js";

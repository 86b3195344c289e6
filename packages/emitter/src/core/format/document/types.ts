/**
 * Document unit types
 *
 * Generated Python is built as a tree of line and block units, each with a
 * declared indent level relative to its parent. The printer is the only
 * place indentation is turned into text.
 */

export type DocLine = {
  readonly kind: "line";
  /** Single line of text, no newline and no leading indentation */
  readonly text: string;
  readonly indentLevel: number;
};

export type DocBlankLine = {
  readonly kind: "blankLine";
};

export type DocBlock = {
  readonly kind: "block";
  readonly indentLevel: number;
  readonly units: readonly DocUnit[];
};

export type DocUnit = DocLine | DocBlankLine | DocBlock;

/**
 * Python text helpers
 */

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["\\", "\\\\"],
  ['"', '\\"'],
  ["\n", "\\n"],
  ["\r", "\\r"],
  ["\t", "\\t"],
]);

const hexEscape = (ch: string): string =>
  `\\x${ch.charCodeAt(0).toString(16).padStart(2, "0")}`;

/**
 * Double-quoted Python string literal. Control characters without a short
 * escape are written as `\xNN`.
 */
export const quotePython = (value: string): string => {
  const escaped = value.replace(/[\\"\x00-\x1f\x7f]/g, (ch) =>
    SIMPLE_ESCAPES.get(ch) ?? hexEscape(ch)
  );
  return `"${escaped}"`;
};

/**
 * Doc comment text as `#` comment lines. Blank doc lines become a bare `#`.
 * `\r\n`, `\r` and `\n` all end a line. Other control characters except
 * tab are spelled `\xNN`.
 */
export const commentLines = (docComment: string | undefined): string[] => {
  if (docComment === undefined || docComment.trim() === "") {
    return [];
  }
  return docComment
    .trim()
    .split(/\r\n|\r|\n/)
    .map((line) => line.replace(/[\x00-\x08\x0b-\x1f\x7f]/g, hexEscape))
    .map((line) => line.trimEnd())
    .map((line) => (line === "" ? "#" : `# ${line}`));
};

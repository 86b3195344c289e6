export * from "./types.js";
export * from "./declarations.js";
export { formatTypeExpression } from "./format.js";

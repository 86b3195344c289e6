export { parseReflectedProgram } from "./parse.js";
export { loadReflectedProgram } from "./load.js";

/**
 * Python Emitter Types
 * Main dispatcher - re-exports from emitter-types/ subdirectory
 */

export * from "./emitter-types/index.js";

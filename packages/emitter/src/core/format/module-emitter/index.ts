/**
 * Module emission - Public API
 */

export { emitModule } from "./orchestrator.js";
export { generateHeader } from "./header.js";
export { classLoader, moduleLoader } from "./loader.js";
export {
  assembleOutput,
  collectAuxiliary,
  type AssemblyParts,
} from "./assembly.js";
export { generateMember } from "./members.js";
export type { GeneratedMember } from "./generated-member.js";

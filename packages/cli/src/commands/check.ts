/**
 * pyschemagen check command - run the generator without writing files
 */

import type { ResolvedConfig, Result } from "../types.js";
import { emitProgram, summarize, type CommandSummary } from "./emit.js";

export const checkCommand = (
  config: ResolvedConfig
): Result<CommandSummary, string> => {
  const emitted = emitProgram(config);
  if (!emitted.ok) {
    return emitted;
  }

  for (const file of emitted.value.files) {
    if (!config.quiet) {
      console.log(`✓ ${file.namespace} (${file.fileName})`);
    }
    if (config.verbose) {
      console.log(`  members: ${file.members.join(", ") || "(none)"}`);
    }
  }

  return { ok: true, value: summarize(emitted.value) };
};

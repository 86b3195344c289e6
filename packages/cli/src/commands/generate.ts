/**
 * pyschemagen generate command - write one Python file per namespace
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join, relative } from "node:path";
import type { ResolvedConfig, Result } from "../types.js";
import { emitProgram, summarize, type CommandSummary } from "./emit.js";

export const generateCommand = (
  config: ResolvedConfig
): Result<CommandSummary, string> => {
  const emitted = emitProgram(config);
  if (!emitted.ok) {
    return emitted;
  }

  const { files } = emitted.value;
  if (files.length > 0) {
    mkdirSync(config.outDir, { recursive: true });
  }

  for (const file of files) {
    const fullPath = join(config.outDir, file.fileName);
    writeFileSync(fullPath, file.content, "utf-8");

    if (!config.quiet) {
      console.log(`✓ ${relative(process.cwd(), fullPath) || fullPath}`);
    }
    if (config.verbose) {
      console.log(`  members: ${file.members.join(", ") || "(none)"}`);
      console.log(`  ${Buffer.byteLength(file.content, "utf-8")} bytes`);
    }
  }

  return { ok: true, value: summarize(emitted.value) };
};

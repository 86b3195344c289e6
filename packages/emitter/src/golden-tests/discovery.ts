/**
 * Test scenario discovery
 *
 * Directory structure:
 *   testcases/
 *   └── common/
 *       ├── <category>/<test>/           # reflected JSON inputs + config.yaml
 *       └── expected/<category>/<test>/  # expected <Namespace>_pkl.py files
 */

import * as fs from "fs";
import * as path from "path";
import type { Scenario } from "./types.js";
import { parseConfigYaml } from "./config-parser.js";

const EXPECTED_DIR = "expected";

/**
 * Discover every scenario under `<baseDir>/common`
 */
export const discoverScenarios = (baseDir: string): readonly Scenario[] => {
  const commonDir = path.join(baseDir, "common");
  const expectedBaseDir = path.join(commonDir, EXPECTED_DIR);
  const scenarios: Scenario[] = [];

  const readScenarios = (dir: string, pathParts: readonly string[]): void => {
    const configPath = path.join(dir, "config.yaml");
    const entries = parseConfigYaml(fs.readFileSync(configPath, "utf-8"));
    const expectedDir = path.join(expectedBaseDir, ...pathParts);

    for (const entry of entries) {
      const inputPath = path.join(dir, entry.input);
      if (!fs.existsSync(inputPath)) {
        throw new Error(
          `Input file not found: ${inputPath} (title: "${entry.title}", config: ${configPath})`
        );
      }

      const expectsDiagnostics = (entry.expectDiagnostics?.length ?? 0) > 0;
      if (!expectsDiagnostics && !fs.existsSync(expectedDir)) {
        throw new Error(
          `Expected directory not found: ${expectedDir} (title: "${entry.title}", config: ${configPath})`
        );
      }

      scenarios.push({
        pathParts: ["common", ...pathParts],
        title: entry.title,
        inputPath,
        expectedDir: expectsDiagnostics ? undefined : expectedDir,
        expectDiagnostics: entry.expectDiagnostics,
        expectDiagnosticsMode: entry.expectDiagnosticsMode,
      });
    }
  };

  const walk = (dir: string, pathParts: readonly string[]): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    if (entries.some((e) => e.isFile() && e.name === "config.yaml")) {
      readScenarios(dir, pathParts);
    }

    const subdirs = entries
      .filter((e) => e.isDirectory() && e.name !== EXPECTED_DIR)
      .map((e) => e.name)
      .sort();
    for (const name of subdirs) {
      walk(path.join(dir, name), [...pathParts, name]);
    }
  };

  if (fs.existsSync(commonDir)) {
    walk(commonDir, []);
  }
  return scenarios;
};

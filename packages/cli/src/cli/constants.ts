/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("@pyschemagen/cli/package.json");

const readVersion = (data: unknown): string =>
  typeof data === "object" &&
  data !== null &&
  "version" in data &&
  typeof data.version === "string"
    ? data.version
    : "0.0.0";

export const VERSION = readVersion(packageJson);

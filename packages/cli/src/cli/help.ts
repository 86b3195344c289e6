/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
pyschemagen - Python dataclasses from reflected Pkl schemas v${VERSION}

USAGE:
  pyschemagen <command> <input.json> [options]

COMMANDS:
  generate <input.json>     Generate one Python file per schema module
  check <input.json>        Run the generator without writing files

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: nearest pyschemagen.json)

GENERATE OPTIONS:
  -o, --out <dir>           Output directory (default: generated)
  --suffix <suffix>         File name suffix: <Module>_<suffix>.py (default: pkl)
  --indent <n>              Spaces per indentation level (default: 4)
  --no-header               Leave out the "Code generated" header comment

EXAMPLES:
  pyschemagen generate schema.json
  pyschemagen generate schema.json --out src/config --indent 2
  pyschemagen check schema.json --verbose
`);
};

/**
 * Loader stub bound to the generated namespace
 */

import { LOADER_NAME } from "../../../constants.js";
import { block, line, lines, type DocUnit } from "../document/index.js";

const loaderBody = (moduleName: string): DocUnit =>
  block(
    lines([
      "# Load the Pkl module at the given source and evaluate it into " +
        `\`${moduleName}.Module\`.`,
      "# - Parameter source: The source of the Pkl module.",
      "config = pkl.load(source, parser=pkl.Parser(namespace = globals()))",
      "return config",
    ])
  );

/**
 * `load_pkl` as a classmethod of the module root class. The caller nests
 * the returned units one level inside the class.
 */
export const classLoader = (moduleName: string): readonly DocUnit[] => [
  line("@classmethod"),
  line(`def ${LOADER_NAME}(cls, source):`),
  loaderBody(moduleName),
];

/**
 * `load_pkl` as a module-level function, for namespaces without a root class
 */
export const moduleLoader = (moduleName: string): readonly DocUnit[] => [
  line(`def ${LOADER_NAME}(source):`),
  loaderBody(moduleName),
];

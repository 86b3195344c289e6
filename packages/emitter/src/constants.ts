/**
 * Shared constants for the Python emitter
 */

/**
 * Header comment for a generated file
 *
 * @param moduleName - Name of the schema module the file is generated from
 */
export const generateFileHeader = (moduleName: string): readonly string[] => [
  `# Code generated from Pkl module \`${moduleName}\`. DO NOT EDIT.`,
];

/**
 * Imports every generated file starts with
 */
export const PREAMBLE_LINES: readonly string[] = [
  "from __future__ import annotations",
  "from typing import Any, Callable, Dict, List, Literal, Optional, Set, Union",
  "from dataclasses import dataclass",
  "import pkl",
];

export const LOADER_NAME = "load_pkl";

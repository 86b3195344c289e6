/**
 * Nest scenarios into describe blocks by their directory path
 */

import type { Scenario, DescribeNode } from "./types.js";

const childNode = (parent: DescribeNode, name: string): DescribeNode => {
  const existing = parent.children.get(name);
  if (existing) return existing;

  const created: DescribeNode = { name, children: new Map(), tests: [] };
  parent.children.set(name, created);
  return created;
};

export const buildDescribeTree = (
  scenarios: readonly Scenario[],
  rootName: string
): DescribeNode | null => {
  if (scenarios.length === 0) return null;

  const root: DescribeNode = { name: rootName, children: new Map(), tests: [] };
  for (const scenario of scenarios) {
    const leaf = scenario.pathParts.reduce(childNode, root);
    leaf.tests.push(scenario);
  }
  return root;
};

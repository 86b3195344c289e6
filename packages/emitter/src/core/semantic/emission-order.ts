/**
 * Emission order for the generated members of one namespace
 *
 * Type aliases come first, in declaration order. Classes and enums follow,
 * topologically sorted over two kinds of edge:
 *
 *   superclass -> subclass          (same-namespace parents only)
 *   every other class/enum -> root  (the module class is declared last)
 *
 * Among members that are ready at the same time the lowest declaration
 * index goes first, so the order is total and stable across runs.
 */

import type { GeneratedMember } from
  "../format/module-emitter/generated-member.js";

const byDeclarationIndex = (a: GeneratedMember, b: GeneratedMember): number =>
  a.declarationIndex - b.declarationIndex;

type MemberGraph = {
  readonly successors: ReadonlyMap<
    GeneratedMember,
    ReadonlySet<GeneratedMember>
  >;
  readonly inDegree: Map<GeneratedMember, number>;
};

const buildGraph = (types: readonly GeneratedMember[]): MemberGraph => {
  const successors = new Map<GeneratedMember, Set<GeneratedMember>>(
    types.map((m) => [m, new Set()])
  );
  const inDegree = new Map<GeneratedMember, number>(types.map((m) => [m, 0]));

  const addEdge = (from: GeneratedMember, to: GeneratedMember): void => {
    const out = successors.get(from);
    if (!out || out.has(to)) return;
    out.add(to);
    inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
  };

  const byName = new Map(types.map((m) => [m.targetName, m]));
  for (const member of types) {
    if (member.superclass === undefined) continue;
    const parent = byName.get(member.superclass);
    if (!parent) continue;
    if (parent === member) {
      throw new Error(`ICE: class '${member.targetName}' extends itself`);
    }
    addEdge(parent, member);
  }

  const roots = types.filter((m) => m.isModuleRootClass);
  if (roots.length > 1) {
    throw new Error(
      `ICE: more than one module root class: ${roots
        .map((m) => m.targetName)
        .join(", ")}`
    );
  }
  const [root] = roots;
  if (root) {
    for (const member of types) {
      if (member !== root) addEdge(member, root);
    }
  }

  return { successors, inDegree };
};

/**
 * Order members for emission. Throws on a dependency cycle, which a
 * well-formed schema cannot produce.
 */
export const orderMembers = (
  members: readonly GeneratedMember[]
): readonly GeneratedMember[] => {
  const aliases = members
    .filter((m) => m.sourceKind === "typealias")
    .sort(byDeclarationIndex);
  const types = members
    .filter((m) => m.sourceKind !== "typealias")
    .sort(byDeclarationIndex);

  const { successors, inDegree } = buildGraph(types);

  const ready = types.filter((m) => inDegree.get(m) === 0);
  const ordered: GeneratedMember[] = [];

  while (ready.length > 0) {
    ready.sort(byDeclarationIndex);
    const next = ready.shift();
    if (!next) break;
    ordered.push(next);

    for (const successor of successors.get(next) ?? []) {
      const remaining = (inDegree.get(successor) ?? 0) - 1;
      inDegree.set(successor, remaining);
      if (remaining === 0) ready.push(successor);
    }
  }

  if (ordered.length !== types.length) {
    const stuck = types
      .filter((m) => !ordered.includes(m))
      .map((m) => m.targetName);
    throw new Error(
      `ICE: dependency cycle among generated declarations: ${stuck.join(", ")}`
    );
  }

  return [...aliases, ...ordered];
};

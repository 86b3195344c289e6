import { describe, it } from "mocha";
import { expect } from "chai";
import type {
  Declaration,
  Mapping,
  ReflectedProgram,
  SchemaModule,
  SourceLocation,
} from "@pyschemagen/frontend";
import { emitModule } from "./orchestrator.js";

const at = (line: number, file = "Zoo.pkl"): SourceLocation => ({
  file,
  line,
  column: 1,
  length: 0,
});

const zooDeclarations: readonly Declaration[] = [
  {
    kind: "typeAliasDeclaration",
    name: "Txt",
    qualifiedName: "Zoo#Txt",
    location: at(3),
    type: { kind: "primitiveType", name: "string" },
  },
  {
    kind: "enumDeclaration",
    name: "E",
    qualifiedName: "Zoo#E",
    location: at(5),
    members: [
      { name: "RED", value: "red" },
      { name: "GREEN", value: "green" },
    ],
  },
  {
    kind: "classDeclaration",
    name: "A",
    qualifiedName: "Zoo#A",
    location: at(8),
    docComment: "An animal.\n\nLives in the zoo.",
    properties: [
      {
        name: "name",
        type: { kind: "primitiveType", name: "string" },
        location: at(9),
        docComment: "Display name",
      },
    ],
    isModuleClass: false,
  },
  {
    kind: "classDeclaration",
    name: "Zoo",
    qualifiedName: "Zoo",
    location: at(1),
    superclass: "Zoo#A",
    properties: [
      {
        name: "count",
        type: { kind: "primitiveType", name: "int" },
        location: at(12),
      },
      {
        name: "color",
        type: {
          kind: "nullableType",
          inner: { kind: "declaredType", declaration: "Zoo#E" },
        },
        location: at(13),
      },
    ],
    isModuleClass: true,
  },
];

const zooMappings: readonly Mapping[] = [
  { declaration: "Zoo#Txt", namespace: "Zoo", targetName: "Txt" },
  { declaration: "Zoo#E", namespace: "Zoo", targetName: "E" },
  { declaration: "Zoo#A", namespace: "Zoo", targetName: "A" },
  { declaration: "Zoo", namespace: "Zoo", targetName: "B" },
];

const zoo: SchemaModule = {
  kind: "module",
  name: "Zoo",
  filePath: "Zoo.pkl",
  location: at(1),
  declarations: zooDeclarations,
};

const program: ReflectedProgram = { modules: [zoo], mappings: zooMappings };

const expectedZoo = [
  "# Code generated from Pkl module `Zoo`. DO NOT EDIT.",
  "from __future__ import annotations",
  "from typing import Any, Callable, Dict, List, Literal, Optional, Set, Union",
  "from dataclasses import dataclass",
  "import pkl",
  "from enum import Enum",
  "",
  "",
  "Txt = str",
  "",
  "class E(str, Enum):",
  '    RED = "red"',
  '    GREEN = "green"',
  "",
  "# An animal.",
  "#",
  "# Lives in the zoo.",
  "@dataclass",
  "class A:",
  "    # Display name",
  "    name: str",
  "",
  '    _registered_identifier = "Zoo#A"',
  "",
  "@dataclass",
  "class B(A):",
  "    count: int",
  "    color: Optional[E]",
  "",
  '    _registered_identifier = "Zoo"',
  "",
  "    @classmethod",
  "    def load_pkl(cls, source):",
  "        # Load the Pkl module at the given source and evaluate it into `Zoo.Module`.",
  "        # - Parameter source: The source of the Pkl module.",
  "        config = pkl.load(source, parser=pkl.Parser(namespace = globals()))",
  "        return config",
  "",
].join("\n");

describe("emitModule", () => {
  it("emits aliases, enums, classes and the root class with its loader", () => {
    const result = emitModule(zoo, program);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.fileName).to.equal("Zoo_pkl.py");
    expect(result.value.namespace).to.equal("Zoo");
    expect(result.value.members).to.deep.equal(["Txt", "E", "A", "B"]);
    expect(result.value.content).to.equal(expectedZoo);
  });

  it("produces byte-identical output across runs", () => {
    const first = emitModule(zoo, program);
    const second = emitModule(zoo, program);

    expect(second).to.deep.equal(first);
  });

  it("honours indent, suffix and header options", () => {
    const result = emitModule(zoo, program, {
      indent: 2,
      suffix: "gen",
      includeHeader: false,
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const lines = result.value.content.split("\n");
    expect(result.value.fileName).to.equal("Zoo_gen.py");
    expect(lines[0]).to.equal("from __future__ import annotations");
    expect(lines).to.include('  RED = "red"');
    expect(lines).to.include("    return config");
  });

  it("writes a module-level loader when there is no root class", () => {
    const plain: SchemaModule = {
      kind: "module",
      name: "Colors",
      filePath: "Colors.pkl",
      location: at(1, "Colors.pkl"),
      declarations: [
        {
          kind: "enumDeclaration",
          name: "Empty",
          qualifiedName: "Colors#Empty",
          location: at(2, "Colors.pkl"),
          members: [],
        },
      ],
    };
    const result = emitModule(plain, {
      modules: [plain],
      mappings: [
        {
          declaration: "Colors#Empty",
          namespace: "Colors",
          targetName: "Empty",
        },
      ],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.content).to.equal(
      [
        "# Code generated from Pkl module `Colors`. DO NOT EDIT.",
        "from __future__ import annotations",
        "from typing import Any, Callable, Dict, List, Literal, Optional, Set, Union",
        "from dataclasses import dataclass",
        "import pkl",
        "from enum import Enum",
        "",
        "",
        "class Empty(str, Enum):",
        "    pass",
        "",
        "def load_pkl(source):",
        "    # Load the Pkl module at the given source and evaluate it into `Colors.Module`.",
        "    # - Parameter source: The source of the Pkl module.",
        "    config = pkl.load(source, parser=pkl.Parser(namespace = globals()))",
        "    return config",
        "",
      ].join("\n")
    );
  });

  it("imports foreign namespaces once through their alias", () => {
    const base: SchemaModule = {
      kind: "module",
      name: "base.Types",
      filePath: "base/Types.pkl",
      location: at(1, "base/Types.pkl"),
      declarations: [
        {
          kind: "classDeclaration",
          name: "Entity",
          qualifiedName: "base.Types#Entity",
          location: at(2, "base/Types.pkl"),
          properties: [],
          isModuleClass: false,
        },
      ],
    };
    const shop: SchemaModule = {
      kind: "module",
      name: "Shop",
      filePath: "Shop.pkl",
      location: at(1, "Shop.pkl"),
      declarations: [
        {
          kind: "classDeclaration",
          name: "Item",
          qualifiedName: "Shop#Item",
          location: at(2, "Shop.pkl"),
          superclass: "base.Types#Entity",
          properties: [
            {
              name: "related",
              type: {
                kind: "genericType",
                base: { kind: "primitiveType", name: "list" },
                typeArguments: [
                  { kind: "declaredType", declaration: "base.Types#Entity" },
                ],
              },
              location: at(3, "Shop.pkl"),
            },
          ],
          isModuleClass: false,
        },
      ],
    };
    const result = emitModule(shop, {
      modules: [base, shop],
      mappings: [
        {
          declaration: "base.Types#Entity",
          namespace: "base.Types",
          targetName: "Entity",
        },
        { declaration: "Shop#Item", namespace: "Shop", targetName: "Item" },
      ],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const lines = result.value.content.split("\n");
    expect(lines.slice(4, 9)).to.deep.equal([
      "import pkl",
      "import base.Types_pkl as base_Types",
      "",
      "",
      "@dataclass",
    ]);
    expect(lines).to.include("class Item(base_Types.Entity):");
    expect(lines).to.include("    related: List[base_Types.Entity]");
  });

  it("fails the namespace on a naming collision", () => {
    const clash: SchemaModule = {
      kind: "module",
      name: "Clash",
      filePath: "Clash.pkl",
      location: at(1, "Clash.pkl"),
      declarations: [
        {
          kind: "classDeclaration",
          name: "Foo",
          qualifiedName: "Clash#Foo",
          location: at(2, "Clash.pkl"),
          properties: [],
          isModuleClass: false,
        },
        {
          kind: "typeAliasDeclaration",
          name: "FooAlias",
          qualifiedName: "Clash#FooAlias",
          location: at(6, "Clash.pkl"),
          type: { kind: "primitiveType", name: "int" },
        },
      ],
    };
    const result = emitModule(clash, {
      modules: [clash],
      mappings: [
        { declaration: "Clash#Foo", namespace: "Clash", targetName: "Foo" },
        {
          declaration: "Clash#FooAlias",
          namespace: "Clash",
          targetName: "Foo",
        },
      ],
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error).to.have.length(1);
    const [diagnostic] = result.error;
    expect(diagnostic?.code).to.equal("PSG3003");
    expect(diagnostic?.relatedLocations).to.deep.equal([
      at(2, "Clash.pkl"),
      at(6, "Clash.pkl"),
    ]);
  });

  it("fails when a declaration has no mapping", () => {
    const result = emitModule(zoo, {
      modules: [zoo],
      mappings: zooMappings.filter((m) => m.declaration !== "Zoo#E"),
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.code)).to.deep.equal(["PSG2002"]);
    expect(result.error[0]?.message).to.equal(
      "Declaration 'Zoo#E' has no mapping."
    );
  });

  it("fails when a declaration is mapped to another namespace", () => {
    const result = emitModule(zoo, {
      modules: [zoo],
      mappings: zooMappings.map((m) =>
        m.declaration === "Zoo#A" ? { ...m, namespace: "Farm" } : m
      ),
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.message).to.equal(
      "Declaration 'Zoo#A' is declared in module 'Zoo' but mapped to " +
        "namespace 'Farm'."
    );
  });

  it("fails on a property type with no Python spelling", () => {
    const odd: SchemaModule = {
      ...zoo,
      declarations: [
        {
          kind: "classDeclaration",
          name: "A",
          qualifiedName: "Zoo#A",
          location: at(8),
          properties: [
            {
              name: "never",
              type: { kind: "opaqueType", display: "nothing" },
              location: at(9),
            },
          ],
          isModuleClass: false,
        },
      ],
    };
    const result = emitModule(odd, { modules: [odd], mappings: zooMappings });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("PSG2001");
    expect(result.error[0]?.location).to.deep.equal(at(9));
  });
});

describe("emitModule foreign imports", () => {
  const app = (declarations: readonly Declaration[]): SchemaModule => ({
    kind: "module",
    name: "App",
    filePath: "App.pkl",
    location: at(1, "App.pkl"),
    declarations,
  });

  const holder = (name: string, declaration: string): Declaration => ({
    kind: "classDeclaration",
    name,
    qualifiedName: `App#${name}`,
    location: at(3, "App.pkl"),
    properties: [
      {
        name: "role",
        type: { kind: "declaredType", declaration },
        location: at(4, "App.pkl"),
      },
    ],
    isModuleClass: false,
  });

  it("fails when a class takes the alias of an imported namespace", () => {
    const module = app([holder("Base", "Base#Role")]);
    const result = emitModule(module, {
      modules: [module],
      mappings: [
        { declaration: "Base#Role", namespace: "Base", targetName: "Role" },
        { declaration: "App#Base", namespace: "App", targetName: "Base" },
      ],
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => [d.code, d.message])).to.deep.equal([
      [
        "PSG3003",
        "class App#Base maps to 'Base', which is also the import alias of " +
          "namespace 'Base'.",
      ],
    ]);
  });

  it("fails when an imported namespace is not a Python module name", () => {
    const module = app([holder("Item", "my-lib#Thing")]);
    const result = emitModule(module, {
      modules: [module],
      mappings: [
        {
          declaration: "my-lib#Thing",
          namespace: "my-lib",
          targetName: "Thing",
        },
        { declaration: "App#Item", namespace: "App", targetName: "Item" },
      ],
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.code)).to.deep.equal(["PSG3002"]);
  });
});

describe("emitModule doc comments", () => {
  it("splits doc comments on lone carriage returns", () => {
    const module: SchemaModule = {
      kind: "module",
      name: "Notes",
      filePath: "Notes.pkl",
      location: at(1, "Notes.pkl"),
      declarations: [
        {
          kind: "typeAliasDeclaration",
          name: "Text",
          qualifiedName: "Notes#Text",
          location: at(2, "Notes.pkl"),
          docComment: "first\rsecond",
          type: { kind: "primitiveType", name: "string" },
        },
      ],
    };
    const result = emitModule(module, {
      modules: [module],
      mappings: [
        { declaration: "Notes#Text", namespace: "Notes", targetName: "Text" },
      ],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const lines = result.value.content.split("\n");
    const start = lines.indexOf("# first");
    expect(lines.slice(start, start + 3)).to.deep.equal([
      "# first",
      "# second",
      "Text = str",
    ]);
  });
});

import { describe, it } from "mocha";
import { expect } from "chai";
import type {
  ClassDeclaration,
  Declaration,
  Mapping,
  SourceLocation,
} from "@pyschemagen/frontend";
import { buildMappingTable, createContext } from "../../../types.js";
import { defaultOptions } from "../options.js";
import { printDocument } from "../document/index.js";
import { generateMember } from "./members.js";
import type { GeneratedMember } from "./generated-member.js";

const at = (line: number): SourceLocation => ({
  file: "Farm.pkl",
  line,
  column: 3,
  length: 4,
});

const mappings: readonly Mapping[] = [
  { declaration: "Farm#Barn", namespace: "Farm", targetName: "Barn" },
  { declaration: "Farm#Cow", namespace: "Farm", targetName: "Cow" },
  { declaration: "Farm#Mood", namespace: "Farm", targetName: "Mood" },
  { declaration: "Farm#Tag", namespace: "Farm", targetName: "Tag" },
  { declaration: "Core#Entity", namespace: "Core", targetName: "Entity" },
];

const context = createContext(
  "Farm",
  buildMappingTable(mappings),
  defaultOptions
);

const generate = (declaration: Declaration, targetName: string) =>
  generateMember(declaration, 4, targetName, context);

const text = (member: GeneratedMember): string =>
  printDocument(member.body, context.indentUnit);

const barn: ClassDeclaration = {
  kind: "classDeclaration",
  name: "Barn",
  qualifiedName: "Farm#Barn",
  location: at(1),
  properties: [],
  isModuleClass: false,
};

describe("generateMember", () => {
  describe("classes", () => {
    it("omits the blank line when there are no properties", () => {
      const result = generate(barn, "Barn");

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(text(result.value)).to.equal(
        '@dataclass\nclass Barn:\n    _registered_identifier = "Farm#Barn"\n'
      );
      expect(result.value.sourceKind).to.equal("class");
      expect(result.value.declarationIndex).to.equal(4);
      expect(result.value.auxiliary).to.deep.equal([]);
      expect(result.value.superclass).to.equal(undefined);
    });

    it("records a same-namespace parent for ordering", () => {
      const result = generate(
        {
          ...barn,
          name: "Cow",
          qualifiedName: "Farm#Cow",
          superclass: "Farm#Barn",
        },
        "Cow"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.superclass).to.equal("Barn");
      expect(text(result.value).split("\n")[1]).to.equal("class Cow(Barn):");
    });

    it("qualifies a foreign parent and imports its namespace", () => {
      const result = generate(
        {
          ...barn,
          superclass: "Core#Entity",
          properties: [
            {
              name: "owner",
              type: { kind: "declaredType", declaration: "Core#Entity" },
              location: at(2),
            },
          ],
        },
        "Barn"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.superclass).to.equal(undefined);
      expect(result.value.auxiliary).to.deep.equal([
        "import Core_pkl as Core",
      ]);
      expect(text(result.value)).to.equal(
        [
          "@dataclass",
          "class Barn(Core.Entity):",
          "    owner: Core.Entity",
          "",
          '    _registered_identifier = "Farm#Barn"',
          "",
        ].join("\n")
      );
    });

    it("fails when the superclass has no mapping", () => {
      const result = generate({ ...barn, superclass: "Farm#Shed" }, "Barn");

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.code).to.equal("PSG2002");
      expect(result.error.message).to.equal(
        "Declaration 'Farm#Shed' is the superclass of 'Farm#Barn' but has no mapping."
      );
      expect(result.error.location).to.deep.equal(at(1));
    });

    it("reports an unmapped property type at the property", () => {
      const result = generate(
        {
          ...barn,
          properties: [
            {
              name: "roof",
              type: { kind: "declaredType", declaration: "Farm#Roof" },
              location: at(7),
            },
          ],
        },
        "Barn"
      );

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.code).to.equal("PSG2002");
      expect(result.error.location).to.deep.equal(at(7));
    });

    it("marks the module class as the root", () => {
      const result = generate(
        { ...barn, name: "Farm", qualifiedName: "Farm", isModuleClass: true },
        "ModuleClass"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.isModuleRootClass).to.equal(true);
      expect(result.value.sourceKind).to.equal("module");
      expect(text(result.value)).to.include(
        '    _registered_identifier = "Farm"'
      );
    });
  });

  describe("enums", () => {
    it("writes escaped string values and needs the Enum import", () => {
      const result = generate(
        {
          kind: "enumDeclaration",
          name: "Mood",
          qualifiedName: "Farm#Mood",
          location: at(10),
          docComment: "How a cow feels",
          members: [
            { name: "HAPPY", value: "happy" },
            { name: "QUOTED", value: 'say "moo"' },
          ],
        },
        "Mood"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.auxiliary).to.deep.equal(["from enum import Enum"]);
      expect(text(result.value)).to.equal(
        [
          "# How a cow feels",
          "class Mood(str, Enum):",
          '    HAPPY = "happy"',
          '    QUOTED = "say \\"moo\\""',
          "",
        ].join("\n")
      );
    });
  });

  describe("type aliases", () => {
    it("assigns the rendered type and imports foreign namespaces", () => {
      const result = generate(
        {
          kind: "typeAliasDeclaration",
          name: "Tag",
          qualifiedName: "Farm#Tag",
          location: at(12),
          type: {
            kind: "unionType",
            types: [
              { kind: "stringLiteralType", value: "a" },
              { kind: "declaredType", declaration: "Core#Entity" },
            ],
          },
        },
        "Tag"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(text(result.value)).to.equal(
        'Tag = Union[Literal["a"], Core.Entity]\n'
      );
      expect(result.value.auxiliary).to.deep.equal([
        "import Core_pkl as Core",
      ]);
      expect(result.value.sourceKind).to.equal("typealias");
    });
  });
});

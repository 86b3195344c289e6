/**
 * Tests for type emission
 * Verifies schema type expressions map to Python typing syntax
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { Mapping, TypeExpression } from "@pyschemagen/frontend";
import {
  buildMappingTable,
  createContext,
  withSite,
  type EmitterContext,
} from "../types.js";
import { defaultOptions } from "../core/format/options.js";
import { emitType } from "./index.js";

const mappings: readonly Mapping[] = [
  { declaration: "Zoo#Animal", namespace: "Zoo", targetName: "Animal" },
  { declaration: "Zoo#Keeper", namespace: "Zoo", targetName: "Keeper" },
  { declaration: "Base#Entity", namespace: "Base", targetName: "Entity" },
  { declaration: "org.shared#Id", namespace: "org.shared", targetName: "Id" },
];

const context: EmitterContext = createContext(
  "Zoo",
  buildMappingTable(mappings),
  defaultOptions
);

const str: TypeExpression = { kind: "primitiveType", name: "string" };
const animal: TypeExpression = { kind: "declaredType", declaration: "Zoo#Animal" };
const keeper: TypeExpression = { kind: "declaredType", declaration: "Zoo#Keeper" };

const render = (type: TypeExpression): string => {
  const result = emitType(type, context);
  if (!result.ok) {
    throw new Error(`Unexpected failure: ${result.error.message}`);
  }
  return result.value;
};

describe("Type Emission", () => {
  describe("primitives", () => {
    it("should spell primitives the Python way", () => {
      const spelled = (
        [
          "string",
          "int",
          "float",
          "number",
          "boolean",
          "null",
          "any",
          "bytes",
          "duration",
          "dataSize",
          "dynamic",
          "pair",
          "list",
          "map",
          "set",
        ] as const
      ).map((name) => render({ kind: "primitiveType", name }));

      expect(spelled).to.deep.equal([
        "str",
        "int",
        "float",
        "float",
        "bool",
        "None",
        "Any",
        "bytes",
        "pkl.Duration",
        "pkl.DataSize",
        "pkl.Dynamic",
        "pkl.Pair",
        "List",
        "Dict",
        "Set",
      ]);
    });
  });

  describe("composite types", () => {
    it("should emit a nullable string as Optional[str]", () => {
      expect(render({ kind: "nullableType", inner: str })).to.equal(
        "Optional[str]"
      );
    });

    it("should emit unions in source order", () => {
      expect(render({ kind: "unionType", types: [animal, keeper] })).to.equal(
        "Union[Animal, Keeper]"
      );
      expect(render({ kind: "unionType", types: [keeper, animal] })).to.equal(
        "Union[Keeper, Animal]"
      );
    });

    it("should emit string literals as Literal", () => {
      expect(render({ kind: "stringLiteralType", value: "x" })).to.equal(
        'Literal["x"]'
      );
    });

    it("should escape quotes and backslashes in literals", () => {
      expect(
        render({ kind: "stringLiteralType", value: 'say "hi"\\now' })
      ).to.equal('Literal["say \\"hi\\"\\\\now"]');
    });

    it("should emit generics with their arguments", () => {
      expect(
        render({
          kind: "genericType",
          base: { kind: "primitiveType", name: "list" },
          typeArguments: [animal],
        })
      ).to.equal("List[Animal]");

      expect(
        render({
          kind: "genericType",
          base: { kind: "primitiveType", name: "map" },
          typeArguments: [str, { kind: "nullableType", inner: keeper }],
        })
      ).to.equal("Dict[str, Optional[Keeper]]");
    });

    it("should emit function types as Callable", () => {
      expect(
        render({
          kind: "functionType",
          parameters: [str, animal],
          returnType: { kind: "primitiveType", name: "boolean" },
        })
      ).to.equal("Callable[[str, Animal], bool]");

      expect(
        render({ kind: "functionType", parameters: [], returnType: str })
      ).to.equal("Callable[[], str]");
    });
  });

  describe("declared references", () => {
    it("should qualify references into other namespaces", () => {
      expect(
        render({ kind: "declaredType", declaration: "Base#Entity" })
      ).to.equal("Base.Entity");
    });

    it("should use a Python-safe alias for dotted namespaces", () => {
      expect(
        render({ kind: "declaredType", declaration: "org.shared#Id" })
      ).to.equal("org_shared.Id");
    });

    it("should fail with PSG2002 for unmapped declarations", () => {
      const site = { file: "Zoo.pkl", line: 7, column: 3, length: 4 };
      const result = emitType(
        { kind: "declaredType", declaration: "Zoo#Ghost" },
        withSite(context, site)
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("PSG2002");
        expect(result.error.location).to.deep.equal(site);
      }
    });
  });

  describe("unsupported types", () => {
    const site = { file: "Zoo.pkl", line: 12, column: 5, length: 9 };

    it("should fail with the display form and source location", () => {
      const result = emitType(
        {
          kind: "genericType",
          base: { kind: "primitiveType", name: "list" },
          typeArguments: [{ kind: "opaqueType", display: "nothing" }],
        },
        withSite(context, site)
      );

      expect(result).to.deep.equal({
        ok: false,
        error: {
          code: "PSG2001",
          severity: "error",
          message: "Type `nothing` has no Python type syntax.",
          location: site,
          hint: undefined,
          relatedLocations: undefined,
          display: "nothing",
        },
      });
    });

    it("should not render any part of a union with an unsupported member", () => {
      const result = emitType(
        {
          kind: "unionType",
          types: [str, { kind: "opaqueType", display: "Int(isPositive)" }],
        },
        context
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("PSG2001");
        expect(result.error.location).to.be.undefined;
      }
    });

    it("should reject generics without type arguments", () => {
      const result = emitType(
        {
          kind: "genericType",
          base: { kind: "primitiveType", name: "list" },
          typeArguments: [],
        },
        withSite(context, site)
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "Type `List<>` has no type arguments."
        );
      }
    });
  });

  it("should be deterministic", () => {
    const type: TypeExpression = {
      kind: "nullableType",
      inner: {
        kind: "unionType",
        types: [
          animal,
          { kind: "stringLiteralType", value: "none" },
          { kind: "declaredType", declaration: "Base#Entity" },
        ],
      },
    };

    expect(render(type)).to.equal(render(type));
    expect(render(type)).to.equal(
      'Optional[Union[Animal, Literal["none"], Base.Entity]]'
    );
  });
});

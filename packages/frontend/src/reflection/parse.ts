/**
 * Reflected program reader - validates the JSON an external reflector
 * writes and builds the typed module model from it.
 *
 * Every structural problem is reported (not just the first) as a PSG1001
 * diagnostic whose message starts with the JSON path of the bad value.
 */

import { createDiagnostic } from "../types/diagnostic.js";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import {
  PRIMITIVE_TYPE_NAMES,
  type PrimitiveTypeName,
  type TypeExpression,
} from "../model/types.js";
import type {
  Declaration,
  EnumMember,
  Mapping,
  PropertyDeclaration,
  ReflectedProgram,
  SchemaModule,
} from "../model/declarations.js";

type JsonObject = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPrimitiveTypeName = (value: unknown): value is PrimitiveTypeName =>
  PRIMITIVE_TYPE_NAMES.some((name) => name === value);

/**
 * Collects diagnostics while walking the input
 */
class InputReader {
  readonly diagnostics: Diagnostic[] = [];

  problem(path: string, message: string): undefined {
    this.diagnostics.push(
      createDiagnostic("PSG1001", "error", `${path}: ${message}`)
    );
    return undefined;
  }

  object(value: unknown, path: string): JsonObject | undefined {
    return isRecord(value)
      ? value
      : this.problem(path, `expected an object, got ${describeValue(value)}`);
  }

  array(value: unknown, path: string): readonly unknown[] | undefined {
    return Array.isArray(value)
      ? value
      : this.problem(path, `expected an array, got ${describeValue(value)}`);
  }

  string(obj: JsonObject, key: string, path: string): string | undefined {
    const value = obj[key];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
    return this.problem(
      `${path}.${key}`,
      `expected a non-empty string, got ${describeValue(value)}`
    );
  }

  optionalString(
    obj: JsonObject,
    key: string,
    path: string
  ): string | undefined {
    const value = obj[key];
    if (value === undefined || typeof value === "string") {
      return value;
    }
    return this.problem(
      `${path}.${key}`,
      `expected a string, got ${describeValue(value)}`
    );
  }

  integer(obj: JsonObject, key: string, path: string): number | undefined {
    const value = obj[key];
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
      return value;
    }
    return this.problem(
      `${path}.${key}`,
      `expected a non-negative integer, got ${describeValue(value)}`
    );
  }

  /**
   * Read every element, keeping the successfully read ones. Failures have
   * already been recorded, so a partial list never escapes `parse`.
   */
  each<T>(
    items: readonly unknown[],
    path: string,
    read: (item: unknown, itemPath: string) => T | undefined
  ): readonly T[] {
    const values: T[] = [];
    for (const [index, item] of items.entries()) {
      const value = read(item, `${path}[${index}]`);
      if (value !== undefined) {
        values.push(value);
      }
    }
    return values;
  }
}

const describeValue = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "string") return JSON.stringify(value);
  return typeof value;
};

const readLocation = (
  reader: InputReader,
  value: unknown,
  path: string
): SourceLocation | undefined => {
  const obj = reader.object(value, path);
  if (!obj) return undefined;

  const file = reader.string(obj, "file", path);
  const line = reader.integer(obj, "line", path);
  const column = reader.integer(obj, "column", path);
  const length =
    obj.length === undefined ? 0 : reader.integer(obj, "length", path);

  if (
    file === undefined ||
    line === undefined ||
    column === undefined ||
    length === undefined
  ) {
    return undefined;
  }
  return { file, line, column, length };
};

const readTypeList = (
  reader: InputReader,
  value: unknown,
  path: string
): readonly TypeExpression[] | undefined => {
  const items = reader.array(value, path);
  if (!items) return undefined;
  const before = reader.diagnostics.length;
  const types = reader.each(items, path, (item, itemPath) =>
    readType(reader, item, itemPath)
  );
  return reader.diagnostics.length === before ? types : undefined;
};

const readType = (
  reader: InputReader,
  value: unknown,
  path: string
): TypeExpression | undefined => {
  const obj = reader.object(value, path);
  if (!obj) return undefined;

  const kind = obj.kind;
  switch (kind) {
    case "primitiveType": {
      const name = obj.name;
      if (!isPrimitiveTypeName(name)) {
        return reader.problem(
          `${path}.name`,
          `unknown primitive type ${describeValue(name)}`
        );
      }
      return { kind: "primitiveType", name };
    }

    case "nullableType": {
      const inner = readType(reader, obj.inner, `${path}.inner`);
      return inner ? { kind: "nullableType", inner } : undefined;
    }

    case "unionType": {
      const types = readTypeList(reader, obj.types, `${path}.types`);
      if (!types) return undefined;
      if (types.length < 2) {
        return reader.problem(
          `${path}.types`,
          "a union needs at least two members"
        );
      }
      return { kind: "unionType", types };
    }

    case "declaredType": {
      const declaration = reader.string(obj, "declaration", path);
      return declaration === undefined
        ? undefined
        : { kind: "declaredType", declaration };
    }

    case "stringLiteralType": {
      const literal = obj.value;
      if (typeof literal !== "string") {
        return reader.problem(
          `${path}.value`,
          `expected a string, got ${describeValue(literal)}`
        );
      }
      return { kind: "stringLiteralType", value: literal };
    }

    case "genericType": {
      const base = readType(reader, obj.base, `${path}.base`);
      const typeArguments = readTypeList(
        reader,
        obj.typeArguments,
        `${path}.typeArguments`
      );
      return base && typeArguments
        ? { kind: "genericType", base, typeArguments }
        : undefined;
    }

    case "functionType": {
      const parameters = readTypeList(
        reader,
        obj.parameters,
        `${path}.parameters`
      );
      const returnType = readType(reader, obj.returnType, `${path}.returnType`);
      return parameters && returnType
        ? { kind: "functionType", parameters, returnType }
        : undefined;
    }

    case "opaqueType": {
      const display = reader.string(obj, "display", path);
      return display === undefined
        ? undefined
        : { kind: "opaqueType", display };
    }

    default:
      return reader.problem(
        `${path}.kind`,
        `unknown type kind ${describeValue(kind)}`
      );
  }
};

const readProperty = (
  reader: InputReader,
  value: unknown,
  path: string
): PropertyDeclaration | undefined => {
  const obj = reader.object(value, path);
  if (!obj) return undefined;

  const name = reader.string(obj, "name", path);
  const type = readType(reader, obj.type, `${path}.type`);
  const location = readLocation(reader, obj.location, `${path}.location`);
  const docComment = reader.optionalString(obj, "docComment", path);

  if (name === undefined || !type || !location) return undefined;
  return { name, type, location, docComment };
};

const readEnumMember = (
  reader: InputReader,
  value: unknown,
  path: string
): EnumMember | undefined => {
  const obj = reader.object(value, path);
  if (!obj) return undefined;

  const name = reader.string(obj, "name", path);
  const memberValue = obj.value;
  if (typeof memberValue !== "string") {
    return reader.problem(
      `${path}.value`,
      `expected a string, got ${describeValue(memberValue)}`
    );
  }
  return name === undefined ? undefined : { name, value: memberValue };
};

const readDeclaration = (
  reader: InputReader,
  value: unknown,
  path: string
): Declaration | undefined => {
  const obj = reader.object(value, path);
  if (!obj) return undefined;

  const before = reader.diagnostics.length;
  const name = reader.string(obj, "name", path);
  const qualifiedName = reader.string(obj, "qualifiedName", path);
  const location = readLocation(reader, obj.location, `${path}.location`);
  const docComment = reader.optionalString(obj, "docComment", path);

  const kind = obj.kind;
  switch (kind) {
    case "classDeclaration": {
      const superclass = reader.optionalString(obj, "superclass", path);
      const isModuleClass = obj.isModuleClass ?? false;
      if (typeof isModuleClass !== "boolean") {
        reader.problem(
          `${path}.isModuleClass`,
          `expected a boolean, got ${describeValue(isModuleClass)}`
        );
      }
      const rawProperties = reader.array(
        obj.properties ?? [],
        `${path}.properties`
      );
      const properties = rawProperties
        ? reader.each(rawProperties, `${path}.properties`, (item, itemPath) =>
            readProperty(reader, item, itemPath)
          )
        : [];

      if (
        reader.diagnostics.length !== before ||
        name === undefined ||
        qualifiedName === undefined ||
        !location
      ) {
        return undefined;
      }
      return {
        kind: "classDeclaration",
        name,
        qualifiedName,
        location,
        docComment,
        superclass,
        properties,
        isModuleClass: isModuleClass === true,
      };
    }

    case "enumDeclaration": {
      const rawMembers = reader.array(obj.members ?? [], `${path}.members`);
      const members = rawMembers
        ? reader.each(rawMembers, `${path}.members`, (item, itemPath) =>
            readEnumMember(reader, item, itemPath)
          )
        : [];

      if (
        reader.diagnostics.length !== before ||
        name === undefined ||
        qualifiedName === undefined ||
        !location
      ) {
        return undefined;
      }
      return {
        kind: "enumDeclaration",
        name,
        qualifiedName,
        location,
        docComment,
        members,
      };
    }

    case "typeAliasDeclaration": {
      const type = readType(reader, obj.type, `${path}.type`);
      if (
        name === undefined ||
        qualifiedName === undefined ||
        !location ||
        !type
      ) {
        return undefined;
      }
      return {
        kind: "typeAliasDeclaration",
        name,
        qualifiedName,
        location,
        docComment,
        type,
      };
    }

    default:
      return reader.problem(
        `${path}.kind`,
        `unknown declaration kind ${describeValue(kind)}`
      );
  }
};

const readModule = (
  reader: InputReader,
  value: unknown,
  path: string
): SchemaModule | undefined => {
  const obj = reader.object(value, path);
  if (!obj) return undefined;

  const name = reader.string(obj, "name", path);
  const filePath = reader.string(obj, "filePath", path);
  const location = readLocation(reader, obj.location, `${path}.location`);
  const rawDeclarations = reader.array(
    obj.declarations,
    `${path}.declarations`
  );
  const declarations = rawDeclarations
    ? reader.each(rawDeclarations, `${path}.declarations`, (item, itemPath) =>
        readDeclaration(reader, item, itemPath)
      )
    : [];

  const moduleClasses = declarations.filter(
    (d) => d.kind === "classDeclaration" && d.isModuleClass
  );
  if (moduleClasses.length > 1) {
    reader.problem(
      `${path}.declarations`,
      `more than one module class: ${moduleClasses
        .map((d) => d.qualifiedName)
        .join(", ")}`
    );
  }

  if (name === undefined || filePath === undefined || !location) {
    return undefined;
  }
  return { kind: "module", name, filePath, location, declarations };
};

const readMapping = (
  reader: InputReader,
  value: unknown,
  path: string
): Mapping | undefined => {
  const obj = reader.object(value, path);
  if (!obj) return undefined;

  const declaration = reader.string(obj, "declaration", path);
  const namespace = reader.string(obj, "namespace", path);
  const targetName = reader.string(obj, "targetName", path);

  if (
    declaration === undefined ||
    namespace === undefined ||
    targetName === undefined
  ) {
    return undefined;
  }
  return { declaration, namespace, targetName };
};

const checkDuplicateQualifiedNames = (
  reader: InputReader,
  modules: readonly SchemaModule[]
): void => {
  const seen = new Set<string>();
  for (const module of modules) {
    for (const declaration of module.declarations) {
      if (seen.has(declaration.qualifiedName)) {
        reader.problem(
          "$.modules",
          `declaration '${declaration.qualifiedName}' is declared more than once`
        );
      }
      seen.add(declaration.qualifiedName);
    }
  }
};

const checkDuplicateMappings = (
  reader: InputReader,
  mappings: readonly Mapping[]
): void => {
  const seen = new Set<string>();
  for (const mapping of mappings) {
    if (seen.has(mapping.declaration)) {
      reader.problem(
        "$.mappings",
        `declaration '${mapping.declaration}' has more than one mapping`
      );
    }
    seen.add(mapping.declaration);
  }
};

/**
 * Validate parsed JSON and build a ReflectedProgram from it.
 */
export const parseReflectedProgram = (
  data: unknown
): Result<ReflectedProgram, readonly Diagnostic[]> => {
  const reader = new InputReader();

  const root = reader.object(data, "$");
  if (!root) {
    return { ok: false, error: reader.diagnostics };
  }

  const rawModules = reader.array(root.modules, "$.modules");
  const modules = rawModules
    ? reader.each(rawModules, "$.modules", (item, itemPath) =>
        readModule(reader, item, itemPath)
      )
    : [];

  const rawMappings = reader.array(root.mappings, "$.mappings");
  const mappings = rawMappings
    ? reader.each(rawMappings, "$.mappings", (item, itemPath) =>
        readMapping(reader, item, itemPath)
      )
    : [];

  checkDuplicateQualifiedNames(reader, modules);
  checkDuplicateMappings(reader, mappings);

  if (reader.diagnostics.length > 0) {
    return { ok: false, error: reader.diagnostics };
  }
  return { ok: true, value: { modules, mappings } };
};

/**
 * Reflected schema modules and their declarations
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { TypeExpression } from "./types.js";

export type PropertyDeclaration = {
  readonly name: string;
  readonly type: TypeExpression;
  readonly location: SourceLocation;
  readonly docComment?: string;
};

export type ClassDeclaration = {
  readonly kind: "classDeclaration";
  readonly name: string;
  readonly qualifiedName: string;
  readonly location: SourceLocation;
  readonly docComment?: string;
  /** Qualified name of the parent declaration */
  readonly superclass?: string;
  readonly properties: readonly PropertyDeclaration[];
  /** True for the class that represents the module itself */
  readonly isModuleClass: boolean;
};

export type EnumMember = {
  readonly name: string;
  readonly value: string;
};

export type EnumDeclaration = {
  readonly kind: "enumDeclaration";
  readonly name: string;
  readonly qualifiedName: string;
  readonly location: SourceLocation;
  readonly docComment?: string;
  readonly members: readonly EnumMember[];
};

export type TypeAliasDeclaration = {
  readonly kind: "typeAliasDeclaration";
  readonly name: string;
  readonly qualifiedName: string;
  readonly location: SourceLocation;
  readonly docComment?: string;
  readonly type: TypeExpression;
};

export type Declaration =
  | ClassDeclaration
  | EnumDeclaration
  | TypeAliasDeclaration;

/**
 * Kind label used in diagnostics
 */
export type DeclarationSourceKind = "module" | "class" | "enum" | "typealias";

export const getSourceKind = (
  declaration: Declaration
): DeclarationSourceKind => {
  switch (declaration.kind) {
    case "classDeclaration":
      return declaration.isModuleClass ? "module" : "class";
    case "enumDeclaration":
      return "enum";
    case "typeAliasDeclaration":
      return "typealias";
  }
};

/**
 * One schema module. Its name is the namespace of the generated file, and
 * `declarations` are in source order.
 */
export type SchemaModule = {
  readonly kind: "module";
  readonly name: string;
  readonly filePath: string;
  readonly location: SourceLocation;
  readonly declarations: readonly Declaration[];
};

/**
 * Binds a declaration (by qualified name) to its Python identifier and the
 * namespace it is generated into. Renames are applied upstream.
 */
export type Mapping = {
  readonly declaration: string;
  readonly namespace: string;
  readonly targetName: string;
};

export type ReflectedProgram = {
  readonly modules: readonly SchemaModule[];
  readonly mappings: readonly Mapping[];
};

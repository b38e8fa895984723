import type { Visibility } from "./type";

/**
 * Unelaborated type definitions as the builder hands them to the compiler.
 * Attribute types are still descriptor strings.
 */
export interface StructDeclaration {
  readonly tag: "Struct";
  readonly name: string;
  readonly description?: string;
  readonly attributes: readonly { readonly name: string; readonly descriptor: string }[];
  readonly visibility: Visibility;
}

export interface EnumDeclaration {
  readonly tag: "Enum";
  readonly name: string;
  readonly description?: string;
  readonly entries: readonly { readonly name: string; readonly value?: bigint }[];
  readonly visibility: Visibility;
}

export type TypeDeclaration = StructDeclaration | EnumDeclaration;

import { ConfigError } from "../outcome/errors";
import type { TypeDeclaration } from "./declaration";
import { isPrimitiveDescriptor, parseArrayDescriptor } from "./resolve";
import type { NamedType, Type } from "./type";

type Mark = "unvisited" | "in-progress" | "done";

/**
 * Depth-first post-order over `items`: every item comes after the items its
 * `dependencies` (indices into `items`) point at. Fails with `CyclicType`
 * naming the cycle when one is reachable.
 */
export function topoOrder<T>(
  items: readonly T[],
  dependencies: (item: T) => readonly number[],
  label: (item: T) => string
): T[] {
  const marks = items.map((): Mark => "unvisited");
  const ordered: T[] = [];
  const path: number[] = [];

  const visit = (index: number): void => {
    marks[index] = "in-progress";
    path.push(index);
    for (const dep of dependencies(items[index])) {
      if (marks[dep] === "in-progress") {
        const cycle = [...path.slice(path.indexOf(dep)), dep].map(i => label(items[i]));
        throw new ConfigError("CyclicType", { cycle: cycle.join(" -> ") }, {
          kind: "type",
          name: label(items[dep]),
        });
      }
      if (marks[dep] === "unvisited") {
        visit(dep);
      }
    }
    path.pop();
    marks[index] = "done";
    ordered.push(items[index]);
  };

  items.forEach((_, index) => {
    if (marks[index] === "unvisited") visit(index);
  });

  return ordered;
}

/**
 * The declared type name an attribute descriptor depends on, or undefined
 * when it only uses the built-in grammar.
 */
export function descriptorDependency(descriptor: string): string | undefined {
  if (isPrimitiveDescriptor(descriptor)) return undefined;
  return parseArrayDescriptor(descriptor)?.inner ?? descriptor;
}

/**
 * Order type declarations so each one follows everything it references.
 */
export function orderTypeDeclarations(declarations: readonly TypeDeclaration[]): TypeDeclaration[] {
  const indexByName = new Map<string, number>();
  declarations.forEach((decl, index) => {
    if (indexByName.has(decl.name)) {
      throw new ConfigError("DuplicateName", { name: decl.name }, { kind: "type", name: decl.name });
    }
    indexByName.set(decl.name, index);
  });

  const edges = new Map<TypeDeclaration, number[]>();
  for (const decl of declarations) {
    const deps: number[] = [];
    if (decl.tag === "Struct") {
      for (const attribute of decl.attributes) {
        const dependency = descriptorDependency(attribute.descriptor);
        if (dependency === undefined) continue;
        const index = indexByName.get(dependency);
        if (index === undefined) {
          throw new ConfigError("UndefinedType", { name: dependency }, {
            kind: "struct",
            name: decl.name,
            member: attribute.name,
          });
        }
        deps.push(index);
      }
    }
    edges.set(decl, deps);
  }

  return topoOrder(declarations, decl => edges.get(decl) ?? [], decl => decl.name);
}

function namedDependencies(type: Type, into: NamedType[]): void {
  switch (type.tag) {
    case "Primitive":
      return;
    case "Struct":
    case "Enum":
      into.push(type);
      return;
    case "Array":
      namedDependencies(type.element, into);
      return;
  }
}

/**
 * Order an already elaborated subset of named types (e.g. the types one node
 * uses). References to types outside the subset are ignored.
 */
export function orderNamedTypes(types: readonly NamedType[]): NamedType[] {
  const indexOf = new Map<NamedType, number>(types.map((type, index) => [type, index]));

  return topoOrder(
    types,
    type => {
      if (type.tag === "Enum") return [];
      const referenced: NamedType[] = [];
      for (const attribute of type.attributes) {
        namedDependencies(attribute.type, referenced);
      }
      return referenced.flatMap(ref => {
        const index = indexOf.get(ref);
        return index === undefined ? [] : [index];
      });
    },
    type => type.name
  );
}

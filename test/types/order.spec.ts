import { describe, it, expect } from "vitest";
import { EnumBuilder, StructBuilder } from "../../src/builder/types";
import type { TypeDeclaration } from "../../src/types/declaration";
import {
  descriptorDependency,
  orderNamedTypes,
  orderTypeDeclarations,
  topoOrder,
} from "../../src/types/order";
import { elaborateTypes } from "../../src/types/elaborate";
import { configErrorOf } from "../helpers/errors";

function struct(name: string, attributes: [string, string][]): TypeDeclaration {
  const builder = new StructBuilder(name);
  for (const [attribute, descriptor] of attributes) builder.addAttribute(attribute, descriptor);
  return builder.declaration();
}

const names = (decls: readonly { name: string }[]): string[] => decls.map(d => d.name);

describe("topoOrder", () => {
  it("places every item after its dependencies", () => {
    const deps: Record<string, number[]> = { a: [2], b: [], c: [1] };
    const ordered = topoOrder(["a", "b", "c"], item => deps[item], item => item);
    expect(ordered).toEqual(["b", "c", "a"]);
  });

  it("keeps declaration order for independent items", () => {
    expect(topoOrder(["x", "y", "z"], () => [], item => item)).toEqual(["x", "y", "z"]);
  });
});

describe("orderTypeDeclarations", () => {
  it("orders structs after the types they reference", () => {
    const ordered = orderTypeDeclarations([
      struct("outer", [["inner_value", "inner"], ["flag", "u1"]]),
      struct("inner", [["v", "u8"]]),
      new EnumBuilder("mode").addEntry("Off").declaration(),
    ]);
    expect(names(ordered)).toEqual(["inner", "outer", "mode"]);
  });

  it("treats array descriptors as a dependency on their element", () => {
    const ordered = orderTypeDeclarations([
      struct("path", [["points", "point[3]"]]),
      struct("point", [["x", "i16"], ["y", "i16"]]),
    ]);
    expect(names(ordered)).toEqual(["point", "path"]);
  });

  it("reports a cycle with its path", () => {
    const error = configErrorOf(() =>
      orderTypeDeclarations([
        struct("a", [["b", "b"]]),
        struct("b", [["a", "a"]]),
      ])
    );
    expect(error.kind).toBe("CyclicType");
    expect(error.code).toBe("E0103");
    expect(error.message).toBe("Cyclic type definition: a -> b -> a");
  });

  it("reports self reference through an array", () => {
    const error = configErrorOf(() => orderTypeDeclarations([struct("list", [["next", "list[2]"]])]));
    expect(error.message).toBe("Cyclic type definition: list -> list");
  });

  it("reports undefined references at the attribute", () => {
    const error = configErrorOf(() => orderTypeDeclarations([struct("s", [["x", "ghost"]])]));
    expect(error.kind).toBe("UndefinedType");
    expect(error.message).toBe("Undefined type: ghost");
    expect(error.diagnostic.at).toEqual({ kind: "struct", name: "s", member: "x" });
  });

  it("rejects duplicate type names", () => {
    const error = configErrorOf(() =>
      orderTypeDeclarations([struct("s", [["x", "u8"]]), struct("s", [["y", "u8"]])])
    );
    expect(error.kind).toBe("DuplicateName");
  });
});

describe("descriptorDependency", () => {
  it("returns the referenced type name", () => {
    expect(descriptorDependency("u8")).toBeUndefined();
    expect(descriptorDependency("d4<0..1>")).toBeUndefined();
    expect(descriptorDependency("u8[2]")).toBeUndefined();
    expect(descriptorDependency("point")).toBe("point");
    expect(descriptorDependency("point[3]")).toBe("point");
  });
});

describe("orderNamedTypes", () => {
  it("orders a subset and ignores types outside it", () => {
    const [mode, inner, outer] = elaborateTypes(
      orderTypeDeclarations([
        new EnumBuilder("mode").addEntry("Off").declaration(),
        struct("inner", [["m", "mode"]]),
        struct("outer", [["i", "inner[2]"]]),
      ]),
      { minEnumBits: 1 }
    );
    expect(names(orderNamedTypes([outer, inner]))).toEqual(["inner", "outer"]);
    expect(names(orderNamedTypes([outer, mode]))).toEqual(["outer", "mode"]);
  });
});

import { ConfigError } from "../outcome/errors";
import type { EnumDeclaration, StructDeclaration } from "../types/declaration";
import type { Visibility } from "../types/type";
import { checkIdentifier, checkUnique } from "./names";

export class StructBuilder {
  description?: string;
  visibility: Visibility = "global";
  private readonly attributes: { name: string; descriptor: string }[] = [];

  constructor(readonly name: string) {}

  /**
   * Append an attribute. `descriptor` is resolved when the network is built,
   * so it may name a type declared later.
   */
  addAttribute(name: string, descriptor: string): this {
    const at = { kind: "struct", name: this.name, member: name } as const;
    checkIdentifier(name, at);
    checkUnique(this.attributes.map(a => a.name), name, at);
    this.attributes.push({ name, descriptor });
    return this;
  }

  setDescription(description: string): this {
    this.description = description;
    return this;
  }

  hide(): this {
    this.visibility = "static";
    return this;
  }

  declaration(): StructDeclaration {
    return {
      tag: "Struct",
      name: this.name,
      description: this.description,
      attributes: [...this.attributes],
      visibility: this.visibility,
    };
  }
}

export class EnumBuilder {
  description?: string;
  visibility: Visibility = "global";
  private readonly entries: { name: string; value?: bigint }[] = [];

  constructor(readonly name: string) {}

  /**
   * Append an entry. Without a value it takes the previous entry's value + 1
   * (0 for the first entry).
   */
  addEntry(name: string, value?: number | bigint): this {
    const at = { kind: "enum", name: this.name, member: name } as const;
    checkIdentifier(name, at);
    checkUnique(this.entries.map(e => e.name), name, at);
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new ConfigError("InvalidRange", { detail: `enum value ${value} is not an integer` }, at);
    }
    const entryValue = value === undefined ? undefined : BigInt(value);
    if (entryValue !== undefined && entryValue < 0n) {
      throw new ConfigError("InvalidRange", { detail: `enum value ${entryValue} is negative` }, at);
    }
    this.entries.push({ name, value: entryValue });
    return this;
  }

  setDescription(description: string): this {
    this.description = description;
    return this;
  }

  hide(): this {
    this.visibility = "static";
    return this;
  }

  declaration(): EnumDeclaration {
    return {
      tag: "Enum",
      name: this.name,
      description: this.description,
      entries: [...this.entries],
      visibility: this.visibility,
    };
  }
}

export type TypeBuilder = StructBuilder | EnumBuilder;

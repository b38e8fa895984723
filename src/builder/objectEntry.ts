import type { ObjectEntryAccess } from "../model/node";
import type { Visibility } from "../types/type";
import type { NodeBuilder } from "./node";

export class ObjectEntryBuilder {
  description?: string;
  unit?: string;
  access: ObjectEntryAccess = "read-write";
  visibility: Visibility = "global";

  constructor(
    readonly name: string,
    readonly descriptor: string,
    readonly node: NodeBuilder
  ) {}

  setDescription(description: string): this {
    this.description = description;
    return this;
  }

  setUnit(unit: string): this {
    this.unit = unit;
    return this;
  }

  setAccess(access: ObjectEntryAccess): this {
    this.access = access;
    return this;
  }

  hide(): this {
    this.visibility = "static";
    return this;
  }
}

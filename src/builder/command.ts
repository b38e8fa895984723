import type { Visibility } from "../types/type";
import type { MessageBuilder } from "./message";
import type { NodeBuilder } from "./node";

/**
 * A request/response pair served by `owner`. Other nodes become callers
 * through `addCaller` or `NodeBuilder.addExternCommand`.
 */
export class CommandBuilder {
  description?: string;
  visibility: Visibility = "global";

  constructor(
    readonly name: string,
    readonly owner: NodeBuilder,
    readonly request: MessageBuilder,
    readonly response: MessageBuilder
  ) {}

  addArgument(name: string, descriptor: string): this {
    this.request.makeTypeFormat().addType(descriptor, name);
    return this;
  }

  addReturnValue(name: string, descriptor: string): this {
    this.response.makeTypeFormat().addType(descriptor, name);
    return this;
  }

  addCaller(node: NodeBuilder): this {
    node.addExternCommand(this);
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
}

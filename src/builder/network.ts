import { mergeConfigs, validateConfig, type CompilerConfig } from "../config";
import { createLogger, type Logger } from "../log";
import { ConfigError, IntegrityFault } from "../outcome/errors";
import { compileNetworkBuilder } from "../compiler/pipeline";
import { declareProtocol, type ProtocolMessageBuilders } from "../compiler/prelude";
import type { Network } from "../model/network";
import { BusBuilder } from "./bus";
import { MessageBuilder } from "./message";
import { checkIdentifier, checkTypeName, checkUnique } from "./names";
import { NodeBuilder } from "./node";
import { EnumBuilder, StructBuilder, type TypeBuilder } from "./types";

export interface NetworkBuilderOptions {
  /** Merged over the defaults; pass `loadConfig()` to honor env and config files */
  config?: Partial<CompilerConfig>;
  logger?: Logger;
}

/**
 * Root of the declaration graph. Every message, type, node and bus is created
 * through here; `build()` consumes the whole graph once.
 */
export class NetworkBuilder {
  readonly config: CompilerConfig;
  readonly logger: Logger;
  baudrate?: number;
  private readonly messages: MessageBuilder[] = [];
  private readonly types: TypeBuilder[] = [];
  private readonly nodes: NodeBuilder[] = [];
  private readonly buses: BusBuilder[] = [];
  private readonly protocol: ProtocolMessageBuilders;
  private consumed = false;

  constructor(options: NetworkBuilderOptions = {}) {
    this.config = mergeConfigs(options.config ?? {});
    const validation = validateConfig(this.config);
    if (!validation.valid) {
      throw new ConfigError("InvalidConfig", { detail: validation.errors.join("; ") });
    }
    this.logger = options.logger ?? createLogger(this.config.logLevel);
    for (const warning of validation.warnings) this.logger.warn(warning);
    this.protocol = declareProtocol(this);
  }

  setBaudrate(baudrate: number): this {
    this.baudrate = baudrate;
    return this;
  }

  createBus(name: string, baudrate?: number): BusBuilder {
    checkIdentifier(name, { kind: "bus", name });
    checkUnique(this.buses.map(b => b.name), name, { kind: "bus", name });
    const bus = new BusBuilder(name, this.buses.length, baudrate);
    this.buses.push(bus);
    return bus;
  }

  createMessage(name: string, expectedIntervalMs?: number): MessageBuilder {
    checkIdentifier(name, { kind: "message", name });
    checkUnique(this.messages.map(m => m.name), name, { kind: "message", name });
    const message = new MessageBuilder(name, expectedIntervalMs);
    this.messages.push(message);
    return message;
  }

  defineStruct(name: string): StructBuilder {
    this.checkNewTypeName(name, "struct");
    const struct = new StructBuilder(name);
    this.types.push(struct);
    return struct;
  }

  defineEnum(name: string): EnumBuilder {
    this.checkNewTypeName(name, "enum");
    const enumBuilder = new EnumBuilder(name);
    this.types.push(enumBuilder);
    return enumBuilder;
  }

  /**
   * Returns the existing node when one with this name was already created.
   */
  createNode(name: string): NodeBuilder {
    const existing = this.nodes.find(node => node.name === name);
    if (existing) return existing;
    checkIdentifier(name, { kind: "node", name });
    const node = new NodeBuilder(name, this.nodes.length, this);
    this.nodes.push(node);
    return node;
  }

  protocolMessages(): ProtocolMessageBuilders {
    return this.protocol;
  }

  get messageBuilders(): readonly MessageBuilder[] {
    return this.messages;
  }

  get typeBuilders(): readonly TypeBuilder[] {
    return this.types;
  }

  get nodeBuilders(): readonly NodeBuilder[] {
    return this.nodes;
  }

  get busBuilders(): readonly BusBuilder[] {
    return this.buses;
  }

  /**
   * Mark the graph as consumed. A builder compiles at most once.
   */
  consume(): void {
    if (this.consumed) {
      throw new IntegrityFault("network builder already built", {
        entity: "network",
        expected: "unbuilt",
        found: "built",
      });
    }
    this.consumed = true;
  }

  /**
   * Compile the declarations. Throws `ConfigError` on invalid declarations.
   */
  build(): Network {
    return compileNetworkBuilder(this);
  }

  private checkNewTypeName(name: string, kind: "struct" | "enum"): void {
    checkTypeName(name, { kind, name });
    checkUnique(this.types.map(t => t.name), name, { kind, name });
  }
}

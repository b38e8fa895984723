import { IntegrityFault } from "../outcome/errors";
import type { BusBuilder } from "./bus";
import { CommandBuilder } from "./command";
import type { MessageBuilder } from "./message";
import { checkIdentifier, checkUnique } from "./names";
import type { NetworkBuilder } from "./network";
import { ObjectEntryBuilder } from "./objectEntry";
import { ReceiveStreamBuilder, StreamBuilder } from "./stream";

export class NodeBuilder {
  description?: string;
  private readonly rx: MessageBuilder[] = [];
  private readonly tx: MessageBuilder[] = [];
  private readonly ownCommands: CommandBuilder[] = [];
  private readonly calledCommands: CommandBuilder[] = [];
  private readonly entries: ObjectEntryBuilder[] = [];
  private readonly published: StreamBuilder[] = [];
  private readonly subscribed: ReceiveStreamBuilder[] = [];
  private readonly attachedBuses: BusBuilder[] = [];

  constructor(
    readonly name: string,
    readonly id: number,
    private readonly network: NetworkBuilder
  ) {
    // every node serves its object entries over the get/set protocol
    const protocol = network.protocolMessages();
    this.addRxMessage(protocol.getReq);
    this.addRxMessage(protocol.setReq);
    this.addTxMessage(protocol.getResp);
    this.addTxMessage(protocol.setResp);
  }

  setDescription(description: string): this {
    this.description = description;
    return this;
  }

  addRxMessage(message: MessageBuilder): this {
    if (!this.rx.includes(message)) this.rx.push(message);
    return this;
  }

  addTxMessage(message: MessageBuilder): this {
    if (!this.tx.includes(message)) this.tx.push(message);
    return this;
  }

  addBus(bus: BusBuilder): this {
    if (!this.attachedBuses.includes(bus)) this.attachedBuses.push(bus);
    return this;
  }

  createObjectEntry(name: string, descriptor: string): ObjectEntryBuilder {
    const at = { kind: "node", name: this.name, member: name } as const;
    checkIdentifier(name, at);
    checkUnique(this.entries.map(e => e.name), name, at);
    const entry = new ObjectEntryBuilder(name, descriptor, this);
    this.entries.push(entry);
    return entry;
  }

  /**
   * Declare a command this node serves. The request starts out with no
   * arguments; the response carries an `erno` status field.
   */
  createCommand(name: string, expectedIntervalMs?: number): CommandBuilder {
    checkIdentifier(name, { kind: "command", name });
    checkUnique(this.ownCommands.map(c => c.name), name, { kind: "command", name });

    const request = this.network.createMessage(`${this.name}_${name}_command_req`, expectedIntervalMs);
    request.makeTypeFormat();
    const response = this.network.createMessage(`${this.name}_${name}_command_resp`, expectedIntervalMs);
    response.makeTypeFormat().addType("command_resp_erno", "erno");

    this.addRxMessage(request);
    this.addTxMessage(response);

    const command = new CommandBuilder(name, this, request, response);
    this.ownCommands.push(command);
    return command;
  }

  /**
   * Call a command served by another node.
   */
  addExternCommand(command: CommandBuilder): this {
    if (command.owner === this) {
      throw new IntegrityFault("node cannot call its own command", {
        entity: `command ${command.name}`,
        expected: "a node other than the owner",
        found: this.name,
      });
    }
    if (!this.calledCommands.includes(command)) {
      this.calledCommands.push(command);
      this.addTxMessage(command.request);
      this.addRxMessage(command.response);
    }
    return this;
  }

  createStream(name: string): StreamBuilder {
    checkIdentifier(name, { kind: "stream", name });
    checkUnique(this.published.map(s => s.name), name, { kind: "stream", name });

    const message = this.network.createMessage(`${this.name}_stream_${name}`);
    message.makeTypeFormat();
    this.addTxMessage(message);

    const stream = new StreamBuilder(name, this, message);
    this.published.push(stream);
    return stream;
  }

  receiveStream(stream: StreamBuilder): ReceiveStreamBuilder {
    if (stream.txNode === this) {
      throw new IntegrityFault("node cannot subscribe to its own stream", {
        entity: `stream ${stream.name}`,
        expected: "a node other than the publisher",
        found: this.name,
      });
    }
    const subscription = new ReceiveStreamBuilder(stream, this);
    this.subscribed.push(subscription);
    this.addRxMessage(stream.message);
    return subscription;
  }

  get rxMessages(): readonly MessageBuilder[] {
    return this.rx;
  }

  get txMessages(): readonly MessageBuilder[] {
    return this.tx;
  }

  get commands(): readonly CommandBuilder[] {
    return this.ownCommands;
  }

  get externCommands(): readonly CommandBuilder[] {
    return this.calledCommands;
  }

  get objectEntries(): readonly ObjectEntryBuilder[] {
    return this.entries;
  }

  get txStreams(): readonly StreamBuilder[] {
    return this.published;
  }

  get rxStreams(): readonly ReceiveStreamBuilder[] {
    return this.subscribed;
  }

  get buses(): readonly BusBuilder[] {
    return this.attachedBuses;
  }
}

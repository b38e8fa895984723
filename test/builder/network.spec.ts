import { describe, it, expect } from "vitest";
import { NetworkBuilder } from "../../src/builder/network";
import { EnumBuilder } from "../../src/builder/types";
import { MessageBuilder } from "../../src/builder/message";
import { configErrorOf, integrityFaultOf } from "../helpers/errors";

const quiet = () => new NetworkBuilder({ config: { logLevel: "silent" } });

describe("NetworkBuilder", () => {
  it("declares the protocol up front", () => {
    const net = quiet();
    expect(net.messageBuilders.map(m => m.name)).toEqual(["get_req", "get_resp", "set_req", "set_resp"]);
    expect(net.messageBuilders.every(m => m.builtin)).toBe(true);
    expect(net.typeBuilders.map(t => t.name)).toEqual([
      "get_resp_erno",
      "set_resp_erno",
      "get_req_header",
      "get_resp_header",
      "set_req_header",
      "set_resp_header",
      "command_resp_erno",
    ]);
  });

  it("rejects names already taken", () => {
    const net = quiet();
    expect(configErrorOf(() => net.createMessage("get_req")).kind).toBe("DuplicateName");
    expect(configErrorOf(() => net.defineStruct("get_req_header")).kind).toBe("DuplicateName");
    net.createBus("can0");
    expect(configErrorOf(() => net.createBus("can0")).kind).toBe("DuplicateName");
  });

  it("rejects type names that look like built-in types", () => {
    const error = configErrorOf(() => quiet().defineStruct("u8"));
    expect(error.kind).toBe("InvalidType");
    expect(error.diagnostic.at).toEqual({ kind: "struct", name: "u8" });
  });

  it("rejects names that are not identifiers", () => {
    expect(configErrorOf(() => quiet().createMessage("bad name")).message).toBe("Invalid type descriptor: bad name");
    expect(configErrorOf(() => quiet().createNode("1st")).kind).toBe("InvalidType");
  });

  it("numbers buses in declaration order", () => {
    const net = quiet();
    expect(net.createBus("body").id).toBe(0);
    expect(net.createBus("chassis", 250_000).id).toBe(1);
    expect(net.busBuilders.map(b => b.baudrate)).toEqual([undefined, 250_000]);
  });

  it("rejects an invalid configuration on construction", () => {
    const error = configErrorOf(
      () => new NetworkBuilder({ config: { logLevel: "silent", minEnumBits: 5, defaultIntervalMs: -10 } })
    );
    expect(error.kind).toBe("InvalidConfig");
    expect(error.code).toBe("E0400");
    expect(error.message).toBe(
      "Invalid compiler configuration: defaultIntervalMs must be positive; minEnumBits must be 0 or 1"
    );
  });

  it("logs configuration warnings", () => {
    const warnings: string[] = [];
    const logger = { debug: () => {}, info: () => {}, error: () => {}, warn: (message: string) => warnings.push(message) };
    new NetworkBuilder({ config: { defaultBaudrate: 2_000_000 }, logger });
    expect(warnings).toEqual(["defaultBaudrate is above 1 Mbit/s, which classic CAN does not support"]);
  });

  it("rejects explicit signal types outside the signal limits at build", () => {
    const net = quiet();
    net
      .createMessage("m")
      .makeSignalFormat()
      .addSignal("a", { tag: "UnsignedInt", bits: 8 })
      .addSignal("b", { tag: "UnsignedInt", bits: -4 })
      .addSignal("c", { tag: "UnsignedInt", bits: 200 });
    const error = configErrorOf(() => net.build());
    expect(error.kind).toBe("InvalidRange");
    expect(error.message).toBe("Invalid range: signal width -4 outside 1..64");
    expect(error.diagnostic.at).toEqual({ kind: "message", name: "m", member: "b" });
  });
});

describe("NodeBuilder", () => {
  it("rejects duplicate object entries", () => {
    const ecu = quiet().createNode("ecu");
    ecu.createObjectEntry("speed", "u16");
    const error = configErrorOf(() => ecu.createObjectEntry("speed", "u8"));
    expect(error.kind).toBe("DuplicateName");
    expect(error.diagnostic.at).toEqual({ kind: "node", name: "ecu", member: "speed" });
  });

  it("refuses to call its own command", () => {
    const ecu = quiet().createNode("ecu");
    const command = ecu.createCommand("reset");
    const fault = integrityFaultOf(() => ecu.addExternCommand(command));
    expect(fault.context).toEqual({
      entity: "command reset",
      expected: "a node other than the owner",
      found: "ecu",
    });
  });

  it("adds an extern command once", () => {
    const net = quiet();
    const command = net.createNode("server").createCommand("reset");
    const client = net.createNode("client");
    client.addExternCommand(command).addExternCommand(command);
    expect(client.externCommands).toHaveLength(1);
    expect(client.txMessages.filter(m => m === command.request)).toHaveLength(1);
  });

  it("refuses to subscribe to its own stream", () => {
    const ecu = quiet().createNode("ecu");
    const stream = ecu.createStream("state");
    expect(() => ecu.receiveStream(stream)).toThrow(/own stream/);
  });

  it("keeps stream entries on the publishing node", () => {
    const net = quiet();
    const sensor = net.createNode("sensor");
    const other = net.createNode("other");
    const stream = sensor.createStream("state");
    const foreign = other.createObjectEntry("x", "u8");
    const fault = integrityFaultOf(() => stream.addEntry(foreign));
    expect(fault.context).toEqual({ entity: "stream state", expected: "sensor", found: "other" });
  });

  it("rejects an entry added to a stream twice", () => {
    const sensor = quiet().createNode("sensor");
    const entry = sensor.createObjectEntry("x", "u8");
    const stream = sensor.createStream("state").addEntry(entry);
    expect(configErrorOf(() => stream.addEntry(entry)).kind).toBe("DuplicateName");
  });

  it("maps only its own entries into a received stream", () => {
    const net = quiet();
    const sensor = net.createNode("sensor");
    const display = net.createNode("display");
    const stream = sensor.createStream("state").addEntry(sensor.createObjectEntry("x", "u8"));
    const subscription = display.receiveStream(stream);
    expect(() => subscription.map(0, sensor.objectEntries[0])).toThrow(/another node/);
  });
});

describe("MessageBuilder", () => {
  it("checks explicit ids against the frame format", () => {
    const error = configErrorOf(() => new MessageBuilder("m").setStdId(0x800));
    expect(error.message).toBe("Message id 2048 out of range for standard frames");
    expect(new MessageBuilder("m").setExtId(0x1fffffff).idTemplate).toEqual({ tag: "Ext", id: 0x1fffffff });
    expect(configErrorOf(() => new MessageBuilder("m").setExtId(0x20000000)).kind).toBe("IdOutOfRange");
  });

  it("defaults to any id", () => {
    expect(new MessageBuilder("m").idTemplate).toEqual({ tag: "AnyAny" });
    expect(new MessageBuilder("m").setAnyExtId(2).idTemplate).toEqual({ tag: "AnyExt", priority: 2 });
  });

  it("reuses an existing format", () => {
    const message = new MessageBuilder("m");
    expect(message.makeTypeFormat()).toBe(message.makeTypeFormat());
    expect(message.makeSignalFormat()).toBe(message.makeSignalFormat());
    expect(message.format.tag).toBe("Signals");
  });

  it("rejects duplicate field names", () => {
    const format = new MessageBuilder("m").makeSignalFormat().addSignal("a", "u8");
    const error = configErrorOf(() => format.addSignal("a", "u4"));
    expect(error.diagnostic.at).toEqual({ kind: "message", name: "m", member: "a" });
  });
});

describe("EnumBuilder", () => {
  it("rejects fractional and negative values", () => {
    expect(configErrorOf(() => new EnumBuilder("e").addEntry("A", 1.5)).message).toBe(
      "Invalid range: enum value 1.5 is not an integer"
    );
    expect(configErrorOf(() => new EnumBuilder("e").addEntry("A", -1)).message).toBe(
      "Invalid range: enum value -1 is negative"
    );
  });

  it("accepts bigint values", () => {
    const decl = new EnumBuilder("e").addEntry("Big", 1n << 40n).declaration();
    expect(decl.entries).toEqual([{ name: "Big", value: 1n << 40n }]);
  });
});

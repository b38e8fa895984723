import { describe, it, expect } from "vitest";
import { BusBuilder } from "../../src/builder/bus";
import { MessageBuilder } from "../../src/builder/message";
import { resolveIdsAndBuses } from "../../src/compiler/resolution";
import { configErrorOf, integrityFaultOf } from "../helpers/errors";

describe("resolveIdsAndBuses", () => {
  it("puts every message on the only bus", () => {
    const bus = new BusBuilder("can0", 0);
    const messages = [new MessageBuilder("a"), new MessageBuilder("b")];
    resolveIdsAndBuses([bus], messages);
    expect(messages.every(m => m.bus === bus)).toBe(true);
  });

  it("claims explicit ids before filling placeholders", () => {
    const bus = new BusBuilder("can0", 0);
    const a = new MessageBuilder("a");
    const b = new MessageBuilder("b").setStdId(0);
    const c = new MessageBuilder("c").setAnyStdId();
    resolveIdsAndBuses([bus], [a, b, c]);
    expect(b.idTemplate).toEqual({ tag: "Std", id: 0 });
    expect(a.idTemplate).toEqual({ tag: "Std", id: 1 });
    expect(c.idTemplate).toEqual({ tag: "Std", id: 2 });
  });

  it("gives lower priority values lower ids", () => {
    const bus = new BusBuilder("can0", 0);
    const late = new MessageBuilder("late").setAnyStdId(5);
    const plain = new MessageBuilder("plain").setAnyStdId();
    const urgent = new MessageBuilder("urgent").setAnyStdId(0);
    resolveIdsAndBuses([bus], [late, plain, urgent]);
    expect(urgent.idTemplate).toEqual({ tag: "Std", id: 0 });
    expect(late.idTemplate).toEqual({ tag: "Std", id: 1 });
    expect(plain.idTemplate).toEqual({ tag: "Std", id: 2 });
  });

  it("fills extended placeholders from the extended space", () => {
    const bus = new BusBuilder("can0", 0);
    const std = new MessageBuilder("std").setStdId(0);
    const ext = new MessageBuilder("ext").setAnyExtId();
    resolveIdsAndBuses([bus], [std, ext]);
    expect(ext.idTemplate).toEqual({ tag: "Ext", id: 0 });
  });

  it("tracks ids per bus", () => {
    const can0 = new BusBuilder("can0", 0);
    const can1 = new BusBuilder("can1", 1);
    const a = new MessageBuilder("a").setStdId(7).assignBus(can0);
    const b = new MessageBuilder("b").setStdId(7).assignBus(can1);
    const c = new MessageBuilder("c").assignBus(can1);
    resolveIdsAndBuses([can0, can1], [a, b, c]);
    expect(c.idTemplate).toEqual({ tag: "Std", id: 0 });
  });

  it("rejects duplicate ids on one bus", () => {
    const bus = new BusBuilder("can0", 0);
    const error = configErrorOf(() =>
      resolveIdsAndBuses([bus], [new MessageBuilder("a").setStdId(5), new MessageBuilder("b").setStdId(5)])
    );
    expect(error.kind).toBe("DuplicateMessageId");
    expect(error.message).toBe("Duplicate message id 0x5 on bus can0");
    expect(error.diagnostic.at).toEqual({ kind: "message", name: "b" });
  });

  it("allows the same number as standard and extended id", () => {
    const bus = new BusBuilder("can0", 0);
    const std = new MessageBuilder("std").setStdId(5);
    const ext = new MessageBuilder("ext").setExtId(5);
    resolveIdsAndBuses([bus], [std, ext]);
    expect(ext.idTemplate).toEqual({ tag: "Ext", id: 5 });
  });

  it("rejects explicit ids outside the frame format", () => {
    const bus = new BusBuilder("can0", 0);
    const message = new MessageBuilder("wide");
    message.idTemplate = { tag: "Std", id: 0x800 };
    const error = configErrorOf(() => resolveIdsAndBuses([bus], [message]));
    expect(error.kind).toBe("IdOutOfRange");
    expect(error.message).toBe("Message id 2048 out of range for standard frames");
  });

  it("requires an explicit bus when several exist", () => {
    const buses = [new BusBuilder("can0", 0), new BusBuilder("can1", 1)];
    const error = configErrorOf(() => resolveIdsAndBuses(buses, [new MessageBuilder("loose")]));
    expect(error.kind).toBe("AmbiguousBus");
    expect(error.message).toBe("Message loose needs an explicit bus: 2 buses declared");
  });

  it("sends built-in messages to the first bus", () => {
    const buses = [new BusBuilder("can0", 0), new BusBuilder("can1", 1)];
    const builtin = new MessageBuilder("get_req").markBuiltin();
    resolveIdsAndBuses(buses, [builtin]);
    expect(builtin.bus).toBe(buses[0]);
  });

  describe("a full standard space", () => {
    const fill = (): MessageBuilder[] =>
      Array.from({ length: 0x800 }, (_, id) => new MessageBuilder(`m${id}`).setStdId(id));

    it("fails standard placeholders", () => {
      const bus = new BusBuilder("can0", 0);
      const error = configErrorOf(() => resolveIdsAndBuses([bus], [...fill(), new MessageBuilder("x").setAnyStdId()]));
      expect(error.kind).toBe("IdSpaceExhausted");
      expect(error.message).toBe("No free standard id left on bus can0");
    });

    it("moves AnyAny placeholders to extended ids", () => {
      const bus = new BusBuilder("can0", 0);
      const overflow = new MessageBuilder("x").setAnyId();
      resolveIdsAndBuses([bus], [...fill(), overflow]);
      expect(overflow.idTemplate).toEqual({ tag: "Ext", id: 0 });
    });
  });

  it("refuses buses from outside the network", () => {
    const stray = new BusBuilder("stray", 3);
    const fault = integrityFaultOf(() =>
      resolveIdsAndBuses([new BusBuilder("can0", 0)], [new MessageBuilder("a").assignBus(stray)])
    );
    expect(fault.context).toEqual({ entity: "message a", found: "stray" });
  });

  it("needs at least one bus", () => {
    expect(() => resolveIdsAndBuses([], [new MessageBuilder("a")])).toThrow(/at least one bus/);
  });
});

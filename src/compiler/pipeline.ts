// src/compiler/pipeline.ts
// Network compilation: declarations in, immutable network out

import type { BusBuilder } from "../builder/bus";
import type { MessageBuilder } from "../builder/message";
import type { NetworkBuilder } from "../builder/network";
import type { Bus } from "../model/bus";
import type { Message } from "../model/message";
import type { Network } from "../model/network";
import { makeDiagnostic } from "../outcome/codes";
import type { Diagnostic } from "../outcome/diagnostic";
import { ConfigError, IntegrityFault } from "../outcome/errors";
import { failure } from "../outcome/failure";
import { done, fail, type Outcome } from "../outcome/outcome";
import { elaborateTypes } from "../types/elaborate";
import { orderTypeDeclarations } from "../types/order";
import { linkNodes } from "./link";
import { compileMessage } from "./messages";
import { resolveIdsAndBuses } from "./resolution";

/** Payload bytes of a classic CAN frame */
export const CLASSIC_CAN_MAX_DLC = 8;

/**
 * Record of a compiler phase.
 */
export type PassRecord = {
  name: string;
  timestamp: number;
  metrics?: Record<string, number>;
};

export type CompilationResult = {
  network: Network;
  passes: PassRecord[];
  warnings: Diagnostic[];
};

function lookupMessage(messages: ReadonlyMap<MessageBuilder, Message>, builder: MessageBuilder): Message {
  const message = messages.get(builder);
  if (!message) {
    throw new IntegrityFault("protocol message was not compiled", { entity: `message ${builder.name}` });
  }
  return message;
}

/**
 * Run every phase over the builder's declarations. Consumes the builder.
 */
export function runPipeline(builder: NetworkBuilder): CompilationResult {
  const { config, logger } = builder;
  const passes: PassRecord[] = [];
  const warnings: Diagnostic[] = [];

  const record = (name: string, metrics: Record<string, number>): void => {
    const pass = { name, timestamp: Date.now(), metrics };
    passes.push(pass);
    logger.debug(`pass ${name}`, metrics);
  };

  builder.consume();

  const baudrate = builder.baudrate ?? config.defaultBaudrate;

  // ─────────────────────────────────────────────────────────────
  // Phase 1: Buses
  // ─────────────────────────────────────────────────────────────

  if (builder.busBuilders.length === 0) {
    builder.createBus(config.defaultBusName);
  }
  const buses = new Map<BusBuilder, Bus>(
    builder.busBuilders.map(bus => [bus, { id: bus.id, name: bus.name, baudrate: bus.baudrate ?? baudrate }])
  );
  record("buses", { buses: buses.size });

  // ─────────────────────────────────────────────────────────────
  // Phase 2: Types
  // ─────────────────────────────────────────────────────────────

  const ordered = orderTypeDeclarations(builder.typeBuilders.map(type => type.declaration()));
  const types = elaborateTypes(ordered, { minEnumBits: config.minEnumBits });
  record("types", { types: types.length });

  // ─────────────────────────────────────────────────────────────
  // Phase 3: Identifiers
  // ─────────────────────────────────────────────────────────────

  resolveIdsAndBuses(builder.busBuilders, builder.messageBuilders);
  record("resolve", { messages: builder.messageBuilders.length });

  // ─────────────────────────────────────────────────────────────
  // Phase 4: Messages
  // ─────────────────────────────────────────────────────────────

  const messages = new Map<MessageBuilder, Message>();
  let signalCount = 0;
  for (const messageBuilder of builder.messageBuilders) {
    const message = compileMessage(messageBuilder, buses, types);
    messages.set(messageBuilder, message);
    signalCount += message.signals.length;
    if (message.dlc > CLASSIC_CAN_MAX_DLC) {
      const warning = makeDiagnostic("W0001", { name: message.name, dlc: message.dlc }, {
        kind: "message",
        name: message.name,
      });
      warnings.push(warning);
      logger.warn(warning.message, { code: warning.code });
    }
  }
  record("messages", { messages: messages.size, signals: signalCount });

  const protocol = builder.protocolMessages();
  const getReqMessage = lookupMessage(messages, protocol.getReq);
  const getRespMessage = lookupMessage(messages, protocol.getResp);
  const setReqMessage = lookupMessage(messages, protocol.setReq);
  const setRespMessage = lookupMessage(messages, protocol.setResp);
  getReqMessage.assignUsage({ tag: "ProtocolGetReq" });
  getRespMessage.assignUsage({ tag: "ProtocolGetResp" });
  setReqMessage.assignUsage({ tag: "ProtocolSetReq" });
  setRespMessage.assignUsage({ tag: "ProtocolSetResp" });

  // ─────────────────────────────────────────────────────────────
  // Phase 5: Nodes
  // ─────────────────────────────────────────────────────────────

  const nodes = linkNodes({ messages, buses, types }, builder.nodeBuilders);
  record("link", { nodes: nodes.length });

  // Anything not claimed by the protocol, a command or a stream is sent freely
  for (const [messageBuilder, message] of messages) {
    if (!message.hasUsage()) {
      message.assignUsage({
        tag: "External",
        intervalMs: messageBuilder.expectedIntervalMs ?? config.defaultIntervalMs,
      });
    }
  }

  const network: Network = {
    baudrate,
    buildTime: new Date(),
    nodes,
    messages: [...messages.values()],
    types,
    getReqMessage,
    getRespMessage,
    setReqMessage,
    setRespMessage,
    buses: [...buses.values()],
  };

  logger.info("network compiled", {
    nodes: nodes.length,
    messages: network.messages.length,
    types: types.length,
    buses: network.buses.length,
  });

  return { network, passes, warnings };
}

/**
 * Compile and return the network. Throws `ConfigError` on invalid
 * declarations and `IntegrityFault` on builder misuse.
 */
export function compileNetworkBuilder(builder: NetworkBuilder): Network {
  return runPipeline(builder).network;
}

/**
 * Compile into an `Outcome`. Invalid declarations become a `Fail`;
 * integrity faults still throw.
 */
export function compileNetwork(builder: NetworkBuilder): Outcome<Network> {
  const startTime = Date.now();
  try {
    const { network, warnings } = runPipeline(builder);
    return done(network, { durationMs: Date.now() - startTime, warnings: warnings.length });
  } catch (error) {
    if (error instanceof ConfigError) {
      return fail(
        failure("validation-failed", error.message, {
          diagnostics: [error.diagnostic],
          context: { kind: error.kind },
        }),
        { durationMs: Date.now() - startTime }
      );
    }
    throw error;
  }
}

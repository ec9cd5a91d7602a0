import { decodePacket, MAX_DATAGRAM_SIZE, validatePacket } from "@padlink/protocol";
import { Clock } from "./clock";
import { Logger } from "./logger";
import { ReplayGuard } from "./replayGuard";
import { SecurityRegistry } from "./securityRegistry";
import { SessionManager } from "./sessionManager";
import { describeError, GamepadSink } from "./sink";
import { TelemetryAggregator } from "./telemetry";
import { PacketOutcome, PipelineCounters, RejectReason } from "./types";

export interface PipelineDeps {
  registry: SecurityRegistry;
  replayGuard: ReplayGuard;
  sessions: SessionManager;
  telemetry: TelemetryAggregator;
  sink: GamepadSink;
  clock: Clock;
  logger: Logger;
}

const DECODE_REASONS = {
  TooShort: "too_short",
  BadVersion: "bad_version",
  SizeExceeded: "oversized",
} as const;

/**
 * Receive path for one datagram, run to completion before the next one is read.
 *
 * Stage order: size, address screen, decode, field validation, client admission
 * (block, connection cap, rate limits), replay guard, accept, slot routing, sink write,
 * telemetry. Every rejection is an outcome; nothing here throws.
 */
export class PacketPipeline {
  private readonly counters: PipelineCounters = {
    received: 0,
    forwarded: 0,
    standby: 0,
    rejected: 0,
    sinkFailed: 0,
    rejectedByReason: {},
  };

  public constructor(private readonly deps: PipelineDeps) {
    deps.sessions.onSessionEvent((event) => {
      deps.registry.assignSlot(event.clientId, event.kind === "player_join" ? event.slot : null);
      deps.telemetry.reset(event.slot, event.at);
      deps.logger.info(
        event.kind === "player_join"
          ? `Client ${event.clientId} took slot ${event.slot}`
          : `Client ${event.clientId} released slot ${event.slot}`,
      );
    });
  }

  public process(datagram: Uint8Array, address: string): PacketOutcome {
    this.counters.received += 1;
    const { registry, replayGuard, sessions, telemetry, sink, clock, logger } = this.deps;

    if (datagram.length > MAX_DATAGRAM_SIZE) {
      registry.recordOversized(address, datagram.length);
      return this.reject("oversized", null);
    }

    const screened = registry.screenAddress(address);
    if (screened) {
      return this.reject(screened, null);
    }

    const decoded = decodePacket(datagram);
    if (!decoded.ok) {
      logger.debug(`Dropped datagram from ${address}: ${decoded.error.message}`);
      return this.reject(DECODE_REASONS[decoded.error.code], null);
    }

    const packet = decoded.packet;
    const invalid = validatePacket(packet);
    if (invalid) {
      logger.debug(`Dropped malformed packet from ${address}: ${invalid.message}`);
      return this.reject("malformed", packet.clientId);
    }

    const admission = registry.admit(packet.clientId, address);
    if (!admission.ok) {
      return this.reject(admission.reason, packet.clientId);
    }

    const replay = replayGuard.check(packet, admission.ticket.lastSequence, clock.now());
    if (replay) {
      registry.rejectAdmitted(admission.ticket, replay);
      return this.reject(replay, packet.clientId);
    }

    registry.accept(admission.ticket, packet);

    const now = clock.now();
    const route = sessions.route(packet.clientId, now);
    if (route.kind === "standby") {
      this.counters.standby += 1;
      return { status: "standby", clientId: packet.clientId, reason: route.reason };
    }

    try {
      sink.write(route.slot, packet.state);
    } catch (error) {
      const message = describeError(error);
      this.counters.sinkFailed += 1;
      logger.error(`Sink write failed for slot ${route.slot} (client ${packet.clientId}): ${message}`);
      return { status: "sink_failed", clientId: packet.clientId, slot: route.slot, error: message };
    }

    telemetry.record(route.slot, packet.clientId, packet.sequence, now);
    this.counters.forwarded += 1;
    return { status: "forwarded", clientId: packet.clientId, slot: route.slot, state: packet.state };
  }

  public getCounters(): PipelineCounters {
    return {
      ...this.counters,
      rejectedByReason: { ...this.counters.rejectedByReason },
    };
  }

  private reject(reason: RejectReason, clientId: number | null): PacketOutcome {
    this.counters.rejected += 1;
    this.counters.rejectedByReason[reason] = (this.counters.rejectedByReason[reason] ?? 0) + 1;
    return { status: "rejected", reason, clientId };
  }
}

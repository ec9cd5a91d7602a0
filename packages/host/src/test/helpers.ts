import { createGamepadState, encodePacket, GamepadState, toNanoseconds } from "@padlink/protocol";
import { Clock } from "../clock";
import { createHostConfig, slotCountFor } from "../config";
import { SinkError } from "../errors";
import { Logger } from "../logger";
import { PacketPipeline } from "../pipeline";
import { ReplayGuard } from "../replayGuard";
import { SecurityRegistry } from "../securityRegistry";
import { SessionManager } from "../sessionManager";
import { GamepadSink } from "../sink";
import { TelemetryAggregator } from "../telemetry";
import { HostConfig } from "../types";

export const START_MS = 1_700_000_000_000;

export class ManualClock implements Clock {
  public constructor(private current = 0) {}

  public now(): number {
    return this.current;
  }

  public advance(ms: number): void {
    this.current += ms;
  }

  public set(ms: number): void {
    this.current = ms;
  }
}

export interface RecordedWrite {
  slot: number;
  state: GamepadState;
}

export class RecordingSink implements GamepadSink {
  public readonly writes: RecordedWrite[] = [];
  public initCalls = 0;
  public closeCalls = 0;
  public initFailures = 0;
  public failWrites = false;

  public async init(): Promise<void> {
    this.initCalls += 1;
    if (this.initFailures > 0) {
      this.initFailures -= 1;
      throw new Error("driver not ready");
    }
  }

  public write(slot: number, state: GamepadState): void {
    if (this.failWrites) {
      throw new SinkError("WRITE_FAILED", "device unplugged");
    }
    this.writes.push({ slot, state });
  }

  public async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

/**
 * Encodes a packet stamped with the clock's current time plus `skewMs`.
 */
export function buildPacket(
  clock: ManualClock,
  clientId: number,
  sequence: number,
  state: Partial<GamepadState> = {},
  skewMs = 0,
): Buffer {
  return encodePacket(createGamepadState(state), clientId, sequence, toNanoseconds(clock.now() + skewMs));
}

export interface PipelineHarness {
  config: HostConfig;
  clock: ManualClock;
  sink: RecordingSink;
  registry: SecurityRegistry;
  sessions: SessionManager;
  telemetry: TelemetryAggregator;
  pipeline: PacketPipeline;
}

export function createHarness(overrides: Partial<HostConfig> = {}): PipelineHarness {
  const config = createHostConfig(overrides);
  const clock = new ManualClock(START_MS);
  const logger = new Logger(false);
  const sink = new RecordingSink();
  const registry = new SecurityRegistry(config, clock, logger);
  const sessions = new SessionManager(slotCountFor(config), config.ownershipTimeoutMs);
  const telemetry = new TelemetryAggregator(slotCountFor(config), clock.now());
  const pipeline = new PacketPipeline({
    registry,
    replayGuard: new ReplayGuard(config),
    sessions,
    telemetry,
    sink,
    clock,
    logger,
  });

  return { config, clock, sink, registry, sessions, telemetry, pipeline };
}

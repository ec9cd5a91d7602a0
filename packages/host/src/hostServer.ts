import { createSocket, RemoteInfo, Socket } from "dgram";
import { EventEmitter } from "events";
import { AddressInfo, isIP } from "net";
import { Clock, systemClock } from "./clock";
import { slotCountFor } from "./config";
import { HostError } from "./errors";
import { Logger } from "./logger";
import { PacketPipeline } from "./pipeline";
import { ReplayGuard } from "./replayGuard";
import { SecurityRegistry } from "./securityRegistry";
import { SessionEventListener, SessionManager } from "./sessionManager";
import { describeError, GamepadSink, initSinkWithRetry, SinkRetryOptions, Sleep } from "./sink";
import { TelemetryAggregator } from "./telemetry";
import { HostConfig, HostStatus, PacketOutcome, SweepResult, TelemetrySample } from "./types";

export interface HostServerOptions {
  sinkRetry?: SinkRetryOptions;
  sleep?: Sleep;
}

export type TelemetryListener = (samples: TelemetrySample[], at: number) => void;

/**
 * UDP receive loop of the host.
 *
 * Datagrams are handled one `message` event at a time, each running the pipeline to
 * completion, so per-client order is arrival order. A telemetry timer expires idle
 * slot bindings and samples arrival statistics; a sweep timer prunes the registry.
 */
export class HostServer {
  public readonly registry: SecurityRegistry;
  public readonly sessions: SessionManager;

  private readonly telemetry: TelemetryAggregator;
  private readonly pipeline: PacketPipeline;
  private readonly emitter = new EventEmitter();
  private socket: Socket | null = null;
  private telemetryTimer: NodeJS.Timeout | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private startedAt: string | null = null;

  public constructor(
    private readonly config: HostConfig,
    private readonly sink: GamepadSink,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
    private readonly options: HostServerOptions = {},
  ) {
    const slotCount = slotCountFor(config);
    this.registry = new SecurityRegistry(config, clock, logger.child("security"));
    this.sessions = new SessionManager(slotCount, config.ownershipTimeoutMs);
    this.telemetry = new TelemetryAggregator(slotCount, clock.now());
    this.pipeline = new PacketPipeline({
      registry: this.registry,
      replayGuard: new ReplayGuard(config),
      sessions: this.sessions,
      telemetry: this.telemetry,
      sink,
      clock,
      logger: logger.child("pipeline"),
    });
  }

  public get listening(): boolean {
    return this.socket !== null;
  }

  /**
   * Initializes the sink, then binds the socket. Rejects with `SinkError` or
   * `HostError("BIND_FAILED")`; either leaves the server stopped.
   */
  public async start(): Promise<void> {
    if (this.socket) {
      return;
    }

    await initSinkWithRetry(this.sink, this.logger, this.options.sinkRetry, this.options.sleep);

    const socket = createSocket(isIP(this.config.bindHost) === 6 ? "udp6" : "udp4");

    try {
      await new Promise<void>((resolvePromise, rejectPromise) => {
        socket.once("error", rejectPromise);
        socket.bind(this.config.port, this.config.bindHost, () => {
          socket.off("error", rejectPromise);
          resolvePromise();
        });
      });
    } catch (error) {
      socket.close();
      await this.sink.close();
      throw new HostError(
        "BIND_FAILED",
        `Could not bind UDP ${this.config.bindHost}:${this.config.port}: ${describeError(error)}`,
      );
    }

    socket.on("message", (datagram: Buffer, remote: RemoteInfo) => {
      this.handleDatagram(datagram, remote);
    });
    socket.on("error", (error) => {
      this.logger.error(`UDP socket error: ${describeError(error)}`);
    });

    this.socket = socket;
    this.startedAt = new Date(this.clock.now()).toISOString();

    this.telemetryTimer = setInterval(() => {
      this.collectTelemetry();
    }, this.config.telemetryIntervalMs);

    this.sweepTimer = setInterval(() => {
      this.runSweep();
    }, this.config.sweepIntervalMs);

    const bound = socket.address();
    const mode = this.config.coopEnabled ? `coop, ${this.config.maxSlots} slots` : "single-owner";
    this.logger.info(`Host listening on udp://${bound.address}:${bound.port} (${mode})`);
  }

  public async stop(): Promise<void> {
    if (this.telemetryTimer) {
      clearInterval(this.telemetryTimer);
      this.telemetryTimer = null;
    }

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;

    await new Promise<void>((resolvePromise) => {
      socket.close(() => resolvePromise());
    });

    try {
      await this.sink.close();
    } catch (error) {
      this.logger.error(`Gamepad sink close failed: ${describeError(error)}`);
    }

    this.logger.info("Host stopped.");
  }

  public address(): AddressInfo | null {
    return this.socket ? this.socket.address() : null;
  }

  /**
   * Runs one datagram through the pipeline. Exposed so callers with their own transport
   * can feed the host directly.
   */
  public handleDatagram(datagram: Uint8Array, remote: Pick<RemoteInfo, "address">): PacketOutcome {
    const address = normalizeRemoteHost(remote.address);
    const outcome = this.pipeline.process(datagram, address);

    if (outcome.status === "rejected" && this.logger.isVerbose) {
      this.logger.debug(`Rejected datagram from ${address}: ${outcome.reason}`);
    }

    return outcome;
  }

  /**
   * One telemetry tick: expire idle slot bindings, then sample and publish statistics.
   */
  public collectTelemetry(): TelemetrySample[] {
    const now = this.clock.now();
    this.sessions.expire(now);
    const samples = this.telemetry.sample(now);

    if (this.logger.isVerbose) {
      const active = samples.filter((sample) => sample.clientId !== null);
      for (const sample of active) {
        this.logger.debug(
          `slot ${sample.slot} client=${sample.clientId} rate=${sample.packetsPerSecond.toFixed(1)}/s interval=${sample.meanIntervalMs.toFixed(2)}ms jitter=${sample.jitterMs.toFixed(2)}ms`,
        );
      }
    }

    this.emitter.emit("telemetry", samples, now);
    return samples;
  }

  public runSweep(): SweepResult {
    const result = this.registry.sweep();
    if (result.evictedClients > 0 || result.evictedAddresses > 0 || result.expiredManualBlocks > 0) {
      this.logger.info(
        `Sweep evicted ${result.evictedClients} clients, ${result.evictedAddresses} addresses; ${result.expiredManualBlocks} manual blocks expired`,
      );
    }
    return result;
  }

  public onTelemetry(listener: TelemetryListener): () => void {
    this.emitter.on("telemetry", listener);
    return () => {
      this.emitter.off("telemetry", listener);
    };
  }

  public onSessionEvent(listener: SessionEventListener): () => void {
    return this.sessions.onSessionEvent(listener);
  }

  public status(): HostStatus {
    const bound = this.address();
    return {
      listening: this.listening,
      bindHost: this.config.bindHost,
      port: bound ? bound.port : this.config.port,
      startedAt: this.startedAt,
      mode: this.config.coopEnabled ? "coop" : "single-owner",
      slots: this.sessions.snapshot(),
      counters: this.pipeline.getCounters(),
      security: this.registry.stats(),
      telemetry: this.telemetry.latest(),
    };
  }
}

export function normalizeRemoteHost(address: string | undefined): string {
  if (!address) {
    return "127.0.0.1";
  }

  if (address.startsWith("::ffff:")) {
    return address.slice(7);
  }

  return address;
}

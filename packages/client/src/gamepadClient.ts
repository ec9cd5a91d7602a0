import { createSocket, Socket } from "dgram";
import { isIP } from "net";
import { encodePacket, neutralState, toNanoseconds } from "@padlink/protocol";
import { InputSource } from "./inputSource";
import { Logger } from "./logger";
import { ClientConfig, ClientStats } from "./types";

const SEND_ERROR_LOG_THROTTLE_MS = 5_000;
const INTERVAL_WINDOW = 50;
const SEQUENCE_MASK = 0xffff;

/**
 * Outbound datagram channel. `send` resolves once the datagram has been handed to the OS.
 */
export interface DatagramTransport {
  send(datagram: Buffer): Promise<void>;
  close(): Promise<void>;
}

export class UdpTransport implements DatagramTransport {
  public constructor(
    private readonly host: string,
    private readonly port: number,
    logger: Logger,
    private readonly socket: Socket = createSocket(isIP(host) === 6 ? "udp6" : "udp4"),
  ) {
    // Without a listener an asynchronous socket error (a failed implicit bind) would be thrown.
    this.socket.on("error", (error) => {
      logger.error(`UDP socket error: ${error.message}`);
    });
  }

  public send(datagram: Buffer): Promise<void> {
    return new Promise<void>((resolvePromise, rejectPromise) => {
      this.socket.send(datagram, this.port, this.host, (error) => {
        if (error) {
          rejectPromise(error);
          return;
        }
        resolvePromise();
      });
    });
  }

  public close(): Promise<void> {
    return new Promise<void>((resolvePromise) => {
      this.socket.close(() => resolvePromise());
    });
  }
}

export interface GamepadClientOptions {
  transport?: DatagramTransport;
  now?: () => number;
}

/**
 * Paced sender: one packet per tick at `updateRateHz`, carrying whatever the input source
 * reports, or a neutral heartbeat when it reports nothing. A failed send is counted and
 * logged; the loop keeps going.
 */
export class GamepadClient {
  private transport: DatagramTransport | null;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private sequence = 0;
  private lastSequence: number | null = null;
  private packetsSent = 0;
  private sendErrors = 0;
  private lastSendAt: number | null = null;
  private intervals: number[] = [];
  private lastErrorLogAt = Number.NEGATIVE_INFINITY;

  public constructor(
    private readonly config: ClientConfig,
    private readonly input: InputSource,
    private readonly logger: Logger,
    options: GamepadClientOptions = {},
  ) {
    this.transport = options.transport ?? null;
    this.now = options.now ?? Date.now;
  }

  public get running(): boolean {
    return this.timer !== null;
  }

  public start(): void {
    if (this.timer) {
      return;
    }

    if (!this.transport) {
      this.transport = new UdpTransport(this.config.targetHost, this.config.port, this.logger);
    }

    const periodMs = 1_000 / this.config.updateRateHz;
    this.timer = setInterval(() => {
      void this.tick();
    }, periodMs);

    this.logger.info(
      `Sending as client ${this.config.clientId} to ${this.config.targetHost}:${this.config.port} at ${this.config.updateRateHz} Hz`,
    );
  }

  public async stop(): Promise<void> {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;

    if (this.transport) {
      await this.transport.close();
      this.transport = null;
    }

    this.logger.info(`Stopped after ${this.packetsSent} packets (${this.sendErrors} send errors).`);
  }

  /**
   * Builds and sends one packet. Never rejects.
   */
  public async tick(): Promise<void> {
    const transport = this.transport;
    if (!transport) {
      return;
    }

    const state = this.input.read() ?? neutralState();
    const sequence = this.sequence;
    this.sequence = (this.sequence + 1) & SEQUENCE_MASK;

    const sentAt = this.now();
    const datagram = encodePacket(state, this.config.clientId, sequence, toNanoseconds(sentAt));

    try {
      await transport.send(datagram);
    } catch (error) {
      this.sendErrors += 1;
      this.logSendError(error);
      return;
    }

    this.packetsSent += 1;
    this.lastSequence = sequence;
    if (this.lastSendAt !== null) {
      this.intervals.push(sentAt - this.lastSendAt);
      if (this.intervals.length > INTERVAL_WINDOW) {
        this.intervals.shift();
      }
    }
    this.lastSendAt = sentAt;
  }

  public getStats(): ClientStats {
    return {
      packetsSent: this.packetsSent,
      sendErrors: this.sendErrors,
      lastSequence: this.lastSequence,
      meanIntervalMs: mean(this.intervals),
      jitterMs: standardDeviation(this.intervals),
    };
  }

  private logSendError(error: unknown): void {
    const message = `Send failed: ${error instanceof Error ? error.message : String(error)}`;
    const now = this.now();
    if (now - this.lastErrorLogAt < SEND_ERROR_LOG_THROTTLE_MS) {
      this.logger.debug(message);
      return;
    }

    this.lastErrorLogAt = now;
    this.logger.warn(message);
  }
}

function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function standardDeviation(values: number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const average = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

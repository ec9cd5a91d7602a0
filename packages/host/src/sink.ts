import { diffButtons, GamepadState, neutralState, statesEqual } from "@padlink/protocol";
import { SinkError } from "./errors";
import { Logger } from "./logger";

/**
 * Output side of the host: one virtual controller per slot.
 *
 * `write` is called synchronously from the receive path and must throw `SinkError`
 * rather than swallow a failed write.
 */
export interface GamepadSink {
  init(): Promise<void>;
  write(slot: number, state: GamepadState): void;
  close(): Promise<void>;
}

export interface SinkRetryOptions {
  retries: number;
  delayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) =>
  new Promise((resolvePromise) => {
    setTimeout(resolvePromise, ms);
  });

/**
 * Sink used when no virtual pad driver is present: logs button edges and stick/trigger
 * changes per slot at debug level.
 */
export class LoggingSink implements GamepadSink {
  private readonly lastStates = new Map<number, GamepadState>();
  private open = false;

  public constructor(private readonly logger: Logger) {}

  public async init(): Promise<void> {
    this.open = true;
    this.logger.info("Logging sink ready (no virtual gamepad driver attached).");
  }

  public write(slot: number, state: GamepadState): void {
    if (!this.open) {
      throw new SinkError("WRITE_FAILED", `Sink is not initialized (slot ${slot}).`);
    }

    const previous = this.lastStates.get(slot) ?? neutralState();
    this.lastStates.set(slot, state);

    if (statesEqual(previous, state)) {
      return;
    }

    const edges = diffButtons(previous.buttons, state.buttons);
    for (const name of edges.pressed) {
      this.logger.debug(`slot ${slot}: ${name} pressed`);
    }
    for (const name of edges.released) {
      this.logger.debug(`slot ${slot}: ${name} released`);
    }

    if (previous.buttons === state.buttons) {
      this.logger.debug(
        `slot ${slot}: LT=${state.leftTrigger} RT=${state.rightTrigger} L=(${state.leftX},${state.leftY}) R=(${state.rightX},${state.rightY})`,
      );
    }
  }

  public async close(): Promise<void> {
    if (!this.open) {
      return;
    }
    this.open = false;
    this.lastStates.clear();
    this.logger.info("Logging sink closed.");
  }
}

/**
 * Initializes `sink`, retrying after a fixed delay. The last failure is rethrown as
 * `SinkError("INIT_FAILED")`.
 */
export async function initSinkWithRetry(
  sink: GamepadSink,
  logger: Logger,
  options: SinkRetryOptions = { retries: 1, delayMs: 2_000 },
  sleep: Sleep = defaultSleep,
): Promise<void> {
  let attempt = 0;

  for (;;) {
    try {
      await sink.init();
      return;
    } catch (error) {
      if (attempt >= options.retries) {
        throw new SinkError("INIT_FAILED", `Gamepad sink failed to initialize: ${describeError(error)}`);
      }

      attempt += 1;
      logger.warn(
        `Gamepad sink init failed (${describeError(error)}); retry ${attempt}/${options.retries} in ${options.delayMs} ms`,
      );
      await sleep(options.delayMs);
    }
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

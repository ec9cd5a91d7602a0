import assert from "node:assert/strict";
import { test } from "node:test";
import { createGamepadState, GamepadButton, neutralState } from "@padlink/protocol";
import { SinkError } from "../errors";
import { Logger } from "../logger";
import { initSinkWithRetry, LoggingSink } from "../sink";
import { RecordingSink } from "./helpers";

function captureLog<T>(run: () => T): { result: T; lines: string[] } {
  const lines: string[] = [];
  const originalLog = console.log;
  try {
    console.log = (...args: unknown[]) => {
      lines.push(args.map((item) => String(item)).join(" "));
    };
    return { result: run(), lines };
  } finally {
    console.log = originalLog;
  }
}

test("logging sink refuses writes before init", () => {
  const sink = new LoggingSink(new Logger(false));
  assert.throws(
    () => sink.write(0, neutralState()),
    (error: unknown) => error instanceof SinkError && error.code === "WRITE_FAILED",
  );
});

test("logging sink logs button edges and axis changes once per change", async () => {
  const sink = new LoggingSink(new Logger(true));
  await sink.init();

  const pressA = createGamepadState({ buttons: GamepadButton.A });
  const { lines } = captureLog(() => {
    sink.write(0, pressA);
    sink.write(0, pressA);
    sink.write(0, createGamepadState({ buttons: GamepadButton.A, leftX: 100 }));
    sink.write(0, neutralState());
  });

  assert.equal(lines.length, 3);
  assert.ok(lines[0].endsWith("[DEBUG] slot 0: A pressed"));
  assert.ok(lines[1].endsWith("[DEBUG] slot 0: LT=0 RT=0 L=(100,0) R=(0,0)"));
  assert.ok(lines[2].endsWith("[DEBUG] slot 0: A released"));
});

test("slots are tracked independently", async () => {
  const sink = new LoggingSink(new Logger(true));
  await sink.init();

  const { lines } = captureLog(() => {
    sink.write(0, createGamepadState({ buttons: GamepadButton.B }));
    sink.write(1, createGamepadState({ buttons: GamepadButton.B }));
  });

  assert.equal(lines.length, 2);
  assert.ok(lines[1].endsWith("[DEBUG] slot 1: B pressed"));
});

test("init is retried once after the configured delay", async () => {
  const sink = new RecordingSink();
  sink.initFailures = 1;
  const delays: number[] = [];

  await initSinkWithRetry(sink, new Logger(false), { retries: 1, delayMs: 2_000 }, async (ms) => {
    delays.push(ms);
  });

  assert.equal(sink.initCalls, 2);
  assert.deepEqual(delays, [2_000]);
});

test("init failure after the last retry surfaces as SinkError", async () => {
  const sink = new RecordingSink();
  sink.initFailures = 2;

  await assert.rejects(
    initSinkWithRetry(sink, new Logger(false), { retries: 1, delayMs: 2_000 }, async () => undefined),
    (error: unknown) =>
      error instanceof SinkError &&
      error.code === "INIT_FAILED" &&
      error.message === "Gamepad sink failed to initialize: driver not ready",
  );
  assert.equal(sink.initCalls, 2);
});

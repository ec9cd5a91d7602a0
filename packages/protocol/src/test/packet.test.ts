import assert from "node:assert/strict";
import { test } from "node:test";
import {
  MAX_DATAGRAM_SIZE,
  PACKET_SIZE,
  PROTOCOL_VERSION,
  createGamepadState,
  decodePacket,
  encodePacket,
  neutralState,
  statesEqual,
  toNanoseconds,
} from "../packet";
import { DecodeError, PacketValidationError } from "../errors";
import { validatePacket } from "../validation";

const SAMPLE_STATE = createGamepadState({
  buttons: 0x1001,
  leftTrigger: 10,
  rightTrigger: 255,
  leftX: -1,
  leftY: 32767,
  rightX: -32768,
  rightY: 0,
});

test("encodePacket writes the fixed little-endian layout without padding", () => {
  const encoded = encodePacket(SAMPLE_STATE, 0x01020304, 0xabcd, 0x0102030405060708n);

  assert.equal(encoded.length, PACKET_SIZE);
  assert.equal(
    encoded.toString("hex"),
    "02" + "04030201" + "cdab" + "0110" + "0a" + "ff" + "ffff" + "ff7f" + "0080" + "0000" + "0807060504030201",
  );
});

test("decodePacket returns the fields that were encoded", () => {
  const cases = [
    { state: SAMPLE_STATE, clientId: 0x01020304, sequence: 0xabcd, timestamp: 0x0102030405060708n },
    { state: neutralState(), clientId: 0, sequence: 0, timestamp: 0n },
    {
      state: createGamepadState({
        buttons: 0xffff,
        leftTrigger: 255,
        rightTrigger: 0,
        leftX: 32767,
        leftY: -32768,
        rightX: 1,
        rightY: -1,
      }),
      clientId: 0xffffffff,
      sequence: 0xffff,
      timestamp: 0xffffffffffffffffn,
    },
  ];

  for (const item of cases) {
    const result = decodePacket(encodePacket(item.state, item.clientId, item.sequence, item.timestamp));
    assert.equal(result.ok, true);
    if (!result.ok) {
      return;
    }

    assert.equal(result.packet.version, PROTOCOL_VERSION);
    assert.equal(result.packet.clientId, item.clientId);
    assert.equal(result.packet.sequence, item.sequence);
    assert.equal(result.packet.timestamp, item.timestamp);
    assert.equal(statesEqual(result.packet.state, item.state), true);
    assert.equal(validatePacket(result.packet), null);
  }
});

test("decodePacket rejects datagrams shorter than one record", () => {
  const encoded = encodePacket(SAMPLE_STATE, 7, 1, 1n);
  const result = decodePacket(encoded.subarray(0, PACKET_SIZE - 1));

  assert.equal(result.ok, false);
  if (result.ok) {
    return;
  }
  assert.ok(result.error instanceof DecodeError);
  assert.equal(result.error.code, "TooShort");
});

test("decodePacket rejects an unsupported version", () => {
  const encoded = encodePacket(SAMPLE_STATE, 7, 1, 1n);
  encoded[0] = 1;

  const result = decodePacket(encoded);
  assert.equal(result.ok, false);
  if (result.ok) {
    return;
  }
  assert.equal(result.error.code, "BadVersion");
});

test("decodePacket rejects datagrams above the size ceiling before reading them", () => {
  const oversized = Buffer.alloc(MAX_DATAGRAM_SIZE + 1);
  const result = decodePacket(oversized);

  assert.equal(result.ok, false);
  if (result.ok) {
    return;
  }
  assert.equal(result.error.code, "SizeExceeded");
});

test("decodePacket ignores trailing bytes up to the ceiling", () => {
  const encoded = encodePacket(SAMPLE_STATE, 42, 9, 123n);
  const extended = Buffer.concat([encoded, Buffer.from([0xde, 0xad, 0xbe, 0xef])]);

  const result = decodePacket(extended);
  assert.equal(result.ok, true);
  if (!result.ok) {
    return;
  }
  assert.equal(result.packet.clientId, 42);
  assert.equal(result.packet.sequence, 9);
  assert.equal(result.packet.timestamp, 123n);
});

test("decoding the same malformed buffer twice yields the same rejection", () => {
  const short = Buffer.from([2, 1, 2, 3]);

  const first = decodePacket(short);
  const second = decodePacket(short);

  assert.equal(first.ok, false);
  assert.equal(second.ok, false);
  if (first.ok || second.ok) {
    return;
  }
  assert.equal(first.error.code, second.error.code);
});

test("decodePacket reads from a view into a larger buffer", () => {
  const encoded = encodePacket(SAMPLE_STATE, 5, 6, 7n);
  const backing = Buffer.concat([Buffer.from([9, 9, 9]), encoded]);

  const result = decodePacket(backing.subarray(3));
  assert.equal(result.ok, true);
  if (!result.ok) {
    return;
  }
  assert.equal(result.packet.clientId, 5);
});

test("encodePacket refuses values the wire cannot carry", () => {
  assert.throws(
    () => encodePacket(createGamepadState({ leftTrigger: 256 }), 1, 1, 1n),
    (error: unknown) => error instanceof PacketValidationError && error.field === "leftTrigger",
  );
  assert.throws(
    () => encodePacket(neutralState(), 1, 0x10000, 1n),
    (error: unknown) => error instanceof PacketValidationError && error.field === "sequence",
  );
  assert.throws(
    () => encodePacket(createGamepadState({ rightX: 1.5 }), 1, 1, 1n),
    (error: unknown) => error instanceof PacketValidationError && error.field === "rightX",
  );
  assert.throws(
    () => encodePacket(neutralState(), 1, 1, -1n),
    (error: unknown) => error instanceof PacketValidationError && error.field === "timestamp",
  );
});

test("validatePacket flags a hand-built packet with an out-of-range axis", () => {
  const error = validatePacket({
    version: PROTOCOL_VERSION,
    clientId: 1,
    sequence: 1,
    state: createGamepadState({ leftY: -40000 }),
    timestamp: 1n,
  });

  assert.ok(error);
  assert.equal(error.code, "Malformed");
  assert.equal(error.field, "leftY");
});

test("millisecond timestamps convert to exact nanoseconds at epoch scale", () => {
  assert.equal(toNanoseconds(1_700_000_000_123), 1_700_000_000_123_000_000n);
  assert.equal(toNanoseconds(1.5), 1_500_000n);
  assert.equal(toNanoseconds(0), 0n);
});

import { DecodeError, PacketValidationError } from "./errors";
import { firstInvalidField } from "./validation";

export const PROTOCOL_VERSION = 2;
export const PACKET_SIZE = 27;
export const MAX_DATAGRAM_SIZE = 1024;

const OFFSET_VERSION = 0;
const OFFSET_CLIENT_ID = 1;
const OFFSET_SEQUENCE = 5;
const OFFSET_BUTTONS = 7;
const OFFSET_LEFT_TRIGGER = 9;
const OFFSET_RIGHT_TRIGGER = 10;
const OFFSET_LEFT_X = 11;
const OFFSET_LEFT_Y = 13;
const OFFSET_RIGHT_X = 15;
const OFFSET_RIGHT_Y = 17;
const OFFSET_TIMESTAMP = 19;

export interface GamepadState {
  readonly buttons: number;
  readonly leftTrigger: number;
  readonly rightTrigger: number;
  readonly leftX: number;
  readonly leftY: number;
  readonly rightX: number;
  readonly rightY: number;
}

export interface Packet {
  readonly version: number;
  readonly clientId: number;
  readonly sequence: number;
  readonly state: GamepadState;
  /** Sender clock in nanoseconds. */
  readonly timestamp: bigint;
}

export type DecodeResult = { ok: true; packet: Packet } | { ok: false; error: DecodeError };

export function createGamepadState(fields: Partial<GamepadState> = {}): GamepadState {
  return Object.freeze({
    buttons: fields.buttons ?? 0,
    leftTrigger: fields.leftTrigger ?? 0,
    rightTrigger: fields.rightTrigger ?? 0,
    leftX: fields.leftX ?? 0,
    leftY: fields.leftY ?? 0,
    rightX: fields.rightX ?? 0,
    rightY: fields.rightY ?? 0,
  });
}

/**
 * Resting controller: no buttons, triggers released, sticks centred.
 * Clients send it as a heartbeat while no physical device is attached.
 */
export function neutralState(): GamepadState {
  return createGamepadState();
}

/**
 * Milliseconds to the wire timestamp unit. Epoch-scale values exceed 2^53 once
 * multiplied, so the whole milliseconds are scaled as a bigint.
 */
export function toNanoseconds(ms: number): bigint {
  const whole = Math.floor(ms);
  return BigInt(whole) * 1_000_000n + BigInt(Math.round((ms - whole) * 1_000_000));
}

/**
 * Serializes one input sample into the fixed 27-byte little-endian record.
 */
export function encodePacket(state: GamepadState, clientId: number, sequence: number, timestamp: bigint): Buffer {
  const invalid = firstInvalidField({
    version: PROTOCOL_VERSION,
    clientId,
    sequence,
    state,
    timestamp,
  });
  if (invalid) {
    throw new PacketValidationError(invalid.field, invalid.message);
  }

  const buffer = Buffer.alloc(PACKET_SIZE);
  buffer.writeUInt8(PROTOCOL_VERSION, OFFSET_VERSION);
  buffer.writeUInt32LE(clientId, OFFSET_CLIENT_ID);
  buffer.writeUInt16LE(sequence, OFFSET_SEQUENCE);
  buffer.writeUInt16LE(state.buttons, OFFSET_BUTTONS);
  buffer.writeUInt8(state.leftTrigger, OFFSET_LEFT_TRIGGER);
  buffer.writeUInt8(state.rightTrigger, OFFSET_RIGHT_TRIGGER);
  buffer.writeInt16LE(state.leftX, OFFSET_LEFT_X);
  buffer.writeInt16LE(state.leftY, OFFSET_LEFT_Y);
  buffer.writeInt16LE(state.rightX, OFFSET_RIGHT_X);
  buffer.writeInt16LE(state.rightY, OFFSET_RIGHT_Y);
  buffer.writeBigUInt64LE(timestamp, OFFSET_TIMESTAMP);
  return buffer;
}

/**
 * Parses a received datagram.
 *
 * Bytes past the fixed record are ignored so later protocol revisions can append fields.
 * Every bit pattern of the numeric fields is representable, so the only failures are
 * size and version.
 */
export function decodePacket(data: Uint8Array): DecodeResult {
  if (data.length > MAX_DATAGRAM_SIZE) {
    return {
      ok: false,
      error: new DecodeError("SizeExceeded", `datagram of ${data.length} bytes exceeds ${MAX_DATAGRAM_SIZE}`),
    };
  }

  if (data.length < PACKET_SIZE) {
    return {
      ok: false,
      error: new DecodeError("TooShort", `datagram of ${data.length} bytes is shorter than ${PACKET_SIZE}`),
    };
  }

  const buffer = Buffer.from(data.buffer, data.byteOffset, data.length);
  const version = buffer.readUInt8(OFFSET_VERSION);
  if (version !== PROTOCOL_VERSION) {
    return {
      ok: false,
      error: new DecodeError("BadVersion", `unsupported protocol version ${version}`),
    };
  }

  const packet: Packet = Object.freeze({
    version,
    clientId: buffer.readUInt32LE(OFFSET_CLIENT_ID),
    sequence: buffer.readUInt16LE(OFFSET_SEQUENCE),
    state: createGamepadState({
      buttons: buffer.readUInt16LE(OFFSET_BUTTONS),
      leftTrigger: buffer.readUInt8(OFFSET_LEFT_TRIGGER),
      rightTrigger: buffer.readUInt8(OFFSET_RIGHT_TRIGGER),
      leftX: buffer.readInt16LE(OFFSET_LEFT_X),
      leftY: buffer.readInt16LE(OFFSET_LEFT_Y),
      rightX: buffer.readInt16LE(OFFSET_RIGHT_X),
      rightY: buffer.readInt16LE(OFFSET_RIGHT_Y),
    }),
    timestamp: buffer.readBigUInt64LE(OFFSET_TIMESTAMP),
  });

  return { ok: true, packet };
}

export function statesEqual(left: GamepadState, right: GamepadState): boolean {
  return (
    left.buttons === right.buttons &&
    left.leftTrigger === right.leftTrigger &&
    left.rightTrigger === right.rightTrigger &&
    left.leftX === right.leftX &&
    left.leftY === right.leftY &&
    left.rightX === right.rightX &&
    left.rightY === right.rightY
  );
}

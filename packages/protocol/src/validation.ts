import { ValidationError } from "./errors";
import type { Packet } from "./packet";

const U8_MAX = 0xff;
const U16_MAX = 0xffff;
const U32_MAX = 0xffff_ffff;
const U64_MAX = 0xffff_ffff_ffff_ffffn;
const AXIS_MIN = -32768;
const AXIS_MAX = 32767;

interface FieldProblem {
  field: string;
  message: string;
}

/**
 * Range check applied to a decoded packet before it can touch any host state.
 *
 * A packet produced by `decodePacket` always passes; the check still runs on the
 * receive path so that a packet built any other way is held to the same contract.
 */
export function validatePacket(packet: Packet): ValidationError | null {
  const problem = firstInvalidField(packet);
  if (!problem) {
    return null;
  }
  return new ValidationError("Malformed", problem.field, problem.message);
}

export function firstInvalidField(packet: Packet): FieldProblem | null {
  const { state } = packet;

  return (
    checkInteger("version", packet.version, 0, U8_MAX) ??
    checkInteger("clientId", packet.clientId, 0, U32_MAX) ??
    checkInteger("sequence", packet.sequence, 0, U16_MAX) ??
    checkInteger("buttons", state.buttons, 0, U16_MAX) ??
    checkInteger("leftTrigger", state.leftTrigger, 0, U8_MAX) ??
    checkInteger("rightTrigger", state.rightTrigger, 0, U8_MAX) ??
    checkInteger("leftX", state.leftX, AXIS_MIN, AXIS_MAX) ??
    checkInteger("leftY", state.leftY, AXIS_MIN, AXIS_MAX) ??
    checkInteger("rightX", state.rightX, AXIS_MIN, AXIS_MAX) ??
    checkInteger("rightY", state.rightY, AXIS_MIN, AXIS_MAX) ??
    checkTimestamp(packet.timestamp)
  );
}

function checkInteger(field: string, value: number, min: number, max: number): FieldProblem | null {
  if (!Number.isInteger(value) || value < min || value > max) {
    return {
      field,
      message: `Field '${field}' must be an integer in [${min}, ${max}], got ${value}.`,
    };
  }
  return null;
}

function checkTimestamp(value: bigint): FieldProblem | null {
  if (value < 0n || value > U64_MAX) {
    return {
      field: "timestamp",
      message: `Field 'timestamp' must fit in an unsigned 64-bit integer, got ${value}.`,
    };
  }
  return null;
}

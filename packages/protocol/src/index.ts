export {
  MAX_DATAGRAM_SIZE,
  PACKET_SIZE,
  PROTOCOL_VERSION,
  createGamepadState,
  decodePacket,
  encodePacket,
  neutralState,
  statesEqual,
  toNanoseconds,
} from "./packet";
export type { DecodeResult, GamepadState, Packet } from "./packet";
export { validatePacket } from "./validation";
export { DecodeError, PacketValidationError, ValidationError } from "./errors";
export type { DecodeErrorCode, ValidationErrorCode } from "./errors";
export { GamepadButton, buttonNames, diffButtons } from "./buttons";
export type { ButtonEdges, GamepadButtonName } from "./buttons";
export { parseAddress, parseBlockRequest, parseUnblockRequest } from "./contracts";
export type {
  BlockRequest,
  SessionEvent,
  SessionEventKind,
  StatusFrame,
  TelemetrySample,
  UnblockRequest,
} from "./contracts";

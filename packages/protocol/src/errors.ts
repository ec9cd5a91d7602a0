export type DecodeErrorCode = "TooShort" | "BadVersion" | "SizeExceeded";

export class DecodeError extends Error {
  constructor(
    public readonly code: DecodeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "DecodeError";
  }
}

export type ValidationErrorCode = "Malformed";

export class ValidationError extends Error {
  constructor(
    public readonly code: ValidationErrorCode,
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Thrown by the encoder when a caller hands it a value the wire format cannot carry.
 */
export class PacketValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "PacketValidationError";
  }
}

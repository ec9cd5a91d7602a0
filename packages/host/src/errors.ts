export type HostErrorCode = "BIND_FAILED";

export class HostError extends Error {
  constructor(
    public readonly code: HostErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HostError";
  }
}

export type SinkErrorCode = "INIT_FAILED" | "WRITE_FAILED";

export class SinkError extends Error {
  constructor(
    public readonly code: SinkErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "SinkError";
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type StatusApiErrorCode = "INVALID_INPUT" | "PAYLOAD_TOO_LARGE";

/**
 * Client-side fault in a status API request; mapped straight to an HTTP status.
 */
export class StatusApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: StatusApiErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "StatusApiError";
  }
}

/**
 * Request and frame contracts of the host status API, shared by the host and any status display.
 */
import { isIP } from "net";

export interface BlockRequest {
  address: string;
  durationMs?: number;
}

export interface UnblockRequest {
  address: string;
}

export interface TelemetrySample {
  slot: number;
  clientId: number | null;
  packetsPerSecond: number;
  meanIntervalMs: number;
  jitterMs: number;
  lastSequence: number | null;
}

export type SessionEventKind = "player_join" | "player_leave";

export interface SessionEvent {
  kind: SessionEventKind;
  slot: number;
  clientId: number;
  at: number;
}

export type StatusFrame =
  | { type: "telemetry"; at: number; samples: TelemetrySample[] }
  | { type: "session"; event: SessionEvent };

/**
 * Parse and validate a manual block payload.
 * Throws a descriptive error when payload is invalid.
 */
export function parseBlockRequest(value: unknown): BlockRequest {
  const payload = requireObject(value, "block payload");
  const address = requireIpAddress(payload.address, "address");
  const durationMs = parseOptionalPositiveNumber(payload.durationMs, "durationMs");

  return {
    address,
    ...(durationMs !== undefined ? { durationMs } : {}),
  };
}

/**
 * Parse and validate a manual unblock payload.
 * Throws a descriptive error when payload is invalid.
 */
export function parseUnblockRequest(value: unknown): UnblockRequest {
  const payload = requireObject(value, "unblock payload");
  return {
    address: requireIpAddress(payload.address, "address"),
  };
}

/**
 * Parse an address path parameter, already URI-decoded.
 */
export function parseAddress(value: unknown): string {
  return requireIpAddress(value, "address");
}

function requireObject(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function requireIpAddress(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new Error(`Field '${field}' must be a string.`);
  }

  const normalized = value.trim();
  if (isIP(normalized) === 0) {
    throw new Error(`Field '${field}' must be an IPv4 or IPv6 address.`);
  }

  return normalized;
}

function parseOptionalPositiveNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new Error(`Field '${field}' must be a positive number or omitted.`);
  }
  return Math.floor(value);
}

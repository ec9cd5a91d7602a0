import type { GamepadState, SessionEvent, TelemetrySample } from "@padlink/protocol";

export type { SessionEvent, TelemetrySample };

export interface HostConfig {
  readonly bindHost: string;
  readonly port: number;
  readonly rateLimitMax: number;
  readonly rateLimitBurst: number;
  readonly ipRateLimitMax: number;
  readonly maxClientsPerIp: number;
  readonly autoBlockThreshold: number;
  readonly blockDurationMs: number;
  readonly maxTimestampAgeMs: number;
  readonly maxTimestampFutureMs: number;
  readonly ownershipTimeoutMs: number;
  readonly enableWhitelist: boolean;
  readonly whitelistIps: readonly string[];
  readonly coopEnabled: boolean;
  readonly maxSlots: number;
  readonly sweepIntervalMs: number;
  readonly retentionMs: number;
  readonly telemetryIntervalMs: number;
  readonly logSecurityEvents: boolean;
  readonly logBlockedPackets: boolean;
  readonly statusEnabled: boolean;
  readonly statusBindHost: string;
  readonly statusPort: number;
  readonly statusAuthToken: string;
  readonly statusMutationRateMax: number;
  readonly verboseLogs: boolean;
}

export type SecurityEventKind =
  | "violation"
  | "auto_block_client"
  | "auto_block_ip"
  | "manual_block"
  | "manual_unblock"
  | "whitelist_reject"
  | "blocked_ip"
  | "blocked_client"
  | "connection_limit";

export interface SecurityEvent {
  readonly at: number;
  readonly kind: SecurityEventKind;
  readonly address: string;
  readonly clientId: number | null;
  readonly detail: string;
}

export type ReplayRejection = "stale_timestamp" | "future_timestamp" | "duplicate_sequence";

export type AdmissionRejection =
  | "whitelist"
  | "blocked_ip"
  | "blocked_client"
  | "connection_limit"
  | "client_rate_limit"
  | "ip_rate_limit";

export type RejectReason = "oversized" | "too_short" | "bad_version" | "malformed" | AdmissionRejection | ReplayRejection;

export interface ClientRecord {
  clientId: number;
  address: string;
  firstSeenAt: number;
  lastActivityAt: number;
  lastSequence: number;
  lastTimestamp: bigint;
  packetCount: number;
  violations: number;
  blockedUntil: number | null;
  slot: number | null;
}

export interface AddressRecord {
  address: string;
  clientIds: number[];
  lastActivityAt: number;
  violations: number;
  blockedUntil: number | null;
}

export interface RegistryStats {
  totalClients: number;
  activeClients: number;
  blockedClients: number;
  trackedAddresses: number;
  blockedAddresses: number;
  manualBlocks: number;
  recentEvents: number;
}

export interface SweepResult {
  evictedClients: number;
  evictedAddresses: number;
  expiredManualBlocks: number;
}

export type RouteDecision =
  | { kind: "slot"; slot: number; claimed: boolean }
  | { kind: "standby"; reason: "not_owner" | "slots_full" };

export interface SlotSnapshot {
  slot: number;
  clientId: number | null;
  boundAt: number | null;
  lastActivityAt: number | null;
}

export type PacketOutcome =
  | { status: "forwarded"; clientId: number; slot: number; state: GamepadState }
  | { status: "standby"; clientId: number; reason: "not_owner" | "slots_full" }
  | { status: "rejected"; reason: RejectReason; clientId: number | null }
  | { status: "sink_failed"; clientId: number; slot: number; error: string };

export interface PipelineCounters {
  received: number;
  forwarded: number;
  standby: number;
  rejected: number;
  sinkFailed: number;
  rejectedByReason: Partial<Record<RejectReason, number>>;
}

export interface HostStatus {
  listening: boolean;
  bindHost: string;
  port: number;
  startedAt: string | null;
  mode: "single-owner" | "coop";
  slots: SlotSnapshot[];
  counters: PipelineCounters;
  security: RegistryStats;
  telemetry: TelemetrySample[];
}

export interface HostErrorPayload {
  error: string;
  message: string;
}

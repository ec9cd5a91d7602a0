import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { isIP } from "net";
import { dirname, resolve } from "path";
import { ConfigError } from "./errors";
import { HostConfig } from "./types";

export const DEFAULT_HOST_CONFIG: HostConfig = Object.freeze({
  bindHost: "0.0.0.0",
  port: 7777,
  rateLimitMax: 120,
  rateLimitBurst: 20,
  ipRateLimitMax: 200,
  maxClientsPerIp: 3,
  autoBlockThreshold: 5,
  blockDurationMs: 300_000,
  maxTimestampAgeMs: 5_000,
  maxTimestampFutureMs: 1_000,
  ownershipTimeoutMs: 500,
  enableWhitelist: false,
  whitelistIps: [],
  coopEnabled: false,
  maxSlots: 4,
  sweepIntervalMs: 60_000,
  retentionMs: 300_000,
  telemetryIntervalMs: 1_000,
  logSecurityEvents: true,
  logBlockedPackets: false,
  statusEnabled: true,
  statusBindHost: "127.0.0.1",
  statusPort: 7778,
  statusAuthToken: "",
  statusMutationRateMax: 20,
  verboseLogs: false,
});

const MAX_SLOTS = 4;

/**
 * Loads runtime configuration from JSON and environment variables.
 *
 * Precedence order:
 * 1. Environment variables.
 * 2. JSON file content.
 * 3. Built-in defaults.
 *
 * Numeric values are floored and clamped into their allowed range before the
 * result goes through `createHostConfig`.
 */
export function loadConfig(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): { config: HostConfig; configPath: string } {
  const configPath = env.PADLINK_HOST_CONFIG
    ? resolve(env.PADLINK_HOST_CONFIG)
    : resolve(cwd, "packages/host/config/host.config.json");

  const file = loadConfigFile(configPath);
  const d = DEFAULT_HOST_CONFIG;

  const config = createHostConfig({
    bindHost: normalizeString(env.PADLINK_BIND_HOST, file.bindHost, d.bindHost),
    port: normalizeNumber(env.PADLINK_PORT, file.port, d.port, 1, 65535),
    rateLimitMax: normalizeNumber(env.PADLINK_RATE_LIMIT_MAX, file.rateLimitMax, d.rateLimitMax, 1, 10_000),
    rateLimitBurst: normalizeNumber(env.PADLINK_RATE_LIMIT_BURST, file.rateLimitBurst, d.rateLimitBurst, 1, 10_000),
    ipRateLimitMax: normalizeNumber(env.PADLINK_IP_RATE_LIMIT_MAX, file.ipRateLimitMax, d.ipRateLimitMax, 1, 100_000),
    maxClientsPerIp: normalizeNumber(env.PADLINK_MAX_CLIENTS_PER_IP, file.maxClientsPerIp, d.maxClientsPerIp, 1, 64),
    autoBlockThreshold: normalizeNumber(
      env.PADLINK_AUTO_BLOCK_THRESHOLD,
      file.autoBlockThreshold,
      d.autoBlockThreshold,
      1,
      1_000,
    ),
    blockDurationMs: normalizeNumber(
      env.PADLINK_BLOCK_DURATION_MS,
      file.blockDurationMs,
      d.blockDurationMs,
      1_000,
      86_400_000,
    ),
    maxTimestampAgeMs: normalizeNumber(
      env.PADLINK_MAX_TIMESTAMP_AGE_MS,
      file.maxTimestampAgeMs,
      d.maxTimestampAgeMs,
      10,
      600_000,
    ),
    maxTimestampFutureMs: normalizeNumber(
      env.PADLINK_MAX_TIMESTAMP_FUTURE_MS,
      file.maxTimestampFutureMs,
      d.maxTimestampFutureMs,
      0,
      600_000,
    ),
    ownershipTimeoutMs: normalizeNumber(
      env.PADLINK_OWNERSHIP_TIMEOUT_MS,
      file.ownershipTimeoutMs,
      d.ownershipTimeoutMs,
      50,
      60_000,
    ),
    enableWhitelist: normalizeBoolean(env.PADLINK_ENABLE_WHITELIST, file.enableWhitelist, d.enableWhitelist),
    whitelistIps: normalizeStringList(env.PADLINK_WHITELIST_IPS, file.whitelistIps, []),
    coopEnabled: normalizeBoolean(env.PADLINK_COOP_ENABLED, file.coopEnabled, d.coopEnabled),
    maxSlots: normalizeNumber(env.PADLINK_MAX_SLOTS, file.maxSlots, d.maxSlots, 1, MAX_SLOTS),
    sweepIntervalMs: normalizeNumber(
      env.PADLINK_SWEEP_INTERVAL_MS,
      file.sweepIntervalMs,
      d.sweepIntervalMs,
      1_000,
      3_600_000,
    ),
    retentionMs: normalizeNumber(env.PADLINK_RETENTION_MS, file.retentionMs, d.retentionMs, 1_000, 86_400_000),
    telemetryIntervalMs: normalizeNumber(
      env.PADLINK_TELEMETRY_INTERVAL_MS,
      file.telemetryIntervalMs,
      d.telemetryIntervalMs,
      100,
      60_000,
    ),
    logSecurityEvents: normalizeBoolean(env.PADLINK_LOG_SECURITY_EVENTS, file.logSecurityEvents, d.logSecurityEvents),
    logBlockedPackets: normalizeBoolean(env.PADLINK_LOG_BLOCKED_PACKETS, file.logBlockedPackets, d.logBlockedPackets),
    statusEnabled: normalizeBoolean(env.PADLINK_STATUS_ENABLED, file.statusEnabled, d.statusEnabled),
    statusBindHost: normalizeString(env.PADLINK_STATUS_BIND_HOST, file.statusBindHost, d.statusBindHost),
    statusPort: normalizeNumber(env.PADLINK_STATUS_PORT, file.statusPort, d.statusPort, 1, 65535),
    statusAuthToken: normalizeString(env.PADLINK_STATUS_TOKEN, file.statusAuthToken, d.statusAuthToken),
    statusMutationRateMax: normalizeNumber(
      env.PADLINK_STATUS_MUTATION_RATE_MAX,
      file.statusMutationRateMax,
      d.statusMutationRateMax,
      1,
      10_000,
    ),
    verboseLogs: normalizeBoolean(env.PADLINK_VERBOSE, file.verboseLogs, d.verboseLogs),
  });

  persistConfigIfMissing(configPath, config);

  return { config, configPath };
}

/**
 * Builds the immutable host configuration, filling omitted fields with defaults.
 * Throws `ConfigError` on the first invalid field.
 */
export function createHostConfig(overrides: Partial<HostConfig> = {}): HostConfig {
  const merged: HostConfig = { ...DEFAULT_HOST_CONFIG, ...overrides };

  requireInteger("port", merged.port, 0, 65535);
  requireInteger("statusPort", merged.statusPort, 0, 65535);
  requirePositive("rateLimitMax", merged.rateLimitMax);
  requirePositive("rateLimitBurst", merged.rateLimitBurst);
  requirePositive("ipRateLimitMax", merged.ipRateLimitMax);
  requireInteger("maxClientsPerIp", merged.maxClientsPerIp, 1, Number.MAX_SAFE_INTEGER);
  requireInteger("autoBlockThreshold", merged.autoBlockThreshold, 1, Number.MAX_SAFE_INTEGER);
  requirePositive("blockDurationMs", merged.blockDurationMs);
  requirePositive("maxTimestampAgeMs", merged.maxTimestampAgeMs);
  requireNonNegative("maxTimestampFutureMs", merged.maxTimestampFutureMs);
  requirePositive("ownershipTimeoutMs", merged.ownershipTimeoutMs);
  requireInteger("maxSlots", merged.maxSlots, 1, MAX_SLOTS);
  requirePositive("sweepIntervalMs", merged.sweepIntervalMs);
  requirePositive("retentionMs", merged.retentionMs);
  requirePositive("telemetryIntervalMs", merged.telemetryIntervalMs);
  requirePositive("statusMutationRateMax", merged.statusMutationRateMax);

  if (!merged.bindHost.trim()) {
    throw new ConfigError("bindHost", "Field 'bindHost' must not be empty.");
  }

  for (const address of merged.whitelistIps) {
    if (isIP(address) === 0) {
      throw new ConfigError("whitelistIps", `Whitelist entry '${address}' is not an IP address.`);
    }
  }

  return Object.freeze({
    ...merged,
    whitelistIps: Object.freeze([...merged.whitelistIps]),
  });
}

/**
 * Number of routable slots: one owner unless co-op is on.
 */
export function slotCountFor(config: HostConfig): number {
  return config.coopEnabled ? config.maxSlots : 1;
}

function loadConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const raw = readFileSync(configPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function persistConfigIfMissing(configPath: string, config: HostConfig): void {
  if (existsSync(configPath)) {
    return;
  }

  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(config, null, 2));
}

function requireInteger(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(field, `Field '${field}' must be an integer in [${min}, ${max}], got ${value}.`);
  }
}

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `Field '${field}' must be greater than 0, got ${value}.`);
  }
}

function requireNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(field, `Field '${field}' must not be negative, got ${value}.`);
  }
}

function normalizeString(primary: string | undefined, secondary: unknown, fallback: string): string {
  const value = (primary ?? (typeof secondary === "string" ? secondary : fallback)).trim();
  return value || fallback;
}

function normalizeNumber(
  primary: string | undefined,
  secondary: unknown,
  fallback: number,
  min: number,
  max: number,
): number {
  const fromEnv = primary ? Number(primary) : Number.NaN;
  const candidate = Number.isFinite(fromEnv) ? fromEnv : typeof secondary === "number" ? secondary : Number.NaN;

  if (!Number.isFinite(candidate)) {
    return fallback;
  }

  const bounded = Math.floor(candidate);
  if (bounded < min) {
    return min;
  }
  if (bounded > max) {
    return max;
  }
  return bounded;
}

function normalizeBoolean(primary: string | undefined, secondary: unknown, fallback: boolean): boolean {
  if (typeof primary === "string") {
    const value = primary.trim().toLowerCase();
    return value === "1" || value === "true" || value === "yes";
  }

  if (typeof secondary === "boolean") {
    return secondary;
  }

  return fallback;
}

function normalizeStringList(primary: string | undefined, secondary: unknown, fallback: string[]): string[] {
  const source: unknown[] = primary
    ? primary.split(",").map((item) => item.trim())
    : Array.isArray(secondary)
      ? secondary
      : fallback;

  const unique = new Set<string>();
  for (const value of source) {
    if (typeof value !== "string") {
      continue;
    }
    const normalized = value.trim();
    if (!normalized) {
      continue;
    }
    unique.add(normalized);
  }

  return [...unique];
}

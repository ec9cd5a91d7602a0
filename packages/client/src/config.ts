import { randomBytes } from "crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { ClientConfig } from "./types";

export const MIN_UPDATE_RATE_HZ = 1;
export const MAX_UPDATE_RATE_HZ = 1_000;

const DEFAULTS = {
  targetHost: "127.0.0.1",
  port: 7777,
  updateRateHz: 60,
  verboseLogs: false,
};

export function randomClientId(): number {
  return randomBytes(4).readUInt32LE(0);
}

/**
 * Loads client configuration: environment (`PADLINK_CLIENT_*`) over the JSON file over
 * defaults. A client id absent from both is drawn fresh on every run and never persisted,
 * since each run restarts its sequence at 0.
 */
export function loadClientConfig(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
  generateClientId: () => number = randomClientId,
): { config: ClientConfig; configPath: string } {
  const configPath = env.PADLINK_CLIENT_CONFIG
    ? resolve(env.PADLINK_CLIENT_CONFIG)
    : resolve(cwd, "packages/client/config/client.config.json");

  const file = loadConfigFile(configPath);

  const config: ClientConfig = Object.freeze({
    targetHost: normalizeString(env.PADLINK_CLIENT_TARGET_HOST, file.targetHost, DEFAULTS.targetHost),
    port: normalizeNumber(env.PADLINK_CLIENT_PORT, file.port, DEFAULTS.port, 1, 65535),
    updateRateHz: normalizeNumber(
      env.PADLINK_CLIENT_RATE_HZ,
      file.updateRateHz,
      DEFAULTS.updateRateHz,
      MIN_UPDATE_RATE_HZ,
      MAX_UPDATE_RATE_HZ,
    ),
    clientId: normalizeClientId(env.PADLINK_CLIENT_ID, file.clientId) ?? generateClientId(),
    verboseLogs: normalizeBoolean(env.PADLINK_CLIENT_VERBOSE, file.verboseLogs, DEFAULTS.verboseLogs),
  });

  persistConfigIfMissing(configPath, config);

  return { config, configPath };
}

function loadConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, "utf8"));
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function persistConfigIfMissing(configPath: string, config: ClientConfig): void {
  if (existsSync(configPath)) {
    return;
  }

  const { clientId: _clientId, ...persisted } = config;
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(persisted, null, 2));
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

  return Math.min(max, Math.max(min, Math.floor(candidate)));
}

function normalizeClientId(primary: string | undefined, secondary: unknown): number | null {
  const candidate = primary ? Number(primary) : typeof secondary === "number" ? secondary : Number.NaN;
  if (Number.isInteger(candidate) && candidate >= 0 && candidate <= 0xffff_ffff) {
    return candidate;
  }
  return null;
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

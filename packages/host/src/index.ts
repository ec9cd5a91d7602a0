import { resolve } from "path";
import { loadConfig } from "./config";
import { HostServer } from "./hostServer";
import { Logger } from "./logger";
import { LoggingSink } from "./sink";
import { StatusServer } from "./statusServer";
import { HostConfig } from "./types";

async function main(): Promise<void> {
  // Resolve the repository root from this file so the default config path does not
  // depend on the launch directory.
  const repoRoot = resolve(__dirname, "..", "..", "..");
  const { config, configPath } = loadConfig(repoRoot);
  const logger = new Logger(config.verboseLogs);

  logger.info(`Loaded host configuration from ${configPath}`);
  logSecurityPosture(config, logger);

  const host = new HostServer(config, new LoggingSink(logger.child("sink")), logger);
  await host.start();

  const status = config.statusEnabled ? new StatusServer(config, host, logger.child("status")) : null;
  if (status) {
    await status.start();
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down host.`);
    if (status) {
      await status.stop();
    }
    await host.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

void main().catch((error) => {
  console.error(`[host] Fatal startup error: ${String(error)}`);
  process.exit(1);
});

function logSecurityPosture(config: HostConfig, logger: Logger): void {
  logger.info(
    `Rate limits: ${config.rateLimitMax}/s per client (burst ${config.rateLimitBurst}), ${config.ipRateLimitMax}/s per address, ${config.maxClientsPerIp} clients per address.`,
  );
  logger.info(
    `Auto-block after ${config.autoBlockThreshold} violations for ${config.blockDurationMs} ms; timestamp window -${config.maxTimestampAgeMs}/+${config.maxTimestampFutureMs} ms.`,
  );

  if (config.enableWhitelist) {
    if (config.whitelistIps.length === 0) {
      logger.warn("Whitelist is enabled but empty: every datagram will be rejected.");
    } else {
      logger.info(`Whitelist enabled for: ${config.whitelistIps.join(", ")}`);
    }
  } else if (!isLoopbackHost(config.bindHost)) {
    logger.info("Whitelist disabled; any address on the network may send input.");
  }

  if (!config.statusEnabled) {
    return;
  }

  const statusLoopback = isLoopbackHost(config.statusBindHost);
  const hasToken = config.statusAuthToken.trim().length > 0;

  if (!statusLoopback && !hasToken) {
    logger.warn(
      "Security risk: status API is bound to a non-loopback interface without a token; only localhost requests will be served.",
    );
  }

  if (hasToken && config.statusAuthToken.length < 24) {
    logger.warn("Status token appears short; prefer a long random token (recommended: >= 24 chars).");
  }
}

function isLoopbackHost(host: string): boolean {
  return host === "127.0.0.1" || host === "::1" || host === "localhost";
}

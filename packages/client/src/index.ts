import { resolve } from "path";
import { loadClientConfig } from "./config";
import { GamepadClient } from "./gamepadClient";
import { NeutralInputSource } from "./inputSource";
import { consoleChannel, Logger } from "./logger";

const STATS_INTERVAL_MS = 5_000;

async function main(): Promise<void> {
  const repoRoot = resolve(__dirname, "..", "..", "..");
  const { config, configPath } = loadClientConfig(repoRoot);
  const logger = new Logger(consoleChannel, config.verboseLogs);

  logger.info(`Loaded client configuration from ${configPath}`);
  logger.info("No input device reader attached; sending neutral heartbeats.");

  const client = new GamepadClient(config, new NeutralInputSource(), logger);
  client.start();

  const statsTimer = setInterval(() => {
    const stats = client.getStats();
    logger.debug(
      `sent=${stats.packetsSent} errors=${stats.sendErrors} interval=${stats.meanIntervalMs.toFixed(2)}ms jitter=${stats.jitterMs.toFixed(2)}ms`,
    );
  }, STATS_INTERVAL_MS);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, stopping client.`);
    clearInterval(statsTimer);
    await client.stop();
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
  console.error(`[client] Fatal startup error: ${String(error)}`);
  process.exit(1);
});

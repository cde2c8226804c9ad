import dotenv from "dotenv";
import type { Server } from "node:http";
import { loadConfig } from "./config";
import { PriceHistory } from "./history/priceHistory";
import { logger, setLogLevel } from "./logger";
import { errorMessage } from "./market/errors";
import { DiscordNotifier } from "./notify/discord";
import { GoldPoller } from "./poller";
import { createApp } from "./server";

async function main() {
  dotenv.config();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info("Starting gold spot reconciler");
  logger.info("Discord webhook present", { present: Boolean(config.discordWebhook) });

  const spot = {
    sources: config.sources,
    primarySource: config.primarySource,
    mismatchThresholdPct: config.mismatchThresholdPct,
    maxQuoteAgeMs: config.maxQuoteAgeMs,
    credentials: config.credentials,
    timeoutMs: config.sourceTimeoutMs,
    cacheTtlMs: config.quoteCacheTtlMs,
  };
  const poller = new GoldPoller({
    spot,
    history: PriceHistory.inDir(config.dataDir),
    notifier: new DiscordNotifier(config.discordWebhook),
    smaPeriod: config.smaPeriod,
    forecast: config.forecast,
  });

  let server: Server | undefined;
  if (config.port > 0) {
    server = createApp({ spot, getLatest: () => poller.latest }).listen(config.port, () => {
      logger.info("HTTP server listening", { port: config.port });
    });
  }

  const ac = new AbortController();
  const shutdown = (sig: string) => {
    logger.info("Shutting down", { signal: sig });
    ac.abort();
    server?.close();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await poller.run(config.updateIntervalMs, ac.signal);
}

main().catch(e => {
  logger.error("Fatal error", { error: errorMessage(e) });
  process.exitCode = 1;
});

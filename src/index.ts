/**
 * Call Leverage Explorer — Entry Point
 *
 * Wires Yahoo market data into the leverage analyst and serves it over HTTP.
 */

import type { Server } from "http";
import { createApp } from "./server.js";
import { LeverageAnalyst } from "./agents/leverage-analyst.js";
import { YahooMarketData } from "./api/market-data/yahoo.js";
import { config } from "./config/index.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
  logger.info("═══ Call Leverage Explorer ═══");
  logger.info(`Environment: ${config.nodeEnv}`);

  const provider = new YahooMarketData({
    baseUrl: config.marketData.yahooBaseUrl,
    cacheTtlMs: config.marketData.cacheTtlMs,
  });
  const analyst = new LeverageAnalyst(provider, config.defaults);
  const app = createApp(analyst);

  const server: Server = await new Promise((resolve) => {
    const s = app.listen(config.port, () => resolve(s));
  });
  logger.info(`Listening on http://localhost:${config.port}`);
  logger.info(
    `Defaults: target ${config.defaults.targetPct}%, strikes ` +
    `${config.defaults.strikeLowPct}%..${config.defaults.strikeHighPct}%`
  );

  // ── Graceful Shutdown ──────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    server.close((err) => {
      if (err) {
        logger.error("Server close failed", { error: String(err) });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.error("Fatal error", { error: err });
  process.exit(1);
});

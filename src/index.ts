/**
 * Benchmark correlation service — entry point.
 *
 * Wires the Yahoo gateway, the analysis orchestrator and the HTTP app
 * from configuration, then starts listening.
 */

import { AnalysisOrchestrator } from "./analysis/orchestrator.js";
import { YahooMarketData } from "./api/market-data/yahoo.js";
import { config } from "./config/index.js";
import { createApp, listen } from "./server.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Benchmarks: ${config.analysis.benchmarks.join(", ")}`);

  const gateway = new YahooMarketData({
    baseUrl: config.yahoo.baseUrl,
    timeoutMs: config.yahoo.timeoutMs,
  });
  const orchestrator = new AnalysisOrchestrator({
    gateway,
    benchmarks: config.analysis.benchmarks,
    lookbackDays: config.analysis.lookbackDays,
    riskFreeRate: config.analysis.riskFreeRate,
  });

  orchestrator.on("phase", (phase) => logger.debug(`Analysis phase: ${phase}`));
  orchestrator.on("ticker_analyzed", (result) =>
    logger.debug(`Analyzed ${result.ticker}`, {
      correlation: result.correlation,
      sharpe: result.sharpe_ratio,
      months: result.returns.length,
    })
  );

  const app = createApp({ orchestrator, corsOrigin: config.corsOrigin });
  await listen(app, config.port, config.host);
  logger.info(`Listening on http://${config.host}:${config.port}`);
}

main().catch((err) => {
  logger.error("Server startup failed", { error: err });
  process.exit(1);
});

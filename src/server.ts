/**
 * Express API Server
 *
 * Exposes:
 *   POST /api/stock-data — correlation and Sharpe ratio of each ticker
 *                          against the first available benchmark index
 *
 * CORS is open on /api/* for the chart front end.
 */

import type { Server } from "node:http";
import express, { type ErrorRequestHandler, type RequestHandler } from "express";
import type { AnalysisOrchestrator } from "./analysis/orchestrator.js";
import { componentLogger } from "./utils/logger.js";
import { StockDataRequestSchema, formatValidationError } from "./utils/validation.js";

const log = componentLogger("server");

export interface AppOptions {
  orchestrator: AnalysisOrchestrator;
  corsOrigin: string;
}

export function createApp({ orchestrator, corsOrigin }: AppOptions): express.Express {
  const app = express();

  app.use(express.json());

  // ── CORS for the chart front end ────────────────────────────
  const cors: RequestHandler = (req, res, next) => {
    res.header("Access-Control-Allow-Origin", corsOrigin);
    res.header("Access-Control-Allow-Headers", "Content-Type");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  };
  app.use("/api", cors);

  /**
   * POST /api/stock-data — monthly return analysis for a list of tickers
   */
  app.post("/api/stock-data", async (req, res) => {
    const parsed = StockDataRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const error = formatValidationError(parsed.error);
      log.warn(`Rejected stock-data request: ${error}`);
      res.status(400).json({ error });
      return;
    }

    try {
      const outcome = await orchestrator.analyze(parsed.data.tickers);
      if (outcome.status === "benchmark_unavailable") {
        res.status(400).json({ error: outcome.message });
        return;
      }
      res.json(outcome.result);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error("Analysis failed", { error: err });
      res.status(500).json({ error: `Error in analysis: ${message}` });
    }
  });

  // Unparseable JSON bodies surface here from express.json()
  const jsonErrors: ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: `Malformed JSON body: ${err.message}` });
      return;
    }
    next(err);
  };
  app.use(jsonErrors);

  return app;
}

/**
 * Bind the app. Rejects on listen failures such as EADDRINUSE instead of
 * letting them surface as an uncaught 'error' event.
 */
export function listen(app: express.Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}

/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";
import { DEFAULT_RISK_FREE_RATE } from "../quant/statistics.js";

dotenv.config();

/** Comma-separated symbol list, order preserved */
const SymbolListSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  )
  .pipe(z.array(z.string()).min(1, "At least one benchmark symbol is required"));

const ConfigSchema = z.object({
  // Market data provider
  yahoo: z.object({
    baseUrl: z.string().url().default("https://query1.finance.yahoo.com/v8/finance/chart"),
    timeoutMs: z.coerce.number().int().nonnegative().default(30_000),
  }),

  // Analysis parameters
  analysis: z.object({
    // NASDAQ composite first, S&P 500 as fallback
    benchmarks: SymbolListSchema.default("^IXIC,^GSPC"),
    lookbackDays: z.coerce.number().int().positive().default(365),
    riskFreeRate: z.coerce.number().default(DEFAULT_RISK_FREE_RATE),
  }),

  // HTTP
  corsOrigin: z.string().default("*"),
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().default(5000),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    yahoo: {
      baseUrl: env.YAHOO_BASE_URL,
      timeoutMs: env.YAHOO_TIMEOUT_MS,
    },
    analysis: {
      benchmarks: env.BENCHMARK_SYMBOLS,
      lookbackDays: env.LOOKBACK_DAYS,
      riskFreeRate: env.RISK_FREE_RATE,
    },
    corsOrigin: env.CORS_ORIGIN,
    host: env.HOST,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
  };

  return ConfigSchema.parse(raw);
}

/** Singleton config instance */
export const config = loadConfig();

/**
 * Analysis Orchestrator
 *
 * Runs one correlation analysis request:
 *   1. Computes the trailing date window from the clock
 *   2. Resolves a benchmark (fatal if none of the candidates has data)
 *   3. Fetches and scores each ticker in input order, one at a time
 *   4. Picks the highest- and lowest-correlated tickers
 *
 * Per-ticker data problems degrade to zeroed statistics and never stop the
 * loop. The instance holds only its collaborators, so concurrent requests
 * share nothing mutable.
 */

import { EventEmitter } from "eventemitter3";
import { benchmarkUnavailableMessage, selectBenchmark } from "./benchmark.js";
import { config } from "../config/index.js";
import { alignReturns, returnValues } from "../quant/returns.js";
import { correlation, sharpeRatio } from "../quant/statistics.js";
import { systemClock, trailingWindow, type Clock } from "../utils/clock.js";
import { componentLogger } from "../utils/logger.js";
import type {
  AnalysisResult,
  MarketDataGateway,
  ReturnSeries,
  TickerResult,
} from "../types/market.js";

const log = componentLogger("analysis");

/** Request phases, in order */
export type AnalysisPhase =
  | "resolving_benchmark"
  | "analyzing"
  | "summarizing"
  | "complete"
  | "benchmark_unavailable";

export interface AnalysisEvents {
  phase: (phase: AnalysisPhase) => void;
  benchmark_resolved: (symbol: string) => void;
  ticker_analyzed: (result: TickerResult) => void;
}

export type AnalysisOutcome =
  | { status: "ok"; result: AnalysisResult }
  | { status: "benchmark_unavailable"; tried: string[]; message: string };

export interface AnalysisOrchestratorOptions {
  gateway: MarketDataGateway;
  clock?: Clock;
  /** Benchmark candidates, most preferred first */
  benchmarks?: readonly string[];
  lookbackDays?: number;
  riskFreeRate?: number;
}

export class AnalysisOrchestrator extends EventEmitter<AnalysisEvents> {
  private readonly gateway: MarketDataGateway;
  private readonly clock: Clock;
  private readonly benchmarks: readonly string[];
  private readonly lookbackDays: number;
  private readonly riskFreeRate: number;

  constructor(options: AnalysisOrchestratorOptions) {
    super();
    this.gateway = options.gateway;
    this.clock = options.clock ?? systemClock;
    this.benchmarks = options.benchmarks ?? config.analysis.benchmarks;
    this.lookbackDays = options.lookbackDays ?? config.analysis.lookbackDays;
    this.riskFreeRate = options.riskFreeRate ?? config.analysis.riskFreeRate;
  }

  async analyze(tickers: readonly string[]): Promise<AnalysisOutcome> {
    const { start, end } = trailingWindow(this.clock.now(), this.lookbackDays);
    log.info(`Fetching data from ${start} to ${end}`);

    // ── Benchmark ─────────────────────────────────────────
    this.emit("phase", "resolving_benchmark");
    const benchmark = await selectBenchmark(this.gateway, this.benchmarks, start, end);
    if (!benchmark.found) {
      const message = benchmarkUnavailableMessage(benchmark.tried);
      log.error(message);
      this.emit("phase", "benchmark_unavailable");
      return { status: "benchmark_unavailable", tried: benchmark.tried, message };
    }
    this.emit("benchmark_resolved", benchmark.symbol);

    // ── Tickers ───────────────────────────────────────────
    this.emit("phase", "analyzing");
    const stockData: TickerResult[] = [];
    const correlations = new Map<string, number>();

    for (const ticker of tickers) {
      const returns = await this.gateway.fetchMonthlyReturns(ticker, start, end);
      const result = this.scoreTicker(ticker, returns, benchmark.returns);
      correlations.set(ticker, result.correlation);
      stockData.push(result);
      this.emit("ticker_analyzed", result);
    }

    // ── Summary ───────────────────────────────────────────
    this.emit("phase", "summarizing");
    const { highest, lowest } = rankCorrelations(correlations, tickers[0] ?? "");

    this.emit("phase", "complete");
    return {
      status: "ok",
      result: {
        stockData,
        benchmarkReturns: returnValues(benchmark.returns),
        benchmarkUsed: benchmark.symbol,
        highestCorrTicker: highest,
        lowestCorrTicker: lowest,
      },
    };
  }

  private scoreTicker(ticker: string, returns: ReturnSeries, benchmarkReturns: ReturnSeries): TickerResult {
    let corr = 0;
    if (returns.length > 0 && benchmarkReturns.length > 0) {
      const aligned = alignReturns(returns, benchmarkReturns);
      if (aligned.dates.length > 0) {
        corr = correlation(aligned);
        log.info(`Correlation calculated for ${ticker}: ${corr}`);
      } else {
        log.warn(`No aligned data available for ${ticker}`);
      }
    } else {
      log.warn(`Missing returns data for ${ticker}`);
    }

    return {
      ticker,
      correlation: corr,
      // Sharpe uses the full series, not just the dates shared with the benchmark
      sharpe_ratio: sharpeRatio(returns, this.riskFreeRate),
      returns: returnValues(returns),
    };
  }
}

/**
 * Ascending sort by correlation: lowest is first, highest is last.
 * Ties keep insertion order, which callers must not rely on.
 */
export function rankCorrelations(
  correlations: ReadonlyMap<string, number>,
  fallback: string
): { highest: string; lowest: string } {
  const sorted = [...correlations.entries()].sort((a, b) => a[1] - b[1]);
  if (sorted.length === 0) {
    return { highest: fallback, lowest: fallback };
  }
  return { lowest: sorted[0][0], highest: sorted[sorted.length - 1][0] };
}

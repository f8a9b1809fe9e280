/**
 * Benchmark Selector
 *
 * Walks an ordered list of index symbols and settles on the first one the
 * gateway returns data for.
 */

import { componentLogger } from "../utils/logger.js";
import type { MarketDataGateway, ReturnSeries } from "../types/market.js";

const log = componentLogger("benchmark");

export type BenchmarkSelection =
  | { found: true; symbol: string; returns: ReturnSeries }
  | { found: false; tried: string[] };

export async function selectBenchmark(
  gateway: MarketDataGateway,
  candidates: readonly string[],
  startDate: string,
  endDate: string
): Promise<BenchmarkSelection> {
  const tried: string[] = [];

  for (const symbol of candidates) {
    log.info(`Trying benchmark ${symbol}...`);
    tried.push(symbol);
    const returns = await gateway.fetchMonthlyReturns(symbol, startDate, endDate);
    if (returns.length > 0) {
      log.info(`Successfully using ${symbol} as benchmark`);
      return { found: true, symbol, returns };
    }
  }

  return { found: false, tried };
}

export function benchmarkUnavailableMessage(tried: readonly string[]): string {
  return `Unable to fetch benchmark data. Tried [${tried.join(", ")}]. Please try again later.`;
}

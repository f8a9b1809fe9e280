/**
 * Market data type definitions.
 * Covers price observations, return series and the analysis payload.
 */

/** Monthly adjusted-close observation, dated in the exchange's local calendar */
export interface Observation {
  date: string; // YYYY-MM-DD
  adjClose: number;
}

/** Period-over-period fractional return */
export interface ReturnPoint {
  date: string;
  value: number;
}

/** Chronological returns; empty when the provider had nothing usable */
export type ReturnSeries = ReturnPoint[];

/** Two return series restricted to their shared dates */
export interface AlignedPair {
  dates: string[];
  left: number[];
  right: number[];
}

/** Trailing date window, both ends as YYYY-MM-DD */
export interface DateWindow {
  start: string;
  end: string;
}

/**
 * Source of monthly return series.
 * Implementations never throw: a missing symbol or a provider fault yields [].
 */
export interface MarketDataGateway {
  fetchMonthlyReturns(symbol: string, startDate: string, endDate: string): Promise<ReturnSeries>;
}

// ── Wire payload ─────────────────────────────────────────────

export interface TickerResult {
  ticker: string;
  correlation: number;
  sharpe_ratio: number;
  returns: number[];
}

export interface AnalysisResult {
  stockData: TickerResult[];
  benchmarkReturns: number[];
  benchmarkUsed: string;
  highestCorrTicker: string;
  lowestCorrTicker: string;
}

/**
 * Yahoo Finance Market Data
 *
 * Uses Yahoo Finance's public chart API to fetch:
 *   - A one-day probe to check that the symbol exists
 *   - Monthly adjusted-close history over a date window
 *
 * No API key required. Every provider fault is logged and reported as an
 * empty return series so one bad symbol cannot fail a whole batch.
 */

import { z } from "zod";
import { config } from "../../config/index.js";
import { toMonthlyReturns } from "../../quant/returns.js";
import { formatDate, toUnixSeconds } from "../../utils/clock.js";
import { componentLogger } from "../../utils/logger.js";
import type { MarketDataGateway, Observation, ReturnSeries } from "../../types/market.js";

const log = componentLogger("yahoo");

const ChartResultSchema = z.object({
  meta: z.object({
    symbol: z.string().optional(),
    exchangeTimezoneName: z.string().optional(),
    gmtoffset: z.number().optional(),
  }),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    adjclose: z.array(z.object({ adjclose: z.array(z.number().nullable()) })).optional(),
  }),
});

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(ChartResultSchema).nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
  }),
});

export type ChartResult = z.infer<typeof ChartResultSchema>;

export interface YahooMarketDataOptions {
  baseUrl?: string;
  /** Per-request timeout; 0 disables it */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class YahooMarketData implements MarketDataGateway {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: YahooMarketDataOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.yahoo.baseUrl;
    this.timeoutMs = options.timeoutMs ?? config.yahoo.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchMonthlyReturns(symbol: string, startDate: string, endDate: string): Promise<ReturnSeries> {
    try {
      log.info(`Fetching data for ${symbol}...`);

      // Probe the latest daily bar first to tell a dead symbol from an empty window
      const probe = await this.fetchChart(symbol, { interval: "1d", range: "1d" });
      if (!probe?.timestamp?.length) {
        log.warn(`No data available for ticker ${symbol}`);
        return [];
      }

      const period2 = toUnixSeconds(endDate);
      const history = await this.fetchChart(symbol, {
        interval: "1mo",
        period1: String(toUnixSeconds(startDate)),
        period2: String(period2),
        includeAdjustedClose: "true",
      });
      const observations = history ? toObservations(history, period2) : [];
      if (observations.length === 0) {
        log.warn(`No monthly data available for ${symbol} between ${startDate} and ${endDate}`);
        return [];
      }

      const returns = toMonthlyReturns(observations);
      log.info(`Successfully fetched ${returns.length} monthly returns for ${symbol}`);
      return returns;
    } catch (err) {
      log.error(`Error fetching data for ${symbol}`, { error: String(err) });
      return [];
    }
  }

  /**
   * GET one chart. Null when Yahoo answers with an error status,
   * a provider error or no result.
   */
  private async fetchChart(symbol: string, params: Record<string, string>): Promise<ChartResult | null> {
    const url = `${this.baseUrl}/${encodeURIComponent(symbol)}?${new URLSearchParams(params)}`;
    const res = await this.fetchImpl(url, {
      headers: { "User-Agent": "Mozilla/5.0" },
      signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined,
    });

    if (!res.ok) {
      log.warn(`Yahoo chart failed for ${symbol}: HTTP ${res.status}`);
      return null;
    }

    const parsed = ChartResponseSchema.parse(await res.json());
    if (parsed.chart.error) {
      log.warn(`Yahoo error for ${symbol}: ${parsed.chart.error.description}`);
      return null;
    }
    return parsed.chart.result?.[0] ?? null;
  }
}

/**
 * One observation per exchange-local month, dated by the month's first bar
 * and priced by its last. Yahoo can append a live mid-month bar beside the
 * month-start bar; it folds into that month. Bars at or after `endTs`
 * (unix seconds, exclusive) and missing or non-positive prices are dropped.
 */
export function toObservations(result: ChartResult, endTs: number = Infinity): Observation[] {
  const timestamps = result.timestamp ?? [];
  const adjCloses = result.indicators.adjclose?.[0]?.adjclose;
  if (!adjCloses) {
    throw new Error(`Chart for ${result.meta.symbol ?? "unknown symbol"} has no adjusted close`);
  }

  const bars = timestamps
    .map((ts, i) => ({ ts, price: adjCloses[i] }))
    .filter((bar): bar is { ts: number; price: number } => bar.price != null && bar.price > 0 && bar.ts < endTs)
    .sort((a, b) => a.ts - b.ts);

  const toDate = exchangeCalendar(result.meta);
  const byMonth = new Map<string, Observation>();
  for (const bar of bars) {
    const date = toDate(bar.ts);
    const month = date.slice(0, 7);
    const existing = byMonth.get(month);
    if (existing) {
      existing.adjClose = bar.price;
    } else {
      byMonth.set(month, { date, adjClose: bar.price });
    }
  }

  return [...byMonth.values()];
}

/**
 * Bar timestamp (unix seconds) to exchange-local YYYY-MM-DD.
 * Prefers the named timezone, which follows DST; the fixed GMT offset
 * only reflects the exchange's current offset.
 */
function exchangeCalendar(meta: ChartResult["meta"]): (ts: number) => string {
  if (meta.exchangeTimezoneName) {
    // en-CA formats as YYYY-MM-DD
    const fmt = new Intl.DateTimeFormat("en-CA", {
      timeZone: meta.exchangeTimezoneName,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    return (ts) => fmt.format(new Date(ts * 1000));
  }
  const offset = meta.gmtoffset ?? 0;
  return (ts) => formatDate(new Date((ts + offset) * 1000));
}

/**
 * Statistics Engine
 *
 * Correlation against a benchmark and annualized Sharpe ratio for
 * monthly return series.
 *
 * The nullable variants report "undefined" as null. The plain variants
 * collapse it to 0, which is what the HTTP payload carries: a 0 there
 * means either no relationship or no data, and callers cannot tell which.
 */

import type { AlignedPair, ReturnSeries } from "../types/market.js";

const MONTHS_PER_YEAR = 12;

export const DEFAULT_RISK_FREE_RATE = 0.02;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator).
 * NaN for fewer than two values; exactly 0 for constant input.
 */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  if (isConstant(values)) return 0;
  const m = mean(values);
  const sqDiffs = values.reduce((s, v) => s + (v - m) ** 2, 0);
  return Math.sqrt(sqDiffs / (values.length - 1));
}

/**
 * Annualized Sharpe ratio of monthly returns:
 *   √12 × mean(r - rf/12) / stddev(r - rf/12)
 *
 * Non-finite returns are skipped. Null when fewer than two values remain
 * or the excess returns have zero spread.
 */
export function computeSharpeRatio(
  returns: ReturnSeries,
  annualRiskFreeRate: number = DEFAULT_RISK_FREE_RATE
): number | null {
  const monthlyRf = annualRiskFreeRate / MONTHS_PER_YEAR;
  const excess = returns
    .map((p) => p.value)
    .filter((v) => Number.isFinite(v))
    .map((v) => v - monthlyRf);

  if (excess.length < 2) return null;

  const std = sampleStdDev(excess);
  if (std === 0 || !Number.isFinite(std)) return null;

  const sharpe = Math.sqrt(MONTHS_PER_YEAR) * (mean(excess) / std);
  return Number.isFinite(sharpe) ? sharpe : null;
}

export function sharpeRatio(
  returns: ReturnSeries,
  annualRiskFreeRate: number = DEFAULT_RISK_FREE_RATE
): number {
  return computeSharpeRatio(returns, annualRiskFreeRate) ?? 0;
}

/**
 * Pearson correlation of an aligned pair.
 * Null when the pair is shorter than two points or either side has
 * zero variance.
 */
export function pearsonCorrelation(pair: AlignedPair): number | null {
  const { left, right } = pair;
  const n = Math.min(left.length, right.length);
  if (n < 2) return null;
  if (isConstant(left) || isConstant(right)) return null;

  const mx = mean(left);
  const my = mean(right);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = left[i] - mx;
    const dy = right[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (sxx === 0 || syy === 0) return null;

  const r = sxy / Math.sqrt(sxx * syy);
  if (!Number.isFinite(r)) return null;
  // Rounding can push a perfect fit just past ±1
  return Math.max(-1, Math.min(1, r));
}

export function correlation(pair: AlignedPair): number {
  return pearsonCorrelation(pair) ?? 0;
}

// ── Utility ─────────────────────────────────────────────────

function isConstant(values: readonly number[]): boolean {
  return values.every((v) => v === values[0]);
}

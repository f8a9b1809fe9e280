/**
 * Return Series Builder
 *
 * Turns adjusted-close observations into monthly fractional returns
 * and joins two return series on their shared dates.
 */

import type { AlignedPair, Observation, ReturnSeries } from "../types/market.js";

/**
 * Period-over-period returns: (p[t] - p[t-1]) / p[t-1].
 * The first observation has no predecessor and produces no entry,
 * so n observations give n - 1 returns.
 */
export function toMonthlyReturns(observations: readonly Observation[]): ReturnSeries {
  const series: ReturnSeries = [];
  for (let i = 1; i < observations.length; i++) {
    const prev = observations[i - 1].adjClose;
    const curr = observations[i].adjClose;
    series.push({ date: observations[i].date, value: (curr - prev) / prev });
  }
  return series;
}

/**
 * Inner join by date. Order follows `left`, which is chronological.
 */
export function alignReturns(left: ReturnSeries, right: ReturnSeries): AlignedPair {
  const rightByDate = new Map<string, number>();
  for (const point of right) {
    rightByDate.set(point.date, point.value);
  }

  const pair: AlignedPair = { dates: [], left: [], right: [] };
  for (const point of left) {
    const other = rightByDate.get(point.date);
    if (other === undefined) continue;
    pair.dates.push(point.date);
    pair.left.push(point.value);
    pair.right.push(other);
  }
  return pair;
}

/** Return values only, with non-finite entries reported as 0 */
export function returnValues(series: ReturnSeries): number[] {
  return series.map((p) => (Number.isFinite(p.value) ? p.value : 0));
}

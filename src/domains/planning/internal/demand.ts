import type { DemandStats, HistoricalSalesRecord, MonthlyForecastRecord } from '../types';

const TRAILING_MONTHS = 12;
const DAYS_PER_MONTH = 30;
const MIN_DAILY_MEAN = 0.1;
const MIN_STD_RATIO = 0.05;
const SINGLE_MONTH_STD_RATIO = 0.25;
const MIN_EXPECTED_DAYS = 20;

export const DEFAULT_DEMAND_STATS: DemandStats = Object.freeze({ meanDaily: 1.0, stdDaily: 0.3 });

/**
 * Daily demand mean and standard deviation from the item's trailing twelve
 * months of sales. Floors keep the policy from collapsing to a zero order.
 */
export function estimateDailyDemand(itemId: string, history: readonly HistoricalSalesRecord[]): DemandStats {
  const rows = history.filter((record) => record.itemId === itemId);
  if (rows.length === 0) {
    return { ...DEFAULT_DEMAND_STATS };
  }

  const trailing = [...rows]
    .sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0))
    .slice(-TRAILING_MONTHS);
  const monthly = trailing.map((record) => Math.max(0, record.actualSalesQty));

  const meanMonthly = monthly.reduce((sum, qty) => sum + qty, 0) / monthly.length;
  let stdMonthly: number;
  if (monthly.length > 1) {
    const variance =
      monthly.reduce((sum, qty) => sum + (qty - meanMonthly) ** 2, 0) / (monthly.length - 1);
    stdMonthly = Math.sqrt(variance);
  } else {
    stdMonthly = SINGLE_MONTH_STD_RATIO * meanMonthly;
  }

  const meanDaily = Math.max(meanMonthly / DAYS_PER_MONTH, MIN_DAILY_MEAN);
  const stdDaily = Math.max(stdMonthly / DAYS_PER_MONTH, MIN_STD_RATIO * meanDaily);
  return { meanDaily, stdDaily };
}

/**
 * Picks the forecast record for a month: exact-month records win over the
 * rest of the pool, then highest confidence, then earliest in input order.
 */
export function selectForecast(
  pool: readonly MonthlyForecastRecord[] | undefined,
  month: string
): MonthlyForecastRecord | null {
  if (!pool || pool.length === 0) return null;
  const exact = pool.filter((record) => record.month === month);
  const candidates = exact.length > 0 ? exact : pool;

  let best = candidates[0];
  for (const candidate of candidates) {
    if (candidate.confidenceScore > best.confidenceScore) best = candidate;
  }
  return best;
}

export function resolveMonthlyExpected(forecast: MonthlyForecastRecord | null, stats: DemandStats): number {
  const projected = forecast ? forecast.forecastedSalesQty : stats.meanDaily * DAYS_PER_MONTH;
  return Math.max(projected, stats.meanDaily * MIN_EXPECTED_DAYS);
}

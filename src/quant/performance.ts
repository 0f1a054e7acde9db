/**
 * Return & Risk Metrics Engine
 *
 * Pure functions of a PerformanceHistory:
 *   1. Monthly returns (last snapshot per calendar month)
 *   2. Daily return series on the cumulative P&L % (legacy definition)
 *   3. Daily return series on current value (true returns)
 *   4. Annualized return/volatility, Sharpe, max drawdown, best/worst day
 *
 * Ratios with a zero denominator come back as null, never NaN or Infinity.
 */

import { format, parseISO } from "date-fns";
import type {
  DailyReturn,
  MonthlyReturn,
  PerformanceHistory,
  PortfolioSnapshot,
  ReturnBasis,
  RiskMetrics,
} from "../types/portfolio.js";

export const TRADING_DAYS_PER_YEAR = 252;

/** Volatility at or below this is treated as zero */
const VOLATILITY_EPSILON = 1e-12;

/** Percent change from base to next; null on a zero base */
export function pctChange(base: number, next: number): number | null {
  return base === 0 ? null : ((next - base) / base) * 100;
}

/**
 * Group by calendar month, keep the last snapshot of each month and
 * compute the month-over-month change of total P&L %.
 */
export function monthlyReturns(history: PerformanceHistory): MonthlyReturn[] {
  const months = new Map<string, { first: PortfolioSnapshot; last: PortfolioSnapshot }>();

  for (const s of history.snapshots) {
    const period = s.date.slice(0, 7);
    const entry = months.get(period);
    if (entry) entry.last = s;
    else months.set(period, { first: s, last: s });
  }

  const result: MonthlyReturn[] = [];
  let prev: PortfolioSnapshot | null = null;

  for (const [period, { first, last }] of months) {
    result.push({
      period,
      label: format(parseISO(last.date), "MMM yyyy"),
      date: last.date,
      totalInvestment: first.totalInvestment,
      currentValue: last.totalCurrentValue,
      totalPl: last.totalPl,
      totalPlPercentage: last.totalPlPercentage,
      monthlyReturn: prev === null ? 0 : pctChange(prev.totalPlPercentage, last.totalPlPercentage),
    });
    prev = last;
  }

  return result;
}

function returnSeries(
  history: PerformanceHistory,
  pick: (s: PortfolioSnapshot) => number
): DailyReturn[] {
  const out: DailyReturn[] = [];
  const snaps = history.snapshots;
  for (let i = 1; i < snaps.length; i++) {
    const r = pctChange(pick(snaps[i - 1]), pick(snaps[i]));
    if (r !== null) out.push({ date: snaps[i].date, returnPct: r });
  }
  return out;
}

/**
 * Percent change of consecutive total P&L % values.
 *
 * This is a change of a percentage, not a portfolio return; it is kept
 * because existing reports are built on it. See valueReturnSeries.
 */
export function dailyReturnSeries(history: PerformanceHistory): DailyReturn[] {
  return returnSeries(history, (s) => s.totalPlPercentage);
}

/** Percent change of consecutive current values */
export function valueReturnSeries(history: PerformanceHistory): DailyReturn[] {
  return returnSeries(history, (s) => s.totalCurrentValue);
}

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population standard deviation; exactly 0 for a constant series */
export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  if (values.every((v) => v === values[0])) return 0;
  const m = mean(values);
  let sq = 0;
  for (const v of values) sq += (v - m) ** 2;
  return Math.sqrt(sq / values.length);
}

export interface DrawdownPoint {
  date: string;
  drawdownPct: number;
}

/**
 * Decline of compounded growth from its running peak at every point.
 * null when growth never gets above zero (the ratio has no meaning).
 */
export function drawdownSeries(returns: readonly DailyReturn[]): DrawdownPoint[] | null {
  let growth = 1;
  let peak = -Infinity;
  const points: DrawdownPoint[] = [];

  for (const { date, returnPct } of returns) {
    growth *= 1 + returnPct / 100;
    peak = Math.max(peak, growth);
    if (peak <= 0) return null;
    points.push({ date, drawdownPct: ((growth - peak) / peak) * 100 });
  }

  return points;
}

/**
 * Worst peak-to-trough decline, in percent. Always ≤ 0; 0 when growth
 * never falls below its running peak.
 */
export function maxDrawdown(returns: readonly DailyReturn[]): number | null {
  const points = drawdownSeries(returns);
  if (points === null || points.length === 0) return null;
  return points.reduce((worst, p) => Math.min(worst, p.drawdownPct), 0);
}

/**
 * Risk metrics over the daily return series of the chosen basis.
 */
export function riskMetrics(
  history: PerformanceHistory,
  basis: ReturnBasis = "pl_percentage"
): RiskMetrics {
  const series = basis === "value" ? valueReturnSeries(history) : dailyReturnSeries(history);
  const returns = series.map((d) => d.returnPct);
  const n = returns.length;
  const last = history.snapshots[history.snapshots.length - 1];

  const base: RiskMetrics = {
    basis,
    observations: n,
    skippedReturns: Math.max(history.snapshots.length - 1, 0) - n,
    isSynthetic: history.isSynthetic,
    totalReturn: last ? last.totalPlPercentage : null,
    annualizedReturn: null,
    annualizedVolatility: null,
    sharpeRatio: null,
    maxDrawdown: null,
    bestDay: null,
    worstDay: null,
    positiveDayFraction: null,
  };

  if (n === 0) return base;

  const annualizedReturn = mean(returns) * TRADING_DAYS_PER_YEAR;
  const annualizedVolatility = populationStdDev(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR);
  const sharpeRatio =
    annualizedVolatility <= VOLATILITY_EPSILON ? null : annualizedReturn / annualizedVolatility;

  return {
    ...base,
    annualizedReturn,
    annualizedVolatility,
    sharpeRatio,
    maxDrawdown: maxDrawdown(series),
    bestDay: returns.reduce((a, b) => Math.max(a, b), -Infinity),
    worstDay: returns.reduce((a, b) => Math.min(a, b), Infinity),
    positiveDayFraction: (returns.filter((r) => r > 0).length / n) * 100,
  };
}

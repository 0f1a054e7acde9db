/**
 * Chart Data Builder
 *
 * Turns a report into plain series for the portfolio chart:
 *   - cumulative P&L % over time
 *   - drawdown from the running peak
 *   - P&L % per priced position with ±threshold guides
 *   - allocation by current value
 *   - month-over-month returns
 *   - distribution of daily returns
 *
 * Output can be consumed by any renderer; the SVG renderer is one.
 */

import type { PortfolioReport } from "../types/portfolio.js";
import { dailyReturnSeries, drawdownSeries, valueReturnSeries } from "../quant/performance.js";

export interface SeriesPoint {
  label: string;
  value: number;
}

export interface BarDatum {
  label: string;
  value: number;
  tone: "positive" | "negative";
}

export interface ChartData {
  title: string;
  cumulativePl: SeriesPoint[];
  drawdown: SeriesPoint[];
  positionPl: BarDatum[];
  thresholdGuides: number[];
  allocation: SeriesPoint[];
  monthlyReturns: BarDatum[];
  /** Bar value is a count of days */
  returnDistribution: BarDatum[];
  isSynthetic: boolean;
}

export const HISTOGRAM_BINS = 20;

function toBar(label: string, value: number): BarDatum {
  return { label, value, tone: value >= 0 ? "positive" : "negative" };
}

/**
 * Equal-width histogram of daily returns, labelled by bin centre. The
 * maximum falls into the last bin.
 */
export function returnHistogram(returns: readonly number[], bins = HISTOGRAM_BINS): BarDatum[] {
  if (returns.length === 0) return [];
  const lo = Math.min(...returns);
  const hi = Math.max(...returns);
  if (lo === hi) return [{ ...toBar(lo.toFixed(1), lo), value: returns.length }];

  const width = (hi - lo) / bins;
  const counts = new Array<number>(bins).fill(0);
  for (const r of returns) {
    counts[Math.min(Math.floor((r - lo) / width), bins - 1)]++;
  }
  return counts.map((count, i) => {
    const centre = lo + (i + 0.5) * width;
    return { ...toBar(centre.toFixed(1), centre), value: count };
  });
}

export function buildChartData(report: PortfolioReport): ChartData {
  const returns =
    report.riskMetrics.basis === "value"
      ? valueReturnSeries(report.history)
      : dailyReturnSeries(report.history);

  const priced = report.positions.filter((p) => !p.priceUnavailable);

  return {
    title: `Portfolio Report ${report.summary.date}`,
    cumulativePl: report.history.snapshots.map((s) => ({
      label: s.date,
      value: s.totalPlPercentage,
    })),
    drawdown: (drawdownSeries(returns) ?? []).map((d) => ({
      label: d.date,
      value: d.drawdownPct,
    })),
    positionPl: priced
      .filter((p) => p.plPercentage !== null)
      .map((p) => toBar(p.symbol, p.plPercentage ?? 0)),
    thresholdGuides: [report.alertThresholdPct, -report.alertThresholdPct],
    allocation: priced
      .filter((p) => p.weight > 0)
      .map((p) => ({ label: p.symbol, value: p.weight })),
    monthlyReturns: report.monthlyReturns
      .filter((m) => m.monthlyReturn !== null)
      .map((m) => toBar(m.label, m.monthlyReturn ?? 0)),
    returnDistribution: returnHistogram(returns.map((r) => r.returnPct)),
    isSynthetic: report.history.isSynthetic,
  };
}

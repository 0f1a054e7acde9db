/**
 * Report Assembler
 *
 * Combines valuation, history, metrics and alerts into one frozen report
 * for the chart renderer, the email composer and the table store. The only
 * computation here is ranking.
 */

import type {
  Alert,
  MonthlyReturn,
  PerformanceHistory,
  PortfolioReport,
  PricedPosition,
  RiskMetrics,
  Valuation,
} from "../types/portfolio.js";

/** How many names the top/bottom performer views show */
export const PERFORMER_VIEW_SIZE = 5;

export interface ReportInput {
  generatedAt: Date;
  valuation: Valuation;
  history: PerformanceHistory;
  riskMetrics: RiskMetrics;
  valueRiskMetrics: RiskMetrics;
  monthlyReturns: readonly MonthlyReturn[];
  alerts: readonly Alert[];
  alertThresholdPct: number;
}

/**
 * Sort by P&L % descending; positions without a price go last. Stable, so
 * ties keep their input order.
 */
export function rankPositions(positions: readonly PricedPosition[]): PricedPosition[] {
  const rank = (p: PricedPosition): number =>
    p.priceUnavailable || p.plPercentage === null ? -Infinity : p.plPercentage;
  return [...positions].sort((a, b) => {
    const ra = rank(a);
    const rb = rank(b);
    if (ra === rb) return 0;
    return rb > ra ? 1 : -1;
  });
}

export function assembleReport(input: ReportInput): PortfolioReport {
  const ranked = rankPositions(input.valuation.positions);
  const priced = ranked.filter((p) => !p.priceUnavailable);

  const report: PortfolioReport = {
    generatedAt: input.generatedAt,
    summary: { ...input.valuation.snapshot },
    positions: Object.freeze([...input.valuation.positions]),
    rankedPositions: Object.freeze(ranked),
    topPerformers: Object.freeze(priced.slice(0, PERFORMER_VIEW_SIZE)),
    bottomPerformers: Object.freeze(priced.slice(-PERFORMER_VIEW_SIZE).reverse()),
    history: input.history,
    monthlyReturns: Object.freeze([...input.monthlyReturns]),
    riskMetrics: input.riskMetrics,
    valueRiskMetrics: input.valueRiskMetrics,
    alerts: Object.freeze([...input.alerts]),
    alertThresholdPct: input.alertThresholdPct,
    degradation: Object.freeze({
      isSynthetic: input.history.isSynthetic,
      priceUnavailable: input.valuation.unpricedSymbols.length > 0,
      unpricedSymbols: Object.freeze([...input.valuation.unpricedSymbols]),
      weightsUndefined: input.valuation.weightsUndefined,
      contributionUndefined: input.valuation.contributionUndefined,
      sharpeUndefined: input.riskMetrics.sharpeRatio === null,
      insufficientHistory: input.riskMetrics.observations === 0,
      skippedReturns: input.riskMetrics.skippedReturns,
    }),
  };

  return Object.freeze(report);
}

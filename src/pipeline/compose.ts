/**
 * Report composition shared by the reporting cycle and the read-only API.
 *
 * "append" upserts today's snapshot into the history (a new real history
 * when none exists). "replay" leaves a persisted history untouched and
 * synthesizes one from the purchase dates when there is none.
 */

import type {
  PerformanceHistory,
  PortfolioReport,
  PortfolioSnapshot,
  Position,
} from "../types/portfolio.js";
import type { PriceMap } from "../types/market.js";
import {
  assembleReport,
  earliestPurchaseDate,
  emptyHistory,
  evaluateAlerts,
  monthlyReturns,
  riskMetrics,
  synthesizeHistory,
  toIsoDate,
  upsertSnapshot,
  valuePortfolio,
} from "../quant/index.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("compose");

export type HistoryMode = "append" | "replay";

export interface ComposeInput {
  positions: readonly Position[];
  prices: PriceMap;
  /** Persisted history, or null when none exists */
  history: PerformanceHistory | null;
  historyMode: HistoryMode;
  now: Date;
  alertThresholdPct: number;
  syntheticSeed: number;
}

function resolveHistory(input: ComposeInput, today: PortfolioSnapshot): PerformanceHistory {
  if (input.historyMode === "append") {
    return upsertSnapshot(input.history ?? emptyHistory(), today);
  }
  if (input.history) return input.history;

  log.warn("No performance history found, synthesizing a backfill from purchase dates");
  return synthesizeHistory({
    startDate: earliestPurchaseDate(input.positions) ?? today.date,
    endDate: today.date,
    initialInvestment: today.totalInvestment,
    seed: input.syntheticSeed,
  });
}

/**
 * Value, extend history, compute both metric bases, evaluate alerts and
 * assemble the frozen report. Throws on invalid holdings.
 */
export function composeReport(input: ComposeInput): PortfolioReport {
  const valuation = valuePortfolio(input.positions, input.prices, toIsoDate(input.now));
  const history = resolveHistory(input, valuation.snapshot);

  return assembleReport({
    generatedAt: input.now,
    valuation,
    history,
    riskMetrics: riskMetrics(history),
    valueRiskMetrics: riskMetrics(history, "value"),
    monthlyReturns: monthlyReturns(history),
    alerts: evaluateAlerts(valuation.positions, input.alertThresholdPct),
    alertThresholdPct: input.alertThresholdPct,
  });
}

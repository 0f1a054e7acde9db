/**
 * Portfolio type definitions.
 * Covers holdings, priced positions, the valuation time series and the
 * metrics derived from it.
 */

/** Calendar date as YYYY-MM-DD */
export type IsoDate = string;

/** A recorded holding */
export interface Position {
  symbol: string;
  name: string;
  purchasePrice: number;
  quantity: number;
  purchaseDate: IsoDate;
}

/** Position valued at current prices */
export interface PricedPosition extends Position {
  /** null when the feed had no price for the symbol */
  currentPrice: number | null;
  priceUnavailable: boolean;
  totalInvestment: number;
  /** 0 when the price is unavailable */
  currentValue: number;
  unrealizedPl: number;
  /** null only when totalInvestment is 0 */
  plPercentage: number | null;
  /** Share of priced current value, in percent */
  weight: number;
  /** Share of priced unrealized P&L, in percent */
  contribution: number;
  contributionUndefined: boolean;
}

/** Point-in-time aggregate of the whole portfolio */
export interface PortfolioSnapshot {
  date: IsoDate;
  totalInvestment: number;
  totalCurrentValue: number;
  totalPl: number;
  totalPlPercentage: number;
}

/** Date-ordered snapshots; isSynthetic marks a fabricated backfill */
export interface PerformanceHistory {
  readonly snapshots: readonly PortfolioSnapshot[];
  readonly isSynthetic: boolean;
}

export interface Valuation {
  positions: PricedPosition[];
  snapshot: PortfolioSnapshot;
  unpricedSymbols: string[];
  weightsUndefined: boolean;
  contributionUndefined: boolean;
}

export interface MonthlyReturn {
  /** YYYY-MM */
  period: string;
  /** e.g. "Jan 2024" */
  label: string;
  /** Date of the last snapshot in the month */
  date: IsoDate;
  totalInvestment: number;
  currentValue: number;
  totalPl: number;
  /** Cumulative return at month end */
  totalPlPercentage: number;
  /** Month-over-month change of totalPlPercentage; null on a zero base */
  monthlyReturn: number | null;
}

export interface DailyReturn {
  date: IsoDate;
  /** Percent */
  returnPct: number;
}

/** Which series the daily returns are computed on */
export type ReturnBasis = "pl_percentage" | "value";

/** Risk metrics; null is the "undefined" sentinel */
export interface RiskMetrics {
  basis: ReturnBasis;
  /** Number of daily returns the metrics were computed from */
  observations: number;
  /** Consecutive pairs left out because their return is undefined (zero base) */
  skippedReturns: number;
  isSynthetic: boolean;
  totalReturn: number | null;
  annualizedReturn: number | null;
  annualizedVolatility: number | null;
  sharpeRatio: number | null;
  maxDrawdown: number | null;
  bestDay: number | null;
  worstDay: number | null;
  positiveDayFraction: number | null;
}

export type AlertDirection = "profit" | "loss";

export interface Alert {
  symbol: string;
  name: string;
  direction: AlertDirection;
  plPercentage: number;
  threshold: number;
  currentPrice: number | null;
}

/** Flags consumers should check before trusting the numbers */
export interface ReportDegradation {
  isSynthetic: boolean;
  priceUnavailable: boolean;
  unpricedSymbols: readonly string[];
  weightsUndefined: boolean;
  contributionUndefined: boolean;
  sharpeUndefined: boolean;
  insufficientHistory: boolean;
  /** Daily returns dropped on a zero base (P&L % basis) */
  skippedReturns: number;
}

export interface PortfolioReport {
  readonly generatedAt: Date;
  readonly summary: PortfolioSnapshot;
  readonly positions: readonly PricedPosition[];
  readonly rankedPositions: readonly PricedPosition[];
  readonly topPerformers: readonly PricedPosition[];
  readonly bottomPerformers: readonly PricedPosition[];
  readonly history: PerformanceHistory;
  readonly monthlyReturns: readonly MonthlyReturn[];
  readonly riskMetrics: RiskMetrics;
  /** Same metrics on current-value returns */
  readonly valueRiskMetrics: RiskMetrics;
  readonly alerts: readonly Alert[];
  readonly alertThresholdPct: number;
  readonly degradation: ReportDegradation;
}

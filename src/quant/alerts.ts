/**
 * Alert Evaluator — flags positions whose P&L % is beyond ±threshold.
 */

import type { Alert, PricedPosition } from "../types/portfolio.js";

/** Decimal places a P&L % is compared at; float noise sits far below this */
export const ALERT_COMPARE_DECIMALS = 9;

/** Round away representation error, e.g. 5.000000000000003 → 5 */
export function comparablePct(pct: number): number {
  const scale = 10 ** ALERT_COMPARE_DECIMALS;
  return Math.round(pct * scale) / scale;
}

/**
 * One alert per position with |P&L %| strictly above the threshold, in
 * input order. Positions without a price are skipped: a missing quote is
 * not a 100% loss.
 */
export function evaluateAlerts(
  positions: readonly PricedPosition[],
  thresholdPct: number
): Alert[] {
  if (!Number.isFinite(thresholdPct) || thresholdPct < 0) {
    throw new RangeError(`Alert threshold must be a non-negative number, got ${thresholdPct}`);
  }

  const alerts: Alert[] = [];
  for (const p of positions) {
    if (p.priceUnavailable || p.plPercentage === null) continue;

    const pct = comparablePct(p.plPercentage);
    const direction = pct > thresholdPct ? "profit" : pct < -thresholdPct ? "loss" : null;
    if (direction === null) continue;

    alerts.push({
      symbol: p.symbol,
      name: p.name,
      direction,
      plPercentage: p.plPercentage,
      threshold: thresholdPct,
      currentPrice: p.currentPrice,
    });
  }
  return alerts;
}

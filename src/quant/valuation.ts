/**
 * Valuation Calculator
 *
 * Turns holdings plus a (possibly partial) price map into priced positions
 * and the portfolio snapshot for one date:
 *   - per-position investment, value, unrealized P&L and P&L %
 *   - weights over priced current value
 *   - contribution to priced unrealized P&L
 *
 * A missing price is carried as an explicit "unavailable" quote, never as
 * a zero price.
 */

import type {
  IsoDate,
  Position,
  PricedPosition,
  PortfolioSnapshot,
  Valuation,
} from "../types/portfolio.js";
import type { PriceMap, PriceQuote } from "../types/market.js";
import { EmptyPortfolioError, InvalidPositionError } from "../utils/errors.js";

/** Map a feed result to an explicit quote */
export function toPriceQuote(prices: PriceMap, symbol: string): PriceQuote {
  const price = prices.get(symbol);
  if (price === undefined || !Number.isFinite(price) || price < 0) {
    return { status: "unavailable" };
  }
  return { status: "present", price };
}

/**
 * Reject holdings that would leave the percentage math undefined.
 */
export function validatePositions(positions: readonly Position[]): void {
  if (positions.length === 0) throw new EmptyPortfolioError();

  const seen = new Set<string>();
  for (const p of positions) {
    if (seen.has(p.symbol)) {
      throw new InvalidPositionError(p.symbol, "duplicate symbol");
    }
    seen.add(p.symbol);

    if (!Number.isInteger(p.quantity) || p.quantity <= 0) {
      throw new InvalidPositionError(p.symbol, `quantity must be a positive integer, got ${p.quantity}`);
    }
    if (!Number.isFinite(p.purchasePrice) || p.purchasePrice <= 0) {
      throw new InvalidPositionError(p.symbol, `purchase price must be positive, got ${p.purchasePrice}`);
    }
  }
}

/** Percentage of part in whole; null when the whole is zero */
export function percentOf(part: number, whole: number): number | null {
  return whole === 0 ? null : (part / whole) * 100;
}

/**
 * Value every position at current prices and aggregate the snapshot.
 */
export function valuePortfolio(
  positions: readonly Position[],
  prices: PriceMap,
  date: IsoDate
): Valuation {
  validatePositions(positions);

  const base = positions.map((p) => {
    const quote = toPriceQuote(prices, p.symbol);
    const totalInvestment = p.purchasePrice * p.quantity;
    const currentPrice = quote.status === "present" ? quote.price : null;
    const currentValue = currentPrice === null ? 0 : currentPrice * p.quantity;
    const unrealizedPl = currentValue - totalInvestment;
    return {
      ...p,
      currentPrice,
      priceUnavailable: quote.status === "unavailable",
      totalInvestment,
      currentValue,
      unrealizedPl,
      plPercentage: percentOf(unrealizedPl, totalInvestment),
    };
  });

  const priced = base.filter((p) => !p.priceUnavailable);
  const pricedValue = priced.reduce((s, p) => s + p.currentValue, 0);
  const pricedPl = priced.reduce((s, p) => s + p.unrealizedPl, 0);
  const weightsUndefined = pricedValue === 0;
  const contributionUndefined = pricedPl === 0;

  const valued: PricedPosition[] = base.map((p) => {
    const weight = p.priceUnavailable ? null : percentOf(p.currentValue, pricedValue);
    const contribution = p.priceUnavailable ? null : percentOf(p.unrealizedPl, pricedPl);
    return {
      ...p,
      weight: weight ?? 0,
      contribution: contribution ?? 0,
      contributionUndefined,
    };
  });

  const totalInvestment = valued.reduce((s, p) => s + p.totalInvestment, 0);
  const totalCurrentValue = pricedValue;
  const totalPl = totalCurrentValue - totalInvestment;

  const snapshot: PortfolioSnapshot = {
    date,
    totalInvestment,
    totalCurrentValue,
    totalPl,
    // totalInvestment > 0 once validatePositions has passed
    totalPlPercentage: (totalPl / totalInvestment) * 100,
  };

  return {
    positions: valued,
    snapshot,
    unpricedSymbols: valued.filter((p) => p.priceUnavailable).map((p) => p.symbol),
    weightsUndefined,
    contributionUndefined,
  };
}

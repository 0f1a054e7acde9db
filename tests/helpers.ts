/**
 * Shared fixtures for the tracker tests.
 */

import type { PerformanceHistory, PortfolioSnapshot, Position } from "../src/types/portfolio.js";

export function position(
  symbol: string,
  purchasePrice: number,
  quantity: number,
  purchaseDate = "2024-01-02"
): Position {
  return { symbol, name: `${symbol} Ltd`, purchasePrice, quantity, purchaseDate };
}

/** Snapshot with a fixed 1000 investment and the given cumulative P&L % */
export function snapshot(date: string, totalPlPercentage: number): PortfolioSnapshot {
  const totalInvestment = 1000;
  const totalPl = (totalInvestment * totalPlPercentage) / 100;
  return {
    date,
    totalInvestment,
    totalCurrentValue: totalInvestment + totalPl,
    totalPl,
    totalPlPercentage,
  };
}

export function history(snapshots: PortfolioSnapshot[], isSynthetic = false): PerformanceHistory {
  return { snapshots, isSynthetic };
}

/** The three-position scenario: one gain, one loss, one without a price */
export const SCENARIO_POSITIONS: Position[] = [
  position("A", 100, 10),
  position("B", 200, 10),
  position("C", 50, 10),
];

export const SCENARIO_PRICES = new Map<string, number>([
  ["A", 120],
  ["B", 180],
]);

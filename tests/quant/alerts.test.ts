import { describe, it, expect } from "vitest";
import { comparablePct, evaluateAlerts } from "../../src/quant/alerts.js";
import { valuePortfolio } from "../../src/quant/valuation.js";
import type { Position } from "../../src/types/portfolio.js";
import { position } from "../helpers.js";

function priced(prices: Record<string, number>) {
  const positions = Object.keys(prices).map((s) => position(s, 100, 1));
  positions.push(position("NOPRICE", 100, 1));
  return valuePortfolio(positions, new Map(Object.entries(prices)), "2024-03-05").positions;
}

describe("evaluateAlerts", () => {
  const positions = priced({ FLAT: 105, UP: 105.01, DOWN: 94.99, EDGE: 95 });

  it("should only flag P&L strictly beyond the threshold", () => {
    const alerts = evaluateAlerts(positions, 5);
    expect(alerts.map((a) => [a.symbol, a.direction])).toEqual([
      ["UP", "profit"],
      ["DOWN", "loss"],
    ]);
  });

  it("should carry the position details", () => {
    const [up] = evaluateAlerts(positions, 5);
    expect(up.name).toBe("UP Ltd");
    expect(up.threshold).toBe(5);
    expect(up.currentPrice).toBe(105.01);
    expect(up.plPercentage).toBeCloseTo(5.01, 8);
  });

  it("should skip positions without a price", () => {
    const alerts = evaluateAlerts(positions, 0);
    expect(alerts.map((a) => a.symbol)).not.toContain("NOPRICE");
    expect(alerts).toHaveLength(4);
  });

  it("should not alert on a priced position sitting exactly on the threshold", () => {
    const [p] = valuePortfolio([position("EXACT", 189.2, 1)], new Map([["EXACT", 198.66]]), "2024-03-05")
      .positions;
    expect(p.plPercentage).not.toBe(5);
    expect(evaluateAlerts([p], 5)).toEqual([]);
  });

  it("should hold the boundary for every exact ±5% price in cents", () => {
    const holdings: Position[] = [];
    const prices = new Map<string, number>();
    // Buy prices 0.20 to 200.00 in steps of 0.20, so ±5% is a whole cent
    for (let cents = 20; cents <= 20_000; cents += 20) {
      holdings.push(position(`UP${cents}`, cents / 100, 3));
      prices.set(`UP${cents}`, ((cents * 21) / 20) / 100);
      holdings.push(position(`DN${cents}`, cents / 100, 3));
      prices.set(`DN${cents}`, ((cents * 19) / 20) / 100);
    }
    const valued = valuePortfolio(holdings, prices, "2024-03-05").positions;
    expect(evaluateAlerts(valued, 5)).toEqual([]);
  });

  it("should reject a negative threshold", () => {
    expect(() => evaluateAlerts(positions, -1)).toThrow(RangeError);
    expect(() => evaluateAlerts(positions, Number.NaN)).toThrow(RangeError);
  });
});

describe("comparablePct", () => {
  it("should drop float noise but keep real differences", () => {
    expect(comparablePct(5.000000000000004)).toBe(5);
    expect(comparablePct(-4.999999999999996)).toBe(-5);
    expect(comparablePct(5.01)).toBe(5.01);
  });
});

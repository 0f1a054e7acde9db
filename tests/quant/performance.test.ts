/**
 * Return & Risk Metrics Tests
 *
 * Exact values on hand-built histories plus properties on a seeded walk.
 */

import { describe, it, expect } from "vitest";
import {
  TRADING_DAYS_PER_YEAR,
  dailyReturnSeries,
  drawdownSeries,
  maxDrawdown,
  monthlyReturns,
  pctChange,
  populationStdDev,
  riskMetrics,
  valueReturnSeries,
} from "../../src/quant/performance.js";
import { synthesizeHistory } from "../../src/quant/time-series.js";
import type { DailyReturn } from "../../src/types/portfolio.js";
import { history, snapshot } from "../helpers.js";

function returns(values: number[]): DailyReturn[] {
  return values.map((returnPct, i) => ({ date: `2024-01-${String(i + 2).padStart(2, "0")}`, returnPct }));
}

describe("pctChange", () => {
  it("should return null on a zero base", () => {
    expect(pctChange(0, 5)).toBeNull();
    expect(pctChange(2, 5)).toBe(150);
  });
});

describe("monthlyReturns", () => {
  it("should use the last snapshot of each month", () => {
    const m = monthlyReturns(
      history([snapshot("2024-01-15", 1), snapshot("2024-01-31", 2), snapshot("2024-02-28", 5)])
    );
    expect(m.map((r) => r.period)).toEqual(["2024-01", "2024-02"]);
    expect(m.map((r) => r.label)).toEqual(["Jan 2024", "Feb 2024"]);
    expect(m[0].date).toBe("2024-01-31");
    expect(m[0].totalPlPercentage).toBe(2);
    expect(m[0].monthlyReturn).toBe(0);
    expect(m[1].monthlyReturn).toBe(150);
  });

  it("should leave the return undefined after a zero month", () => {
    const m = monthlyReturns(history([snapshot("2024-01-31", 0), snapshot("2024-02-29", 3)]));
    expect(m[1].monthlyReturn).toBeNull();
  });

  it("should return nothing for an empty history", () => {
    expect(monthlyReturns(history([]))).toEqual([]);
  });
});

describe("return series", () => {
  it("should compute percent change of P&L %", () => {
    const h = history([snapshot("2024-01-02", 1), snapshot("2024-01-03", 2), snapshot("2024-01-04", 1)]);
    expect(dailyReturnSeries(h)).toEqual([
      { date: "2024-01-03", returnPct: 100 },
      { date: "2024-01-04", returnPct: -50 },
    ]);
  });

  it("should skip pairs with a zero base", () => {
    const h = history([snapshot("2024-01-02", 0), snapshot("2024-01-03", 1), snapshot("2024-01-04", 2)]);
    expect(dailyReturnSeries(h)).toEqual([{ date: "2024-01-04", returnPct: 100 }]);
  });

  it("should compute value returns on current value", () => {
    // Values 1000, 1100, 990
    const h = history([snapshot("2024-01-02", 0), snapshot("2024-01-03", 10), snapshot("2024-01-04", -1)]);
    const series = valueReturnSeries(h);
    expect(series).toHaveLength(2);
    expect(series[0].returnPct).toBeCloseTo(10, 10);
    expect(series[1].returnPct).toBeCloseTo(-10, 10);
  });
});

describe("populationStdDev", () => {
  it("should divide by n", () => {
    expect(populationStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it("should be exactly zero for a constant series", () => {
    expect(populationStdDev([0.1, 0.1, 0.1])).toBe(0);
  });
});

describe("maxDrawdown", () => {
  it("should find the worst decline from the running peak", () => {
    const dd = drawdownSeries(returns([10, -50, 20]));
    expect(dd?.[0].drawdownPct).toBe(0);
    expect(dd?.[1].drawdownPct).toBeCloseTo(-50, 10);
    expect(dd?.[2].drawdownPct).toBeCloseTo(-40, 10);
    expect(maxDrawdown(returns([10, -50, 20]))).toBeCloseTo(-50, 10);
  });

  it("should be zero for a rising series", () => {
    expect(maxDrawdown(returns([1, 2, 3]))).toBe(0);
  });

  it("should be undefined when growth hits zero", () => {
    expect(drawdownSeries(returns([-100]))).toBeNull();
    expect(maxDrawdown(returns([-100, 5]))).toBeNull();
  });

  it("should be undefined for an empty series", () => {
    expect(maxDrawdown([])).toBeNull();
  });
});

describe("riskMetrics", () => {
  it("should leave every ratio undefined without returns", () => {
    const m = riskMetrics(history([snapshot("2024-01-02", 3)]));
    expect(m).toEqual({
      basis: "pl_percentage",
      observations: 0,
      skippedReturns: 0,
      isSynthetic: false,
      totalReturn: 3,
      annualizedReturn: null,
      annualizedVolatility: null,
      sharpeRatio: null,
      maxDrawdown: null,
      bestDay: null,
      worstDay: null,
      positiveDayFraction: null,
    });
  });

  it("should count returns skipped on a zero base", () => {
    // 1 → 0 is -100%, 0 → 2 is undefined, 2 → 4 is +100%
    const m = riskMetrics(
      history([
        snapshot("2024-01-02", 1),
        snapshot("2024-01-03", 0),
        snapshot("2024-01-04", 2),
        snapshot("2024-01-05", 4),
      ])
    );
    expect(m.observations).toBe(2);
    expect(m.skippedReturns).toBe(1);
    expect(m.bestDay).toBe(100);
    expect(m.worstDay).toBe(-100);
    expect(riskMetrics(history([])).skippedReturns).toBe(0);
  });

  it("should leave Sharpe undefined for zero volatility", () => {
    // Returns 100, 100, 100
    const m = riskMetrics(
      history([
        snapshot("2024-01-02", 1),
        snapshot("2024-01-03", 2),
        snapshot("2024-01-04", 4),
        snapshot("2024-01-05", 8),
      ])
    );
    expect(m.observations).toBe(3);
    expect(m.annualizedVolatility).toBe(0);
    expect(m.sharpeRatio).toBeNull();
    expect(m.annualizedReturn).toBe(100 * TRADING_DAYS_PER_YEAR);
    expect(m.bestDay).toBe(100);
    expect(m.worstDay).toBe(100);
    expect(m.positiveDayFraction).toBe(100);
    expect(m.maxDrawdown).toBe(0);
    expect(m.totalReturn).toBe(8);
  });

  it("should annualize mean and population volatility", () => {
    // Returns 100, 50: mean 75, std 25
    const m = riskMetrics(
      history([snapshot("2024-01-02", 1), snapshot("2024-01-03", 2), snapshot("2024-01-04", 3)])
    );
    expect(m.annualizedReturn).toBe(75 * 252);
    expect(m.annualizedVolatility).toBeCloseTo(25 * Math.sqrt(252), 8);
    expect(m.sharpeRatio).toBeCloseTo(3 * Math.sqrt(252), 8);
    expect(m.bestDay).toBe(100);
    expect(m.worstDay).toBe(50);
  });

  it("should carry the synthetic flag and basis", () => {
    const h = synthesizeHistory({ startDate: "2024-01-01", endDate: "2024-02-29", initialInvestment: 5000 });
    expect(riskMetrics(h).isSynthetic).toBe(true);
    expect(riskMetrics(h, "value").basis).toBe("value");
  });

  it("should be idempotent", () => {
    const h = synthesizeHistory({ startDate: "2024-01-01", endDate: "2024-06-28", initialInvestment: 5000 });
    expect(riskMetrics(h)).toEqual(riskMetrics(h));
    expect(riskMetrics(h, "value")).toEqual(riskMetrics(h, "value"));
  });

  it("should keep drawdown within [-100, 0] on value returns", () => {
    for (const seed of [1, 2, 3, 4, 5]) {
      const h = synthesizeHistory({ startDate: "2023-01-02", endDate: "2023-12-29", initialInvestment: 5000, seed });
      const dd = riskMetrics(h, "value").maxDrawdown;
      expect(dd).not.toBeNull();
      expect(dd ?? 1).toBeLessThanOrEqual(0);
      expect(dd ?? -101).toBeGreaterThanOrEqual(-100);
    }
  });
});

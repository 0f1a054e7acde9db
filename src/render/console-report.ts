/**
 * Plain-text performance report for the terminal, as printed by analyze.
 */

import type { PortfolioReport, RiskMetrics } from "../types/portfolio.js";
import { formatPct, formatRatio, formatSignedPct } from "../utils/format.js";

const RULE = "=".repeat(50);

function metricLines(m: RiskMetrics): string[] {
  const rows: Array<[string, string]> = [
    ["Total Return", formatSignedPct(m.totalReturn)],
    ["Annualized Return", formatSignedPct(m.annualizedReturn)],
    ["Volatility", formatPct(m.annualizedVolatility)],
    ["Sharpe Ratio", formatRatio(m.sharpeRatio)],
    ["Max Drawdown", formatPct(m.maxDrawdown)],
    ["Best Day", formatSignedPct(m.bestDay)],
    ["Worst Day", formatSignedPct(m.worstDay)],
    ["Positive Days", formatPct(m.positiveDayFraction, 1)],
  ];
  return rows.map(([label, value]) => `  ${label.padEnd(20)}${value}`);
}

export function formatConsoleReport(report: PortfolioReport): string[] {
  const snaps = report.history.snapshots;
  const period =
    snaps.length === 0
      ? "no history"
      : `${snaps[0].date} to ${snaps[snaps.length - 1].date} (${snaps.length} snapshots)`;
  const m = report.riskMetrics;

  const lines = [
    RULE,
    "PORTFOLIO PERFORMANCE REPORT",
    RULE,
    `Period: ${period}`,
  ];
  if (report.history.isSynthetic) lines.push("History is a simulated backfill, not market data");
  lines.push(`Daily observations: ${m.observations}` + (m.skippedReturns > 0 ? `, ${m.skippedReturns} skipped` : ""));
  lines.push("", "Performance Metrics (on P&L %):", ...metricLines(m));

  lines.push("", "Monthly Performance:");
  if (report.monthlyReturns.length === 0) {
    lines.push("  none");
  } else {
    lines.push(`  ${"Month".padEnd(10)}${"Cumulative".padStart(12)}${"Monthly".padStart(12)}`);
    for (const month of report.monthlyReturns) {
      lines.push(
        `  ${month.label.padEnd(10)}` +
          `${formatSignedPct(month.totalPlPercentage).padStart(12)}` +
          `${formatSignedPct(month.monthlyReturn).padStart(12)}`
      );
    }
  }
  lines.push(RULE);
  return lines;
}

/**
 * Email Report Composer
 *
 * Renders a PortfolioReport as a self-contained HTML email:
 *   1. Portfolio summary
 *   2. Risk metrics (both return bases)
 *   3. Per-position performance
 *   4. Alerts outside the ±threshold band
 *   5. Monthly performance
 *
 * Every interpolated value is escaped. Undefined metrics render as "n/a".
 */

import { format } from "date-fns";
import type { PortfolioReport, RiskMetrics } from "../types/portfolio.js";
import {
  escapeHtml,
  formatAmount,
  formatPct,
  formatRatio,
  formatSignedPct,
} from "../utils/format.js";

export const CHART_CID = "portfolio_chart";

const CELL = `style="padding: 10px; border: 1px solid #ddd;"`;
const TABLE = `style="border-collapse: collapse; width: 100%; margin: 20px 0;"`;

function tone(n: number | null): string {
  return n !== null && n >= 0 ? "green" : "red";
}

function row(cells: string[], attrs = ""): string {
  return `<tr${attrs ? " " + attrs : ""}>${cells.map((c) => `<td ${CELL}>${c}</td>`).join("")}</tr>`;
}

function headerRow(cells: string[], background: string): string {
  return (
    `<tr style="background-color: ${background};">` +
    cells.map((c) => `<th ${CELL}>${escapeHtml(c)}</th>`).join("") +
    `</tr>`
  );
}

export function buildSubject(date: Date): string {
  return `Daily Portfolio Report - ${format(date, "yyyy-MM-dd")}`;
}

function summarySection(report: PortfolioReport): string {
  const s = report.summary;
  const plColor = tone(s.totalPl);
  return (
    `<h3>Portfolio Summary</h3><table ${TABLE}>` +
    row([`<strong>Total Investment</strong>`, formatAmount(s.totalInvestment)], `style="background-color: #f8f9fa;"`) +
    row([`<strong>Current Value</strong>`, formatAmount(s.totalCurrentValue)]) +
    row(
      [
        `<strong>Total P&amp;L</strong>`,
        `<span style="color: ${plColor};">${formatAmount(s.totalPl)} (${formatSignedPct(s.totalPlPercentage)})</span>`,
      ],
      `style="background-color: ${s.totalPl >= 0 ? "#d4edda" : "#f8d7da"};"`
    ) +
    `</table>`
  );
}

function metricsSection(literal: RiskMetrics, value: RiskMetrics): string {
  const lines: Array<[string, (m: RiskMetrics) => string]> = [
    ["Total Return", (m) => formatSignedPct(m.totalReturn)],
    ["Annualized Return", (m) => formatSignedPct(m.annualizedReturn)],
    ["Volatility", (m) => formatPct(m.annualizedVolatility)],
    ["Sharpe Ratio", (m) => formatRatio(m.sharpeRatio)],
    ["Max Drawdown", (m) => formatPct(m.maxDrawdown)],
    ["Best Day", (m) => formatSignedPct(m.bestDay)],
    ["Worst Day", (m) => formatSignedPct(m.worstDay)],
    ["Positive Days", (m) => formatPct(m.positiveDayFraction, 1)],
  ];

  return (
    `<h3>Performance Metrics</h3><table ${TABLE}>` +
    headerRow(["Metric", "On P&L %", "On Value"], "#e9ecef") +
    lines.map(([label, f]) => row([`<strong>${label}</strong>`, f(literal), f(value)])).join("") +
    `</table>` +
    `<p style="color: #666; font-size: 12px;">Based on ${literal.observations} daily observations.</p>`
  );
}

function positionsSection(report: PortfolioReport): string {
  const rows = report.positions
    .map((p) => {
      const color = tone(p.plPercentage);
      const price = p.priceUnavailable ? "<em>unavailable</em>" : formatAmount(p.currentPrice);
      const pl = p.priceUnavailable ? "n/a" : formatAmount(p.unrealizedPl);
      const pct = p.priceUnavailable ? "n/a" : formatSignedPct(p.plPercentage);
      return (
        `<tr><td ${CELL}><strong>${escapeHtml(p.symbol)}</strong></td>` +
        `<td ${CELL}>${escapeHtml(p.name)}</td>` +
        `<td ${CELL}>${price}</td>` +
        `<td ${CELL}><span style="color: ${color};">${pl}</span></td>` +
        `<td ${CELL}><span style="color: ${color};">${pct}</span></td>` +
        `<td ${CELL}>${formatPct(p.weight, 1)}</td></tr>`
      );
    })
    .join("");

  return (
    `<h3>Individual Stock Performance</h3><table ${TABLE}>` +
    headerRow(["Stock", "Name", "Current Price", "P&L", "P&L %", "Weight"], "#007bff; color: white") +
    rows +
    `</table>`
  );
}

function alertsSection(report: PortfolioReport): string {
  if (report.alerts.length === 0) return "";
  const threshold = report.alertThresholdPct;
  const rows = report.alerts
    .map((a) =>
      row([
        `<strong>${escapeHtml(a.symbol)}</strong>`,
        a.direction === "profit" ? "PROFIT ALERT" : "LOSS ALERT",
        `<span style="color: ${tone(a.plPercentage)};">${formatSignedPct(a.plPercentage)}</span>`,
      ])
    )
    .join("");

  return (
    `<h3>Alerts (${report.alerts.length} stocks outside &plusmn;${escapeHtml(String(threshold))}% threshold)</h3>` +
    `<table ${TABLE}>` +
    headerRow(["Stock", "Alert Type", "P&L %"], "#fff3cd") +
    rows +
    `</table>`
  );
}

function monthlySection(report: PortfolioReport): string {
  if (report.monthlyReturns.length === 0) return "";
  const rows = report.monthlyReturns
    .map((m) =>
      row([
        escapeHtml(m.label),
        formatSignedPct(m.totalPlPercentage),
        formatSignedPct(m.monthlyReturn),
      ])
    )
    .join("");
  return (
    `<h3>Monthly Performance</h3><table ${TABLE}>` +
    headerRow(["Month", "Cumulative", "Monthly"], "#e9ecef") +
    rows +
    `</table>`
  );
}

function noticesSection(report: PortfolioReport): string {
  const d = report.degradation;
  const notices: string[] = [];
  if (d.isSynthetic) {
    notices.push("Performance history is a simulated backfill, not market data. Metrics are illustrative only.");
  }
  if (d.priceUnavailable) {
    notices.push(`Prices unavailable for: ${d.unpricedSymbols.map(escapeHtml).join(", ")}. Their value is counted as 0.`);
  }
  if (d.skippedReturns > 0) {
    notices.push(`${d.skippedReturns} daily return(s) could not be computed on a zero base and were left out of the metrics.`);
  }
  if (d.insufficientHistory) {
    notices.push("Not enough history for return metrics yet.");
  }
  if (notices.length === 0) return "";
  return `<div style="background-color: #fff3cd; padding: 10px; margin: 20px 0;">${notices
    .map((n) => `<p>${n}</p>`)
    .join("")}</div>`;
}

export interface EmailRenderOptions {
  /** Embed the chart image by content id */
  withChart?: boolean;
}

export function renderEmailReport(report: PortfolioReport, options: EmailRenderOptions = {}): string {
  const reportDate = format(report.generatedAt, "MMMM d, yyyy");
  const chart = options.withChart
    ? `<h3>Charts</h3><img src="cid:${CHART_CID}" alt="Portfolio chart" style="max-width: 100%;"/>`
    : "";

  return `<html>
<head>
<style>
body { font-family: Arial, sans-serif; margin: 20px; }
h2, h3 { color: #333; }
</style>
</head>
<body>
<h2>Daily Portfolio Report - ${escapeHtml(reportDate)}</h2>
<hr>
${noticesSection(report)}
${summarySection(report)}
${metricsSection(report.riskMetrics, report.valueRiskMetrics)}
${positionsSection(report)}
${alertsSection(report)}
${monthlySection(report)}
${chart}
<hr>
<p style="color: #666; font-size: 12px;">Generated ${escapeHtml(format(report.generatedAt, "yyyy-MM-dd HH:mm:ss"))}</p>
</body>
</html>
`;
}

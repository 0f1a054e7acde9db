/**
 * Chart renderer.
 *
 * Lays the chart data out as six panels in one SVG document, keeps the SVG
 * beside a PNG rasterized with resvg, and returns the PNG path: mail
 * clients do not display inline SVG.
 */

import fs from "fs";
import path from "path";
import { format } from "date-fns";
import { Resvg } from "@resvg/resvg-js";
import type { PortfolioReport } from "../types/portfolio.js";
import type { ChartRenderer, ChartResult } from "../types/collaborators.js";
import { buildChartData, type BarDatum, type ChartData, type SeriesPoint } from "./chart-data.js";
import { escapeHtml } from "../utils/format.js";
import { errorMessage } from "../utils/errors.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("chart");

const WIDTH = 1200;
const HEIGHT = 1080;
const PANEL_W = 600;
const PANEL_H = 340;
const HEADER_H = 60;
const PAD = { left: 60, right: 20, top: 36, bottom: 56 };

const COLORS = {
  positive: "#2e7d32",
  negative: "#c62828",
  line: "#1565c0",
  drawdown: "#ad1457",
  guide: "#ef6c00",
  axis: "#9e9e9e",
  text: "#333333",
};

const SLICE_COLORS = [
  "#1565c0", "#2e7d32", "#ef6c00", "#6a1b9a", "#00838f",
  "#c62828", "#558b2f", "#4e342e", "#ad1457", "#283593",
];

export interface Panel {
  x: number;
  y: number;
  title: string;
}

/** Linear scale from [d0, d1] onto [r0, r1] */
function scale(d0: number, d1: number, r0: number, r1: number): (v: number) => number {
  const span = d1 - d0 || 1;
  return (v) => r0 + ((v - d0) / span) * (r1 - r0);
}

function fmt(n: number): string {
  return n.toFixed(1);
}

function text(x: number, y: number, content: string, attrs = ""): string {
  return `<text x="${fmt(x)}" y="${fmt(y)}" fill="${COLORS.text}" ${attrs}>${escapeHtml(content)}</text>`;
}

function panelFrame(p: Panel): string {
  return (
    `<rect x="${p.x + 8}" y="${p.y + 8}" width="${PANEL_W - 16}" height="${PANEL_H - 16}" ` +
    `fill="#ffffff" stroke="#e0e0e0"/>` +
    text(p.x + PANEL_W / 2, p.y + 28, p.title, `font-size="15" font-weight="bold" text-anchor="middle"`)
  );
}

function plotBox(p: Panel) {
  return {
    left: p.x + PAD.left,
    right: p.x + PANEL_W - PAD.right,
    top: p.y + PAD.top + 10,
    bottom: p.y + PANEL_H - PAD.bottom,
  };
}

function noData(p: Panel): string {
  return text(p.x + PANEL_W / 2, p.y + PANEL_H / 2, "No data", `font-size="13" text-anchor="middle"`);
}

/** Value range that always includes zero and never collapses */
function valueRange(values: readonly number[]): [number, number] {
  let lo = Math.min(0, ...values);
  let hi = Math.max(0, ...values);
  if (lo === hi) {
    lo -= 1;
    hi += 1;
  }
  return [lo, hi];
}

function yAxis(p: Panel, lo: number, hi: number, y: (v: number) => number, unit = "%"): string {
  const box = plotBox(p);
  const digits = unit === "%" ? 1 : 0;
  return (
    `<line x1="${box.left}" y1="${fmt(y(0))}" x2="${box.right}" y2="${fmt(y(0))}" stroke="${COLORS.axis}"/>` +
    text(box.left - 6, y(hi) + 4, `${hi.toFixed(digits)}${unit}`, `font-size="10" text-anchor="end"`) +
    text(box.left - 6, y(lo) + 4, `${lo.toFixed(digits)}${unit}`, `font-size="10" text-anchor="end"`)
  );
}

export function linePanel(p: Panel, points: readonly SeriesPoint[], color: string): string {
  if (points.length === 0) return panelFrame(p) + noData(p);

  const box = plotBox(p);
  const [lo, hi] = valueRange(points.map((pt) => pt.value));
  const y = scale(lo, hi, box.bottom, box.top);
  const x =
    points.length === 1
      ? (_i: number) => (box.left + box.right) / 2
      : scale(0, points.length - 1, box.left, box.right);

  const coords = points.map((pt, i) => `${fmt(x(i))},${fmt(y(pt.value))}`).join(" ");
  const first = points[0];
  const last = points[points.length - 1];

  return (
    panelFrame(p) +
    yAxis(p, lo, hi, y) +
    `<polyline points="${coords}" fill="none" stroke="${color}" stroke-width="1.5"/>` +
    text(box.left, box.bottom + 18, first.label, `font-size="10"`) +
    text(box.right, box.bottom + 18, last.label, `font-size="10" text-anchor="end"`)
  );
}

export interface BarOptions {
  /** Dashed horizontal reference lines */
  guides?: readonly number[];
  /** Axis label suffix; "" for counts */
  unit?: string;
}

export function barPanel(p: Panel, bars: readonly BarDatum[], options: BarOptions = {}): string {
  if (bars.length === 0) return panelFrame(p) + noData(p);
  const { guides = [], unit = "%" } = options;

  const box = plotBox(p);
  const [lo, hi] = valueRange([...bars.map((b) => b.value), ...guides]);
  const y = scale(lo, hi, box.bottom, box.top);
  const slot = (box.right - box.left) / bars.length;
  const barW = slot * 0.7;

  const rects = bars
    .map((b, i) => {
      const x = box.left + i * slot + (slot - barW) / 2;
      const top = Math.min(y(0), y(b.value));
      const h = Math.abs(y(b.value) - y(0));
      const cx = x + barW / 2;
      return (
        `<rect x="${fmt(x)}" y="${fmt(top)}" width="${fmt(barW)}" height="${fmt(h)}" fill="${COLORS[b.tone]}"/>` +
        text(cx, box.bottom + 14, b.label, `font-size="9" text-anchor="end" transform="rotate(-45 ${fmt(cx)} ${fmt(box.bottom + 14)})"`)
      );
    })
    .join("");

  const guideLines = guides
    .map(
      (g) =>
        `<line x1="${box.left}" y1="${fmt(y(g))}" x2="${box.right}" y2="${fmt(y(g))}" ` +
        `stroke="${COLORS.guide}" stroke-dasharray="6 4"/>`
    )
    .join("");

  return panelFrame(p) + yAxis(p, lo, hi, y, unit) + rects + guideLines;
}

export function piePanel(p: Panel, slices: readonly SeriesPoint[]): string {
  const total = slices.reduce((s, sl) => s + sl.value, 0);
  if (slices.length === 0 || total <= 0) return panelFrame(p) + noData(p);

  const cx = p.x + 200;
  const cy = p.y + PANEL_H / 2 + 10;
  const r = 110;
  let angle = -Math.PI / 2;

  const shapes = slices
    .map((sl, i) => {
      const color = SLICE_COLORS[i % SLICE_COLORS.length];
      const sweep = (sl.value / total) * 2 * Math.PI;
      if (slices.length === 1) {
        return `<circle cx="${cx}" cy="${cy}" r="${r}" fill="${color}"/>`;
      }
      const x1 = cx + r * Math.cos(angle);
      const y1 = cy + r * Math.sin(angle);
      angle += sweep;
      const x2 = cx + r * Math.cos(angle);
      const y2 = cy + r * Math.sin(angle);
      const large = sweep > Math.PI ? 1 : 0;
      return (
        `<path d="M ${cx} ${cy} L ${fmt(x1)} ${fmt(y1)} A ${r} ${r} 0 ${large} 1 ${fmt(x2)} ${fmt(y2)} Z" ` +
        `fill="${color}" stroke="#ffffff"/>`
      );
    })
    .join("");

  const legend = slices
    .map((sl, i) => {
      const ly = p.y + 60 + i * 18;
      const color = SLICE_COLORS[i % SLICE_COLORS.length];
      return (
        `<rect x="${p.x + 360}" y="${ly - 10}" width="12" height="12" fill="${color}"/>` +
        text(p.x + 378, ly, `${sl.label} ${sl.value.toFixed(1)}%`, `font-size="11"`)
      );
    })
    .join("");

  return panelFrame(p) + shapes + legend;
}

/** Full SVG document for the chart data */
export function renderSvg(data: ChartData): string {
  const panel = (col: number, row: number, title: string): Panel => ({
    x: col * PANEL_W,
    y: HEADER_H + row * PANEL_H,
    title,
  });

  const subtitle = data.isSynthetic
    ? "History is synthetic (simulated backfill), not market data"
    : "";

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" ` +
      `viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="Arial, sans-serif">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#f8f9fa"/>`,
    text(WIDTH / 2, 30, data.title, `font-size="20" font-weight="bold" text-anchor="middle"`),
    subtitle ? text(WIDTH / 2, 50, subtitle, `font-size="12" fill-opacity="0.8" text-anchor="middle"`) : "",
    linePanel(panel(0, 0, "Cumulative P&L (%)"), data.cumulativePl, COLORS.line),
    linePanel(panel(1, 0, "Drawdown (%)"), data.drawdown, COLORS.drawdown),
    barPanel(panel(0, 1, "P&L by Position (%)"), data.positionPl, { guides: data.thresholdGuides }),
    piePanel(panel(1, 1, "Allocation by Current Value"), data.allocation),
    barPanel(panel(0, 2, "Monthly Return (%)"), data.monthlyReturns),
    barPanel(panel(1, 2, "Daily Return Distribution (days)"), data.returnDistribution, { unit: "" }),
    "</svg>",
  ].join("\n");
}

export type ChartFormat = "svg" | "png";

export function chartFileName(generatedAt: Date, ext: ChartFormat = "png"): string {
  return `portfolio_chart_${format(generatedAt, "yyyyMMdd")}.${ext}`;
}

/** Rasterize an SVG document at its own size */
export function rasterize(svg: string): Buffer {
  const resvg = new Resvg(svg, {
    background: "#ffffff",
    fitTo: { mode: "width", value: WIDTH },
    font: { loadSystemFonts: true, defaultFontFamily: "Arial" },
  });
  return resvg.render().asPng();
}

export class PngChartRenderer implements ChartRenderer {
  constructor(private readonly outDir: string) {}

  async render(report: PortfolioReport): Promise<ChartResult> {
    try {
      const svg = renderSvg(buildChartData(report));
      fs.mkdirSync(this.outDir, { recursive: true });
      const svgFile = path.join(this.outDir, chartFileName(report.generatedAt, "svg"));
      fs.writeFileSync(svgFile, svg, "utf-8");
      const pngFile = path.join(this.outDir, chartFileName(report.generatedAt, "png"));
      fs.writeFileSync(pngFile, rasterize(svg));
      log.info(`Chart saved as ${pngFile}`);
      return { ok: true, path: pngFile };
    } catch (err) {
      log.error("Chart rendering failed", { error: errorMessage(err) });
      return { ok: false, error: errorMessage(err) };
    }
  }
}

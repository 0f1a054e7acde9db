/**
 * Reporting Cycle — runs one pass of the tracker.
 *
 *   track:   holdings → live prices → valuation → history upsert → metrics
 *            → alerts → report → chart → email → persist
 *   analyze: holdings → last persisted prices → persisted (or synthetic)
 *            history → metrics → report → chart → persist derived tables
 *   test:    holdings → fixed prices → in-memory history → report → chart
 *
 * History is read once at the start and written once at the end. Only
 * holdings failures abort a cycle; every other failure is recorded in the
 * outcome and the cycle carries on.
 */

import { EventEmitter } from "eventemitter3";
import type { Alert, PortfolioReport, Position } from "../types/portfolio.js";
import type { PriceFeed } from "../types/market.js";
import type { ChartRenderer, ReportMailer, SendResult } from "../types/collaborators.js";
import { TABLES, type HistoryLoad, type PortfolioRepository } from "../storage/portfolio-repository.js";
import { composeReport } from "./compose.js";
import { toIsoDate } from "../quant/time-series.js";
import { buildSubject, renderEmailReport } from "../render/email-report.js";
import { errorMessage, isFatalHoldingsError, type PortfolioError } from "../utils/errors.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("cycle");

export type CycleMode = "track" | "analyze" | "test";

export type CycleStage =
  | "load_holdings"
  | "load_history"
  | "fetch_prices"
  | "compose"
  | "chart"
  | "email"
  | "persist";

export interface DegradedEvent {
  stage: CycleStage;
  message: string;
}

export interface CycleEvents {
  stage: (stage: CycleStage, mode: CycleMode) => void;
  alert: (alert: Alert) => void;
  degraded: (event: DegradedEvent) => void;
}

export type EmailOutcome = SendResult | { sent: false; reason: "skipped" };

export interface CycleOutcome {
  mode: CycleMode;
  /** 0 unless holdings could not be loaded */
  exitCode: 0 | 1;
  report?: PortfolioReport;
  chartPath?: string;
  email: EmailOutcome;
  persisted: boolean;
  degraded: DegradedEvent[];
  error?: PortfolioError;
}

export interface ReportingCycleDeps {
  repository: PortfolioRepository;
  /** Live feed used by track */
  priceFeed: PriceFeed;
  /** Fixed feed used by test */
  mockPriceFeed?: PriceFeed;
  chartRenderer: ChartRenderer;
  mailer: ReportMailer;
  alertThresholdPct: number;
  syntheticSeed: number;
  clock?: () => Date;
}

export class ReportingCycle extends EventEmitter<CycleEvents> {
  private readonly clock: () => Date;

  constructor(private readonly deps: ReportingCycleDeps) {
    super();
    this.clock = deps.clock ?? (() => new Date());
  }

  track(): Promise<CycleOutcome> {
    return this.run("track");
  }

  analyze(): Promise<CycleOutcome> {
    return this.run("analyze");
  }

  test(): Promise<CycleOutcome> {
    return this.run("test");
  }

  private async run(mode: CycleMode): Promise<CycleOutcome> {
    const now = this.clock();
    const today = toIsoDate(now);
    const degraded: DegradedEvent[] = [];
    const degrade = (stage: CycleStage, message: string): void => {
      const event = { stage, message };
      degraded.push(event);
      log.warn(`${stage}: ${message}`);
      this.emit("degraded", event);
    };
    const stage = (s: CycleStage): void => {
      this.emit("stage", s, mode);
    };

    log.info(`Starting ${mode} cycle for ${today}`);

    // ── 1. Holdings (fatal) ───────────────────────────────────
    stage("load_holdings");
    let positions: Position[];
    try {
      positions = this.deps.repository.loadPositions();
    } catch (err) {
      return this.fatal(mode, err, degraded);
    }

    // ── 2. History (read once) ────────────────────────────────
    stage("load_history");
    const loaded: HistoryLoad =
      mode === "test" ? { status: "missing" } : this.deps.repository.readHistory();
    if (loaded.status === "corrupt") {
      degrade("load_history", `performance history unreadable, starting from today: ${loaded.reason}`);
    }
    const persisted = loaded.status === "loaded" ? loaded.history : null;

    // ── 3. Prices ─────────────────────────────────────────────
    stage("fetch_prices");
    const symbols = positions.map((p) => p.symbol);
    const prices = await this.fetchPrices(mode, symbols, degrade);

    // ── 4. Valuation, history, metrics, alerts ───────────────
    stage("compose");
    let report: PortfolioReport;
    try {
      report = composeReport({
        positions,
        prices,
        history: persisted,
        historyMode: mode === "analyze" ? "replay" : "append",
        now,
        alertThresholdPct: this.deps.alertThresholdPct,
        syntheticSeed: this.deps.syntheticSeed,
      });
    } catch (err) {
      return this.fatal(mode, err, degraded);
    }

    const { unpricedSymbols } = report.degradation;
    if (unpricedSymbols.length > 0) {
      degrade("compose", `price unavailable for ${unpricedSymbols.join(", ")}`);
    }
    for (const alert of report.alerts) {
      log.info(`${alert.symbol}: ${alert.direction.toUpperCase()} ALERT ${alert.plPercentage.toFixed(2)}%`);
      this.emit("alert", alert);
    }

    // ── 5. Chart ──────────────────────────────────────────────
    stage("chart");
    const chart = await this.deps.chartRenderer.render(report);
    if (!chart.ok) degrade("chart", chart.error);
    const chartPath = chart.ok ? chart.path : undefined;

    // ── 6. Email (track only) ─────────────────────────────────
    let email: EmailOutcome = { sent: false, reason: "skipped" };
    if (mode === "track") {
      stage("email");
      email = await this.deps.mailer.send({
        subject: buildSubject(now),
        html: renderEmailReport(report, { withChart: chartPath !== undefined }),
        attachmentPath: chartPath,
      });
      if (!email.sent && this.deps.mailer.configured) degrade("email", email.reason);
    }

    // ── 7. Persist (write once) ───────────────────────────────
    let saved = false;
    if (mode !== "test") {
      stage("persist");
      const keepHistory = loaded.status === "corrupt";
      try {
        this.deps.repository.saveResults(report, { keepHistory });
        saved = true;
      } catch (err) {
        degrade("persist", errorMessage(err));
      }
      if (keepHistory) {
        degrade("persist", `${TABLES.history} left as is until it is repaired`);
      }
    }

    const s = report.summary;
    log.info(
      `${mode} cycle complete: ${positions.length} positions, ${prices.size} prices, ` +
        `${report.alerts.length} alerts, total P&L ${s.totalPl.toFixed(2)} (${s.totalPlPercentage.toFixed(2)}%)`
    );

    return { mode, exitCode: 0, report, chartPath, email, persisted: saved, degraded };
  }

  private async fetchPrices(
    mode: CycleMode,
    symbols: string[],
    degrade: (stage: CycleStage, message: string) => void
  ): Promise<Map<string, number>> {
    if (mode === "analyze") {
      return this.deps.repository.loadLatestPrices();
    }

    const feed = mode === "test" ? this.deps.mockPriceFeed : this.deps.priceFeed;
    if (!feed) {
      degrade("fetch_prices", "no price feed configured for test mode");
      return new Map();
    }

    try {
      return await feed.fetchPrices(symbols);
    } catch (err) {
      degrade("fetch_prices", `${feed.name} feed failed: ${errorMessage(err)}`);
      return new Map();
    }
  }

  private fatal(mode: CycleMode, err: unknown, degraded: DegradedEvent[]): CycleOutcome {
    if (!isFatalHoldingsError(err)) throw err;
    log.error(`${mode} cycle aborted: ${err.message}`);
    return {
      mode,
      exitCode: 1,
      email: { sent: false, reason: "skipped" },
      persisted: false,
      degraded,
      error: err,
    };
  }
}

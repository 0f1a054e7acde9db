/**
 * Portfolio Repository
 *
 * The tracker's tables on top of a TableStore:
 *   holdings             — input positions (read only)
 *   positions            — last priced positions
 *   performance_history  — daily snapshots, the only cross-cycle state
 *   monthly_returns      — derived cache
 *   risk_metrics         — derived cache, metric/value rows
 *
 * Every table read is validated with zod.
 */

import type { ZodError } from "zod";
import type {
  PerformanceHistory,
  PortfolioReport,
  Position,
  RiskMetrics,
} from "../types/portfolio.js";
import type { TableStore } from "./table-store.js";
import { normalizeHistory } from "../quant/time-series.js";
import {
  HistoryTableSchema,
  HoldingsTableSchema,
  PricedPositionTableSchema,
} from "../utils/validation.js";
import { EmptyPortfolioError, HoldingsLoadError, errorMessage } from "../utils/errors.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("repository");

export const TABLES = {
  holdings: "holdings",
  positions: "positions",
  history: "performance_history",
  monthlyReturns: "monthly_returns",
  riskMetrics: "risk_metrics",
} as const;

export interface RiskMetricRow {
  basis: RiskMetrics["basis"];
  metric: string;
  value: number | boolean | null;
}

const METRIC_KEYS = [
  "observations",
  "skippedReturns",
  "isSynthetic",
  "totalReturn",
  "annualizedReturn",
  "annualizedVolatility",
  "sharpeRatio",
  "maxDrawdown",
  "bestDay",
  "worstDay",
  "positiveDayFraction",
] as const satisfies readonly (keyof RiskMetrics)[];

/** Flatten metrics into key/value rows */
export function riskMetricRows(metrics: RiskMetrics): RiskMetricRow[] {
  return METRIC_KEYS.map((metric) => ({
    basis: metrics.basis,
    metric,
    value: metrics[metric],
  }));
}

export type HistoryLoad =
  | { status: "missing" }
  | { status: "loaded"; history: PerformanceHistory }
  | { status: "corrupt"; reason: string };

export interface SaveOptions {
  /** Skip the history table, e.g. when the stored one could not be read */
  keepHistory?: boolean;
}

function describeZodError(err: ZodError): string {
  return err.issues
    .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
}

export class PortfolioRepository {
  constructor(private readonly store: TableStore) {}

  /**
   * Load holdings. Missing or malformed tables are fatal.
   */
  loadPositions(): Position[] {
    let raw: unknown;
    try {
      raw = this.store.read(TABLES.holdings);
    } catch (err) {
      throw new HoldingsLoadError(`Holdings table unreadable: ${errorMessage(err)}`, err);
    }
    if (raw === null) {
      throw new HoldingsLoadError(`Holdings table "${TABLES.holdings}" not found`);
    }

    const parsed = HoldingsTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new HoldingsLoadError(
        `Holdings table malformed: ${describeZodError(parsed.error)}`,
        parsed.error
      );
    }
    if (parsed.data.length === 0) throw new EmptyPortfolioError();

    log.info(`Loaded ${parsed.data.length} holdings`);
    return parsed.data;
  }

  /**
   * Read the persisted history, telling an absent table apart from one that
   * exists but cannot be parsed. A corrupt table must not be overwritten.
   */
  readHistory(): HistoryLoad {
    let raw: unknown;
    try {
      raw = this.store.read(TABLES.history);
    } catch (err) {
      return this.corruptHistory(errorMessage(err));
    }
    if (raw === null) return { status: "missing" };

    const parsed = HistoryTableSchema.safeParse(raw);
    if (!parsed.success) return this.corruptHistory(describeZodError(parsed.error));
    if (parsed.data.snapshots.length === 0) return { status: "missing" };

    const history = normalizeHistory(parsed.data.snapshots, parsed.data.isSynthetic);
    log.info(
      `Loaded performance history: ${history.snapshots.length} records ` +
        `(${history.snapshots[0].date} → ${history.snapshots[history.snapshots.length - 1].date})`
    );
    return { status: "loaded", history };
  }

  /** The persisted history, or null when it is missing or unreadable */
  loadHistory(): PerformanceHistory | null {
    const loaded = this.readHistory();
    return loaded.status === "loaded" ? loaded.history : null;
  }

  private corruptHistory(reason: string): HistoryLoad {
    log.warn(`Unreadable performance history: ${reason}`);
    return { status: "corrupt", reason };
  }

  /** Prices from the last persisted positions table; absent when never priced */
  loadLatestPrices(): Map<string, number> {
    const prices = new Map<string, number>();
    try {
      const raw = this.store.read(TABLES.positions);
      if (raw === null) return prices;
      for (const row of PricedPositionTableSchema.parse(raw)) {
        if (row.currentPrice !== null) prices.set(row.symbol, row.currentPrice);
      }
    } catch (err) {
      log.warn(`Ignoring unreadable positions table: ${errorMessage(err)}`);
    }
    return prices;
  }

  /**
   * Persist the cycle's tables. A synthetic history is never written over
   * the real history table, and keepHistory leaves that table untouched.
   */
  saveResults(report: PortfolioReport, options: SaveOptions = {}): string[] {
    const written: string[] = [];

    this.store.write(TABLES.positions, report.positions);
    written.push(TABLES.positions);

    if (!report.history.isSynthetic && !options.keepHistory) {
      this.store.write(TABLES.history, {
        isSynthetic: false,
        snapshots: report.history.snapshots,
      });
      written.push(TABLES.history);
    }

    this.store.write(TABLES.monthlyReturns, report.monthlyReturns);
    written.push(TABLES.monthlyReturns);

    this.store.write(TABLES.riskMetrics, [
      ...riskMetricRows(report.riskMetrics),
      ...riskMetricRows(report.valueRiskMetrics),
    ]);
    written.push(TABLES.riskMetrics);

    log.info(`Saved tables: ${written.join(", ")}`);
    return written;
  }
}

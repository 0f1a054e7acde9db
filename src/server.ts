/**
 * Express API Server — read-only portfolio report
 *
 *   GET /api/report    — Full report (replayed from persisted tables)
 *   GET /api/history   — Daily snapshots
 *   GET /api/metrics   — Risk metrics (?basis=pl_percentage|value)
 *   GET /api/monthly   — Monthly returns
 *   GET /api/alerts    — Positions outside the alert band
 *   GET /api/status    — Degradation flags and table counts
 *
 * Every request recomputes from the stores and never writes. No network
 * calls are made: prices come from the last persisted positions table.
 *
 * Start: npm run serve
 */

import express, { type Request, type Response } from "express";
import { z } from "zod";
import type { PortfolioReport } from "./types/portfolio.js";
import type { Config } from "./config/index.js";
import type { PortfolioRepository } from "./storage/portfolio-repository.js";
import { composeReport } from "./pipeline/compose.js";
import { PortfolioError, errorMessage } from "./utils/errors.js";
import { componentLogger } from "./utils/logger.js";

const log = componentLogger("server");

export interface ServerDeps {
  repository: PortfolioRepository;
  config: Pick<Config, "alertThresholdPct" | "synthetic">;
  clock?: () => Date;
}

const MetricsQuerySchema = z.object({
  basis: z.enum(["pl_percentage", "value"]).default("pl_percentage"),
});

export function createServer(deps: ServerDeps): express.Express {
  const clock = deps.clock ?? (() => new Date());
  const app = express();

  function currentReport(): PortfolioReport {
    return composeReport({
      positions: deps.repository.loadPositions(),
      prices: deps.repository.loadLatestPrices(),
      history: deps.repository.loadHistory(),
      historyMode: "replay",
      now: clock(),
      alertThresholdPct: deps.config.alertThresholdPct,
      syntheticSeed: deps.config.synthetic.seed,
    });
  }

  /** Run a handler against the current report, mapping failures to JSON */
  function withReport(handler: (report: PortfolioReport, req: Request, res: Response) => void) {
    return (req: Request, res: Response): void => {
      let report: PortfolioReport;
      try {
        report = currentReport();
      } catch (err) {
        if (err instanceof PortfolioError) {
          log.warn(`Report unavailable: ${err.message}`);
          res.status(503).json({ error: err.message, code: err.code });
          return;
        }
        log.error("Report computation failed", { error: errorMessage(err) });
        res.status(500).json({ error: errorMessage(err), code: "INTERNAL" });
        return;
      }
      handler(report, req, res);
    };
  }

  app.get(
    "/api/report",
    withReport((report, _req, res) => {
      res.json(report);
    })
  );

  app.get(
    "/api/history",
    withReport((report, _req, res) => {
      res.json(report.history);
    })
  );

  app.get(
    "/api/metrics",
    withReport((report, req, res) => {
      const query = MetricsQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: "basis must be pl_percentage or value", code: "BAD_REQUEST" });
        return;
      }
      res.json(query.data.basis === "value" ? report.valueRiskMetrics : report.riskMetrics);
    })
  );

  app.get(
    "/api/monthly",
    withReport((report, _req, res) => {
      res.json(report.monthlyReturns);
    })
  );

  app.get(
    "/api/alerts",
    withReport((report, _req, res) => {
      res.json({ thresholdPct: report.alertThresholdPct, alerts: report.alerts });
    })
  );

  app.get(
    "/api/status",
    withReport((report, _req, res) => {
      res.json({
        date: report.summary.date,
        positions: report.positions.length,
        snapshots: report.history.snapshots.length,
        degradation: report.degradation,
      });
    })
  );

  return app;
}

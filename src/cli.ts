/**
 * Command wiring for the tracker.
 *
 *   track     — live prices, append today's snapshot, email, persist
 *   analyze   — replay persisted tables (or a synthetic backfill), no network
 *   test      — fixed prices from mock-prices.json, nothing persisted or sent
 *   schedule  — run track every day at REPORT_SCHEDULE
 *   serve     — read-only JSON API on PORT
 */

import path from "path";
import type { Server } from "http";
import { z } from "zod";
import type { Config, Env } from "./config/index.js";
import { JsonFileTableStore } from "./storage/table-store.js";
import { PortfolioRepository } from "./storage/portfolio-repository.js";
import { YahooPriceFeed } from "./api/market-data/yahoo.js";
import { StaticPriceFeed, loadMockPrices } from "./api/market-data/static.js";
import { PngChartRenderer } from "./render/svg-chart.js";
import { createMailer } from "./notify/mailer.js";
import { formatConsoleReport } from "./render/console-report.js";
import { ReportingCycle, type CycleOutcome } from "./pipeline/reporting-cycle.js";
import { DailyScheduler, parseSchedule } from "./pipeline/schedule.js";
import { createServer } from "./server.js";
import { errorMessage } from "./utils/errors.js";
import { componentLogger } from "./utils/logger.js";

const log = componentLogger("cli");

export const CommandSchema = z.enum(["track", "analyze", "test", "schedule", "serve"]);
export type Command = z.infer<typeof CommandSchema>;

export const MOCK_PRICES_FILE = "mock-prices.json";

export const USAGE = `Usage: portfolio-tracker <command>

Commands:
  track      Fetch live prices, update history, email the report
  analyze    Recompute metrics from persisted data (no network)
  test       Dry run with fixed prices (nothing persisted or sent)
  schedule   Run track daily at REPORT_SCHEDULE
  serve      Start the read-only JSON API on PORT`;

/** Exit codes */
export const EXIT = { ok: 0, fatal: 1, usage: 2 } as const;

export function parseCommand(argv: readonly string[]): Command | null {
  const parsed = CommandSchema.safeParse(argv[0]);
  return parsed.success ? parsed.data : null;
}

export interface Runtime {
  cycle: ReportingCycle;
  repository: PortfolioRepository;
}

/** Build the cycle and its collaborators from config */
export function createRuntime(cfg: Config, env: Env = process.env): Runtime {
  const repository = new PortfolioRepository(new JsonFileTableStore(cfg.dataDir));

  let mockPriceFeed: StaticPriceFeed | undefined;
  try {
    mockPriceFeed = new StaticPriceFeed(loadMockPrices(path.join(cfg.dataDir, MOCK_PRICES_FILE)));
  } catch (err) {
    log.debug(`No mock prices loaded: ${errorMessage(err)}`);
  }

  const cycle = new ReportingCycle({
    repository,
    priceFeed: new YahooPriceFeed({
      symbolSuffix: cfg.market.symbolSuffix,
      timeoutMs: cfg.market.timeoutMs,
    }),
    mockPriceFeed,
    chartRenderer: new PngChartRenderer(cfg.chartDir),
    mailer: createMailer(cfg, env),
    alertThresholdPct: cfg.alertThresholdPct,
    syntheticSeed: cfg.synthetic.seed,
  });

  return { cycle, repository };
}

function logOutcome(outcome: CycleOutcome): void {
  if (outcome.error) {
    log.error(`${outcome.mode} failed: ${outcome.error.message}`);
    return;
  }
  const email = outcome.email.sent ? "sent" : `not sent (${outcome.email.reason})`;
  log.info(
    `${outcome.mode} done: chart ${outcome.chartPath ?? "not rendered"}, email ${email}, ` +
      `${outcome.persisted ? "tables saved" : "nothing saved"}` +
      (outcome.degraded.length > 0 ? `, ${outcome.degraded.length} degraded stage(s)` : "")
  );
}

export interface Started {
  /** Release timers and sockets */
  stop: () => Promise<void>;
}

export type CommandResult =
  | { kind: "exit"; code: number; outcome?: CycleOutcome }
  | { kind: "running"; handle: Started };

/**
 * Run one command. One-shot commands resolve with their exit code;
 * schedule and serve resolve once started.
 */
export async function runCommand(
  command: Command,
  cfg: Config,
  runtime: Runtime = createRuntime(cfg)
): Promise<CommandResult> {
  const { cycle, repository } = runtime;

  switch (command) {
    case "track":
    case "analyze":
    case "test": {
      const outcome = await cycle[command]();
      if (command === "analyze" && outcome.report) {
        for (const line of formatConsoleReport(outcome.report)) log.info(line);
      }
      logOutcome(outcome);
      return { kind: "exit", code: outcome.exitCode, outcome };
    }

    case "schedule": {
      const scheduler = new DailyScheduler(parseSchedule(cfg.reportSchedule), async () => {
        logOutcome(await cycle.track());
      });
      const first = scheduler.start();
      log.info(`Scheduler started: daily at ${cfg.reportSchedule}, first run ${first.toISOString()}`);
      return {
        kind: "running",
        handle: {
          stop: async () => scheduler.stop(),
        },
      };
    }

    case "serve": {
      const app = createServer({ repository, config: cfg });
      const server = await new Promise<Server>((resolve) => {
        const s = app.listen(cfg.port, () => resolve(s));
      });
      log.info(`Read-only API listening on http://localhost:${cfg.port}`);
      return {
        kind: "running",
        handle: {
          stop: () =>
            new Promise<void>((resolve, reject) => {
              server.close((err) => (err ? reject(err) : resolve()));
            }),
        },
      };
    }
  }
}

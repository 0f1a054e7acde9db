#!/usr/bin/env node
/**
 * Portfolio Tracker — Entry Point
 *
 * Daily valuation, performance history, risk metrics and email report for
 * a personal equity portfolio.
 */

import { config } from "./config/index.js";
import { EXIT, USAGE, parseCommand, runCommand } from "./cli.js";
import { configureLogging, logger } from "./utils/logger.js";

async function main(): Promise<void> {
  const command = parseCommand(process.argv.slice(2));
  if (!command) {
    console.error(USAGE);
    process.exitCode = EXIT.usage;
    return;
  }

  configureLogging({ level: config.logLevel, file: config.logFile });
  logger.info(`═══ Portfolio Tracker: ${command} ═══`);
  logger.info(
    `Environment: ${config.nodeEnv}, data: ${config.dataDir}` +
      (config.logFile ? `, log file: ${config.logFile}` : "")
  );

  const result = await runCommand(command, config);
  if (result.kind === "exit") {
    process.exitCode = result.code;
    return;
  }

  // ── Shutdown ─────────────────────────────────────────────
  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down...`);
    result.handle.stop().then(
      () => process.exit(EXIT.ok),
      (err: unknown) => {
        logger.error("Shutdown failed", { error: String(err) });
        process.exit(EXIT.fatal);
      }
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  process.exit(EXIT.fatal);
});

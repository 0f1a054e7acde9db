/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 *
 * The pipeline never reads this module's singleton: the CLI loads it once
 * and passes the value down.
 */

import { z } from "zod";
import dotenv from "dotenv";
import { LOG_LEVELS } from "../utils/logger.js";

dotenv.config();

const SCHEDULE_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

const ConfigSchema = z.object({
  // Email report
  email: z.object({
    sender: z.string().default(""),
    receiver: z.string().default(""),
    /** Name of the env var that holds the SMTP password */
    passwordEnv: z.string().min(1).default("SMTP_PASSWORD"),
    smtpHost: z.string().min(1).default("smtp.gmail.com"),
    smtpPort: z.coerce.number().int().positive().default(465),
  }),

  // Alerting & scheduling
  alertThresholdPct: z.coerce.number().nonnegative().default(5),
  reportSchedule: z
    .string()
    .regex(SCHEDULE_PATTERN, "REPORT_SCHEDULE must be HH:mm")
    .default("05:00"),

  // Market data
  market: z.object({
    /** Exchange suffix appended to every symbol, e.g. ".NS" */
    symbolSuffix: z.string().default(""),
    timeoutMs: z.coerce.number().int().positive().default(10_000),
  }),

  // Synthetic backfill
  synthetic: z.object({
    seed: z.coerce.number().int().default(42),
  }),

  // Storage & output
  dataDir: z.string().min(1).default("data"),
  chartDir: z.string().min(1).default("charts"),

  // System
  logLevel: z.enum(LOG_LEVELS).default("info"),
  /** JSON-lines log file, in addition to the console */
  logFile: z.string().optional(),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().positive().default(3000),
});

export type Config = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

/** Treat empty strings as unset so defaults apply */
function opt(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(env: Env = process.env): Config {
  const raw = {
    email: {
      sender: opt(env.EMAIL_SENDER),
      receiver: opt(env.EMAIL_RECEIVER),
      passwordEnv: opt(env.EMAIL_PASSWORD_ENV),
      smtpHost: opt(env.SMTP_HOST),
      smtpPort: opt(env.SMTP_PORT),
    },
    alertThresholdPct: opt(env.ALERT_THRESHOLD_PCT),
    reportSchedule: opt(env.REPORT_SCHEDULE),
    market: {
      symbolSuffix: opt(env.SYMBOL_SUFFIX),
      timeoutMs: opt(env.PRICE_TIMEOUT_MS),
    },
    synthetic: {
      seed: opt(env.SYNTHETIC_SEED),
    },
    dataDir: opt(env.DATA_DIR),
    chartDir: opt(env.CHART_DIR),
    logLevel: opt(env.LOG_LEVEL),
    logFile: opt(env.LOG_FILE),
    nodeEnv: opt(env.NODE_ENV),
    port: opt(env.PORT),
  };

  return ConfigSchema.parse(raw);
}

/**
 * Resolve the SMTP password through the configured credentials reference.
 * Returns null unless sender, receiver and password are all present.
 */
export function resolveEmailCredentials(
  cfg: Config,
  env: Env = process.env
): { user: string; pass: string; receiver: string } | null {
  const pass = opt(env[cfg.email.passwordEnv]);
  if (!cfg.email.sender || !cfg.email.receiver || !pass) return null;
  return { user: cfg.email.sender, pass, receiver: cfg.email.receiver };
}

/** Singleton config instance, for the CLI entry point */
export const config = loadConfig();

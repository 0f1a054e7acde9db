/**
 * Winston logging for the tracker.
 *
 * Console lines carry the emitting component. A scheduled or served
 * process can also append JSON lines to LOG_FILE, one object per event,
 * so unattended runs leave a trail.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const consoleLine = printf(({ level, message, timestamp, component, ...meta }) => {
  const tag = component ? `[${String(component)}]` : "[tracker]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} ${level} ${tag} ${message}${metaStr}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(errors({ stack: true }), timestamp({ format: "YYYY-MM-DD HH:mm:ss" })),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), consoleLine),
    }),
  ],
});

export type Logger = winston.Logger;

/** Child logger tagged with a component name, e.g. "cycle" or "repository" */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export type FileTransport = InstanceType<typeof winston.transports.File>;

export interface LoggingOptions {
  level: LogLevel;
  /** Append JSON lines here as well as to the console */
  file?: string;
}

/**
 * Apply the configured level and, when a file is given, add the JSON file
 * transport. Returns the file transport so a caller can detach it.
 */
export function configureLogging(options: LoggingOptions): FileTransport | null {
  logger.level = options.level;
  if (!options.file) return null;

  const file = new winston.transports.File({
    filename: options.file,
    format: combine(timestamp(), json()),
  });
  logger.add(file);
  return file;
}

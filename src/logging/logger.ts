/**
 * Logging for scanprep.
 *
 * stdout carries command output (rule sets, URL lists), so every log
 * line goes to stderr. Lines are JSON with a fixed key order so CI log
 * viewers and grep agree on the layout.
 */

import { type Logger, createLogger as createWinstonLogger, format, transports } from "winston";
import type TransportStream from "winston-transport";
import type { LogLevel } from "../types/config.js";

export type { Logger } from "winston";

export const orderedJsonFormat = format.printf((info) => {
  const { timestamp, level, message, module, ...rest } = info;

  const ordered: Record<string, unknown> = {};

  if (timestamp) ordered.timestamp = timestamp;
  if (level) ordered.level = level;
  if (module) ordered.module = module;
  if (message) ordered.message = message;

  for (const key of Object.keys(rest).sort()) {
    ordered[key] = rest[key];
  }

  return JSON.stringify(ordered);
});

export interface LoggerOptions {
  readonly level?: LogLevel;
  /** Replaces the stderr console transport, e.g. with an in-memory one in tests. */
  readonly transport?: TransportStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const transport =
    options.transport ??
    new transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    });

  return createWinstonLogger({
    level: options.level ?? "info",
    format: format.combine(format.timestamp(), orderedJsonFormat),
    transports: [transport],
  });
}

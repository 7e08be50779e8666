// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import pino from "pino";
import type { Logger, DestinationStream } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type { Logger };

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Configuration options for creating a pino logger instance.
 *
 * @property level - Log severity threshold. Messages below this level are suppressed.
 * @property name - Logger name included in every log entry.
 * @property pretty - Enable pino-pretty for human-readable output. Defaults to true in non-production.
 */
export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

/**
 * Contextual metadata attached to child loggers for request-scoped logging.
 *
 * @property session - Conversation session the request belongs to.
 * @property intent - Routed intent (e.g., "sprint-health", "standup").
 * @property sprint - Sprint id being analyzed.
 */
export interface AnalysisContext {
  session?: string;
  intent?: string;
  sprint?: string;
}

const REDACT = {
  paths: [
    "*.password",
    "*.token",
    "*.secret",
    "*.apiKey",
    "*.authorization",
  ],
  censor: "[REDACTED]",
};

let logDestination: DestinationStream | undefined;

/**
 * Redirect all logger output to a file. The interactive chat calls this
 * before reading from stdin so log lines don't interleave with answers.
 */
export function redirectLogToFile(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  logDestination = pino.destination({ dest: filePath, sync: false });
  const newLogger = pino(
    {
      name: logger.bindings()["name"] ?? "sprint-analyst",
      level: logger.level,
      redact: REDACT,
    },
    logDestination,
  );
  Object.assign(logger, newLogger);
}

/** Change the threshold of the default logger (from the `logging.level` config key). */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a new pino logger with the given options.
 *
 * Sensitive fields (password, token, secret, apiKey, authorization) are
 * redacted. If {@link redirectLogToFile} was called, the logger writes to
 * the file destination instead of stdout.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    name = "sprint-analyst",
    pretty = process.env["NODE_ENV"] !== "production",
  } = options;

  const transport = !logDestination && pretty
    ? { target: "pino-pretty", options: { colorize: true, destination: 2 } }
    : undefined;

  const pinoOptions = { name, level, transport, redact: REDACT };

  return logDestination ? pino(pinoOptions, logDestination) : pino(pinoOptions);
}

/** Default logger instance for convenience. */
export const logger = createLogger();

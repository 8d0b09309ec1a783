/**
 * Logger Module
 * Structured logging using pino, written to stderr
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && !isTest();
}

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return "info";
}

const loggers = new Set<PinoLogger>();

/**
 * Changes the level of every logger created so far, e.g. for `--debug`
 */
export function setLogLevel(level: LogLevel): void {
  process.env.LOG_LEVEL = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "fetcher", "reconciliation", "sync")
 * @param options - Optional configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger("fetcher");
 * logger.info({ formId }, "Fetching submissions");
 * logger.error({ err }, "Page request failed");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  // Pretty output on stderr in development so stdout stays clean for --json
  if (isDevelopment()) {
    return track(pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    }));
  }

  return track(pino(baseOptions, pino.destination(2)));
}

function track(logger: PinoLogger): PinoLogger {
  loggers.add(logger);
  return logger;
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;

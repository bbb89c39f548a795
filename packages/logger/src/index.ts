/**
 * @linkshrink/logger - Structured Logging Package
 *
 * Consistent structured logging for every LinkShrink package.
 * Uses pino for JSON logging, pino-pretty while developing.
 *
 * Usage:
 * ```ts
 * import { createLogger } from "@linkshrink/logger";
 *
 * const log = createLogger("registry");
 * log.debug({ shrinker: "shorty" }, "Shrinker registered");
 * ```
 */

import pino from "pino";

// ============================================================================
// Log Levels
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

const DEFAULT_LEVEL: LogLevel = "info";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a LOG_LEVEL value, falling back to "info" when unset or unknown.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LEVEL;
}

// ============================================================================
// Configuration
// ============================================================================

export interface LoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel;

  /** Write here instead of stdout (no pretty transport) */
  destination?: pino.DestinationStream;
}

const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "linkshrink";

/** Shrinker API keys, top level or one object down */
export const REDACTED_PATHS = ["apiKey", "*.apiKey"];

// ============================================================================
// Logger Factory
// ============================================================================

function buildOptions(name: string, options: LoggerOptions): pino.LoggerOptions {
  const pretty = NODE_ENV === "development" && options.destination === undefined;

  return {
    name: `${SERVICE_NAME}:${name}`,
    level: options.level ?? resolveLogLevel(process.env.LOG_LEVEL),
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[Redacted]" },
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      component: name,
      env: NODE_ENV,
    },
  };
}

/**
 * Create a logger for a package component
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const loggerOptions = buildOptions(name, options);
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

export type { Logger } from "pino";

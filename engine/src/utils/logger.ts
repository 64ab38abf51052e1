/**
 * Cellar Engine -- Structured Logger
 *
 * Wraps pino for structured logging. All engine operations log through
 * this module.
 *
 * When verbose=false (default), logging is silent so CLI users only see
 * clean output. When verbose=true, structured logs go to stderr.
 *
 * NOTE: pino.destination() instead of pino transports: transports spawn
 * worker_threads, which break inside bundles.
 */

import pino from "pino";

export const LOG_LEVELS = ["silent", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level: LogLevel;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;

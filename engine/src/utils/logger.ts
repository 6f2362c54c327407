/**
 * dscpack Engine -- Structured Logger
 *
 * Wraps pino. Silent by default so the CLI owns what the user sees;
 * with --verbose the pipeline's step-by-step log goes to stderr.
 *
 * NOTE: pino.destination() instead of pino transports, which spawn
 * worker_threads we do not want inside a short-lived CLI process.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** File descriptor to write to (default: stderr) */
  fd: number;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
  fd: 2,
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
    pino.destination({ fd: opts.fd, sync: true }),
  );
}

export type Logger = pino.Logger;

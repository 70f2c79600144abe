/**
 * Structured logging for the library back end.
 *
 * Call sites use `logger.<level>(message, data?)`; the wrapper forwards to
 * pino's `(object, message)` form so fields land as top-level JSON keys.
 * Development output goes through pino-pretty.
 */

import pino from "pino";
import { getEnvConfig } from "@/lib/config/env.schema";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogData = Record<string, unknown>;

type LogMethod = (message: string, data?: LogData) => void;

export type Logger = Record<LogLevel, LogMethod>;

function createPinoLogger(): pino.Logger {
  const env = getEnvConfig();

  const options: pino.LoggerOptions = {
    level: env.LOG_LEVEL,
    name: "library-desk",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (env.NODE_ENV === "development") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(options);
}

let pinoInstance: pino.Logger | null = null;

function getPino(): pino.Logger {
  if (!pinoInstance) {
    pinoInstance = createPinoLogger();
  }
  return pinoInstance;
}

function method(level: LogLevel): LogMethod {
  return (message, data) => {
    const target = getPino();
    if (data) {
      target[level](data, message);
    } else {
      target[level](message);
    }
  };
}

export const logger: Logger = {
  trace: method("trace"),
  debug: method("debug"),
  info: method("info"),
  warn: method("warn"),
  error: method("error"),
  fatal: method("fatal"),
};

/**
 * Normalizes a caught value for the `error` field of a log entry.
 */
export function toLogError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { pino } from "pino";

import type { DestinationStream, Logger, LoggerOptions } from "pino";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export interface LoggerFactoryOptions {
  name?: string;
  /**
   * Falls back to `process.env.LOG_LEVEL`, then `"info"`.
   */
  level?: LoggerLevels | "silent";
  /**
   * Route output through pino-pretty. Ignores `destination`.
   */
  pretty?: boolean;
  destination?: DestinationStream;
}

const createPinoLogger = (options: LoggerFactoryOptions): Logger => {
  const pinoOptions: LoggerOptions = {
    name: options.name,
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
  };

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
};

/**
 * Structured logger backed by pino.
 * Errors are logged under `err` so pino's error serializer picks them up.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoLogger = createPinoLogger(options);

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      if (message instanceof Error) {
        pinoLogger[level]({ ...meta, err: message }, message.message);
        return;
      }
      pinoLogger[level](meta ?? {}, message);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, pinoLogger };
};

const noop = () => undefined;

/**
 * Discards everything. Default logger for library components.
 */
export const silentLogger: BaseLogger = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop,
};

export default loggerFactory;

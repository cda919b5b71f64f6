import { pino, type Logger, type LoggerOptions } from "pino";
import { isMainThread, parentPort } from "node:worker_threads";

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
export interface WorkerLoggerPostMessageType {
  level: LoggerLevels;
  message: LoggerMessage;
  meta?: LoggerMeta;
  type: "message";
}

export type LoggerFactoryOptions = LoggerOptions & {
  /**
   * Inside a worker thread, post log records to `parentPort` instead of
   * writing them. The main thread relays them with {@link forwardWorkerLogs}.
   *
   * @default true
   */
  forwardToParent?: boolean;
};

const LEVELS: ReadonlySet<string> = new Set<LoggerLevels>([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
]);

const isLoggerLevel = (value: unknown): value is LoggerLevels =>
  typeof value === "string" && LEVELS.has(value);

/**
 * This logger can be used
 * in both the main thread and worker threads.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const { forwardToParent = true, ...pinoOptions } = options;
  const pinoLogger: Logger = pino({
    ...pinoOptions,
    level: pinoOptions.level ?? process.env.LOG_LEVEL ?? "info",
  });

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      //If inside a worker thread
      if (!isMainThread && forwardToParent && parentPort) {
        const postMessage: WorkerLoggerPostMessageType = {
          type: "message",
          level,
          message,
          meta,
        };
        //NOTE: meta has to be structured-cloneable, functions and class instances with methods won't survive
        parentPort.postMessage(postMessage);

        return;
      }
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

export const isWorkerLogMessage = (
  value: unknown,
): value is WorkerLoggerPostMessageType => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "type" in value &&
    value.type === "message" &&
    "level" in value &&
    isLoggerLevel(value.level) &&
    "message" in value &&
    (typeof value.message === "string" || value.message instanceof Error)
  );
};

/**
 * Anything that emits `message` events, e.g. a `Worker`.
 */
export interface MessageSource {
  on(event: "message", listener: (value: unknown) => void): unknown;
  off(event: "message", listener: (value: unknown) => void): unknown;
}

/**
 * Relays records posted by worker-side loggers to `logger`.
 * Messages that aren't log records are left alone.
 *
 * @returns a function that stops the relay
 */
export const forwardWorkerLogs = (
  source: MessageSource,
  logger: BaseLogger,
): (() => void) => {
  const listener = (value: unknown) => {
    if (isWorkerLogMessage(value)) {
      logger[value.level](value.message, value.meta);
    }
  };
  source.on("message", listener);

  return () => {
    source.off("message", listener);
  };
};

export default loggerFactory;

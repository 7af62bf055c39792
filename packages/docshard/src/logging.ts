export interface Logger {
  log(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
  debug(...data: unknown[]): void;
}

export type LogLevel = "log" | "info" | "warn" | "error" | "debug";

/**
 * Structured log line. `event` is a dotted name such as `locate.ceiling-reached`; the remaining
 * fields (`collection`, `baseId`, `shard`, `key`, `error`) depend on the event.
 */
export type LogPayload = { event: string } & Record<string, unknown>;

const handlerFor = (logger: Logger, level: LogLevel) => {
  switch (level) {
    case "info":
      return logger.info;
    case "warn":
      return logger.warn;
    case "error":
      return logger.error;
    case "debug":
      return logger.debug;
    case "log":
      return logger.log;
  }
};

export const logWithLogger = (logger: Logger | undefined, level: LogLevel, payload: LogPayload) => {
  if (!logger) {
    return;
  }
  handlerFor(logger, level).call(logger, payload);
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

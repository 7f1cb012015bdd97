export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

export const resolveLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
};

const formatMeta = (meta?: LogMeta): string =>
  meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";

export const createLogger = (
  scope: string,
  level: LogLevel = resolveLogLevel(process.env.CTXPATH_LOG_LEVEL)
): Logger => {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[ctxpath:${scope}]`;
  const emit = (at: LogLevel, sink: (line: string) => void) => (
    message: string,
    meta?: LogMeta
  ) => {
    if (LEVEL_ORDER[at] < threshold) {
      return;
    }
    sink(`${prefix} ${at.toUpperCase()} ${message}${formatMeta(meta)}`);
  };

  return {
    debug: emit("debug", line => console.debug(line)),
    info: emit("info", line => console.info(line)),
    warn: emit("warn", line => console.warn(line)),
    error: emit("error", line => console.error(line))
  };
};

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};

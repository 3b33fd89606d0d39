// log.ts
// Console-backed logger with a level gate and a tag prefix. Callers that want the
// messages elsewhere pass their own XmlLogger through the document options.

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface XmlLogger {
  debug(message: string, detail?: unknown): void;
  info(message: string, detail?: unknown): void;
  warn(message: string, detail?: unknown): void;
  error(message: string, detail?: unknown): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(v: string | undefined): v is LogLevel {
  return v !== undefined && Object.prototype.hasOwnProperty.call(RANK, v);
}

export function createConsoleLogger(prefix = "[xmlcodec]", level: LogLevel = "warn"): XmlLogger {
  const on = (l: LogLevel) => RANK[l] >= RANK[level];
  const line = (message: string) => `${prefix} ${message}`;
  const emit = (sink: (...args: unknown[]) => void, message: string, detail?: unknown) => {
    if (detail === undefined) sink(line(message));
    else sink(line(message), detail);
  };

  return {
    debug: (m, d) => {
      if (on("debug")) emit(console.debug, m, d);
    },
    info: (m, d) => {
      if (on("info")) emit(console.info, m, d);
    },
    warn: (m, d) => {
      if (on("warn")) emit(console.warn, m, d);
    },
    error: (m, d) => {
      if (on("error")) emit(console.error, m, d);
    },
  };
}

const NOOP = () => {};

export const silentLogger: XmlLogger = {
  debug: NOOP,
  info: NOOP,
  warn: NOOP,
  error: NOOP,
};

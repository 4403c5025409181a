export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const levelRank: Record<Exclude<LogLevel, "silent">, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export type Logger = {
  trace(message: string, ...rest: unknown[]): void;
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
};

const prefix = "[pomodoro-log]";

export const createLogger = (threshold: LogLevel = "info"): Logger => {
  if (threshold === "silent") {
    return createNoopLogger();
  }

  const rank = levelRank[threshold];
  const enabled = (level: Exclude<LogLevel, "silent">) =>
    rank <= levelRank[level];

  return {
    trace: (message, ...rest) => {
      if (enabled("trace")) console.trace(`${prefix} ${message}`, ...rest);
    },
    debug: (message, ...rest) => {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...rest);
    },
    info: (message, ...rest) => {
      if (enabled("info")) console.info(`${prefix} ${message}`, ...rest);
    },
    warn: (message, ...rest) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...rest);
    },
    error: (message, ...rest) => {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...rest);
    },
  };
};

export const createNoopLogger = (): Logger => {
  return {
    trace() {},
    debug() {},
    info() {},
    warn() {},
    error() {},
  };
};

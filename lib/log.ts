export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug: (msg: string, ...rest: unknown[]) => void;
  info: (msg: string, ...rest: unknown[]) => void;
  warn: (msg: string, ...rest: unknown[]) => void;
  error: (msg: string, ...rest: unknown[]) => void;
};

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(v: string): v is LogLevel {
  return v in RANK;
}

function envLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

// Console logger with a "[tag]" prefix, e.g. "[stats] fetched 24310 rows"
export function createLogger(tag: string, level: LogLevel = envLevel()): Logger {
  const min = RANK[level];
  const prefix = `[${tag}]`;
  const on = (l: LogLevel) => RANK[l] >= min;
  return {
    debug: (msg, ...rest) => {
      if (on("debug")) console.debug(prefix, msg, ...rest);
    },
    info: (msg, ...rest) => {
      if (on("info")) console.info(prefix, msg, ...rest);
    },
    warn: (msg, ...rest) => {
      if (on("warn")) console.warn(prefix, msg, ...rest);
    },
    error: (msg, ...rest) => {
      if (on("error")) console.error(prefix, msg, ...rest);
    },
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function minimumLevel(): number {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw === "silent") return Number.POSITIVE_INFINITY;
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return LEVEL_ORDER[raw];
  }
  return LEVEL_ORDER.info;
}

export function log(level: LogLevel, msg: string, data?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] < minimumLevel()) return;

  const entry = {
    level,
    msg,
    timestamp: new Date().toISOString(),
    ...data,
  };
  console[level === "error" ? "error" : "log"](JSON.stringify(entry));
}

export type Logger = {
  [L in LogLevel]: (msg: string, data?: Record<string, unknown>) => void;
};

/** Logger that stamps every entry with the given fields (e.g. jobId). */
export function withContext(context: Record<string, unknown>): Logger {
  const emit = (level: LogLevel) => (msg: string, data?: Record<string, unknown>) =>
    log(level, msg, { ...context, ...data });
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

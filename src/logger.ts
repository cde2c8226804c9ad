export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogMeta = Record<string, unknown>;

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const isLogLevel = (s: string): s is LogLevel => Object.hasOwn(ORDER, s);

const envLevel = process.env.LOG_LEVEL ?? "";
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

function write(level: LogLevel, msg: string, meta?: LogMeta) {
  if (ORDER[level] < ORDER[threshold]) return;
  const tail = meta && Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${msg}${tail}`;
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export const logger = {
  debug: (msg: string, meta?: LogMeta) => write("debug", msg, meta),
  info: (msg: string, meta?: LogMeta) => write("info", msg, meta),
  warn: (msg: string, meta?: LogMeta) => write("warn", msg, meta),
  error: (msg: string, meta?: LogMeta) => write("error", msg, meta),
};

export type Logger = typeof logger;

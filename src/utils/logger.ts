import { getConfig } from "../config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (msg: string, data?: Record<string, unknown>) => void>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

// Unset until setLogLevel() is called; config decides until then.
let levelOverride: LogLevel | undefined;

export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

export function getLogLevel(): LogLevel {
  return levelOverride ?? getConfig().logging.level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
}

export function formatMsg(
  level: LogLevel,
  msg: string,
  data?: Record<string, unknown>,
  scope?: string,
): string {
  const ts = new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : "";
  const base = `${ts} [${level.toUpperCase()}] ${prefix}${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

/** A logger whose lines carry a `[scope]` prefix after the level. */
export function createLogger(scope?: string): Logger {
  const emit = (level: LogLevel) => (msg: string, data?: Record<string, unknown>) => {
    if (shouldLog(level)) WRITERS[level](formatMsg(level, msg, data, scope));
  };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export const log: Logger = createLogger();

import { redact, redactValue } from "../security/pii.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let minLevel: LogLevel = "info";

function isLogLevel(level: string): level is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, level);
}

export function setLogLevel(level: string): void {
  if (isLogLevel(level)) minLevel = level;
}

export type Logger = {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
};

/**
 * One JSON line per entry on the console. Message and data go through PII
 * redaction first, so callers can pass identifiers without pre-cleaning them.
 *
 *   const log = createLogger("orchestrator");
 *   log.warn("registry degraded", { kind: "timeout" });
 */
export function createLogger(service: string): Logger {
  function write(level: LogLevel, message: string, data?: unknown) {
    if (LEVELS[level] < LEVELS[minLevel]) return;
    const entry: Record<string, unknown> = {
      level,
      service,
      message: redact(message),
      timestamp: new Date().toISOString()
    };
    if (data !== undefined) entry.data = redactValue(data);

    const line = JSON.stringify(entry);
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }

  return {
    debug: (m, d) => write("debug", m, d),
    info: (m, d) => write("info", m, d),
    warn: (m, d) => write("warn", m, d),
    error: (m, d) => write("error", m, d)
  };
}

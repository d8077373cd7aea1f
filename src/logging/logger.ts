// =============================================================================
// Logger — Structured decode & dispatch event logging
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

/** Receives every entry; filtering is the sink's business. */
export type Logger = (entry: LogEntry) => void;

export interface ConsoleLoggerOptions {
  /** Lowest level that is printed (default: "info") */
  level?: LogLevel;
  /** Output sink (defaults to console.log) */
  write?: (line: string, data?: Record<string, unknown>) => void;
}

export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export function formatLogLine(entry: LogEntry): string {
  return `[${new Date(entry.timestamp).toISOString()}] [${entry.level}] ${entry.event}`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = options.level ?? "info";
  const write = options.write ?? ((line: string, data?: Record<string, unknown>) => {
    // eslint-disable-next-line no-console
    console.log(line, data ?? "");
  });

  return (entry: LogEntry) => {
    if (!isLevelEnabled(threshold, entry.level)) return;
    write(formatLogLine(entry), entry.data);
  };
}

export const silentLogger: Logger = () => {};

/** Small helper so call sites read `log.debug("event", {...})`. */
export interface BoundLogger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

export function bindLogger(logger: Logger, base: Record<string, unknown> = {}): BoundLogger {
  const emit = (level: LogLevel, event: string, data?: Record<string, unknown>): void => {
    logger({ timestamp: Date.now(), level, event, data: { ...base, ...data } });
  };
  return {
    debug: (event, data) => emit("debug", event, data),
    info: (event, data) => emit("info", event, data),
    warn: (event, data) => emit("warn", event, data),
    error: (event, data) => emit("error", event, data),
  };
}
